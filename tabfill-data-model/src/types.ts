/*
 * This file is part of TREB.
 *
 * TREB is free software: you can redistribute it and/or modify it under the 
 * terms of the GNU General Public License as published by the Free Software 
 * Foundation, either version 3 of the License, or (at your option) any 
 * later version.
 *
 * TREB is distributed in the hope that it will be useful, but WITHOUT ANY 
 * WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS 
 * FOR A PARTICULAR PURPOSE. See the GNU General Public License for more 
 * details.
 *
 * You should have received a copy of the GNU General Public License along 
 * with TREB. If not, see <https://www.gnu.org/licenses/>. 
 *
 * Copyright 2022-2024 trebco, llc. 
 * info@treb.app
 * 
 */


import type { CellValue } from 'tabfill-base-types';

/**
 * a column. name is the key we match in keyed rows, label is what we 
 * write in the header row. ordinal is the column index, assigned when
 * the header is first registered and never changed.
 */
export interface Header {
  name: string;
  label: string;
  ordinal: number;
}

/**
 * a value we couldn't place because its key doesn't match any header.
 * row is the 0-based index of the data row (not counting the header row).
 */
export interface FailedCell {
  row: number;
  name: string;
  value: CellValue;
}

/** row with named values: an object or a map */
export type KeyedRow = Readonly<Record<string, CellValue>> | ReadonlyMap<string|number, CellValue>;

/** row with values by position, index === ordinal */
export type PositionalRow = readonly CellValue[];

export type RowInput = KeyedRow | PositionalRow;

/** ordered name -> label */
export type HeaderInput = Readonly<Record<string, string>> | ReadonlyMap<string, string>;

/** typeguard */
export const IsPositionalRow = (row: RowInput): row is PositionalRow => Array.isArray(row);

/** typeguard */
export const IsMapRow = (row: KeyedRow): row is ReadonlyMap<string|number, CellValue> => row instanceof Map;
