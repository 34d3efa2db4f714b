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


/**
 * cell kinds we can write. this is a much smaller set than a spreadsheet
 * can hold: booleans, errors and the rest are written as strings.
 */
export enum CellKind {
  string = 'string',
  number = 'number',
  datetime = 'datetime',
  formula = 'formula',
}

/** string types accepted on explicitly tagged values */
export type SerializedCellKind = 'string'|'number'|'datetime'|'formula';

export const CellKindList: readonly SerializedCellKind[] = [
  'string', 'number', 'datetime', 'formula',
] as const;

export interface StringCell {
  kind: CellKind.string;
  value: string;
}

export interface NumberCell {
  kind: CellKind.number;
  value: number|bigint;
}

export interface DateTimeCell {
  kind: CellKind.datetime;
  value: Date;
}

export interface FormulaCell {
  kind: CellKind.formula;

  /** expression, without a leading = */
  value: string;
}

export type TypedCell = StringCell | NumberCell | DateTimeCell | FormulaCell;

/**
 * a value with an explicit type. this is the only way to get a formula
 * cell; it can also force a type on a value that would otherwise be 
 * classified differently (numbers as strings, for example).
 */
export interface TaggedValue {
  type: SerializedCellKind;
  value: unknown;
}

/** anything that can go in a cell */
export type CellValue = TaggedValue|Date|number|bigint|string|boolean|null|undefined;

/** typeguard */
export const IsTaggedValue = (test: unknown): test is TaggedValue => {
  if (typeof test !== 'object' || !test || !('type' in test) || !('value' in test)) {
    return false;
  }
  const { type, value } = test;
  return CellKindList.some(kind => kind === type) && value !== undefined && value !== null;
};

/** typeguard. invalid dates (NaN time) don't count. */
export const IsValidDate = (test: unknown): test is Date => {
  return (test instanceof Date) && !isNaN(test.getTime());
};

/** 
 * stringify for inline strings. null and undefined are empty. 
 */
export const CellText = (value: unknown): string => {
  if (value === null || value === undefined) {
    return '';
  }
  return String(value);
};

const Text = (value: unknown): StringCell => ({ kind: CellKind.string, value: CellText(value) });

/**
 * classify a raw value. this is the only place we look at runtime types;
 * rendering works from the result.
 */
export const ClassifyValue = (value: unknown): TypedCell => {

  if (IsTaggedValue(value)) {
    switch (value.type) {

      case 'formula':
        return { kind: CellKind.formula, value: CellText(value.value) };

      case 'number':
        if (typeof value.value === 'bigint') {
          return { kind: CellKind.number, value: value.value };
        }
        else {
          const number = Number(value.value);
          if (Number.isFinite(number)) {
            return { kind: CellKind.number, value: number };
          }
        }
        return Text(value.value);

      case 'datetime':
        if (IsValidDate(value.value)) {
          return { kind: CellKind.datetime, value: value.value };
        }
        if (typeof value.value === 'string' || typeof value.value === 'number') {
          const date = new Date(value.value);
          if (IsValidDate(date)) {
            return { kind: CellKind.datetime, value: date };
          }
        }
        return Text(value.value);

      case 'string':
        return Text(value.value);
    }
  }

  switch (typeof value) {

    case 'number':

      // NaN and infinities have no representation in a <v/> element
      if (Number.isFinite(value)) {
        return { kind: CellKind.number, value };
      }
      return Text(value);

    case 'bigint':
      return { kind: CellKind.number, value };

    case 'object':
      if (IsValidDate(value)) {
        return { kind: CellKind.datetime, value };
      }
      return Text(value);

    default:
      return Text(value);

  }

};
