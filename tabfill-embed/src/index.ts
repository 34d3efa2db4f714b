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


export { TableFiller } from './table-filler';
export * from './options';

export { DataTable } from 'tabfill-data-model';
export type { FailedCell, Header, HeaderInput, RowInput } from 'tabfill-data-model';
export { Workbook, WorksheetWriter } from 'tabfill-export';
export type { CalculatedColumn, WorkbookOptions } from 'tabfill-export';
export * from 'tabfill-base-types';
export { CreateLogger } from 'tabfill-utils';
export type { Logger } from 'tabfill-utils';
