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


import type { Logger } from 'tabfill-utils';

/** 
 * options for creating a table filler 
 */
export interface TableFillerOptions {

  /** 
   * target sheet, by name. this is the name declared in the workbook, 
   * not the part name. also the default table name for preserving 
   * formulas and refreshing the table range.
   */
  sheet_name?: string;

  /** 
   * target sheet, by sheetId. if this is set it wins over sheet_name 
   * for choosing the sheet.
   */
  sheet_id?: number;

  /** 
   * save after every change to the file. if an attach fails part way 
   * through, changes made up to that point stay in the file.
   */
  auto_save?: boolean;

  /** logger. defaults to a new pino logger, silent unless TABFILL_LOG_LEVEL is set. */
  logger?: Logger;

  /** directory for scratch files (FillXLSX). defaults to os.tmpdir(). */
  temp_dir?: string;

}

export const DefaultTableFillerOptions: TableFillerOptions = {
  sheet_name: 'Data',
  auto_save: false,
};
