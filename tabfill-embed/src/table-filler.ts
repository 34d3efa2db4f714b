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


import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import type { CellValue, SerializedCellKind } from 'tabfill-base-types';
import { DataTable, type FailedCell, type HeaderInput, type RowInput } from 'tabfill-data-model';
import { type CalculatedColumn, type SheetReference, Workbook, WorksheetWriter } from 'tabfill-export';
import { CreateLogger, type Logger } from 'tabfill-utils';

import { DefaultTableFillerOptions, type TableFillerOptions } from './options';

/**
 * fills one sheet of an existing xlsx file with the rows of a table. 
 * everything else in the file (other sheets, charts, pivots, styles) is
 * left as it was. 
 *
 * ```ts
 * const filler = new TableFiller({ sheet_name: 'Data' });
 * filler.ShowHeaders().AddRows(rows);
 * filler.AttachToFile('template.xlsx', 'report.xlsx');
 * ```
 */
export class TableFiller {

  public readonly table: DataTable;

  private options: TableFillerOptions;

  private logger: Logger;

  /** table names, set when requested. an empty string means the sheet name. */
  private preserve_formulas?: string;
  private refresh_table?: string;

  constructor(options: TableFillerOptions = {}) {
    this.options = { ...DefaultTableFillerOptions, ...options };
    this.logger = this.options.logger ?? CreateLogger();
    this.table = new DataTable({ logger: this.logger });
  }

  // --- table -----------------------------------------------------------------

  public get HeaderCount(): number {
    return this.table.HeaderCount;
  }

  public get RowCount(): number {
    return this.table.RowCount;
  }

  public get headers_visible(): boolean {
    return this.table.headers_visible;
  }

  public SetHeaders(headers: HeaderInput): this {
    this.table.SetHeaders(headers);
    return this;
  }

  public GetHeaders(): Map<string, string> {
    return this.table.GetHeaders();
  }

  public SetLabel(name: string, label: string): this {
    this.table.SetLabel(name, label);
    return this;
  }

  public ShowHeaders(): this {
    this.table.ShowHeaders();
    return this;
  }

  public HideHeaders(): this {
    this.table.HideHeaders();
    return this;
  }

  public AddRow(row: RowInput): this {
    this.table.AddRow(row);
    return this;
  }

  public AddRows(rows: Iterable<RowInput>): this {
    this.table.AddRows(rows);
    return this;
  }

  public GetFailedCells(): FailedCell[] {
    return this.table.GetFailedCells();
  }

  public SetColumnType(column: string|number, type: SerializedCellKind): never {
    return this.table.SetColumnType(column, type);
  }

  public ToArray(): CellValue[][] {
    return this.table.ToArray();
  }

  public ToCSV(separator = ',', quote = '', line_ending = '\n'): string {
    return this.table.ToCSV(separator, quote, line_ending);
  }

  /** 
   * the worksheet document for the current rows, with the default date 
   * style and no calculated columns.
   */
  public ToXML(): string {
    return new WorksheetWriter().AddRows(this.table.ToArray()).ToXML();
  }

  public toString(): string {
    return this.ToCSV();
  }

  // --- target ----------------------------------------------------------------

  public SetSheetName(name: string): this {
    this.options.sheet_name = name;
    return this;
  }

  public SetSheetId(id: number): this {
    this.options.sheet_id = id;
    return this;
  }

  /**
   * keep the calculated columns of a table in the template. the formulas
   * are read before the sheet is replaced, and added back to every row. 
   * the table defaults to the sheet name.
   */
  public PreserveFormulas(table = ''): this {
    this.preserve_formulas = table;
    return this;
  }

  /** 
   * resize a table in the template to fit the rows. the table defaults
   * to the sheet name.
   */
  public RefreshTableRange(table = ''): this {
    this.refresh_table = table;
    return this;
  }

  // --- files -----------------------------------------------------------------

  /**
   * replace the target sheet's data in src with our rows. writes to dst, 
   * or back to src if there's no dst. unless auto_save is set, nothing is 
   * written if this throws.
   */
  public AttachToFile(src: string, dst?: string, force_auto_calculation = false): void {

    const sheet: SheetReference = this.options.sheet_id !== undefined ?
      { id: this.options.sheet_id } : { name: this.options.sheet_name };

    let calculated_columns: CalculatedColumn[] = [];

    if (this.preserve_formulas !== undefined) {
      const table = this.preserve_formulas || this.options.sheet_name || '';
      const reader = new Workbook(src, { logger: this.logger });
      try {
        calculated_columns = reader.GetCalculatedColumns(table);
      }
      finally {
        reader.Close();
      }
      this.logger.debug({ table, columns: calculated_columns.length }, 'preserving formulas');
    }

    const workbook = new Workbook(src, { 
      target: dst, 
      auto_save: this.options.auto_save, 
      logger: this.logger,
    });

    try {

      const part = workbook.ResolveSheetPath(sheet);

      const writer = new WorksheetWriter()
        .SetDateTimeStyle(workbook.EnsureDateTimeStyle())
        .AddRows(this.table.ToArray(), calculated_columns);

      workbook.ReplaceSheetData(part, writer.ToXML());

      if (force_auto_calculation) {
        workbook.EnableAutoCalculation();
      }

      if (this.refresh_table !== undefined) {
        workbook.RefreshTableRange(
          this.refresh_table || this.options.sheet_name || '', 
          this.table.RowCount + 1);
      }

      workbook.Close();

    }
    catch (err) {
      workbook.Discard();
      throw err;
    }

    this.logger.info({
      file: dst ?? src, 
      sheet: sheet.id ?? sheet.name,
      rows: this.table.RowCount,
      failed: this.table.GetFailedCells().length,
    }, 'attached');

  }

  /**
   * attach to a copy of src and return the bytes. src is not modified. 
   */
  public FillXLSX(src: string): Uint8Array {

    const dir = fs.mkdtempSync(path.join(this.options.temp_dir ?? os.tmpdir(), 'tabfill-'));

    try {
      const scratch = path.join(dir, 'output.xlsx');
      this.AttachToFile(src, scratch);
      return new Uint8Array(fs.readFileSync(scratch));
    }
    finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }

  }

}
