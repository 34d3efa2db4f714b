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


import { type CellValue, type SerializedCellKind, CellText, IsTaggedValue, IsValidDate, UnsupportedOperationError } from 'tabfill-base-types';
import { ComponentLogger, type Logger } from 'tabfill-utils';
import type { FailedCell, Header, HeaderInput, RowInput } from './types';
import { IsMapRow, IsPositionalRow } from './types';

export interface DataTableOptions {
  logger?: Logger;
}

/**
 * text for csv output. tagged values write their value, dates write 
 * ISO strings; we don't format anything.
 */
const CSVText = (value: CellValue): string => {
  if (IsTaggedValue(value)) {
    return CSVText(IsValidDate(value.value) ? value.value : CellText(value.value));
  }
  if (IsValidDate(value)) {
    return value.toISOString();
  }
  return CellText(value);
};

/**
 * in-memory table: a list of headers and a list of rows. rows are stored
 * sparse (ordinal -> value) and filled out when exported, so rows added 
 * before a column existed are still the right width.
 */
export class DataTable {

  /** headers in ordinal order */
  private headers: Header[] = [];

  /** name -> ordinal */
  private header_index: Map<string, number> = new Map();

  private rows: Array<Map<number, CellValue>> = [];

  private failed_cells: FailedCell[] = [];

  /** set once, on the first header registration. never reset. */
  private headers_defined_ = false;

  private headers_visible_ = false;

  private logger: Logger;

  constructor(options: DataTableOptions = {}) {
    this.logger = ComponentLogger('data-table', options.logger);
  }

  public get headers_defined(): boolean {
    return this.headers_defined_;
  }

  public get headers_visible(): boolean {
    return this.headers_visible_;
  }

  public get HeaderCount(): number {
    return this.headers.length;
  }

  /** data rows, not counting the header row */
  public get RowCount(): number {
    return this.rows.length;
  }

  /**
   * register headers, in order. names that are already registered keep 
   * their ordinal and label; registering them again is a caller error, 
   * which we log and skip. use SetLabel to change a label.
   */
  public SetHeaders(headers: HeaderInput): this {

    const entries = IsMapRow(headers) ? Array.from(headers.entries()) : Object.entries(headers);

    for (const [name, label] of entries) {
      if (this.header_index.has(name)) {
        this.logger.warn({ name }, 'header already registered, ignoring');
        continue;
      }
      const ordinal = this.headers.length;
      this.headers.push({ name, label, ordinal });
      this.header_index.set(name, ordinal);
    }

    this.headers_defined_ = true;
    return this;

  }

  /** name -> label, in ordinal order */
  public GetHeaders(): Map<string, string> {
    return new Map(this.headers.map(header => [header.name, header.label]));
  }

  public SetLabel(name: string, label: string): this {
    const ordinal = this.header_index.get(name);
    if (ordinal === undefined) {
      this.logger.warn({ name }, 'set label: no such header');
    }
    else {
      this.headers[ordinal].label = label;
    }
    return this;
  }

  public ShowHeaders(): this {
    this.headers_visible_ = true;
    return this;
  }

  public HideHeaders(): this {
    this.headers_visible_ = false;
    return this;
  }

  /**
   * add a row. if we don't have headers yet, this row defines them (the 
   * keys are used as both name and label). values with keys that don't 
   * match a header are recorded as failed cells; this never throws.
   *
   * positional rows (arrays) are placed by index, without name lookup.
   */
  public AddRow(row: RowInput): this {

    const positional = IsPositionalRow(row);

    const entries: Array<[string|number, CellValue]> = 
      positional ? row.map((value, index): [number, CellValue] => [index, value]) :
      IsMapRow(row) ? Array.from(row.entries()) :
      Object.entries(row);

    if (!this.headers_defined_) {
      this.SetHeaders(new Map(entries.map(([key]) => [String(key), String(key)])));
    }

    const index = this.rows.length;
    const cells: Map<number, CellValue> = new Map();

    for (const [key, value] of entries) {

      const ordinal = (typeof key === 'number' && positional) ?
        (key < this.headers.length ? key : undefined) :
        this.header_index.get(String(key));

      if (ordinal === undefined) {
        this.failed_cells.push({ row: index, name: String(key), value });
        this.logger.debug({ row: index, name: String(key) }, 'no header for value');
      }
      else {
        cells.set(ordinal, value);
      }

    }

    this.rows.push(cells);
    return this;

  }

  /** add rows in order. throws only if rows is not iterable. */
  public AddRows(rows: Iterable<RowInput>): this {
    for (const row of rows) {
      this.AddRow(row);
    }
    return this;
  }

  /** values we could not place, across every AddRow call so far */
  public GetFailedCells(): FailedCell[] {
    return this.failed_cells.map(cell => ({ ...cell }));
  }

  /** not supported; columns are typed by their values */
  public SetColumnType(column: string|number, type: SerializedCellKind): never {
    throw new UnsupportedOperationError(`can't set type of column ${column} to ${type}: column types are not supported`);
  }

  /** 
   * dense rows, each exactly HeaderCount wide. missing values are empty 
   * strings. if headers are visible, the label row comes first.
   */
  public ToArray(): CellValue[][] {

    const result: CellValue[][] = [];

    if (this.headers_visible_) {
      result.push(this.headers.map(header => header.label));
    }

    for (const cells of this.rows) {
      const row: CellValue[] = [];
      for (let i = 0; i < this.headers.length; i++) {
        row.push(cells.get(i) ?? '');
      }
      result.push(row);
    }

    return result;

  }

  /**
   * fields are wrapped in quote and joined with separator; rows are joined
   * with line_ending. there's no escaping: if the data can contain the 
   * separator or the quote, that's up to the caller.
   */
  public ToCSV(separator = ',', quote = '', line_ending = '\n'): string {
    return this.ToArray().map(row => 
      row.map(value => quote + CSVText(value) + quote).join(separator)).join(line_ending);
  }

  public toString(): string {
    return this.ToCSV();
  }

}
