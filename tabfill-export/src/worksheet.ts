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


import { CellKind, ClassifyValue, DateToSerial } from 'tabfill-base-types';
import type { TypedCell } from 'tabfill-base-types';
import { EscapeXML } from './xml-utils';

/**
 * a table column whose values come from a formula. index is the 0-based
 * position of the column in the table.
 */
export interface CalculatedColumn {
  index: number;
  header: string;
  formula: string;
}

/** cell style for dates until we know better */
export const default_date_style = 1;

const xml_header = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

const worksheet_open = '<worksheet xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main"' 
  + ' xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships">';

const worksheet_close = '</worksheet>';

/**
 * buffers rows and renders a worksheet document containing only sheetData.
 * rows are written in the order they were added, numbered from 1. 
 * we don't pad rows; that's up to the data model.
 */
export class WorksheetWriter {

  private rows: TypedCell[][] = [];

  private date_style = default_date_style;

  /** rendered xml, until something changes */
  private cached?: string;

  public get RowCount(): number {
    return this.rows.length;
  }

  /**
   * set the cell style index used for dates. this is an index into 
   * cellXfs, not a number format id.
   */
  public SetDateTimeStyle(style: number): this {
    this.date_style = style;
    this.cached = undefined;
    return this;
  }

  public AddRow(cells: readonly unknown[]): this {
    this.rows.push(cells.map(cell => ClassifyValue(cell)));
    this.cached = undefined;
    return this;
  }

  /**
   * add rows. calculated columns are inserted into each row at their 
   * index, in order: the first row gets the header label and every other 
   * row gets the formula. this assumes the first row is the header row.
   */
  public AddRows(rows: Iterable<readonly unknown[]>, calculated_columns: readonly CalculatedColumn[] = []): this {

    let index = 0;

    for (const row of rows) {
      const cells: unknown[] = [...row];
      for (const column of calculated_columns) {
        cells.splice(column.index, 0, index === 0 ? 
          column.header : 
          { type: CellKind.formula, value: column.formula });
      }
      this.AddRow(cells);
      index++;
    }

    return this;

  }

  public CellXML(cell: TypedCell): string {
    switch (cell.kind) {
      case CellKind.number:
        return `<c><v>${cell.value.toString()}</v></c>`;
      case CellKind.datetime:
        return `<c s="${this.date_style}"><v>${DateToSerial(cell.value)}</v></c>`;
      case CellKind.formula:
        return `<c><f>${EscapeXML(cell.value)}</f></c>`;
      case CellKind.string:
        return `<c t="inlineStr"><is><t>${EscapeXML(cell.value)}</t></is></c>`;
    }
  }

  public ToXML(): string {

    if (this.cached === undefined) {

      const rows = this.rows.map((cells, index) => 
        `<row r="${index + 1}">${cells.map(cell => this.CellXML(cell)).join('')}</row>`);

      this.cached = xml_header 
        + worksheet_open 
        + (rows.length ? `<sheetData>${rows.join('')}</sheetData>` : '<sheetData/>')
        + worksheet_close;

    }

    return this.cached;

  }

}
