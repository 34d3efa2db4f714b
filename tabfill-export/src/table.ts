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


import type * as ElementTree from 'elementtree';
import { FormatError } from 'tabfill-base-types';
import type { CalculatedColumn } from './worksheet';
import { ElementText } from './xml-utils';

/**
 * replace the row number at the end of a range like `A1:C10`. returns 
 * undefined if the reference doesn't look like that.
 */
export const ReplaceTrailingRow = (ref: string, row: number): string|undefined => {
  const match = ref.match(/^(\w+:[A-Z]+)(\d+)$/);
  return match ? match[1] + row : undefined;
};

/**
 * a table part (xl/tables/tableN.xml)
 */
export class TablePart {

  constructor(public readonly path: string, public readonly dom: ElementTree.ElementTree) {}

  public get display_name(): string {
    return this.dom.getroot().attrib.displayName || '';
  }

  public get ref(): string {
    return this.dom.getroot().attrib.ref || '';
  }

  /**
   * columns with a calculatedColumnFormula, with their position in the 
   * column list.
   */
  public CalculatedColumns(): CalculatedColumn[] {

    const columns: CalculatedColumn[] = [];

    this.dom.findall('./tableColumns/tableColumn').forEach((element, index) => {
      const formula = element.find('./calculatedColumnFormula');
      if (formula) {
        columns.push({
          index,
          header: element.attrib.name || '',
          formula: ElementText(formula),
        });
      }
    });

    return columns;

  }

  /** 
   * set the last row of the table (and its filter). row_count includes 
   * the header row.
   */
  public RefreshRange(row_count: number): void {

    const root = this.dom.getroot();

    const ref = ReplaceTrailingRow(this.ref, row_count);
    if (!ref) {
      throw new FormatError(`can't parse table range "${this.ref}"`, { part: this.path, table: this.display_name });
    }

    root.attrib.ref = ref;

    const filter = this.dom.find('./autoFilter');
    if (filter) {
      const filter_ref = ReplaceTrailingRow(filter.attrib.ref || '', row_count);
      if (filter_ref) {
        filter.attrib.ref = filter_ref;
      }
    }

  }

}
