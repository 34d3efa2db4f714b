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
import type * as ElementTree from 'elementtree';
import { Element } from 'elementtree';

import { FormatError, MissingResourceError, UnsupportedOperationError } from 'tabfill-base-types';
import { ComponentLogger, type Logger } from 'tabfill-utils';

import { ParseRelationships, ResolveTarget, type RelationshipMap } from './relationship';
import { StyleSheet } from './style';
import { TablePart } from './table';
import type { CalculatedColumn } from './worksheet';
import { ColumnLabel, InsertChild, ParseDOM, ReplaceChild, WriteDOM } from './xml-utils';
import { ZipWrapper } from './zip-wrapper';

export interface WorkbookOptions {

  /** write here on save. defaults to the source file. */
  target?: string;

  /** save after every change */
  auto_save?: boolean;

  logger?: Logger;
}

/** look up a sheet by id (sheetId) or name. id wins if both are set. */
export interface SheetReference {
  id?: number;
  name?: string;
}

export interface SheetInfo {
  id: number;
  name: string;
  rid?: string;
}

const workbook_path = 'xl/workbook.xml';
const workbook_rels_path = 'xl/_rels/workbook.xml.rels';
const styles_path = 'xl/styles.xml';
const tables_path = 'xl/tables/';

/**
 * workbook elements that come before calcPr. if we have to create calcPr,
 * it goes after the last of these.
 */
const before_calc = ['fileVersion', 'fileSharing', 'workbookPr', 'workbookProtection', 
  'bookViews', 'sheets', 'functionGroups', 'externalReferences', 'definedNames'];

/**
 * an xlsx file opened for patching. parts are read and parsed on demand,
 * and written back to the in-memory archive after each change; nothing 
 * goes to disk until Save (or Close, if there are changes). with 
 * auto_save, every change is saved immediately.
 */
export class Workbook {

  private zip?: ZipWrapper;

  private dirty = false;

  /** the file we read from. this changes to the target after saving. */
  private current: string;

  private readonly target: string;

  private readonly auto_save: boolean;

  private readonly logger: Logger;

  constructor(public readonly source: string, options: WorkbookOptions = {}) {
    this.current = source;
    this.target = options.target ?? source;
    this.auto_save = !!options.auto_save;
    this.logger = ComponentLogger('workbook', options.logger);
    this.zip = this.Open(source);
  }

  public get is_open(): boolean {
    return !!this.zip;
  }

  public get is_dirty(): boolean {
    return this.dirty;
  }

  /** sheet names, in workbook order */
  public SheetNames(): string[] {
    return this.Sheets().map(sheet => sheet.name);
  }

  public Count(): number {
    return this.Sheets().length;
  }

  public Sheets(): SheetInfo[] {
    return this.ReadPart(workbook_path).findall('./sheets/sheet').map(element => ({
      id: Number(element.attrib.sheetId),
      name: element.attrib.name || '',
      rid: element.attrib['r:id'],
    }));
  }

  /**
   * find the worksheet part for a sheet. we look for a declared sheet
   * first and follow its relationship. if that doesn't work we use the 
   * conventional path for the id. the part has to exist.
   */
  public ResolveSheetPath(by: SheetReference): string {

    const sheet = this.Sheets().find(candidate => 
      (by.id !== undefined) ? candidate.id === by.id : candidate.name === by.name);

    let path: string|undefined;

    if (sheet?.rid) {
      const relationship = this.ReadRels(workbook_rels_path)[sheet.rid];
      if (relationship) {
        path = ResolveTarget('xl', relationship.target);
      }
    }

    if (!path) {
      const id = by.id ?? sheet?.id;
      if (id === undefined) {
        throw new MissingResourceError('sheet not found', { file: this.current, sheet: by.name });
      }
      path = `xl/worksheets/sheet${id}.xml`;
    }

    if (!this.archive.Has(path)) {
      throw new MissingResourceError('worksheet not found', { file: this.current, part: path, sheet: by.id ?? by.name });
    }

    return path;

  }

  /** 
   * find a table by display name. returns undefined if there's no 
   * such table.
   */
  public FindTable(display_name: string): TablePart|undefined {
    for (const path of this.archive.List(tables_path)) {
      if (/\.xml$/i.test(path)) {
        const table = new TablePart(path, this.ReadPart(path));
        if (table.display_name === display_name) {
          return table;
        }
      }
    }
    return undefined;
  }

  public GetCalculatedColumns(display_name: string): CalculatedColumn[] {
    return this.RequireTable(display_name).CalculatedColumns();
  }

  /**
   * returns a cell style index for dates, adding a number format 
   * and/or style if necessary.
   */
  public EnsureDateTimeStyle(): number {

    const styles = new StyleSheet(this.ReadPart(styles_path), this.logger);
    const index = styles.EnsureDateTimeStyle();

    if (styles.modified) {
      this.WritePart(styles_path, styles.dom);
      this.Changed();
    }

    this.logger.debug({ index }, 'date style');
    return index;

  }

  /**
   * replace the sheetData element in a worksheet with the one from 
   * fragment (a worksheet document). everything else in the part is 
   * left alone, except the dimension, which we update.
   */
  public ReplaceSheetData(path: string, fragment: string): void {

    const source = ParseDOM(fragment, path);
    const root = source.getroot();
    const replacement = root.tag === 'sheetData' ? root : source.find('./sheetData');

    if (!replacement) {
      throw new FormatError('sheetData not found in generated xml', { file: this.current, part: path });
    }

    const dom = this.ReadPart(path);
    const worksheet = dom.getroot();
    const children = worksheet.getchildren();
    const index = children.findIndex(child => child.tag === 'sheetData');

    if (index < 0) {
      throw new FormatError('sheetData not found', { file: this.current, part: path });
    }

    const current = children[index];
    replacement.tail = current.tail;

    ReplaceChild(worksheet, index, replacement);

    const dimension = dom.find('./dimension');
    if (dimension) {
      dimension.attrib.ref = this.Dimension(replacement);
    }

    this.WritePart(path, dom);
    this.Changed();

  }

  /**
   * set the last row of a table. row_count includes the header row.
   */
  public RefreshTableRange(display_name: string, row_count: number): void {

    const table = this.RequireTable(display_name);
    table.RefreshRange(row_count);

    this.logger.debug({ table: display_name, ref: table.ref }, 'table range');

    this.WritePart(table.path, table.dom);
    this.Changed();

  }

  /**
   * set (or clear) the flag that tells the application to recalculate 
   * everything when the file is opened.
   */
  public EnableAutoCalculation(flag = true): void {

    const dom = this.ReadPart(workbook_path);
    let calc = dom.find('./calcPr');

    if (!calc) {
      calc = Element('calcPr');
      const root = dom.getroot();
      const children = root.getchildren();
      let index = children.length;
      for (let i = children.length - 1; i >= 0; i--) {
        const tag = children[i].tag;
        if (before_calc.some(name => name === tag)) {
          index = i + 1;
          break;
        }
      }
      InsertChild(root, index, calc);
    }

    calc.attrib.fullCalcOnLoad = flag ? '1' : '0';

    this.WritePart(workbook_path, dom);
    this.Changed();

  }

  public AddSheet(name: string): never {
    throw new UnsupportedOperationError('adding sheets is not supported', { file: this.current, sheet: name });
  }

  /**
   * write the archive to the target, then reopen it from there. 
   */
  public Save(): void {

    const bytes = this.archive.ToBytes();
    fs.writeFileSync(this.target, bytes);

    this.dirty = false;
    this.current = this.target;
    this.zip = undefined;

    this.logger.info({ file: this.target, bytes: bytes.byteLength }, 'saved');

    this.zip = this.Open(this.target);

  }

  /**
   * save if there are changes, then release the archive. it's OK to 
   * call this more than once.
   */
  public Close(): void {
    if (this.zip && this.dirty) {
      this.Save();
    }
    this.zip = undefined;
  }

  /**
   * release the archive without saving. changes that were not saved are
   * lost; with auto_save there won't be any.
   */
  public Discard(): void {
    if (this.dirty) {
      this.logger.debug({ file: this.current }, 'discarding changes');
    }
    this.dirty = false;
    this.zip = undefined;
  }

  // --- internal --------------------------------------------------------------

  private get archive(): ZipWrapper {
    if (!this.zip) {
      throw new MissingResourceError('workbook is closed', { file: this.current });
    }
    return this.zip;
  }

  private Open(file: string): ZipWrapper {
    if (!fs.existsSync(file)) {
      throw new MissingResourceError('file not found', { file });
    }
    return new ZipWrapper(fs.readFileSync(file), file);
  }

  private RequireTable(display_name: string): TablePart {
    const table = this.FindTable(display_name);
    if (!table) {
      throw new MissingResourceError('table not found', { file: this.current, table: display_name });
    }
    return table;
  }

  private ReadPart(path: string): ElementTree.ElementTree {
    if (!this.archive.Has(path)) {
      throw new MissingResourceError('part not found', { file: this.current, part: path });
    }
    return ParseDOM(this.archive.Get(path), path);
  }

  private ReadRels(path: string): RelationshipMap {
    return this.archive.Has(path) ? ParseRelationships(this.archive.Get(path), path) : {};
  }

  private WritePart(path: string, dom: ElementTree.ElementTree): void {
    this.archive.Set(path, WriteDOM(dom));
    this.dirty = true;
    this.logger.debug({ part: path }, 'wrote part');
  }

  private Changed(): void {
    if (this.auto_save) {
      this.Save();
    }
  }

  /** range covered by a sheetData element, assuming it starts at A1 */
  private Dimension(sheet_data: ElementTree.Element): string {
    const rows = sheet_data.findall('./row');
    const columns = rows.reduce((max, row) => Math.max(max, row.findall('./c').length), 0);
    return (rows.length && columns) ? `A1:${ColumnLabel(columns)}${rows.length}` : 'A1';
  }

}
