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


import * as ElementTree from 'elementtree';
import { Element } from 'elementtree';
import { FormatError } from 'tabfill-base-types';
import type { Logger } from 'tabfill-utils';
import { InsertChild } from './xml-utils';

export interface NumberFormat {
  id: number;
  format: string;
}

/** the format we add if we can't find one */
export const datetime_format = 'dd/mm/yyyy\\ hh:mm:ss';

/** exact matches, compared upper-case */
const exact_formats = ['DD/MM/YYYY\\ HH:MM:SS', 'DD/MM/YYYY HH:MM:SS'];

/** tokens for scoring. each token present counts once. */
const score_tokens = ['Y', 'YY', 'YYYY', 'M', 'MM', 'D', 'DD', 'H', 'HH', 'HH:MM', 'HH:MM:SS'];

/** a format has to beat this score to be used */
const score_threshold = 3;

/** ids up to here are reserved for builtin formats */
const last_builtin_format = 163;

/**
 * wraps a parsed styles.xml. the only thing we do is find (or create) a 
 * cell style for dates.
 */
export class StyleSheet {

  public modified = false;

  constructor(public readonly dom: ElementTree.ElementTree, private readonly logger?: Logger) {}

  /** 
   * count date/time tokens in a format code. this is a rough guess at 
   * whether the format shows a date and a time.
   */
  public static ScoreFormat(format: string): number {
    const code = format.toUpperCase();
    return score_tokens.reduce((score, token) => score + (code.includes(token) ? 1 : 0), 0);
  }

  public static IsExactFormat(format: string): boolean {
    return exact_formats.includes(format.toUpperCase());
  }

  public NumberFormats(): NumberFormat[] {
    return this.dom.findall('./numFmts/numFmt').map(element => ({
      id: Number(element.attrib.numFmtId),
      format: element.attrib.formatCode || '',
    }));
  }

  /**
   * choose a number format for dates: an exact match if there is one, 
   * then the best-scoring format over the threshold. failing both, add 
   * a new format.
   */
  public EnsureDateTimeFormat(): number {

    const formats = this.NumberFormats();

    const exact = formats.find(candidate => StyleSheet.IsExactFormat(candidate.format));
    if (exact) {
      return exact.id;
    }

    let best: NumberFormat|undefined;
    let best_score = score_threshold;

    for (const candidate of formats) {
      const score = StyleSheet.ScoreFormat(candidate.format);
      if (score > best_score) {
        best = candidate;
        best_score = score;
      }
    }

    if (best) {
      this.logger?.debug({ id: best.id, format: best.format, score: best_score }, 'using existing date format');
      return best.id;
    }

    const id = formats.reduce((max, candidate) => Math.max(max, candidate.id || 0), last_builtin_format) + 1;

    let number_formats = this.dom.find('./numFmts');

    if (!number_formats) {
      number_formats = Element('numFmts', { count: '0' });
      InsertChild(this.dom.getroot(), 0, number_formats);
    }

    number_formats.append(Element('numFmt', {
      numFmtId: id.toString(),
      formatCode: datetime_format,
    }));

    number_formats.attrib.count = number_formats.findall('./numFmt').length.toString();

    this.modified = true;
    this.logger?.debug({ id }, 'added date format');

    return id;

  }

  /** 
   * returns the cell style (index into cellXfs) for dates. 
   */
  public EnsureDateTimeStyle(): number {

    const xfs = this.dom.find('./cellXfs');
    if (!xfs) {
      throw new FormatError('cellXfs not found', { part: 'xl/styles.xml' });
    }

    const id = this.EnsureDateTimeFormat();
    const elements = xfs.findall('./xf');

    const index = elements.findIndex(element => Number(element.attrib.numFmtId) === id);
    if (index >= 0) {
      return index;
    }

    xfs.append(Element('xf', {
      numFmtId: id.toString(),
      fontId: '0',
      fillId: '0',
      borderId: '0',
      xfId: '0',
      applyNumberFormat: '1',
    }));

    xfs.attrib.count = (elements.length + 1).toString();

    this.modified = true;
    this.logger?.debug({ id, index: elements.length }, 'added date style');

    return elements.length;

  }

}
