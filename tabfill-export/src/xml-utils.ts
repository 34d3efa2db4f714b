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
import { XMLValidator } from 'fast-xml-parser';
import { FormatError } from 'tabfill-base-types';

const entities: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  '\'': '&apos;',
};

/** 
 * escape the five predefined entities. nothing else is touched: control
 * characters and the like are written as-is.
 */
export const EscapeXML = (text: string): string => {
  return text.replace(/[&<>"']/g, match => entities[match] || match);
};

/**
 * parse into a mutable tree. the validator runs first because the tree 
 * parser is not reliable about reporting truncated documents.
 */
export const ParseDOM = (data: string, part?: string): ElementTree.ElementTree => {

  const result = XMLValidator.validate(data);
  if (result !== true) {
    throw new FormatError(`invalid xml: ${result.err.msg} at ${result.err.line}:${result.err.col}`, { part });
  }

  let dom: ElementTree.ElementTree;

  try {
    dom = ElementTree.parse(data);
  }
  catch (err) {
    throw new FormatError('invalid xml', { part }, { cause: err });
  }

  if (!dom.getroot()) {
    throw new FormatError('empty document', { part });
  }

  return dom;

};

export const WriteDOM = (dom: ElementTree.ElementTree): string => {
  return dom.write({ xml_declaration: true });
};

/**
 * insert a child at index, moving later children along. Element.insert
 * overwrites the child at index; getchildren() is the live child list.
 */
export const InsertChild = (parent: ElementTree.Element, index: number, child: ElementTree.Element): void => {
  parent.getchildren().splice(index, 0, child);
};

/** swap one child for another, in the same position */
export const ReplaceChild = (parent: ElementTree.Element, index: number, child: ElementTree.Element): void => {
  parent.getchildren().splice(index, 1, child);
};

/** element text, or empty string */
export const ElementText = (element: ElementTree.Element|null|undefined): string => {
  return element?.text?.toString() ?? '';
};

/** 
 * 1-based column index to letters. 
 */
export const ColumnLabel = (column: number): string => {
  let label = '';
  while (column > 0) {
    const x = ((column - 1) % 26) + 1;
    label = String.fromCharCode(64 + x) + label;
    column = (column - x) / 26;
  }
  return label;
};
