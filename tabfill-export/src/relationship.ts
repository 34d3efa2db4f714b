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


import { type X2jOptions, XMLParser } from 'fast-xml-parser';
import { FormatError } from 'tabfill-base-types';

export interface Relationship {
  id: string,
  type: string,
  target: string,
  mode?: string;
}

export type RelationshipMap = Record<string, Relationship>;

/**
 * group attributes under `a$` and force arrays on <Relationship/>. we 
 * only read rels, we never write them, so the plain parser is fine.
 */
const RelsOptions: Partial<X2jOptions> = {
  ignoreAttributes: false,
  attributesGroupName: 'a$',
  attributeNamePrefix: '',
  ignoreDeclaration: true,
  isArray: (tag_name: string) => {
    return /Relationship$/.test(tag_name);
  },
};

const parser = new XMLParser(RelsOptions);

const IsRecord = (test: unknown): test is Record<string, unknown> => {
  return !!test && (typeof test === 'object') && !Array.isArray(test);
};

const Attribute = (attributes: Record<string, unknown>, name: string): string|undefined => {
  const value = attributes[name];
  return typeof value === 'string' ? value : undefined;
};

export const ParseRelationships = (data: string, part?: string): RelationshipMap => {

  let parsed: unknown;

  try {
    parsed = parser.parse(data, true);
  }
  catch (err) {
    throw new FormatError('invalid relationships', { part }, { cause: err });
  }

  const rels: RelationshipMap = {};

  const root = IsRecord(parsed) ? parsed.Relationships : undefined;
  const list: unknown = IsRecord(root) ? root.Relationship : undefined;
  const entries: unknown[] = Array.isArray(list) ? list : [];

  for (const entry of entries) {
    const attributes: unknown = IsRecord(entry) ? entry['a$'] : undefined;
    if (IsRecord(attributes)) {
      const id = Attribute(attributes, 'Id');
      const target = Attribute(attributes, 'Target');
      if (id && target) {
        rels[id] = {
          id, 
          target,
          type: Attribute(attributes, 'Type') || '',
          mode: Attribute(attributes, 'TargetMode'),
        };
      }
    }
  }

  return rels;

};

/**
 * resolve a relationship target against the directory of the part that
 * owns the rels. absolute targets start at the package root.
 */
export const ResolveTarget = (base: string, target: string): string => {

  const segments = target.startsWith('/') ? [] : base.split('/').filter(segment => !!segment);

  for (const segment of target.split('/')) {
    if (segment === '..') {
      segments.pop();
    }
    else if (segment && segment !== '.') {
      segments.push(segment);
    }
  }

  return segments.join('/');

};
