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


import UZip from 'uzip';
import { FormatError, MissingResourceError } from 'tabfill-base-types';

/** end of central directory record signature, little-endian */
const eocd_signature = 0x06054b50;

/** fixed part of the end of central directory record */
const eocd_length = 22;

/** max length of the trailing archive comment */
const max_comment_length = 0xffff;

/**
 * look for the end of central directory record. UZip will spin forever
 * looking for it if it's not there, so we check first.
 */
export const IsZipArchive = (data: Uint8Array): boolean => {

  if (data.byteLength < eocd_length) {
    return false;
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const limit = Math.max(0, data.byteLength - eocd_length - max_comment_length);

  for (let offset = data.byteLength - eocd_length; offset >= limit; offset--) {
    if (view.getUint32(offset, true) === eocd_signature) {
      return true;
    }
  }

  return false;

};

/**
 * holds the decompressed entries of an archive. entries keep their 
 * original bytes (and order) unless they are replaced with Set. 
 */
export class ZipWrapper {

  public records: UZip.UZIPFiles;

  public constructor(data: Uint8Array, file?: string) {

    if (!IsZipArchive(data)) {
      throw new FormatError('not a zip archive', { file });
    }

    // copy, so we hand UZip a plain ArrayBuffer with nothing else in it
    const buffer = new ArrayBuffer(data.byteLength);
    new Uint8Array(buffer).set(data);

    try {
      this.records = UZip.parse(buffer);
    }
    catch (err) {
      throw new FormatError('can\'t read zip archive', { file }, { cause: err });
    }

  }

  /**
   * check if entry exists
   */
  public Has(path: string): boolean {
    return !!this.records[path];
  }

  /** 
   * entry paths, in archive order, optionally filtered by prefix 
   */
  public List(prefix = ''): string[] {
    return Object.keys(this.records).filter(path => path.startsWith(prefix));
  }

  /**
   * nondestructive
   */
  public ToBytes(): Uint8Array {
    return new Uint8Array(UZip.encode(this.records));
  }

  /**
   * replace (or add) a text entry. replacing keeps the entry's position.
   */
  public Set(path: string, text: string): void {
    this.records[path] = new TextEncoder().encode(text);
  }

  public GetBinary(path: string): Uint8Array {
    const data = this.records[path];
    if (data) {
      return new Uint8Array(data);
    }
    throw new MissingResourceError('path not in zip file', { part: path });
  }

  public Get(path: string): string {
    return new TextDecoder().decode(this.GetBinary(path));
  }

}
