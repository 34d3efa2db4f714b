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


/**
 * failure categories. validation problems (a row key with no matching 
 * header) are not in this list: those are recorded on the table and 
 * never thrown.
 */
export enum ErrorType {
  MissingResource =       'MISSING_RESOURCE',
  Format =                'FORMAT',
  UnsupportedOperation =  'UNSUPPORTED_OPERATION',
}

/**
 * whatever we know about where the failure happened. file is the archive
 * on disk, part is the path inside the archive.
 */
export interface ErrorContext {
  file?: string;
  part?: string;
  sheet?: string|number;
  table?: string;
}

export class TabfillError extends Error {

  constructor(
      public readonly type: ErrorType, 
      message: string, 
      public readonly context: ErrorContext = {},
      options?: { cause?: unknown }) {

    super(TabfillError.Compose(message, context), options);
    this.name = new.target.name;

  }

  /** append context as `key=value` pairs so the message stands alone */
  public static Compose(message: string, context: ErrorContext): string {
    const pairs = Object.entries(context)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => `${key}=${value}`);
    return pairs.length ? `${message} (${pairs.join(', ')})` : message;
  }

}

/** a file, archive or required part does not exist */
export class MissingResourceError extends TabfillError {
  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(ErrorType.MissingResource, message, context, options);
  }
}

/** archive can't be opened, or some xml can't be parsed */
export class FormatError extends TabfillError {
  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(ErrorType.Format, message, context, options);
  }
}

/** 
 * thrown on every call to an operation we don't support (adding sheets, 
 * changing column types).
 */
export class UnsupportedOperationError extends TabfillError {
  constructor(message: string, context: ErrorContext = {}) {
    super(ErrorType.UnsupportedOperation, message, context);
  }
}

/** typeguard */
export const IsTabfillError = (test: unknown): test is TabfillError => {
  return test instanceof TabfillError;
};
