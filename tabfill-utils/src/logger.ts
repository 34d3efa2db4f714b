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


import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export interface CreateLoggerOptions {

  /** 
   * pino level. defaults to the TABFILL_LOG_LEVEL environment variable,
   * then silent.
   */
  level?: string;

  /** defaults to stdout */
  destination?: DestinationStream;

  /** extra bindings on every line */
  base?: Record<string, string>;

}

export const DefaultLogLevel = (): string => process.env.TABFILL_LOG_LEVEL || 'silent';

export function CreateLogger(options: CreateLoggerOptions = {}): Logger {

  const logger_options: LoggerOptions = {
    level: options.level ?? DefaultLogLevel(),
    base: {
      service: 'tabfill',
      ...options.base,
    },
  };

  return options.destination ? pino(logger_options, options.destination) : pino(logger_options);

}

/** 
 * child logger for a component, or a fresh (default-level) one if the
 * caller didn't pass a parent.
 */
export function ComponentLogger(component: string, parent?: Logger): Logger {
  return (parent ?? CreateLogger()).child({ component });
}
