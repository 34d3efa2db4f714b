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


//
// spreadsheet dates are a day count, 1 == 1 day, with day 1 being 
// January 1, 1900. time is the fraction of a day.
//
// the count includes February 29, 1900, which never happened. this was 
// for compatibility with Lotus 1-2-3, and everyone who reads these files
// expects it, so dates after that point are one day later than the real
// day count. the extra day is only left out for January and February of
// 1900 and earlier years, so December 31, 1899 comes out as 1 and 
// December 30, 1899 as 0.
//
// ref:
// https://docs.microsoft.com/en-us/office/troubleshoot/excel/wrongly-assumes-1900-is-leap-year
//

const day_millis = 86400000;

/** start of the day count, in UTC millis */
const base_date = Date.UTC(1899, 11, 31);

/** 
 * UTC millis for a calendar day. Date.UTC maps years 0-99 to 1900-1999,
 * so we set the year explicitly.
 */
const CalendarDay = (year: number, month: number, day: number): number => {
  const date = new Date(0);
  date.setUTCFullYear(year, month, day);
  date.setUTCHours(0, 0, 0, 0);
  return date.getTime();
};

/**
 * convert a date to a serial date value. we use the wall-clock fields 
 * (local time): the value represents the date as the caller sees it, and
 * spreadsheet dates have no time zone.
 */
export const DateToSerial = (date: Date): number => {

  const year = date.getFullYear();
  const month = date.getMonth(); // 0-based

  const days = Math.round((CalendarDay(year, month, date.getDate()) - base_date) / day_millis);

  // the phantom leap day is counted for everything after Feb 1900
  const leap = (year <= 1900 && month <= 1) ? 0 : 1;

  const time = (date.getHours() * 3600 + date.getMinutes() * 60 + date.getSeconds()) / 86400;

  return days + leap + time;

};
