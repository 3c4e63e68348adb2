// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal decoders for typed leaf values: numbers, Y/N booleans and OFX
 * datetimes (`YYYYMMDDHHMMSS.XXX[gmt offset[:tz name]]`).
 *
 * Each decoder returns `undefined` when the text does not parse; the caller
 * decides whether that is fatal.
 *
 * @module
 */

import { skipWhitespace } from "./_common.js";
import type { FormatDateTimeOptions } from "./types.js";

const CC_0 = 48; // 0
const CC_9 = 57; // 9
const CC_DOT = 46; // .
const CC_PLUS = 43; // +
const CC_MINUS = 45; // -
const CC_COLON = 58; // :
const CC_LBRACKET = 91; // [
const CC_RBRACKET = 93; // ]

const INT64_MAX = 2n ** 63n - 1n;

/** Largest timezone offset accepted, in hours. */
const MAX_OFFSET_HOURS = 12;

/** A decoded OFX datetime. Month and day are 1-based. */
export interface OfxDateTime {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly millisecond: number;
  /** Offset from UTC in minutes; negative west of Greenwich. */
  readonly offsetMinutes: number;
}

function isDigit(code: number): boolean {
  return code >= CC_0 && code <= CC_9;
}

/**
 * Parses a decimal number: optional sign, digits with at most one `.`,
 * surrounding whitespace allowed. No exponent.
 *
 * @example Usage
 * ```ts
 * import { parseNumber } from "./_values.js";
 *
 * parseNumber("  -12.50 "); // -12.5
 * parseNumber("12.5.3");    // undefined
 * ```
 *
 * @param text The leaf text.
 * @returns The number, or `undefined` if the text is not a number or its
 * digits do not fit a signed 64-bit integer.
 */
export function parseNumber(text: string): number | undefined {
  const len = text.length;
  let pos = skipWhitespace(text, 0);
  if (pos >= len) return undefined;

  let negative = false;
  const first = text.charCodeAt(pos);
  if (first === CC_MINUS || first === CC_PLUS) {
    negative = first === CC_MINUS;
    if (++pos >= len) return undefined;
  }

  let mantissa = 0n;
  let scale = 0;
  let seenPoint = false;
  for (; pos < len; pos++) {
    const code = text.charCodeAt(pos);
    if (code === CC_DOT) {
      if (seenPoint) return undefined;
      seenPoint = true;
    } else if (isDigit(code)) {
      if (seenPoint) scale++;
      mantissa = mantissa * 10n + BigInt(code - CC_0);
      if (mantissa > INT64_MAX) return undefined;
    } else {
      break;
    }
  }

  if (skipWhitespace(text, pos) < len) return undefined;

  const value = Number(mantissa) / 10 ** scale;
  return negative && value !== 0 ? -value : value;
}

/**
 * Parses an OFX boolean: `Y` or `N`, either case, surrounded by whitespace.
 *
 * @example Usage
 * ```ts
 * import { parseBoolean } from "./_values.js";
 *
 * parseBoolean("y");   // true
 * parseBoolean("N  "); // false
 * parseBoolean("yes"); // undefined
 * ```
 */
export function parseBoolean(text: string): boolean | undefined {
  const pos = skipWhitespace(text, 0);
  let value: boolean;
  switch (text[pos]) {
    case "Y":
    case "y":
      value = true;
      break;
    case "N":
    case "n":
      value = false;
      break;
    default:
      return undefined;
  }
  return skipWhitespace(text, pos + 1) >= text.length ? value : undefined;
}

/** Reads exactly `count` digits at `pos`. */
function readFixedDigits(
  text: string,
  pos: number,
  count: number,
): number | undefined {
  if (pos + count > text.length) return undefined;
  let value = 0;
  for (let i = pos; i < pos + count; i++) {
    const code = text.charCodeAt(i);
    if (!isDigit(code)) return undefined;
    value = value * 10 + (code - CC_0);
  }
  return value;
}

/** Reads a run of one or more digits at `pos`; returns its value and end. */
function readDigitRun(
  text: string,
  pos: number,
): { value: number; end: number } | undefined {
  let end = pos;
  let value = 0;
  while (end < text.length && isDigit(text.charCodeAt(end))) {
    value = value * 10 + (text.charCodeAt(end) - CC_0);
    end++;
  }
  return end === pos ? undefined : { value, end };
}

/**
 * Parses the bracketed timezone suffix `[±H[.F][:NAME]]` starting at the `[`.
 * Only trailing whitespace may follow the `]`.
 *
 * @returns The offset in minutes, or `undefined` on failure.
 */
function parseZoneSuffix(text: string, pos: number): number | undefined {
  const len = text.length;
  if (text.charCodeAt(pos) !== CC_LBRACKET) return undefined;
  let i = skipWhitespace(text, pos + 1);
  if (i >= len) return undefined;

  let negative = false;
  const sign = text.charCodeAt(i);
  if (sign === CC_MINUS || sign === CC_PLUS) {
    negative = sign === CC_MINUS;
    if (++i >= len) return undefined;
  }

  const hours = readDigitRun(text, i);
  if (hours === undefined || hours.value > MAX_OFFSET_HOURS) return undefined;
  let minutes = hours.value * 60;
  i = hours.end;
  if (i >= len) return undefined;

  if (text.charCodeAt(i) === CC_DOT) {
    if (++i >= len) return undefined;
    // Whether the fraction is minutes or a fraction of an hour is unknown,
    // so only a zero fraction is accepted.
    const fraction = readDigitRun(text, i);
    if (fraction === undefined || fraction.value !== 0) return undefined;
    i = fraction.end;
  }
  if (negative && minutes !== 0) minutes = -minutes;

  i = skipWhitespace(text, i);
  if (i >= len) return undefined;
  if (text.charCodeAt(i) === CC_COLON) {
    i = text.indexOf("]", i + 1);
    if (i === -1) return undefined;
  }
  if (text.charCodeAt(i) !== CC_RBRACKET) return undefined;

  return skipWhitespace(text, i + 1) < len ? undefined : minutes;
}

/**
 * Parses an OFX datetime.
 *
 * Accepted shapes are `YYYYMMDD`, `YYYYMMDDHHMMSS`, and (from 18 characters
 * on) `YYYYMMDDHHMMSS` followed by an optional `.XXX` millisecond part and an
 * optional `[±H:NAME]` zone suffix. A second of 60 is allowed for leap seconds.
 *
 * @example Usage
 * ```ts
 * import { parseDateTime } from "./_values.js";
 *
 * parseDateTime("20210115120000[-5:EST]")?.offsetMinutes; // -300
 * parseDateTime("2021-01-15"); // undefined
 * ```
 *
 * @param text The leaf text.
 * @returns The decoded fields, or `undefined` if the text is not a datetime.
 */
export function parseDateTime(text: string): OfxDateTime | undefined {
  const len = text.length;
  if (len < 8) return undefined;

  const year = readFixedDigits(text, 0, 4);
  const month = readFixedDigits(text, 4, 2);
  const day = readFixedDigits(text, 6, 2);
  if (year === undefined) return undefined;
  if (month === undefined || month === 0 || month > 12) return undefined;
  if (day === undefined || day === 0 || day > 31) return undefined;

  if (len === 8) {
    return {
      year,
      month,
      day,
      hour: 0,
      minute: 0,
      second: 0,
      millisecond: 0,
      offsetMinutes: 0,
    };
  }
  if (len < 14) return undefined;

  const hour = readFixedDigits(text, 8, 2);
  const minute = readFixedDigits(text, 10, 2);
  const second = readFixedDigits(text, 12, 2);
  if (hour === undefined || hour > 23) return undefined;
  if (minute === undefined || minute > 59) return undefined;
  if (second === undefined || second > 60) return undefined;

  let millisecond = 0;
  let offsetMinutes = 0;
  if (len >= 18) {
    let i = 14;
    if (text.charCodeAt(i) === CC_DOT) {
      const ms = readFixedDigits(text, i + 1, 3);
      if (ms === undefined) return undefined;
      millisecond = ms;
      i += 4;
    }
    i = skipWhitespace(text, i);
    if (i < len) {
      const zone = parseZoneSuffix(text, i);
      if (zone === undefined) return undefined;
      offsetMinutes = zone;
    }
  } else if (len > 14) {
    return undefined;
  }

  return { year, month, day, hour, minute, second, millisecond, offsetMinutes };
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

/**
 * Renders a datetime as ISO-8601: `YYYY-MM-DDTHH:MM:SS`, then `Z` for a zero
 * offset or `±HH:MM` otherwise. Milliseconds are not rendered.
 *
 * @example Usage
 * ```ts
 * import { formatDateTime, parseDateTime } from "./_values.js";
 *
 * const dt = parseDateTime("20210115120000[-5:EST]");
 * if (dt) {
 *   formatDateTime(dt); // "2021-01-15T12:00:00-05:00"
 *   formatDateTime(dt, { compactOffset: true }); // "2021-01-15T12:00:00-05"
 * }
 * ```
 */
export function formatDateTime(
  dt: OfxDateTime,
  options?: FormatDateTimeOptions,
): string {
  const date = `${pad(dt.year, 4)}-${pad(dt.month, 2)}-${pad(dt.day, 2)}`;
  const time = `${pad(dt.hour, 2)}:${pad(dt.minute, 2)}:${pad(dt.second, 2)}`;
  if (dt.offsetMinutes === 0) return `${date}T${time}Z`;

  const sign = dt.offsetMinutes < 0 ? "-" : "+";
  const magnitude = Math.abs(dt.offsetMinutes);
  const hours = pad(Math.floor(magnitude / 60), 2);
  const minutes = magnitude % 60;
  if (minutes === 0 && options?.compactOffset) {
    return `${date}T${time}${sign}${hours}`;
  }
  return `${date}T${time}${sign}${hours}:${pad(minutes, 2)}`;
}

/**
 * Writes a datetime in the OFX source form `YYYYMMDDHHMMSS.XXX[±H]`, which
 * {@linkcode parseDateTime} reads back to the same fields.
 *
 * @example Usage
 * ```ts
 * import { encodeDateTime } from "./_values.js";
 *
 * encodeDateTime({
 *   year: 2021, month: 1, day: 15, hour: 12, minute: 0, second: 0,
 *   millisecond: 250, offsetMinutes: -300,
 * }); // "20210115120000.250[-5]"
 * ```
 *
 * @throws {RangeError} If the offset is not a whole number of hours within
 * ±12 hours, since the zone suffix cannot express it.
 */
export function encodeDateTime(dt: OfxDateTime): string {
  const { offsetMinutes } = dt;
  if (
    offsetMinutes % 60 !== 0 ||
    Math.abs(offsetMinutes) > MAX_OFFSET_HOURS * 60
  ) {
    throw new RangeError(
      `Offset of ${offsetMinutes} minutes cannot be written as an OFX zone`,
    );
  }
  const hours = offsetMinutes / 60;
  const zone = hours < 0 ? `-${-hours}` : `+${hours}`;
  return pad(dt.year, 4) + pad(dt.month, 2) + pad(dt.day, 2) +
    pad(dt.hour, 2) + pad(dt.minute, 2) + pad(dt.second, 2) +
    `.${pad(dt.millisecond, 3)}[${zone}]`;
}

