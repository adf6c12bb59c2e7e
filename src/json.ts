import { isLosslessNumber, parse, stringify } from 'lossless-json';
import type { LosslessNumber } from 'lossless-json';
import type { JsonObject, JsonValue } from './types.js';

/**
 * A response body as decoded for checking. Numbers keep their literal so
 * `10.0` stays a float and integers beyond 2^53 compare exactly.
 */
export type DecodedValue = string | boolean | null | LosslessNumber | DecodedValue[] | DecodedObject;

export interface DecodedObject {
  [key: string]: DecodedValue;
}

function toDecoded(value: unknown): DecodedValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean' || isLosslessNumber(value)) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toDecoded);
  }
  if (typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, toDecoded(entry)]));
  }
  throw new SyntaxError(`Unexpected ${typeof value} in JSON`);
}

/** Throws a SyntaxError when the text is not JSON. */
export function decodeJson(text: string): DecodedValue {
  return toDecoded(parse(text));
}

export function isDecodedObject(value: DecodedValue): value is DecodedObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !isLosslessNumber(value);
}

export function isFloatLiteral(number: LosslessNumber): boolean {
  return /[.eE]/.test(number.value);
}

function numberEquals(actual: LosslessNumber, expected: number): boolean {
  if (!isFloatLiteral(actual) && Number.isInteger(expected)) {
    return BigInt(actual.value) === BigInt(expected);
  }
  // === treats 0 and -0 as equal
  return Number(actual.value) === expected;
}

/** Structural equality with numbers compared by value. */
export function jsonEquals(actual: DecodedValue, expected: JsonValue): boolean {
  if (isLosslessNumber(actual)) {
    return typeof expected === 'number' && numberEquals(actual, expected);
  }
  if (Array.isArray(actual)) {
    if (!Array.isArray(expected) || actual.length !== expected.length) return false;
    const items: JsonValue[] = expected;
    return actual.every((item, idx) => jsonEquals(item, items[idx]));
  }
  if (isDecodedObject(actual)) {
    if (typeof expected !== 'object' || expected === null || Array.isArray(expected)) return false;
    const fields: DecodedObject = actual;
    const wanted: JsonObject = expected;
    const keys = Object.keys(fields);
    return (
      keys.length === Object.keys(wanted).length &&
      keys.every((key) => Object.prototype.hasOwnProperty.call(wanted, key) && jsonEquals(fields[key], wanted[key]))
    );
  }
  return actual === expected;
}

/** Strings as they are, everything else as compact JSON. */
export function formatValue(value: DecodedValue | JsonValue): string {
  if (typeof value === 'string') return value;
  return stringify(value) ?? String(value);
}
