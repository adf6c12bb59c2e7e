import { isLosslessNumber } from 'lossless-json';
import { PASS, fail, malformed } from './errors.js';
import type { CheckOutcome } from './errors.js';
import { formatValue, isDecodedObject, isFloatLiteral, jsonEquals } from './json.js';
import type { DecodedValue } from './json.js';
import { TYPE_TAGS } from './types.js';
import type { JsonObject, JsonValue, TypeTag } from './types.js';

export interface TypeCheckOptions {
  /** Let booleans pass an "int" check. Off unless asked for. */
  boolAsInt?: boolean;
}

type TypePredicate = (value: DecodedValue, options: TypeCheckOptions) => boolean;

// int and float follow the literal in the response: 10.0 is a float.
const TYPE_PREDICATES: Record<TypeTag, TypePredicate> = {
  string: (value) => typeof value === 'string',
  int: (value, options) =>
    (isLosslessNumber(value) && !isFloatLiteral(value)) ||
    (options.boolAsInt === true && typeof value === 'boolean'),
  float: (value) => isLosslessNumber(value) && isFloatLiteral(value),
};

function isTypeTag(tag: JsonValue): tag is TypeTag {
  return TYPE_TAGS.some((known) => known === tag);
}

export function describeType(value: DecodedValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (isLosslessNumber(value)) return isFloatLiteral(value) ? 'float' : 'int';
  return typeof value;
}

function lookup(response: DecodedValue, key: string): DecodedValue | undefined {
  if (!isDecodedObject(response) || !Object.prototype.hasOwnProperty.call(response, key)) {
    return undefined;
  }
  return response[key];
}

/** Exact-value checks, stopping at the first key that is absent or differs. */
export function checkValues(response: DecodedValue, expected: JsonObject): CheckOutcome {
  for (const [key, expectedValue] of Object.entries(expected)) {
    const actual = lookup(response, key);
    if (actual === undefined) {
      return fail({ kind: 'key-not-found', key });
    }
    if (!jsonEquals(actual, expectedValue)) {
      return fail({ kind: 'value-mismatch', key, expected: formatValue(expectedValue), actual: formatValue(actual) });
    }
  }
  return PASS;
}

/** Type checks, stopping at the first unknown tag, absent key or mismatch. */
export function checkTypes(response: DecodedValue, expected: JsonObject, options: TypeCheckOptions = {}): CheckOutcome {
  for (const [key, tag] of Object.entries(expected)) {
    if (!isTypeTag(tag)) {
      return fail(malformed(`Expected types allowed: ${TYPE_TAGS.map((t) => `'${t}'`).join(', ')}`));
    }
    const actual = lookup(response, key);
    if (actual === undefined) {
      return fail({ kind: 'key-not-found', key });
    }
    if (!TYPE_PREDICATES[tag](actual, options)) {
      return fail({ kind: 'type-mismatch', key, expected: tag, actual: describeType(actual) });
    }
  }
  return PASS;
}

/** Runs the pipeline stages in order and returns the first failure. */
export function firstFailure(...stages: Array<() => CheckOutcome>): CheckOutcome {
  for (const stage of stages) {
    const outcome = stage();
    if (!outcome.ok) return outcome;
  }
  return PASS;
}
