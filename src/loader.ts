import { readFile } from 'fs/promises';
import { JSON_SCHEMA, load as parseYaml } from 'js-yaml';
import { ParseError, ParseErrorCode } from './errors.js';
import type { JsonValue, TestCase } from './types.js';

function isYamlFile(filePath: string): boolean {
  return filePath.endsWith('.yaml') || filePath.endsWith('.yml');
}

async function readSource(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      throw new ParseError(ParseErrorCode.FILE_NOT_FOUND, filePath, `Cannot open file '${filePath}'. File not found.`, { cause: error });
    }
    throw new ParseError(ParseErrorCode.UNREADABLE, filePath, `Cannot read file '${filePath}'.`, { cause: error });
  }
}

function decode(raw: string, filePath: string): unknown {
  try {
    return isYamlFile(filePath) ? parseYaml(raw, { schema: JSON_SCHEMA }) : JSON.parse(raw);
  } catch (error) {
    throw new ParseError(ParseErrorCode.INVALID_JSON, filePath, `Cannot decode JSON from file '${filePath}'.`, { cause: error });
  }
}

function isTestCase(entry: unknown): entry is TestCase {
  return typeof entry === 'object' && entry !== null && !Array.isArray(entry);
}

/**
 * Reads a test file holding an array of test cases. Entries are not
 * validated here; a malformed entry fails on its own when it runs.
 */
export async function loadTestCases(filePath: string): Promise<TestCase[]> {
  const data = decode(await readSource(filePath), filePath);
  if (!Array.isArray(data)) {
    throw new ParseError(ParseErrorCode.NOT_AN_ARRAY, filePath, `Cannot decode JSON from file '${filePath}'. Expected an array of tests.`);
  }
  // Non-object entries become empty cases so they still report as malformed.
  return data.map((entry: JsonValue): TestCase => (isTestCase(entry) ? entry : {}));
}
