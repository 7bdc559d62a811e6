/**
 * Line classifier for the Nex statement vocabulary.
 *
 * Each trimmed source line maps to exactly one statement variant. Keywords are
 * matched as a case-sensitive prefix of the line followed by a space, so
 * `gameobject Foo` or `reimport "a"` never match.
 */

export type SceneLine =
  | { readonly kind: 'object'; readonly name: string }
  | { readonly kind: 'import'; readonly ref: string }
  | { readonly kind: 'other' };

const OBJECT_PREFIX = 'object ';
const IMPORT_PREFIX = 'import ';
const QUOTE_CHARS = '"';

const OTHER_LINE: SceneLine = { kind: 'other' };

export function classifySceneLine(line: string): SceneLine {
  if (line.startsWith(OBJECT_PREFIX)) {
    const name = secondToken(line);
    return name === undefined ? OTHER_LINE : { kind: 'object', name };
  }

  if (line.startsWith(IMPORT_PREFIX)) {
    const token = secondToken(line);
    return token === undefined ? OTHER_LINE : { kind: 'import', ref: stripQuotes(token) };
  }

  return OTHER_LINE;
}

/** Split source text into trimmed, non-empty lines. */
export function splitSceneLines(source: string): string[] {
  return source
    .split(/\r\n|[\n\r]/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function secondToken(line: string): string | undefined {
  return line.split(/\s+/)[1];
}

function stripQuotes(token: string): string {
  let start = 0;
  let end = token.length;
  while (start < end && QUOTE_CHARS.includes(token[start] ?? '')) {
    start += 1;
  }
  while (end > start && QUOTE_CHARS.includes(token[end - 1] ?? '')) {
    end -= 1;
  }
  return token.slice(start, end);
}
