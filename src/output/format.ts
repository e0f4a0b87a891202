import { ConfigurationError } from '../errors';
import { HeaderPair } from '../http/types';
import { TestsReport } from '../script-engine/report';
import { parseJsonObject } from '../utils/json';

export type FormatItem =
  | { kind: 'firstLine' }
  | { kind: 'headers' }
  | { kind: 'body' }
  | { kind: 'tests' }
  | { kind: 'name' }
  | { kind: 'chars'; text: string };

const DIRECTIVES: Record<string, FormatItem> = {
  R: { kind: 'firstLine' },
  H: { kind: 'headers' },
  B: { kind: 'body' },
  T: { kind: 'tests' },
  N: { kind: 'name' },
};

/**
 * Parses `%R` (first line), `%H` (headers), `%B` (body), `%T` (tests), `%N` (name) and `%%`.
 */
export function parseFormat(format: string): FormatItem[] {
  const items: FormatItem[] = [];
  let buffer = '';
  let marker = false;

  for (const ch of format) {
    if (!marker) {
      if (ch === '%') {
        marker = true;
      } else {
        buffer += ch;
      }
      continue;
    }

    marker = false;
    if (ch === '%') {
      buffer += ch;
      continue;
    }
    const directive = DIRECTIVES[ch];
    if (!directive) {
      throw new ConfigurationError(`Invalid formatting character '${ch}'`);
    }
    if (buffer.length > 0) {
      items.push({ kind: 'chars', text: buffer });
      buffer = '';
    }
    items.push(directive);
  }

  if (marker) {
    throw new ConfigurationError(`Format "${format}" ends with a lone '%'`);
  }
  if (buffer.length > 0) {
    items.push({ kind: 'chars', text: buffer });
  }
  return items;
}

/** Turns the two-character sequences `\n` and `\t` typed on a command line into real ones. */
export function unescapeFormat(format: string): string {
  return format.replace(/\\n/g, '\n').replace(/\\t/g, '\t');
}

export function formatHeaders(headers: readonly HeaderPair[]): string {
  return headers.map(([name, value]) => `${name}: ${value}\n`).join('');
}

/** JSON objects are pretty-printed, anything else is written as is. */
export function formatBody(body: string | undefined): string {
  if (body === undefined) {
    return '';
  }
  const parsed = parseJsonObject(body);
  return parsed ? JSON.stringify(parsed, null, 2) : body;
}

export function formatTests(report: TestsReport): string {
  return report
    .all()
    .map(([name, result]) =>
      result.result === 'success' ? `Test \`${name}\`: OK\n` : `Test \`${name}\`: FAILED with ${result.error}\n`
    )
    .join('');
}
