import { describe, it, expect } from 'vitest';
import { formatBody, parseFormat, unescapeFormat } from '../../../src/output/format';
import { ConfigurationError } from '../../../src/errors';

describe('parseFormat', () => {
  it('should split directives from literal text', () => {
    expect(parseFormat('%N\n%R\n\n')).toEqual([
      { kind: 'name' },
      { kind: 'chars', text: '\n' },
      { kind: 'firstLine' },
      { kind: 'chars', text: '\n\n' },
    ]);
  });

  it('should parse every directive', () => {
    expect(parseFormat('%R%H%B%T%N').map(item => item.kind)).toEqual(['firstLine', 'headers', 'body', 'tests', 'name']);
  });

  it('should turn %% into a literal percent sign', () => {
    expect(parseFormat('100%% %R')).toEqual([{ kind: 'chars', text: '100% ' }, { kind: 'firstLine' }]);
  });

  it('should reject unknown directives', () => {
    expect(() => parseFormat('%X')).toThrow(ConfigurationError);
    expect(() => parseFormat('%X')).toThrow("Invalid formatting character 'X'");
    expect(() => parseFormat('%R%')).toThrow(ConfigurationError);
  });

  it('should return no items for an empty format', () => {
    expect(parseFormat('')).toEqual([]);
  });
});

describe('unescapeFormat', () => {
  it('should expand escaped newlines and tabs', () => {
    expect(unescapeFormat('%N\\n%R\\t|')).toBe('%N\n%R\t|');
  });
});

describe('formatBody', () => {
  it('should pretty-print JSON objects only', () => {
    expect(formatBody('{"a":1,"b":[2]}')).toBe('{\n  "a": 1,\n  "b": [\n    2\n  ]\n}');
    expect(formatBody('[1,2]')).toBe('[1,2]');
    expect(formatBody('plain text')).toBe('plain text');
    expect(formatBody(undefined)).toBe('');
  });
});
