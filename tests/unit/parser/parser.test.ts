import { describe, it, expect } from 'vitest';
import { parse } from '../../../src/parser';
import { ConfigurationError, ParseError } from '../../../src/errors';

function parseError(source: string): ParseError {
  try {
    parse('test.http', source);
  } catch (error) {
    if (error instanceof ParseError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ParseError');
}

describe('parse', () => {
  describe('sections', () => {
    it('should split requests on ### separators', () => {
      const file = parse('test.http', 'GET http://{{host}}/x\n\n###\n\nGET http://{{host}}/y');

      expect(file.filename).toBe('test.http');
      expect(file.requestScripts).toHaveLength(2);
      expect(file.requestScripts.map(script => script.request.target.state.value)).toEqual([
        'http://{{host}}/x',
        'http://{{host}}/y',
      ]);
      expect(file.requestScripts[0].name).toBeUndefined();
      expect(file.requestScripts[1].name).toBeUndefined();
      expect(file.requestScripts[1].request.selection.start).toEqual({ line: 5, col: 1 });
    });

    it('should take the rest of the separator line as the section name', () => {
      const file = parse('test.http', '###   list users  \nGET http://example.com/users\n### \nGET http://example.com/');

      expect(file.requestScripts[0].name).toBe('list users');
      expect(file.requestScripts[1].name).toBeUndefined();
    });

    it('should read a line starting with // as a comment, not a scheme-relative target', () => {
      expect(parse('test.http', '//a.com/x').requestScripts).toHaveLength(0);
    });

    it('should skip sections holding only comments and blank lines', () => {
      const file = parse('test.http', '# just a comment\n\n// another\n###\n\n');

      expect(file.requestScripts).toHaveLength(0);
      expect(() => file.selectRequestScripts()).toThrow(ConfigurationError);
    });

    it('should select a single request by its 1-based number', () => {
      const file = parse('test.http', 'GET http://a\n###\nGET http://b');

      const selected = file.selectRequestScripts(2);
      expect(selected).toHaveLength(1);
      expect(selected[0][0]).toBe(1);
      expect(selected[0][1].request.target.state.value).toBe('http://b');
      expect(() => file.selectRequestScripts(5)).toThrow('Request #5 not found in test.http (2 available)');
    });
  });

  describe('full request section', () => {
    const source = [
      '### login',
      '@user = admin',
      '# comment',
      '@pass = {{secret}}',
      '< {%',
      "  request.variables.set('a', '1');",
      '%}',
      'POST http://example.com/login HTTP/1.1',
      'Content-Type: application/json',
      '// note',
      'Accept: */*',
      '',
      '{',
      '  "user": "{{user}}"',
      '}',
      '',
      '> {%',
      "  client.test('ok', () => {});",
      '%}',
    ].join('\n');

    it('should parse declarations in order', () => {
      const [script] = parse('test.http', source).requestScripts;

      expect(script.name).toBe('login');
      expect(script.requestVariables.map(([name]) => name)).toEqual(['user', 'pass']);

      const [, user] = script.requestVariables[0];
      expect(user.state.kind).toBe('withoutInline');
      expect(user.state.value).toBe('admin');
      expect(user.state.selection.start).toEqual({ line: 2, col: 9 });

      const [, pass] = script.requestVariables[1];
      expect(pass.state.kind).toBe('withInline');
      if (pass.state.kind === 'withInline') {
        expect(pass.state.inlineScripts[0].script).toBe('secret');
      }
    });

    it('should parse handlers with trimmed script text', () => {
      const [script] = parse('test.http', source).requestScripts;

      expect(script.preRequestHandler?.script).toBe("request.variables.set('a', '1');");
      expect(script.preRequestHandler?.selection.start).toEqual({ line: 5, col: 1 });
      expect(script.handler?.script).toBe("client.test('ok', () => {});");
      expect(script.handler?.selection.end).toEqual({ line: 19, col: 3 });
    });

    it('should parse the request line, headers and body', () => {
      const { request } = parse('test.http', source).requestScripts[0];

      expect(request.method.name).toBe('POST');
      expect(request.method.selection.start).toEqual({ line: 8, col: 1 });
      expect(request.target.state.value).toBe('http://example.com/login');
      expect(request.headers.map(header => [header.fieldName, header.fieldValue.state.value])).toEqual([
        ['Content-Type', 'application/json'],
        ['Accept', '*/*'],
      ]);
      expect(request.body?.state.value).toBe('{\n  "user": "{{user}}"\n}');
    });

    it('should record a selection for every placeholder', () => {
      const { request } = parse('test.http', source).requestScripts[0];
      const body = request.body?.state;

      expect(body?.kind).toBe('withInline');
      if (body?.kind === 'withInline') {
        expect(body.inlineScripts).toHaveLength(1);
        expect(body.inlineScripts[0].placeholder).toBe('{{user}}');
        expect(body.inlineScripts[0].selection.start).toEqual({ line: 14, col: 12 });
        expect(body.inlineScripts[0].selection.end).toEqual({ line: 14, col: 20 });
      }
    });
  });

  describe('request line', () => {
    it('should default the method to GET', () => {
      const { request } = parse('test.http', 'http://example.com/a').requestScripts[0];

      expect(request.method.name).toBe('GET');
      expect(request.target.state.value).toBe('http://example.com/a');
    });

    it('should tolerate surrounding whitespace and strip the HTTP version', () => {
      const { request } = parse('test.http', '      POST       http://example.com     HTTP/1.1     ').requestScripts[0];

      expect(request.method.name).toBe('POST');
      expect(request.target.state.value).toBe('http://example.com');
      expect(request.target.state.selection.start).toEqual({ line: 1, col: 18 });
    });

    it('should keep indented continuation lines in the raw target', () => {
      const source = 'GET http://example.com/api\n    ?page=1\n    &size=10 HTTP/1.1\nAccept: */*';
      const { request } = parse('test.http', source).requestScripts[0];

      expect(request.target.state.value).toBe('http://example.com/api\n    ?page=1\n    &size=10');
      expect(request.headers).toHaveLength(1);
    });

    it('should extract placeholders from the target with their positions', () => {
      const { request } = parse('test.http', 'GET http://{{host}}/x').requestScripts[0];
      const target = request.target.state;

      expect(target.kind).toBe('withInline');
      if (target.kind === 'withInline') {
        expect(target.inlineScripts[0]).toMatchObject({ script: 'host', placeholder: '{{host}}' });
        expect(target.inlineScripts[0].selection.start).toEqual({ line: 1, col: 12 });
        expect(target.inlineScripts[0].selection.end).toEqual({ line: 1, col: 20 });
      }
    });

    it('should trim the inner text of a placeholder', () => {
      const { request } = parse('test.http', 'GET http://x/{{ $random.uuid }}').requestScripts[0];
      const target = request.target.state;

      expect(target.kind === 'withInline' && target.inlineScripts[0].script).toBe('$random.uuid');
    });

    it('should treat an unclosed placeholder as literal text', () => {
      const { request } = parse('test.http', 'GET http://x/{{a').requestScripts[0];

      expect(request.target.state.kind).toBe('withoutInline');
    });

    it('should accept CRLF line endings', () => {
      const { request } = parse('test.http', 'GET http://x\r\nAccept: a\r\n').requestScripts[0];

      expect(request.headers[0].fieldValue.state.value).toBe('a');
    });
  });

  describe('body', () => {
    it('should be absent when only blank lines follow the headers', () => {
      const { request } = parse('test.http', 'GET http://x\nAccept: a\n\n   \n').requestScripts[0];

      expect(request.body).toBeUndefined();
    });

    it('should drop trailing comment lines', () => {
      const { request } = parse('test.http', 'POST http://x\n\n{"a":1}\n\n# trailing note\n').requestScripts[0];

      expect(request.body?.state.value).toBe('{"a":1}');
    });

    it('should keep comment-like lines written directly under the body text', () => {
      const { request } = parse('test.http', 'POST http://x\n\nline1\n# tail\n\n# note\n').requestScripts[0];

      expect(request.body?.state.value).toBe('line1\n# tail');
    });

    it('should not turn a comment after the headers into a body', () => {
      const { request, handler } = parse('test.http', 'GET http://x\n\n# note\n> {% client.log(1) %}').requestScripts[0];

      expect(request.body).toBeUndefined();
      expect(handler?.script).toBe('client.log(1)');
    });
  });

  describe('errors', () => {
    it('should reject an unsupported method at its token', () => {
      const error = parseError('HEAD http://example.com');

      expect(error.detail).toBe('unsupported method `HEAD`');
      expect(error.selection.start).toEqual({ line: 1, col: 1 });
      expect(error.message).toBe('unsupported method `HEAD` at test.http:1:1');
    });

    it('should point an unterminated handler at its opening marker', () => {
      const error = parseError('GET http://x\n\n> {%\nclient.log(1)');

      expect(error.detail).toBe('unterminated handler, expected `%}`');
      expect(error.selection.start).toEqual({ line: 3, col: 1 });
    });

    it('should require a request line after declarations', () => {
      const error = parseError('@a = 1\n# c\n');

      expect(error.message).toBe('missing request line at test.http:1:1');
    });

    it('should reject a non-header line after the request line', () => {
      const error = parseError('GET http://x\nnot a header');

      expect(error.detail).toBe('expected header, blank line or response handler');
      expect(error.selection.start).toEqual({ line: 2, col: 1 });
    });

    it('should reject content after the response handler', () => {
      const error = parseError('GET http://x\n\n> {% client.log(1) %}\nGET http://y');

      expect(error.detail).toBe('unexpected content after response handler');
      expect(error.selection.start).toEqual({ line: 4, col: 1 });
    });
  });
});
