import { describe, it, expect } from 'vitest';
import { Runtime } from '../../../src/core/runtime';
import { FileSourceProvider } from '../../../src/core/source-provider';
import { StaticEnvironmentProvider } from '../../../src/environment/provider';
import { HttpClient, HttpRequest, HttpResponse } from '../../../src/http/types';
import { Output, RequestResult } from '../../../src/output/types';
import { TestsReport } from '../../../src/script-engine/report';
import { parse } from '../../../src/parser';
import { TestFailuresError, TransportError } from '../../../src/errors';
import { VariableMap } from '../../../src/script-engine/types';

class FakeHttpClient implements HttpClient {
  readonly requests: HttpRequest[] = [];

  constructor(private readonly reply: (request: HttpRequest) => HttpResponse = () => ok()) {}

  async execute(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    return this.reply(request);
  }
}

class RecordingOutput implements Output {
  readonly events: string[] = [];
  results?: RequestResult[];

  request(request: HttpRequest, name: string): void {
    this.events.push(`request ${name}`);
  }

  response(response: HttpResponse, report: TestsReport): void {
    this.events.push(`response ${response.statusCode} ${report.all().length}`);
  }

  tests(results: RequestResult[]): void {
    this.results = results;
  }

  exitCode(): number {
    return 0;
  }
}

function ok(body?: string): HttpResponse {
  return { version: 'HTTP/1.1', statusCode: 200, statusText: 'OK', headers: [], body };
}

function run(source: string, environment: VariableMap = {}, client = new FakeHttpClient()) {
  const provider = new StaticEnvironmentProvider(environment);
  const output = new RecordingOutput();
  const runtime = Runtime.create(provider, output, client);
  const sources = new FileSourceProvider(parse('test.http', source), 'test.http');
  return { provider, output, client, execution: runtime.execute(sources) };
}

describe('Runtime', () => {
  it('should resolve environment variables in every request', async () => {
    const { client, output, execution } = run('GET http://{{host}}/x\n\n###\n\nGET http://{{host}}/y', {
      host: 'a.com',
    });

    const results = await execution;

    expect(client.requests.map(request => request.target)).toEqual(['http://a.com/x', 'http://a.com/y']);
    expect(results.map(result => [result.file, result.request, result.report.isEmpty()])).toEqual([
      ['test.http', '#1', true],
      ['test.http', '#2', true],
    ]);
    expect(output.events).toEqual(['request test.http / #1', 'response 200 0', 'request test.http / #2', 'response 200 0']);
    expect(output.results).toBe(results);
  });

  it('should apply values persisted by a pre-request handler', async () => {
    const source = [
      '< {%',
      "  client.global.set('token', 'abc');",
      '%}',
      'GET http://example.com/me',
      'Authorization: {{token}}',
    ].join('\n');
    const { client, provider, execution } = run(source);

    await execution;

    expect(client.requests[0].headers).toEqual([['Authorization', 'abc']]);
    expect(provider.lastSaved()).toEqual({ token: 'abc' });
  });

  it('should resolve declarations in order and forget them after the request', async () => {
    const source = '@id = 42\n@path = items/{{id}}\nGET http://example.com/{{path}}\n\n###\nGET http://example.com/{{id}}';
    const { client, execution } = run(source);

    await execution;

    expect(client.requests.map(request => request.target)).toEqual([
      'http://example.com/items/42',
      'http://example.com/{{id}}',
    ]);
  });

  it('should collapse a multi-line target and keep the method', async () => {
    const { client, execution } = run('DELETE http://example.com/api\n    ?page=1\n    &size=10\n');

    await execution;

    expect(client.requests[0]).toEqual({
      method: 'DELETE',
      target: 'http://example.com/api?page=1&size=10',
      headers: [],
      body: undefined,
    });
  });

  it('should generate a new value for every generator placeholder', async () => {
    const { client, execution } = run('POST http://example.com\n\n{"a": "{{$random.uuid}}", "b": "{{$random.uuid}}"}');

    await execution;

    const body: { a: string; b: string } = JSON.parse(client.requests[0].body ?? '{}');
    expect(body.a).toMatch(/^[0-9a-f-]{36}$/);
    expect(body.b).toMatch(/^[0-9a-f-]{36}$/);
    expect(body.a).not.toBe(body.b);
  });

  it('should report failed tests after running every request', async () => {
    const source = [
      'GET http://example.com/missing',
      '',
      '> {%',
      '  client.test("ok", () => client.assert(response.status === 200));',
      '%}',
      '',
      '### second',
      'GET http://example.com/other',
      '',
      '> {%',
      '  client.global.set("seen", true);',
      "  client.test('status', () => { throw new Error('nope'); });",
      '%}',
    ].join('\n');
    const client = new FakeHttpClient(() => ({ ...ok(), statusCode: 404, statusText: 'Not Found' }));
    const { provider, output, execution } = run(source, {}, client);

    const error: unknown = await execution.catch(caught => caught);

    expect(error).toBeInstanceOf(TestFailuresError);
    if (error instanceof TestFailuresError) {
      expect(error.message).toBe('failed tests ok, status');
      expect(error.failures).toEqual([
        { request: 'test.http / #1', test: 'ok', message: 'Assertion failed: Assertion failed' },
        { request: 'test.http / second', test: 'status', message: 'nope' },
      ]);
    }
    expect(client.requests).toHaveLength(2);
    expect(provider.lastSaved()).toEqual({ seen: true });
    expect(output.results?.map(result => result.request)).toEqual(['#1', 'second']);
  });

  it('should stop at a transport failure and keep earlier progress', async () => {
    const source = [
      'GET http://example.com/1',
      '',
      "> {% client.global.set('first', 'done') %}",
      '###',
      'GET http://example.com/2',
      '###',
      'GET http://example.com/3',
    ].join('\n');
    const client = new FakeHttpClient(request => {
      if (request.target.endsWith('/2')) {
        throw new TransportError('connection refused');
      }
      return ok();
    });
    const { provider, output, execution } = run(source, {}, client);

    const error: unknown = await execution.catch(caught => caught);

    expect(error).toBeInstanceOf(Error);
    if (error instanceof Error) {
      expect(error.message).toBe('Error executing request test.http / #2: connection refused');
      expect(error.cause).toBeInstanceOf(TransportError);
    }
    expect(client.requests).toHaveLength(2);
    expect(provider.lastSaved()).toEqual({ first: 'done' });
    expect(output.results).toBeUndefined();
  });

  it('should abort on a script error outside of a test', async () => {
    const { execution } = run('GET http://example.com\n\n> {% throw new Error("bad") %}');

    await expect(execution).rejects.toThrow(
      'Error handling response for request test.http / #1: Error executing script: bad'
    );
  });
});
