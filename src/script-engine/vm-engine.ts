import * as vm from 'vm';
import { ConfigurationError, ScriptError, describeError } from '../errors';
import { HttpResponse } from '../http/types';
import { Selection } from '../parser/selection';
import { parseJsonObject } from '../utils/json';
import { stringifyValue, unresolved } from '../variables/value';
import { Client } from './client';
import * as generators from './generators';
import { createRandom } from './random';
import { TestsReport } from './report';
import { createRequestObject } from './request';
import { Script, ScriptEngine, UnprocessedRequest, VariableMap } from './types';
import { VariableStore, Variables } from './variables';

export interface ScriptEngineOptions {
  /** Milliseconds a single script may run. */
  timeout?: number;
}

interface ContentType {
  mimeType: string;
  charset: string | null;
}

function parseContentType(response: HttpResponse): ContentType | null {
  const header = response.headers.find(([name]) => name.toLowerCase() === 'content-type');
  if (!header) {
    return null;
  }
  const [mimeType, ...parameters] = header[1].split(';').map(part => part.trim());
  const charset = parameters.find(parameter => parameter.toLowerCase().startsWith('charset='));
  return { mimeType, charset: charset ? charset.slice('charset='.length) : null };
}

/**
 * Script host backed by a `vm` context. The context holds only the script-facing globals; the
 * variable stores live outside it, so `reset()` can throw the context away wholesale.
 */
export class VmScriptEngine implements ScriptEngine {
  private persisted: VariableStore;
  private readonly environment: VariableStore;
  private requestVariables = new VariableStore();
  private tests = new TestsReport();
  private context: vm.Context;
  private readonly timeout: number;

  constructor(initial: VariableMap, environment: VariableMap = initial, options: ScriptEngineOptions = {}) {
    if (Object.prototype.hasOwnProperty.call(environment, 'client')) {
      throw new ConfigurationError("Can't register environment value with the name `client`");
    }
    this.persisted = new VariableStore(initial);
    this.environment = new VariableStore(environment, true);
    this.timeout = options.timeout ?? 30000;
    this.context = this.createContext();
  }

  executeScript(script: Script): unknown {
    try {
      return vm.runInContext(script.source, this.context, {
        filename: script.selection.filename || 'script',
        lineOffset: Math.max(script.selection.start.line - 1, 0),
        timeout: this.timeout,
      });
    } catch (error) {
      throw new ScriptError(`Error executing script: ${describeError(error)}`, script.selection, { cause: error });
    }
  }

  resolveRequestVariable(name: string): string {
    if (name.startsWith('$')) {
      return stringifyValue(this.executeScript({ source: name, selection: Selection.none() }));
    }

    const value = this.requestVariables.get(name) ?? this.persisted.get(name) ?? this.environment.get(name);
    return value === undefined || value === null ? unresolved(name) : stringifyValue(value);
  }

  defineVariable(name: string, value: string): void {
    this.requestVariables.set(name, value);
  }

  preHandle(script: Script, request: UnprocessedRequest): void {
    const requestObject = createRequestObject(
      request,
      this,
      new Variables(this.requestVariables),
      this.environment
    );
    this.withGlobal('request', requestObject, () => this.executeScript(script));
  }

  handle(script: Script, response: HttpResponse): void {
    const body = response.body === undefined ? null : parseJsonObject(response.body) ?? response.body;
    const payload = JSON.stringify({
      status: response.statusCode,
      headers: Object.fromEntries(response.headers),
      body,
      contentType: parseContentType(response),
    });
    // parsed inside the context so scripts see objects of their own realm
    const responseObject: unknown = vm.runInContext(`JSON.parse(${JSON.stringify(payload)})`, this.context);

    this.withGlobal('response', responseObject, () => this.executeScript(script));
  }

  report(): TestsReport {
    return this.tests;
  }

  reset(): void {
    this.persisted = new VariableStore(this.snapshot());
    this.requestVariables = new VariableStore();
    this.tests = new TestsReport();
    this.context = this.createContext();
  }

  snapshot(): VariableMap {
    return this.persisted.toJSON();
  }

  private createContext(): vm.Context {
    const sandbox: Record<string, unknown> = {
      client: new Client(new Variables(this.persisted, this.environment), (name, result) =>
        this.tests.record(name, result)
      ),
      $random: createRandom(),
    };
    Object.defineProperty(sandbox, '$uuid', { get: generators.uuid, enumerable: true });
    Object.defineProperty(sandbox, '$timestamp', { get: generators.timestamp, enumerable: true });
    Object.defineProperty(sandbox, '$isoTimestamp', { get: generators.isoTimestamp, enumerable: true });

    return vm.createContext(sandbox, { name: 'httpscript' });
  }

  private withGlobal(name: string, value: unknown, run: () => void): void {
    this.context[name] = value;
    try {
      run();
    } finally {
      delete this.context[name];
    }
  }
}
