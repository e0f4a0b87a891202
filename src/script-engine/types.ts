import { Header, Value } from '../parser/ast';
import { Selection } from '../parser/selection';
import { HttpResponse } from '../http/types';
import { VariableResolver } from '../variables/value';
import { TestsReport } from './report';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type VariableMap = Record<string, JsonValue>;

/**
 * Script text together with where it came from, used for error positions.
 */
export interface Script {
  readonly source: string;
  readonly selection: Selection;
}

/**
 * The request as written, before any placeholder is substituted.
 */
export interface UnprocessedRequest {
  readonly target: Value;
  readonly headers: readonly Header[];
  readonly body?: Value;
}

export interface ScriptEngine extends VariableResolver {
  executeScript(script: Script): unknown;
  defineVariable(name: string, value: string): void;
  preHandle(script: Script, request: UnprocessedRequest): void;
  handle(script: Script, response: HttpResponse): void;
  report(): TestsReport;
  /** Discards every script-created global and request variable; persisted values survive. */
  reset(): void;
  snapshot(): VariableMap;
}
