import { ConfigurationError } from '../errors';
import { Selection } from './selection';

export type MethodName = 'GET' | 'POST' | 'DELETE' | 'PUT' | 'PATCH' | 'OPTIONS';

export const METHOD_NAMES: readonly MethodName[] = ['GET', 'POST', 'DELETE', 'PUT', 'PATCH', 'OPTIONS'];

export function isMethodName(value: string): value is MethodName {
  return METHOD_NAMES.some(name => name === value);
}

export interface Method {
  readonly name: MethodName;
  readonly selection: Selection;
}

export interface InlineScript {
  /** Inner text of the placeholder, trimmed: a variable name or a `$`-expression. */
  readonly script: string;
  /** The full delimited text, e.g. `{{ host }}`. */
  readonly placeholder: string;
  readonly selection: Selection;
}

export type Unprocessed =
  | {
      readonly kind: 'withInline';
      readonly value: string;
      readonly inlineScripts: readonly InlineScript[];
      readonly selection: Selection;
    }
  | {
      readonly kind: 'withoutInline';
      readonly value: string;
      readonly selection: Selection;
    };

export interface Value {
  readonly state: Unprocessed;
}

export interface Header {
  readonly fieldName: string;
  readonly fieldValue: Value;
  readonly selection: Selection;
}

export interface Handler {
  readonly script: string;
  readonly selection: Selection;
}

export interface Request {
  readonly method: Method;
  readonly target: Value;
  readonly headers: readonly Header[];
  readonly body?: Value;
  readonly selection: Selection;
}

export type RequestVariable = readonly [name: string, value: Value];

export interface RequestScript {
  readonly name?: string;
  readonly request: Request;
  readonly requestVariables: readonly RequestVariable[];
  readonly preRequestHandler?: Handler;
  readonly handler?: Handler;
  readonly selection: Selection;
}

export class File {
  constructor(readonly filename: string, readonly requestScripts: readonly RequestScript[]) {}

  /**
   * Pairs of zero-based index and script. With `request` (1-based) only that script is kept.
   */
  selectRequestScripts(request?: number): Array<[number, RequestScript]> {
    const scripts = this.requestScripts
      .map((script, index): [number, RequestScript] => [index, script])
      .filter(([index]) => request === undefined || index + 1 === request);

    if (scripts.length === 0) {
      throw new ConfigurationError(
        request === undefined
          ? `No requests found in ${this.filename}`
          : `Request #${request} not found in ${this.filename} (${this.requestScripts.length} available)`
      );
    }
    return scripts;
  }
}

/**
 * Raw text of a value, placeholders left in place.
 */
export function rawText(value: Value): string {
  return value.state.value;
}
