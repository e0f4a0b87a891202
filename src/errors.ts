import { Selection, formatSelection } from './parser/selection';

export class HttpScriptError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The text of an `.http` file does not match the grammar.
 */
export class ParseError extends HttpScriptError {
  readonly selection: Selection;
  readonly detail: string;

  constructor(detail: string, selection: Selection) {
    super(`${detail} at ${formatSelection(selection)}`);
    this.detail = detail;
    this.selection = selection;
  }
}

export class TransportError extends HttpScriptError {}

/**
 * A handler or inline script threw outside of a `client.test` callback.
 */
export class ScriptError extends HttpScriptError {
  readonly selection: Selection;

  constructor(message: string, selection: Selection, options?: { cause?: unknown }) {
    super(message, options);
    this.selection = selection;
  }
}

export class ConfigurationError extends HttpScriptError {}

export interface TestFailure {
  request: string;
  test: string;
  message: string;
}

export class TestFailuresError extends HttpScriptError {
  readonly failures: TestFailure[];

  constructor(failures: TestFailure[]) {
    super(`failed tests ${failures.map(failure => failure.test).join(', ')}`);
    this.failures = failures;
  }
}

/**
 * Stringifies anything a script may throw. Values thrown inside the vm
 * belong to another realm, so `instanceof Error` cannot be relied on.
 */
export function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Runs `fn`, re-throwing any failure under `message` with the original kept as `cause`.
 */
export async function withContext<T>(message: string, fn: () => T | Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw new HttpScriptError(`${message}: ${describeError(error)}`, { cause: error });
  }
}

