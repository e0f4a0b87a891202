import { describeError } from '../errors';
import { logger } from '../utils/logger';
import { stringifyValue } from '../variables/value';
import { TestResult } from './report';
import { Variables } from './variables';

type RecordTest = (name: string, result: TestResult) => void;

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

/**
 * The `client` global available to every handler script.
 */
export class Client {
  constructor(readonly global: Variables, private readonly recordTest: RecordTest) {}

  /**
   * Runs `fn` immediately. Whatever it throws is recorded against `name` and never escapes.
   * A callback that returns a promise is recorded as an error.
   */
  test(name: unknown, fn: unknown): void {
    if (typeof name !== 'string') {
      throw new TypeError('Expected test name to be a string');
    }
    if (typeof fn !== 'function') {
      throw new TypeError('Expected test callback to be a function');
    }

    try {
      const returned: unknown = fn();
      if (isThenable(returned)) {
        returned.then(undefined, (error: unknown) => {
          logger.debug(`Test '${name}' settled after it was recorded: ${describeError(error)}`);
        });
        this.recordTest(name, { result: 'error', error: 'Test callback must be synchronous' });
        return;
      }
      this.recordTest(name, { result: 'success' });
    } catch (error) {
      this.recordTest(name, { result: 'error', error: describeError(error) });
    }
  }

  assert(condition: unknown, message?: unknown): void {
    if (typeof condition !== 'boolean') {
      throw new TypeError('Expected to get assert condition');
    }
    if (!condition) {
      const text = message === undefined || message === null ? 'Assertion failed' : String(message);
      throw new Error(`Assertion failed: ${text}`);
    }
  }

  log(...args: unknown[]): void {
    logger.script(args.map(arg => (typeof arg === 'string' ? arg : stringifyValue(arg))).join(' '));
  }
}
