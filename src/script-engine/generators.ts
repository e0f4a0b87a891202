import { faker } from '@faker-js/faker';

const I32_MIN = -(2 ** 31);
const I32_MAX = 2 ** 31 - 1;

export function assertInteger(value: unknown): asserts value is number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new TypeError('Expected to get an integer');
  }
}

function toNumber(value: unknown): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new TypeError('Expected to get a number');
  }
  return value;
}

function assertLength(value: unknown): asserts value is number {
  assertInteger(value);
  if (value < 0) {
    throw new RangeError(`Expected a non-negative length, got ${value}`);
  }
}

function assertRange(min: number, max: number): void {
  if (min >= max) {
    throw new RangeError(`Empty range [${min}, ${max})`);
  }
}

export function uuid(): string {
  return faker.string.uuid();
}

export function email(): string {
  return faker.internet.email();
}

/** Seconds since the epoch. */
export function timestamp(): number {
  return Math.floor(Date.now() / 1000);
}

export function isoTimestamp(): string {
  return new Date().toISOString();
}

/**
 * No bounds: any 32-bit signed integer. `(max)`: `[0, max)`. `(min, max)`: `[min, max)`.
 */
export function integer(first?: unknown, second?: unknown): number {
  if (first === undefined) {
    return faker.number.int({ min: I32_MIN, max: I32_MAX });
  }
  assertInteger(first);
  if (second === undefined) {
    assertRange(0, first);
    return faker.number.int({ min: 0, max: first - 1 });
  }
  assertInteger(second);
  assertRange(first, second);
  return faker.number.int({ min: first, max: second - 1 });
}

/**
 * Same arities as `integer`, `[0, 1)` when called without bounds.
 */
export function float(first?: unknown, second?: unknown): number {
  if (first === undefined) {
    return faker.number.float({ min: 0, max: 1 });
  }
  const bound = toNumber(first);
  const [min, max] = second === undefined ? [0, bound] : [bound, toNumber(second)];
  assertRange(min, max);
  return faker.number.float({ min, max });
}

export function alphabetic(length: unknown): string {
  assertLength(length);
  return faker.string.alpha({ length });
}

export function alphanumeric(length: unknown): string {
  assertLength(length);
  return faker.string.alphanumeric(length);
}

/** Uppercase hex digits, no prefix. */
export function hexadecimal(length: unknown): string {
  assertLength(length);
  return faker.string.hexadecimal({ length, casing: 'upper', prefix: '' });
}
