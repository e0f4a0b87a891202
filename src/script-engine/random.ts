import * as generators from './generators';

type Generator = (first?: unknown, second?: unknown) => number;

/**
 * A callable generator whose string coercion produces a fresh value, so `{{$random.integer}}`
 * and `{{$random.integer(10)}}` both work.
 */
function coercible(generate: Generator): Generator {
  const fn: Generator = (first, second) => generate(first, second);
  Object.defineProperty(fn, 'toString', {
    value: () => String(generate()),
    enumerable: false,
  });
  return fn;
}

/**
 * The `$random` global.
 */
export function createRandom(): object {
  return Object.freeze({
    get uuid(): string {
      return generators.uuid();
    },
    get email(): string {
      return generators.email();
    },
    get integer(): Generator {
      return coercible(generators.integer);
    },
    get float(): Generator {
      return coercible(generators.float);
    },
    alphabetic: (length: unknown) => generators.alphabetic(length),
    alphanumeric: (length: unknown) => generators.alphanumeric(length),
    hexadecimal: (length: unknown) => generators.hexadecimal(length),
  });
}
