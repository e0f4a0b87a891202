import * as generators from '../script-engine/generators';
import { VariableResolver, stringifyValue, unresolved } from './value';

const CALL = /^\$([A-Za-z][\w.]*)\s*(?:\(([^()]*)\))?$/;
const INTEGER = /^-?\d+$/;
const FLOAT = /^-?\d+(\.\d+)?$/;
const LENGTH = /^\d+$/;

/**
 * Comma separated numeric arguments, or `undefined` when one of them does not match `pattern`.
 */
function parseArguments(args: string | undefined, pattern: RegExp): number[] | undefined {
  if (args === undefined || args.trim() === '') {
    return [];
  }
  const parts = args.split(',').map(part => part.trim());
  if (!parts.every(part => pattern.test(part))) {
    return undefined;
  }
  return parts.map(Number);
}

function bounded(args: number[], generate: (min: number, max: number) => number): string | undefined {
  const [first, second] = args;
  const [min, max] = second === undefined ? [0, first] : [first, second];
  if (min >= max) {
    return undefined;
  }
  return String(generate(min, max));
}

/**
 * Produces the value of a `$`-generator without a scripting host. Calls that the host would
 * reject (malformed or out of range arguments, unknown generators) yield `undefined`.
 */
export function resolveStaticGenerator(script: string): string | undefined {
  const match = CALL.exec(script.trim());
  if (!match) {
    return undefined;
  }
  const [, name, args] = match;

  switch (name) {
    case 'uuid':
    case 'random.uuid':
      return args === undefined ? generators.uuid() : undefined;
    case 'timestamp':
      return args === undefined ? String(generators.timestamp()) : undefined;
    case 'isoTimestamp':
      return args === undefined ? generators.isoTimestamp() : undefined;
    case 'random.email':
      return args === undefined ? generators.email() : undefined;
    case 'random.integer': {
      const parsed = parseArguments(args, INTEGER);
      if (!parsed || parsed.length > 2) {
        return undefined;
      }
      if (parsed.length === 0) {
        return String(generators.integer());
      }
      return bounded(parsed, generators.integer);
    }
    case 'random.float': {
      const parsed = parseArguments(args, FLOAT);
      if (!parsed || parsed.length > 2) {
        return undefined;
      }
      if (parsed.length === 0) {
        return String(generators.float());
      }
      return bounded(parsed, generators.float);
    }
    case 'random.alphabetic':
    case 'random.alphanumeric':
    case 'random.hexadecimal': {
      const parsed = parseArguments(args, LENGTH);
      if (!parsed || parsed.length !== 1) {
        return undefined;
      }
      const [length] = parsed;
      if (name === 'random.alphabetic') {
        return generators.alphabetic(length);
      }
      return name === 'random.alphanumeric' ? generators.alphanumeric(length) : generators.hexadecimal(length);
    }
    default:
      return undefined;
  }
}

/**
 * Resolves placeholders from a fixed set of variables plus the static generators. Used to
 * render requests without running any script.
 */
export class StaticVariableResolver implements VariableResolver {
  constructor(private readonly variables: Readonly<Record<string, unknown>>) {}

  resolveRequestVariable(name: string): string {
    if (name.startsWith('$')) {
      return resolveStaticGenerator(name) ?? unresolved(name);
    }
    const value = Object.prototype.hasOwnProperty.call(this.variables, name) ? this.variables[name] : undefined;
    return value === undefined || value === null ? unresolved(name) : stringifyValue(value);
  }
}
