import { JsonValue, VariableMap } from './types';

/**
 * Deep copy through JSON. Values coming out of a script context are copied into this realm;
 * anything JSON cannot represent (functions, `undefined`) yields `undefined`.
 */
export function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') {
    return undefined;
  }
  const serialized = JSON.stringify(value);
  if (serialized === undefined) {
    return undefined;
  }
  const copy: JsonValue = JSON.parse(serialized);
  return copy;
}

/**
 * One named container of script variables.
 */
export class VariableStore {
  private readonly values = new Map<string, JsonValue>();

  constructor(initial: VariableMap = {}, private readonly readOnly = false) {
    for (const [name, value] of Object.entries(initial)) {
      const copy = toJsonValue(value);
      if (copy !== undefined && copy !== null) {
        this.values.set(name, copy);
      }
    }
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  /** Returns a copy, so changing it does not touch the store. */
  get(name: string): JsonValue | undefined {
    return toJsonValue(this.values.get(name));
  }

  set(name: string, value: JsonValue): void {
    this.assertWritable();
    this.values.set(name, value);
  }

  delete(name: string): void {
    this.assertWritable();
    this.values.delete(name);
  }

  clear(): void {
    this.assertWritable();
    this.values.clear();
  }

  get size(): number {
    return this.values.size;
  }

  toJSON(): VariableMap {
    const result: VariableMap = {};
    for (const [name, value] of this.values) {
      const copy = toJsonValue(value);
      if (copy !== undefined) {
        result[name] = copy;
      }
    }
    return result;
  }

  private assertWritable(): void {
    if (this.readOnly) {
      throw new TypeError('Environment variables are read-only');
    }
  }
}

/**
 * Script-facing accessor over a store, as `client.global` and `request.variables`.
 * `get` consults `fallback` when the store has no value.
 */
export class Variables {
  constructor(private readonly store: VariableStore, private readonly fallback?: VariableStore) {}

  get(name: unknown): JsonValue | undefined {
    if (typeof name !== 'string') {
      return undefined;
    }
    return this.store.get(name) ?? this.fallback?.get(name);
  }

  /** `null` and `undefined` values are ignored. */
  set(name: unknown, value: unknown): void {
    if (typeof name !== 'string') {
      return;
    }
    const copy = toJsonValue(value);
    if (copy === undefined || copy === null) {
      return;
    }
    this.store.set(name, copy);
  }

  clear(name: unknown): void {
    if (typeof name === 'string') {
      this.store.delete(name);
    }
  }

  clearAll(): void {
    this.store.clear();
  }

  isEmpty(): boolean {
    return this.store.size === 0;
  }
}
