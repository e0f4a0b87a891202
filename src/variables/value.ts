import { Value } from '../parser/ast';

/**
 * Anything that can turn the inner text of a placeholder into its replacement.
 */
export interface VariableResolver {
  resolveRequestVariable(name: string): string;
}

export interface Processed {
  readonly value: string;
}

export function unresolved(name: string): string {
  return `{{${name}}}`;
}

/**
 * String form of a stored or evaluated value. Objects and arrays become JSON.
 */
export function stringifyValue(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Substitutes every inline script of `value`, in order. Each substitution consumes the first
 * remaining occurrence of its placeholder, so repeated placeholders resolve independently.
 */
export function processValue(resolver: VariableResolver, value: Value): Processed {
  const { state } = value;
  switch (state.kind) {
    case 'withoutInline':
      return { value: state.value };
    case 'withInline': {
      let template = state.value;
      for (const inline of state.inlineScripts) {
        const resolved = resolver.resolveRequestVariable(inline.script);
        template = template.replace(inline.placeholder, () => resolved);
      }
      return { value: template };
    }
  }
}

export function stripWhitespace(text: string): string {
  return text.replace(/\s+/g, '');
}
