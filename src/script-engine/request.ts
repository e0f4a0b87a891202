import { Header, rawText } from '../parser/ast';
import { VariableResolver, processValue, stripWhitespace } from '../variables/value';
import { JsonValue, UnprocessedRequest } from './types';
import { VariableStore, Variables } from './variables';

export interface RequestHeader {
  readonly name: string;
  getRawValue(): string;
  tryGetSubstitutedValue(): string;
}

/**
 * The `request` global seen by a pre-request handler. Values are read lazily, so substitutions
 * reflect variables the handler has set so far.
 */
export interface RequestObject {
  readonly url: { getRaw(): string; tryGetSubstituted(): string };
  readonly body: { getRaw(): string; tryGetSubstituted(): string };
  readonly headers: { all(): RequestHeader[]; findByName(name: unknown): RequestHeader | null };
  readonly variables: Variables;
  readonly environment: { get(name: unknown): JsonValue | null };
}

export function createRequestObject(
  request: UnprocessedRequest,
  resolver: VariableResolver,
  variables: Variables,
  environment: VariableStore
): RequestObject {
  const toHeader = (header: Header): RequestHeader => ({
    name: header.fieldName,
    getRawValue: () => rawText(header.fieldValue),
    tryGetSubstitutedValue: () => processValue(resolver, header.fieldValue).value,
  });

  return Object.freeze({
    url: {
      getRaw: () => rawText(request.target),
      tryGetSubstituted: () => stripWhitespace(processValue(resolver, request.target).value),
    },
    body: {
      getRaw: () => (request.body ? rawText(request.body) : ''),
      tryGetSubstituted: () => (request.body ? processValue(resolver, request.body).value : ''),
    },
    headers: {
      all: () => request.headers.map(toHeader),
      findByName: (name: unknown) => {
        if (typeof name !== 'string') {
          return null;
        }
        const header = request.headers.find(h => h.fieldName.toLowerCase() === name.toLowerCase());
        return header ? toHeader(header) : null;
      },
    },
    variables,
    environment: {
      get: (name: unknown) => (typeof name === 'string' ? environment.get(name) ?? null : null),
    },
  });
}
