import { MethodName } from '../parser/ast';

export type HeaderPair = readonly [name: string, value: string];

/** A fully resolved request, ready for the wire. */
export interface HttpRequest {
  readonly method: MethodName;
  readonly target: string;
  readonly headers: readonly HeaderPair[];
  readonly body?: string;
}

export interface HttpResponse {
  /** e.g. `HTTP/1.1` */
  readonly version: string;
  readonly statusCode: number;
  readonly statusText: string;
  readonly headers: readonly HeaderPair[];
  readonly body?: string;
}

export interface HttpClient {
  /** Resolves for every status code; rejects with `TransportError` when no response arrives. */
  execute(request: HttpRequest): Promise<HttpResponse>;
}
