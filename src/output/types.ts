import { HttpRequest, HttpResponse } from '../http/types';
import { TestsReport } from '../script-engine/report';

/** Anything with a `write`, such as `process.stdout`. */
export interface Writer {
  write(text: string): unknown;
}

export interface RequestResult {
  readonly file: string;
  /** Section name, or `#n` for unnamed sections. */
  readonly request: string;
  readonly report: TestsReport;
}

export interface Output {
  request(request: HttpRequest, name: string): void;
  response(response: HttpResponse, report: TestsReport): void;
  /** Called once after the last request. */
  tests(results: RequestResult[]): void;
  exitCode(): number;
}
