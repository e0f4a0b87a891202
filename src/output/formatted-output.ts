import { HttpRequest, HttpResponse } from '../http/types';
import { TestsReport } from '../script-engine/report';
import { FormatItem, formatBody, formatHeaders, formatTests } from './format';
import { Output, RequestResult, Writer } from './types';

/**
 * Writes each request and response according to a format, then lists failed tests on the error
 * writer.
 */
export class FormattedOutput implements Output {
  private failed = false;

  constructor(
    private readonly writer: Writer,
    private readonly errorWriter: Writer,
    private readonly requestFormat: FormatItem[],
    private readonly responseFormat: FormatItem[]
  ) {}

  request(request: HttpRequest, name: string): void {
    for (const item of this.requestFormat) {
      this.write(this.renderRequestItem(item, request, name));
    }
  }

  response(response: HttpResponse, report: TestsReport): void {
    for (const item of this.responseFormat) {
      this.write(this.renderResponseItem(item, response, report));
    }
    this.failed = this.failed || report.failed().length > 0;
  }

  tests(results: RequestResult[]): void {
    if (!this.failed) {
      return;
    }

    this.errorWriter.write('RUN FAILED\n');
    let index = 1;
    for (const { file, request, report } of results) {
      for (const [test, error] of report.failed()) {
        this.errorWriter.write(`${index}. Test \`${test}\` in \`[${file} / ${request}]\` FAILED with ${error}\n`);
        index += 1;
      }
    }
  }

  exitCode(): number {
    return this.failed ? 1 : 0;
  }

  private renderRequestItem(item: FormatItem, request: HttpRequest, name: string): string {
    switch (item.kind) {
      case 'firstLine':
        return `${request.method} ${request.target}`;
      case 'headers':
        return formatHeaders(request.headers);
      case 'body':
        return formatBody(request.body);
      case 'name':
        return `[${name}]`;
      case 'tests':
        return '';
      case 'chars':
        return item.text;
    }
  }

  private renderResponseItem(item: FormatItem, response: HttpResponse, report: TestsReport): string {
    switch (item.kind) {
      case 'firstLine':
        return `${response.version} ${response.statusCode} ${response.statusText}`;
      case 'headers':
        return formatHeaders(response.headers);
      case 'body':
        return formatBody(response.body);
      case 'tests':
        return formatTests(report);
      case 'name':
        return '';
      case 'chars':
        return item.text;
    }
  }

  private write(text: string): void {
    if (text.length > 0) {
      this.writer.write(text);
    }
  }
}
