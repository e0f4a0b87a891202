import { Output, RequestResult, Writer } from './types';

const HEADER = ['File', 'Request', 'Test', 'Result'];

/**
 * Silent while running; prints one table of every test at the end.
 */
export class CiOutput implements Output {
  private failed = false;

  constructor(private readonly writer: Writer) {}

  request(): void {}

  response(): void {}

  tests(results: RequestResult[]): void {
    const rows: string[][] = [];
    let failedRequests = 0;

    for (const { file, request, report } of results) {
      if (report.isEmpty()) {
        rows.push([file, request, 'NO TESTS FOUND', '']);
      }
      let requestFailed = false;
      for (const [test, result] of report.all()) {
        const isError = result.result === 'error';
        requestFailed = requestFailed || isError;
        rows.push([file, request, test, isError ? 'FAILED' : 'PASSED']);
      }
      if (requestFailed) {
        failedRequests += 1;
      }
    }
    this.failed = this.failed || failedRequests > 0;

    this.writer.write(renderTable(HEADER, rows));
    this.writer.write(`${results.length} requests completed, ${failedRequests} have failed tests\n`);
  }

  exitCode(): number {
    return this.failed ? 1 : 0;
  }
}

function renderTable(header: string[], rows: string[][]): string {
  const widths = header.map((title, column) => Math.max(title.length, ...rows.map(row => row[column].length)));
  const line = (cells: string[]) =>
    cells
      .map((cell, column) => cell.padEnd(widths[column]))
      .join('  ')
      .trimEnd();

  return [line(header), line(widths.map(width => '-'.repeat(width))), ...rows.map(line)]
    .map(text => `${text}\n`)
    .join('');
}
