export type TestResult = { result: 'success' } | { result: 'error'; error: string };

/**
 * Outcomes of `client.test` calls made while handling one response, keyed by test name.
 */
export class TestsReport {
  private readonly results = new Map<string, TestResult>();

  record(name: string, result: TestResult): void {
    this.results.set(name, result);
  }

  /** All results ordered by test name. */
  all(): Array<[string, TestResult]> {
    return [...this.results.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  failed(): Array<[string, string]> {
    const failures: Array<[string, string]> = [];
    for (const [name, result] of this.all()) {
      if (result.result === 'error') {
        failures.push([name, result.error]);
      }
    }
    return failures;
  }

  get(name: string): TestResult | undefined {
    return this.results.get(name);
  }

  isEmpty(): boolean {
    return this.results.size === 0;
  }

  toJSON(): Record<string, TestResult> {
    return Object.fromEntries(this.all());
  }
}
