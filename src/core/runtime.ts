import { TestFailure, TestFailuresError, describeError, withContext } from '../errors';
import { EnvironmentProvider } from '../environment/provider';
import { HttpClient } from '../http/types';
import { Output, RequestResult } from '../output/types';
import { ScriptEngine } from '../script-engine/types';
import { ScriptEngineOptions, VmScriptEngine } from '../script-engine/vm-engine';
import { logger } from '../utils/logger';
import { Executor } from './executor';
import { SourceProvider } from './source-provider';

/**
 * Runs every request of a source in order against one script engine, resetting it between
 * requests, and hands the persisted variables back to the environment at the end.
 */
export class Runtime {
  constructor(
    private readonly engine: ScriptEngine,
    private readonly environment: EnvironmentProvider,
    private readonly output: Output,
    private readonly client: HttpClient
  ) {}

  static create(
    environment: EnvironmentProvider,
    output: Output,
    client: HttpClient,
    options: ScriptEngineOptions = {}
  ): Runtime {
    const engine = new VmScriptEngine(environment.snapshot(), undefined, options);
    return new Runtime(engine, environment, output, client);
  }

  /**
   * Throws `TestFailuresError` once every request has run if any test failed. Other errors stop
   * the run at the failing request.
   */
  async execute(sourceProvider: SourceProvider): Promise<RequestResult[]> {
    const results: RequestResult[] = [];
    const failures: TestFailure[] = [];

    try {
      for (const source of sourceProvider.requests()) {
        const executor = new Executor(source);
        logger.debug(`▶️  ${executor.requestName}`);

        const { name, report } = await executor.execute(this.client, this.engine, this.output);
        results.push({ file: source.name, request: executor.sectionName, report });

        const failed = report.failed();
        failed.forEach(([test, message]) => failures.push({ request: name, test, message }));
        logger.debug(`✅ ${name}: ${report.all().length} tests, ${failed.length} failed`);

        this.engine.reset();
      }
    } catch (error) {
      this.saveAfterFailure();
      throw error;
    }

    await withContext('Error writing snapshot', () => this.environment.save(this.engine.snapshot()));
    this.output.tests(results);

    if (failures.length > 0) {
      throw new TestFailuresError(failures);
    }
    return results;
  }

  /** Keeps what earlier requests persisted; the original error is what gets reported. */
  private saveAfterFailure(): void {
    try {
      this.environment.save(this.engine.snapshot());
    } catch (saveError) {
      logger.warn(`Could not save snapshot: ${describeError(saveError)}`);
    }
  }
}
