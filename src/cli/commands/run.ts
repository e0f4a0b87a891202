import { FilesSourceProvider } from '../../core/source-provider';
import { Runtime } from '../../core/runtime';
import { EnvironmentFileProvider } from '../../environment/provider';
import { ConfigurationError, TestFailuresError, describeError } from '../../errors';
import { AxiosHttpClient } from '../../http/axios-client';
import { logger, LogLevel } from '../../utils/logger';
import { OutputOptions, createOutput, parseTimeout } from '../options';

export interface RunOptions extends OutputOptions {
  envFile: string;
  snapshot: string;
  env: string;
  insecure?: boolean;
  timeout: string;
  verbose?: boolean;
}

export async function runCommand(files: string[], options: RunOptions): Promise<void> {
  try {
    if (options.verbose) {
      logger.setLevel(LogLevel.DEBUG);
    }
    if (files.length === 0) {
      throw new ConfigurationError('No request files given');
    }

    const sources = FilesSourceProvider.fromList(files);
    const environment = EnvironmentFileProvider.open(options.env, options.envFile, options.snapshot);
    const output = createOutput(options, process.stdout, process.stderr);
    const client = new AxiosHttpClient({ insecure: options.insecure, timeout: parseTimeout(options.timeout) });

    logger.debug(`Running ${files.join(', ')} with environment "${options.env}"`);
    await Runtime.create(environment, output, client).execute(sources);

    process.exitCode = output.exitCode();
  } catch (error) {
    if (error instanceof TestFailuresError) {
      logger.error(`❌ ${error.failures.length} test(s) failed`);
      process.exit(1);
    }
    logger.error(`❌ ${describeError(error)}`);
    if (options.verbose && error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    process.exit(1);
  }
}
