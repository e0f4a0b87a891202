import { FileSourceProvider, parseSourceArgument } from '../../core/source-provider';
import { resolveRequest } from '../../core/executor';
import { EnvironmentFileProvider } from '../../environment/provider';
import { describeError } from '../../errors';
import { FormattedOutput, parseFormat, unescapeFormat } from '../../output';
import { rawText } from '../../parser/ast';
import { logger, LogLevel } from '../../utils/logger';
import { StaticVariableResolver } from '../../variables/static-resolver';

export interface ValidateOptions {
  preview?: boolean;
  envFile: string;
  snapshot: string;
  env: string;
  requestFormat: string;
  verbose?: boolean;
}

export async function validateCommand(files: string[], options: ValidateOptions): Promise<void> {
  try {
    if (options.verbose) {
      logger.setLevel(LogLevel.DEBUG);
    }

    const resolver = options.preview
      ? new StaticVariableResolver(EnvironmentFileProvider.open(options.env, options.envFile, options.snapshot).snapshot())
      : undefined;
    const output = new FormattedOutput(
      process.stdout,
      process.stderr,
      parseFormat(unescapeFormat(options.requestFormat)),
      []
    );

    let failed = 0;
    for (const file of files) {
      const { path, request } = parseSourceArgument(file);
      let provider: FileSourceProvider;
      try {
        provider = FileSourceProvider.open(path, request);
      } catch (error) {
        logger.error(`❌ ${describeError(error)}`);
        failed += 1;
        continue;
      }

      const items = provider.requests();
      logger.success(`✅ ${path}: ${items.length} request(s)`);
      for (const { index, script } of items) {
        const label = script.name ?? `#${index + 1}`;
        if (resolver) {
          output.request(resolveRequest(resolver, script.request), `${path} / ${label}`);
        } else {
          console.log(`  ${String(index + 1).padStart(2)}. ${label}  ${script.request.method.name} ${rawText(script.request.target)}`);
        }
      }
    }

    if (failed > 0) {
      logger.error(`${failed} of ${files.length} file(s) failed to parse`);
      process.exit(1);
    }
  } catch (error) {
    logger.error(`❌ ${describeError(error)}`);
    process.exit(1);
  }
}
