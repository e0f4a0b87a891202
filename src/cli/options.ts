import { ConfigurationError } from '../errors';
import { CiOutput, FormattedOutput, Output, Writer, parseFormat, unescapeFormat } from '../output';

export const DEFAULT_REQUEST_FORMAT = '%N\\n%R\\n\\n';
export const DEFAULT_RESPONSE_FORMAT = '%R\\n%H\\n%B\\n\\n%T\\n';

export interface OutputOptions {
  format: string;
  requestFormat: string;
  responseFormat: string;
}

export function createOutput(options: OutputOptions, writer: Writer, errorWriter: Writer): Output {
  switch (options.format) {
    case 'standard':
      return new FormattedOutput(
        writer,
        errorWriter,
        parseFormat(unescapeFormat(options.requestFormat)),
        parseFormat(unescapeFormat(options.responseFormat))
      );
    case 'ci':
      return new CiOutput(writer);
    default:
      throw new ConfigurationError(`Unknown output format "${options.format}", expected standard or ci`);
  }
}

export function parseTimeout(value: string): number {
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new ConfigurationError(`Invalid timeout "${value}", expected a positive number of milliseconds`);
  }
  return timeout;
}
