import * as fs from 'fs';
import { ConfigurationError, describeError } from '../errors';
import { File, RequestScript } from '../parser/ast';
import { parse } from '../parser/parser';

export interface SourceItem {
  /** Name of the file the script came from, as given on the command line. */
  readonly name: string;
  /** Zero-based position of the script in its file. */
  readonly index: number;
  readonly script: RequestScript;
}

export interface SourceProvider {
  requests(): SourceItem[];
}

/**
 * The request scripts of one parsed file, optionally narrowed to a single 1-based request.
 */
export class FileSourceProvider implements SourceProvider {
  constructor(private readonly file: File, private readonly name: string, private readonly request?: number) {}

  static open(filePath: string, request?: number): FileSourceProvider {
    let contents: string;
    try {
      contents = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      throw new ConfigurationError(`Failed opening script file: \`${filePath}\`: ${describeError(error)}`, {
        cause: error,
      });
    }
    return new FileSourceProvider(parse(filePath, contents), filePath, request);
  }

  requests(): SourceItem[] {
    return this.file.selectRequestScripts(this.request).map(([index, script]) => ({
      name: this.name,
      index,
      script,
    }));
  }
}

/**
 * Splits `path#N` into the path and the 1-based request number.
 */
export function parseSourceArgument(argument: string): { path: string; request?: number } {
  const match = /^(.*)#(\d+)$/.exec(argument);
  if (!match) {
    return { path: argument };
  }
  return { path: match[1], request: Number(match[2]) };
}

/**
 * Several files run one after another. Every file is parsed up front, so a syntax error in any
 * of them stops the run before the first request is sent.
 */
export class FilesSourceProvider implements SourceProvider {
  constructor(private readonly providers: SourceProvider[]) {}

  static fromList(files: string[]): FilesSourceProvider {
    return new FilesSourceProvider(
      files.map(file => {
        const { path, request } = parseSourceArgument(file);
        return FileSourceProvider.open(path, request);
      })
    );
  }

  requests(): SourceItem[] {
    return this.providers.flatMap(provider => provider.requests());
  }
}
