export { parse, createValue, Selection, formatSelection, File } from './parser';
export type {
  Handler,
  Header,
  InlineScript,
  Method,
  MethodName,
  Request,
  RequestScript,
  RequestVariable,
  Unprocessed,
  Value,
  Position,
} from './parser';

export { processValue, stringifyValue } from './variables/value';
export type { Processed, VariableResolver } from './variables/value';
export { resolveStaticGenerator, StaticVariableResolver } from './variables/static-resolver';

export { VmScriptEngine } from './script-engine/vm-engine';
export type { ScriptEngineOptions } from './script-engine/vm-engine';
export { TestsReport } from './script-engine/report';
export type { TestResult } from './script-engine/report';
export type { JsonValue, Script, ScriptEngine, UnprocessedRequest, VariableMap } from './script-engine/types';

export { Executor, resolveRequest } from './core/executor';
export { Runtime } from './core/runtime';
export { FileSourceProvider, FilesSourceProvider, parseSourceArgument } from './core/source-provider';
export type { SourceItem, SourceProvider } from './core/source-provider';

export { AxiosHttpClient } from './http/axios-client';
export type { AxiosHttpClientOptions } from './http/axios-client';
export type { HttpClient, HttpRequest, HttpResponse, HeaderPair } from './http/types';

export { EnvironmentFileProvider, StaticEnvironmentProvider } from './environment/provider';
export type { EnvironmentProvider } from './environment/provider';

export { CiOutput, FormattedOutput, parseFormat } from './output';
export type { FormatItem, Output, RequestResult, Writer } from './output';

export * from './errors';
export { logger, LogLevel } from './utils/logger';
