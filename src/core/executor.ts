import { withContext } from '../errors';
import { HttpClient, HttpRequest, HttpResponse } from '../http/types';
import { Handler, Request } from '../parser/ast';
import { Output } from '../output/types';
import { TestsReport } from '../script-engine/report';
import { Script, ScriptEngine } from '../script-engine/types';
import { VariableResolver, processValue, stripWhitespace } from '../variables/value';
import { SourceItem } from './source-provider';

export interface ExecutionResult {
  /** `{file} / {section}` */
  readonly name: string;
  readonly report: TestsReport;
}

/**
 * Substitutes every placeholder of `request`. Whitespace is removed from the target so it may be
 * written across several lines.
 */
export function resolveRequest(resolver: VariableResolver, request: Request): HttpRequest {
  const { method, target, headers, body } = request;

  return {
    method: method.name,
    target: stripWhitespace(processValue(resolver, target).value),
    headers: headers.map(header => [header.fieldName, processValue(resolver, header.fieldValue).value] as const),
    body: body ? processValue(resolver, body).value : undefined,
  };
}

function toScript(handler: Handler): Script {
  return { source: handler.script, selection: handler.selection };
}

/**
 * Runs a single request script: declarations, pre-request handler, resolution, send and
 * response handler, strictly in that order.
 */
export class Executor {
  constructor(private readonly source: SourceItem) {}

  /** Declared section name, or `#n` counting from 1. */
  get sectionName(): string {
    return this.source.script.name ?? `#${this.source.index + 1}`;
  }

  get requestName(): string {
    return `${this.source.name} / ${this.sectionName}`;
  }

  async execute(client: HttpClient, engine: ScriptEngine, output: Output): Promise<ExecutionResult> {
    const name = this.requestName;

    await withContext(`Failed processing request ${name}`, () => this.declareVariables(engine));
    await withContext(`Error pre handling request ${name}`, () => this.preProcessRequest(engine));
    const request = await withContext(`Failed processing request ${name}`, () => this.processRequest(engine));

    output.request(request, name);

    const response = await withContext(`Error executing request ${name}`, () => client.execute(request));
    const report = await withContext(`Error handling response for request ${name}`, () =>
      this.handleResponse(engine, response)
    );

    output.response(response, report);

    return { name, report };
  }

  private declareVariables(engine: ScriptEngine): void {
    for (const [variable, value] of this.source.script.requestVariables) {
      engine.defineVariable(variable, processValue(engine, value).value);
    }
  }

  private preProcessRequest(engine: ScriptEngine): void {
    const { preRequestHandler, request } = this.source.script;
    if (preRequestHandler) {
      engine.preHandle(toScript(preRequestHandler), request);
    }
  }

  private processRequest(engine: ScriptEngine): HttpRequest {
    return resolveRequest(engine, this.source.script.request);
  }

  private handleResponse(engine: ScriptEngine, response: HttpResponse): TestsReport {
    const { handler } = this.source.script;
    if (!handler) {
      return new TestsReport();
    }
    engine.handle(toScript(handler), response);
    return engine.report();
  }
}
