import { ParseError } from '../errors';
import {
  File,
  Handler,
  Header,
  InlineScript,
  Method,
  Request,
  RequestScript,
  RequestVariable,
  Value,
  isMethodName,
} from './ast';
import { Position, Selection, positionAt } from './selection';

interface Line {
  readonly text: string;
  /** 1-based */
  readonly number: number;
}

interface Section {
  readonly name?: string;
  readonly separator?: Line;
  readonly lines: Line[];
}

const SEPARATOR = /^###/;
const COMMENT = /^\s*(#|\/\/)/;
const BLANK = /^\s*$/;
const DECLARATION_START = /^\s*@/;
const DECLARATION = /^(\s*)@([A-Za-z_$][\w$.-]*)\s*=\s*(.*?)\s*$/;
const PRE_REQUEST_HANDLER = /^\s*<\s*\{%/;
const RESPONSE_HANDLER = /^\s*>\s*\{%/;
const REQUEST_LINE = /^(\s*)(\S+)(?:(\s+)(.*))?$/;
const UPPERCASE_WORD = /^[A-Z]+$/;
const CONTINUATION = /^\s+\S/;
const HTTP_VERSION = /\s+HTTP\/\d+(?:\.\d+)?\s*$/;
const HEADER = /^(\s*)([^\s:]+)\s*:(.*)$/;
const PLACEHOLDER = /\{\{([\s\S]*?)\}\}/g;

function isTrivia(line: Line): boolean {
  return BLANK.test(line.text) || COMMENT.test(line.text);
}

function endOf(line: Line): Position {
  return { line: line.number, col: line.text.length + 1 };
}

function firstColumn(line: Line): number {
  return line.text.length - line.text.trimStart().length + 1;
}

/**
 * Builds a `Value` from `text` located at `start`, extracting every `{{ ... }}` placeholder in order.
 */
export function createValue(filename: string, text: string, start: Position): Value {
  const selection = Selection.of(filename, start, positionAt(start, text, text.length));
  const inlineScripts: InlineScript[] = [];

  for (const match of text.matchAll(PLACEHOLDER)) {
    const offset = match.index ?? 0;
    inlineScripts.push({
      script: match[1].trim(),
      placeholder: match[0],
      selection: Selection.of(
        filename,
        positionAt(start, text, offset),
        positionAt(start, text, offset + match[0].length)
      ),
    });
  }

  if (inlineScripts.length === 0) {
    return { state: { kind: 'withoutInline', value: text, selection } };
  }
  return { state: { kind: 'withInline', value: text, inlineScripts, selection } };
}

/**
 * Line oriented parser for `.http` request files.
 */
class ScriptParser {
  private lines: Line[] = [];
  private cursor = 0;

  constructor(private readonly filename: string) {}

  parseFile(source: string): File {
    const scripts: RequestScript[] = [];
    for (const section of this.splitSections(source)) {
      const script = this.parseSection(section);
      if (script) {
        scripts.push(script);
      }
    }
    return new File(this.filename, scripts);
  }

  private splitSections(source: string): Section[] {
    const sections: Section[] = [];
    let current: Section = { lines: [] };

    source.split(/\r?\n/).forEach((text, index) => {
      const line: Line = { text, number: index + 1 };
      if (SEPARATOR.test(text)) {
        sections.push(current);
        const name = text.slice(3).trim();
        current = { name: name.length > 0 ? name : undefined, separator: line, lines: [] };
      } else {
        current.lines.push(line);
      }
    });
    sections.push(current);

    return sections;
  }

  private parseSection(section: Section): RequestScript | undefined {
    this.lines = section.lines;
    this.cursor = 0;

    const significant = this.lines.filter(line => !isTrivia(line));
    if (significant.length === 0) {
      return undefined;
    }
    const sectionStart = section.separator ?? significant[0];

    this.skipTrivia();
    const requestVariables = this.parseDeclarations();

    this.skipTrivia();
    let preRequestHandler: Handler | undefined;
    if (this.current() && PRE_REQUEST_HANDLER.test(this.peek().text)) {
      preRequestHandler = this.parseHandler('<');
    }

    this.skipTrivia();
    const requestLine = this.current();
    if (!requestLine || RESPONSE_HANDLER.test(requestLine.text) || PRE_REQUEST_HANDLER.test(requestLine.text)) {
      const at = requestLine ?? significant[significant.length - 1];
      throw new ParseError('missing request line', this.selectLine(at));
    }
    if (DECLARATION_START.test(requestLine.text)) {
      throw new ParseError(
        'variable declarations must precede the pre-request handler',
        this.selectLine(requestLine)
      );
    }

    const { method, target } = this.parseRequestLine();
    const headers = this.parseHeaders();
    const body = this.parseBody();

    const requestEnd = body ? body.state.selection.end : this.lastEnd(requestLine, headers);

    this.skipTrivia();
    let handler: Handler | undefined;
    if (this.current() && RESPONSE_HANDLER.test(this.peek().text)) {
      handler = this.parseHandler('>');
    }

    this.skipTrivia();
    const leftover = this.current();
    if (leftover) {
      throw new ParseError('unexpected content after response handler', this.selectLine(leftover));
    }

    const request: Request = {
      method,
      target,
      headers,
      body,
      selection: Selection.of(this.filename, { line: requestLine.number, col: firstColumn(requestLine) }, requestEnd),
    };

    return {
      name: section.name,
      request,
      requestVariables,
      preRequestHandler,
      handler,
      selection: Selection.of(
        this.filename,
        { line: sectionStart.number, col: 1 },
        endOf(significant[significant.length - 1])
      ),
    };
  }

  private parseDeclarations(): RequestVariable[] {
    const declarations: RequestVariable[] = [];

    while (this.current() && DECLARATION_START.test(this.peek().text)) {
      const line = this.advance();
      const match = DECLARATION.exec(line.text);
      if (!match) {
        throw new ParseError('invalid variable declaration, expected `@name = value`', this.selectLine(line));
      }
      const [, , name, rawValue] = match;
      const valueCol = rawValue.length > 0 ? line.text.lastIndexOf(rawValue) + 1 : line.text.length + 1;
      declarations.push([name, createValue(this.filename, rawValue, { line: line.number, col: valueCol })]);
      this.skipTrivia();
    }

    return declarations;
  }

  private parseHandler(marker: '<' | '>'): Handler {
    const first = this.advance();
    const markerCol = firstColumn(first);
    const open = first.text.indexOf('{%');
    const opening = Selection.of(this.filename, { line: first.number, col: markerCol }, { line: first.number, col: open + 3 });

    const parts: string[] = [];
    let line = first;
    let rest = first.text.slice(open + 2);

    for (;;) {
      const close = rest.indexOf('%}');
      if (close >= 0) {
        parts.push(rest.slice(0, close));
        const trailing = rest.slice(close + 2);
        if (!BLANK.test(trailing)) {
          throw new ParseError(
            `unexpected text after \`${marker} {% ... %}\` handler`,
            this.selectLine(line)
          );
        }
        const closeCol = line.text.length - trailing.length + 1;
        return {
          script: parts.join('\n').trim(),
          selection: Selection.of(this.filename, opening.start, { line: line.number, col: closeCol }),
        };
      }

      parts.push(rest);
      const next = this.current();
      if (!next) {
        throw new ParseError('unterminated handler, expected `%}`', opening);
      }
      this.advance();
      line = next;
      rest = next.text;
    }
  }

  private parseRequestLine(): { method: Method; target: Value } {
    const line = this.advance();
    const match = REQUEST_LINE.exec(line.text);
    if (!match) {
      throw new ParseError('missing request line', this.selectLine(line));
    }
    const [, indent, first, gap, remainder] = match;

    let method: Method = { name: 'GET', selection: Selection.none() };
    let targetCol = indent.length + 1;
    let targetText = remainder === undefined ? first : `${first}${gap}${remainder}`;

    if (UPPERCASE_WORD.test(first)) {
      const methodSelection = Selection.of(
        this.filename,
        { line: line.number, col: indent.length + 1 },
        { line: line.number, col: indent.length + first.length + 1 }
      );
      if (!isMethodName(first)) {
        throw new ParseError(`unsupported method \`${first}\``, methodSelection);
      }
      if (remainder === undefined || remainder.trim().length === 0) {
        throw new ParseError('missing request target', methodSelection);
      }
      method = { name: first, selection: methodSelection };
      targetCol = indent.length + first.length + gap.length + 1;
      targetText = remainder;
    }

    while (!HTTP_VERSION.test(targetText)) {
      const next = this.current();
      if (!next || !CONTINUATION.test(next.text) || COMMENT.test(next.text)) {
        break;
      }
      this.advance();
      targetText += `\n${next.text}`;
    }

    targetText = targetText.replace(HTTP_VERSION, '').trimEnd();

    return {
      method,
      target: createValue(this.filename, targetText, { line: line.number, col: targetCol }),
    };
  }

  private parseHeaders(): Header[] {
    const headers: Header[] = [];

    for (let line = this.current(); line; line = this.current()) {
      if (BLANK.test(line.text) || RESPONSE_HANDLER.test(line.text)) {
        break;
      }
      this.advance();
      if (COMMENT.test(line.text)) {
        continue;
      }

      const match = HEADER.exec(line.text);
      if (!match) {
        throw new ParseError('expected header, blank line or response handler', this.selectLine(line));
      }
      const [, indent, fieldName, rawValue] = match;
      const fieldValue = rawValue.trim();
      const valueCol = fieldValue.length > 0
        ? line.text.length - rawValue.trimStart().length + 1
        : line.text.length + 1;

      headers.push({
        fieldName,
        fieldValue: createValue(this.filename, fieldValue, { line: line.number, col: valueCol }),
        selection: Selection.of(this.filename, { line: line.number, col: indent.length + 1 }, endOf(line)),
      });
    }

    return headers;
  }

  private parseBody(): Value | undefined {
    const bodyLines: Line[] = [];

    for (let line = this.current(); line; line = this.current()) {
      if (RESPONSE_HANDLER.test(line.text)) {
        break;
      }
      bodyLines.push(this.advance());
    }

    while (bodyLines.length > 0 && BLANK.test(bodyLines[0].text)) {
      bodyLines.shift();
    }
    let trailing = bodyLines.length;
    while (trailing > 0 && isTrivia(bodyLines[trailing - 1])) {
      trailing -= 1;
    }
    if (trailing === 0) {
      return undefined;
    }
    // comments directly under the body text are part of it; after a blank line they are not
    while (trailing < bodyLines.length && !BLANK.test(bodyLines[trailing].text)) {
      trailing += 1;
    }
    bodyLines.splice(trailing);

    const text = bodyLines.map(line => line.text).join('\n').trimEnd();
    return createValue(this.filename, text, { line: bodyLines[0].number, col: 1 });
  }

  private lastEnd(requestLine: Line, headers: Header[]): Position {
    const lastHeader = headers[headers.length - 1];
    return lastHeader ? lastHeader.selection.end : endOf(requestLine);
  }

  private selectLine(line: Line): Selection {
    return Selection.of(this.filename, { line: line.number, col: firstColumn(line) }, endOf(line));
  }

  private skipTrivia(): void {
    while (this.cursor < this.lines.length && isTrivia(this.lines[this.cursor])) {
      this.cursor += 1;
    }
  }

  private current(): Line | undefined {
    return this.lines[this.cursor];
  }

  private peek(): Line {
    const line = this.lines[this.cursor];
    if (!line) {
      throw new Error('parser read past the end of the section');
    }
    return line;
  }

  private advance(): Line {
    const line = this.peek();
    this.cursor += 1;
    return line;
  }
}

/**
 * Parses the text of an `.http` file. Throws `ParseError` pointing at the offending line.
 */
export function parse(filename: string, source: string): File {
  return new ScriptParser(filename).parseFile(source);
}
