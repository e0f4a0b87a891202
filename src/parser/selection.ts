export interface Position {
  /** 1-based */
  readonly line: number;
  /** 1-based */
  readonly col: number;
}

/**
 * Source span of an AST node. Used for diagnostics only.
 */
export interface Selection {
  readonly filename: string;
  readonly start: Position;
  readonly end: Position;
}

export const Selection = {
  none(): Selection {
    return { filename: '', start: { line: 0, col: 0 }, end: { line: 0, col: 0 } };
  },

  of(filename: string, start: Position, end: Position = start): Selection {
    return Object.freeze({ filename, start: Object.freeze({ ...start }), end: Object.freeze({ ...end }) });
  },
};

export function formatSelection(selection: Selection): string {
  const { filename, start } = selection;
  return `${filename || '<unknown>'}:${start.line}:${start.col}`;
}

/**
 * Position of `offset` inside `text`, where `text` begins at `base`.
 */
export function positionAt(base: Position, text: string, offset: number): Position {
  let line = base.line;
  let col = base.col;
  for (let i = 0; i < offset && i < text.length; i++) {
    if (text[i] === '\n') {
      line += 1;
      col = 1;
    } else {
      col += 1;
    }
  }
  return { line, col };
}
