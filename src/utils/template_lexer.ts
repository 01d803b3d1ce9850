/**
 * Position-preserving lexer for the Jinja-style templating layer of dbt models.
 *
 * The source is split into units that exactly cover it: raw `data` text and the
 * `{{ … }}`, `{% … %}` and `{# … #}` tags. Unlike a rendering lexer nothing is
 * normalised away, so `source.slice(unit.start, unit.end)` is always the unit's
 * original text.
 */

export type TemplateUnitType = 'data' | 'expression' | 'block' | 'comment';

export interface TemplateUnit {
  type: TemplateUnitType;
  start: number;
  end: number;
  /** First identifier inside an expression or block tag. */
  name?: string;
}

export class TemplateSyntaxError extends Error {
  constructor(
    message: string,
    public readonly position: number
  ) {
    super(`${message} at offset ${position}`);
    this.name = 'TemplateSyntaxError';
  }
}

const TAG_TYPES: Record<string, TemplateUnitType> = {
  '{{': 'expression',
  '{%': 'block',
  '{#': 'comment',
};

const TAG_CLOSERS: Record<TemplateUnitType, string> = {
  data: '',
  expression: '}}',
  block: '%}',
  comment: '#}',
};

const BRACKET_PAIRS: Record<string, string> = {
  ')': '(',
  ']': '[',
  '}': '{',
};

const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /[A-Za-z0-9_]/;

function findNextTag(source: string, from: number): number {
  let index = source.indexOf('{', from);
  while (index !== -1) {
    const next = source[index + 1];
    if (next === '{' || next === '%' || next === '#') {
      return index;
    }
    index = source.indexOf('{', index + 1);
  }
  return -1;
}

function scanString(source: string, start: number): number {
  const quote = source[start];
  let pos = start + 1;
  while (pos < source.length) {
    const char = source[pos];
    if (char === '\\') {
      pos += 2;
      continue;
    }
    if (char === quote) {
      return pos + 1;
    }
    pos++;
  }
  throw new TemplateSyntaxError('Unterminated string literal', start);
}

function scanComment(source: string, start: number): TemplateUnit {
  const closeIndex = source.indexOf(TAG_CLOSERS.comment, start + 2);
  if (closeIndex === -1) {
    throw new TemplateSyntaxError('Missing end of comment tag', start);
  }
  return { type: 'comment', start, end: closeIndex + 2 };
}

/**
 * Scans an expression or block tag starting at `start` (the opening delimiter).
 * The closing delimiter only counts once every bracket opened inside the tag has
 * been closed, which is what makes `{{ ref('x' }}` a syntax error.
 */
function scanTag(source: string, start: number, type: TemplateUnitType): TemplateUnit {
  const closer = TAG_CLOSERS[type];
  const brackets: string[] = [];
  let name: string | undefined;
  let pos = start + 2;

  while (pos < source.length) {
    const char = source[pos];

    if (brackets.length === 0 && source.startsWith(closer, pos)) {
      return { type, start, end: pos + closer.length, name };
    }

    if (char === "'" || char === '"') {
      pos = scanString(source, pos);
      continue;
    }

    if (IDENTIFIER_START.test(char)) {
      const identifierStart = pos;
      while (pos < source.length && IDENTIFIER_PART.test(source[pos])) {
        pos++;
      }
      name ??= source.slice(identifierStart, pos);
      continue;
    }

    if (char === '(' || char === '[' || char === '{') {
      brackets.push(char);
    } else if (char in BRACKET_PAIRS) {
      const expected = BRACKET_PAIRS[char];
      if (brackets.pop() !== expected) {
        throw new TemplateSyntaxError(`Unexpected '${char}'`, pos);
      }
    }
    pos++;
  }

  throw new TemplateSyntaxError(`Unexpected end of template, expected '${closer}'`, start);
}

export function lexTemplate(source: string): TemplateUnit[] {
  const units: TemplateUnit[] = [];
  let pos = 0;

  while (pos < source.length) {
    const tagStart = findNextTag(source, pos);
    if (tagStart === -1) {
      units.push({ type: 'data', start: pos, end: source.length });
      break;
    }
    if (tagStart > pos) {
      units.push({ type: 'data', start: pos, end: tagStart });
    }

    const type = TAG_TYPES[source.slice(tagStart, tagStart + 2)];
    const unit = type === 'comment' ? scanComment(source, tagStart) : scanTag(source, tagStart, type);
    units.push(unit);
    pos = unit.end;
  }

  return units;
}
