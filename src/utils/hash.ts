import { createHash } from 'node:crypto';

/** `sha256:<64 lowercase hex>` */
export type Fingerprint = string;

export const FINGERPRINT_PREFIX = 'sha256:';
export const FINGERPRINT_PATTERN = /^sha256:[0-9a-f]{64}$/;

export function contentHash(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

export function isFingerprint(value: unknown): value is Fingerprint {
  return typeof value === 'string' && FINGERPRINT_PATTERN.test(value);
}

/** `sha256:0123456789ab` for display. */
export function shortFingerprint(fingerprint: Fingerprint, length = 12): string {
  return fingerprint.slice(0, FINGERPRINT_PREFIX.length + length);
}

/**
 * Fingerprint of one entity's source. Formatting-only edits (comments,
 * whitespace, indentation width, line endings, quote style where the
 * language does not distinguish quotes) leave it unchanged.
 */
export function fingerprint(source: string, language?: string): Fingerprint {
  return FINGERPRINT_PREFIX + contentHash(normalizeSource(source, language));
}

interface LexicalSyntax {
  lineComments: string[];
  blockComments: Array<[open: string, close: string]>;
  quotes: string[];
  tripleQuotes: boolean;
  /** `'x'` and `"x"` are the same literal. */
  interchangeableQuotes: boolean;
  /** `/.../flags` in operand position is a literal. */
  regexLiterals?: boolean;
}

const PYTHON: LexicalSyntax = {
  lineComments: ['#'],
  blockComments: [],
  quotes: ['"', "'"],
  tripleQuotes: true,
  interchangeableQuotes: true,
};

const ECMASCRIPT: LexicalSyntax = {
  lineComments: ['//'],
  blockComments: [['/*', '*/']],
  quotes: ['"', "'", '`'],
  tripleQuotes: false,
  interchangeableQuotes: true,
  regexLiterals: true,
};

const SYNTAX: Record<string, LexicalSyntax> = {
  python: PYTHON,
  javascript: ECMASCRIPT,
  typescript: ECMASCRIPT,
  go: {
    lineComments: ['//'],
    blockComments: [['/*', '*/']],
    quotes: ['"', "'", '`'],
    tripleQuotes: false,
    interchangeableQuotes: false,
  },
  rust: {
    // `'` also starts lifetimes, so only double quotes delimit literals
    lineComments: ['//'],
    blockComments: [['/*', '*/']],
    quotes: ['"'],
    tripleQuotes: false,
    interchangeableQuotes: false,
  },
};

const FALLBACK: LexicalSyntax = {
  lineComments: ['#', '//'],
  blockComments: [['/*', '*/']],
  quotes: ['"', "'", '`'],
  tripleQuotes: true,
  interchangeableQuotes: true,
};

// Stands in for a removed block comment: whitespace to the compactor, but not
// counted as indentation.
const ERASED = '\u0000';
const QUOTE_MARK = '"';
const TAB_WIDTH = 8;

interface Segment {
  literal: boolean;
  text: string;
}

/**
 * Canonical text of a source fragment: comments removed, literals in one
 * quote style, blank lines dropped, indentation reduced to nesting levels and
 * in-line whitespace kept only where it separates two tokens of the same kind.
 * Never throws.
 */
export function normalizeSource(source: string, language?: string): string {
  const syntax = (language && SYNTAX[language.toLowerCase()]) || FALLBACK;
  const text = source.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');

  const out: string[] = [];
  const indentStack = [0];

  for (const segments of scan(text, syntax)) {
    const rendered = renderLine(segments);
    if (!rendered) continue;

    while (indentStack.length > 1 && indentStack[indentStack.length - 1] > rendered.indent) {
      indentStack.pop();
    }
    if (indentStack[indentStack.length - 1] < rendered.indent) {
      indentStack.push(rendered.indent);
    }
    out.push('\t'.repeat(indentStack.length - 1) + rendered.text);
  }

  return out.join('\n');
}

function scan(source: string, syntax: LexicalSyntax): Segment[][] {
  const lines: Segment[][] = [];
  let current: Segment[] = [];
  let code = '';
  // Tail of the significant text so far, for telling a regex from a division
  let recent = '';

  const note = (text: string) => {
    recent = (recent + text.replace(/\s/g, '')).slice(-32);
  };

  const flushCode = () => {
    if (code) {
      current.push({ literal: false, text: code });
      code = '';
    }
  };

  const pushLiteral = (text: string) => {
    flushCode();
    current.push({ literal: true, text });
    note(QUOTE_MARK);
  };

  let i = 0;
  while (i < source.length) {
    const ch = source[i];

    if (ch === '\n') {
      flushCode();
      lines.push(current);
      current = [];
      i++;
      continue;
    }

    const block = syntax.blockComments.find(([open]) => source.startsWith(open, i));
    if (block) {
      const [open, close] = block;
      const end = source.indexOf(close, i + open.length);
      i = end === -1 ? source.length : end + close.length;
      code += ERASED;
      continue;
    }

    if (syntax.lineComments.some(marker => source.startsWith(marker, i))) {
      const end = source.indexOf('\n', i);
      i = end === -1 ? source.length : end;
      continue;
    }

    if (syntax.quotes.includes(ch)) {
      const literal = readLiteral(source, i, ch, syntax);
      pushLiteral(literal.text);
      i = literal.end;
      continue;
    }

    if (ch === '/' && syntax.regexLiterals && startsOperand(recent)) {
      const end = readRegex(source, i);
      if (end !== undefined) {
        pushLiteral(source.slice(i, end));
        i = end;
        continue;
      }
    }

    // An escaped character is never a comment marker or a quote
    if (ch === '\\' && i + 1 < source.length && source[i + 1] !== '\n') {
      code += source.slice(i, i + 2);
      note(source.slice(i, i + 2));
      i += 2;
      continue;
    }

    code += ch;
    note(ch);
    i++;
  }

  flushCode();
  lines.push(current);
  return lines;
}

const OPERAND_KEYWORDS = new Set([
  'return', 'typeof', 'instanceof', 'in', 'of', 'new', 'delete', 'void',
  'throw', 'case', 'do', 'else', 'yield', 'await',
]);

/** Whether a `/` after `recent` opens a regex rather than dividing. */
function startsOperand(recent: string): boolean {
  if (!recent) return true;
  const word = /[\p{L}\p{N}_$]+$/u.exec(recent);
  if (word) return OPERAND_KEYWORDS.has(word[0]);
  return '(,=:[!&|?{};+-*%<>~^'.includes(recent[recent.length - 1]);
}

/** End of the regex literal opening at `start`, or undefined when the line ends first. */
function readRegex(source: string, start: number): number | undefined {
  let inClass = false;
  let i = start + 1;
  while (i < source.length) {
    const ch = source[i];
    if (ch === '\n') return undefined;
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === '[') inClass = true;
    else if (ch === ']') inClass = false;
    else if (ch === '/' && !inClass) {
      i++;
      while (i < source.length && /[a-z]/.test(source[i])) i++;
      return i;
    }
    i++;
  }
  return undefined;
}

function readLiteral(source: string, start: number, quote: string, syntax: LexicalSyntax): { text: string; end: number } {
  const triple = syntax.tripleQuotes && quote !== '`' && source.startsWith(quote.repeat(3), start);
  const delimiter = triple ? quote.repeat(3) : quote;
  const multiline = triple || quote === '`';

  let i = start + delimiter.length;
  while (i < source.length) {
    const ch = source[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === '\n' && !multiline) break;
    if (source.startsWith(delimiter, i)) {
      const end = i + delimiter.length;
      const raw = source.slice(start, end);
      const canonical = syntax.interchangeableQuotes && quote === "'" ? requote(raw, triple) : raw;
      return { text: canonical, end };
    }
    i++;
  }

  // Unterminated: keep as written
  const end = Math.min(i, source.length);
  return { text: source.slice(start, end), end };
}

function requote(raw: string, triple: boolean): string {
  if (triple) {
    const body = raw.slice(3, -3);
    return body.includes('"') ? raw : `"""${body}"""`;
  }

  const body = raw.slice(1, -1);
  let result = '';
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch === '\\' && i + 1 < body.length) {
      const next = body[i + 1];
      result += next === "'" ? "'" : ch + next;
      i++;
    } else if (ch === '"') {
      result += '\\"';
    } else {
      result += ch;
    }
  }
  return `"${result}"`;
}

type CharClass = 'word' | 'operator' | 'other';

function classify(ch: string): CharClass {
  if (/[\p{L}\p{N}_$"'`]/u.test(ch)) return 'word';
  if (/[+\-*/%=<>!&|^~?:.@#]/.test(ch)) return 'operator';
  return 'other';
}

function isBlank(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === ERASED || ch === '\f' || ch === '\v';
}

function renderLine(segments: Segment[]): { indent: number; text: string } | undefined {
  let indent = 0;
  const first = segments[0];
  if (first && !first.literal) {
    for (const ch of first.text) {
      if (ch === ' ') indent++;
      else if (ch === '\t') indent += TAB_WIDTH - (indent % TAB_WIDTH);
      else break;
    }
  }

  let text = '';
  let pendingSpace = false;

  const append = (leading: string, chunk: string) => {
    if (pendingSpace && text) {
      const kind = classify(text[text.length - 1]);
      if (kind !== 'other' && kind === classify(leading)) text += ' ';
    }
    pendingSpace = false;
    text += chunk;
  };

  for (const segment of segments) {
    if (segment.literal) {
      append(segment.text[0], segment.text);
      continue;
    }
    for (const ch of segment.text) {
      if (isBlank(ch)) pendingSpace = true;
      else append(ch, ch);
    }
  }

  return text ? { indent, text } : undefined;
}
