/**
 * Low level scanning helpers for the format preserving TOML tree.
 *
 * Input is always text that already passed a full TOML parse, so the
 * scanner only needs to find boundaries: where keys start and end, and
 * where a value (possibly spanning several lines) stops.
 */

/**
 * One key of a dotted key path, with its span in the scanned text
 */
export interface KeySegment {
  name: string;
  start: number;
  end: number;
}

const BARE_KEY = /[A-Za-z0-9_-]/;
const BARE_KEY_FULL = /^[A-Za-z0-9_-]+$/;

/**
 * Offset just past the end of the line starting at `start`
 */
export function lineEnd(text: string, start: number): number {
  const newline = text.indexOf('\n', start);
  return newline === -1 ? text.length : newline + 1;
}

/**
 * Offset of the first character that is not a space or tab
 */
export function skipBlanks(text: string, start: number): number {
  let i = start;
  while (i < text.length && (text[i] === ' ' || text[i] === '\t')) {
    i++;
  }
  return i;
}

/**
 * Line holding only whitespace and an optional comment
 */
export function isTriviaLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.length === 0 || trimmed.startsWith('#');
}

export function isBlankLine(line: string): boolean {
  return line.trim().length === 0;
}

/**
 * Read a (possibly dotted) key starting at `start`
 */
export function scanKeyPath(text: string, start: number): { segments: KeySegment[]; end: number } {
  const segments: KeySegment[] = [];
  let i = skipBlanks(text, start);

  for (;;) {
    const segmentStart = i;
    let name: string;

    if (text[i] === '"') {
      const close = skipBasicString(text, i);
      name = unescapeBasic(text.slice(i + 1, close - 1));
      i = close;
    } else if (text[i] === "'") {
      const close = text.indexOf("'", i + 1);
      name = text.slice(i + 1, close);
      i = close + 1;
    } else {
      while (i < text.length && BARE_KEY.test(text.charAt(i))) {
        i++;
      }
      name = text.slice(segmentStart, i);
    }

    segments.push({ name, start: segmentStart, end: i });

    const next = skipBlanks(text, i);
    if (text[next] !== '.') {
      return { segments, end: i };
    }
    i = skipBlanks(text, next + 1);
  }
}

/**
 * Offset just past the line terminator that ends the value starting at `start`.
 *
 * Tracks strings, comments and bracket depth so that multi-line arrays and
 * multi-line strings are consumed as one value.
 */
export function scanValueEnd(text: string, start: number): number {
  let depth = 0;
  let i = start;

  while (i < text.length) {
    if (text.startsWith('"""', i)) {
      i = skipMultilineString(text, i, '"');
      continue;
    }
    if (text.startsWith("'''", i)) {
      i = skipMultilineString(text, i, "'");
      continue;
    }

    const ch = text[i];
    if (ch === '"') {
      i = skipBasicString(text, i);
      continue;
    }
    if (ch === "'") {
      i = text.indexOf("'", i + 1) + 1;
      continue;
    }
    if (ch === '#') {
      while (i < text.length && text[i] !== '\n') {
        i++;
      }
      continue;
    }

    if (ch === '[' || ch === '{') {
      depth++;
    } else if (ch === ']' || ch === '}') {
      depth--;
    } else if (ch === '\n' && depth <= 0) {
      return i + 1;
    }
    i++;
  }

  return text.length;
}

/**
 * Offset just past the closing quote of the basic string opening at `start`
 */
export function skipBasicString(text: string, start: number): number {
  let i = start + 1;
  while (i < text.length && text[i] !== '"') {
    i += text[i] === '\\' ? 2 : 1;
  }
  return i + 1;
}

function skipMultilineString(text: string, start: number, quote: '"' | "'"): number {
  const delimiter = quote.repeat(3);
  let i = start + 3;

  while (i < text.length) {
    if (quote === '"' && text[i] === '\\') {
      i += 2;
      continue;
    }
    if (text.startsWith(delimiter, i)) {
      let end = i + 3;
      // Up to two quotes directly before the delimiter belong to the content.
      let extra = 0;
      while (extra < 2 && text[end] === quote) {
        end++;
        extra++;
      }
      return end;
    }
    i++;
  }

  return text.length;
}

function unescapeBasic(body: string): string {
  return body.replace(
    /\\(u[0-9A-Fa-f]{4}|U[0-9A-Fa-f]{8}|[btnfr"\\e])/g,
    (_match, escape: string) => {
      switch (escape[0]) {
        case 'b':
          return '\b';
        case 't':
          return '\t';
        case 'n':
          return '\n';
        case 'f':
          return '\f';
        case 'r':
          return '\r';
        case 'e':
          return '\x1b';
        case 'u':
        case 'U':
          return String.fromCodePoint(parseInt(escape.slice(1), 16));
        default:
          return escape;
      }
    },
  );
}

/**
 * Render a key segment, quoting only when a bare key is not possible
 */
export function formatKey(name: string): string {
  return BARE_KEY_FULL.test(name) ? name : formatString(name);
}

export function formatKeyPath(path: readonly string[]): string {
  return path.map(formatKey).join('.');
}

/**
 * Render a TOML basic string
 */
export function formatString(value: string): string {
  let out = '"';
  for (const ch of value) {
    const code = ch.codePointAt(0) ?? 0;
    switch (ch) {
      case '"':
        out += '\\"';
        break;
      case '\\':
        out += '\\\\';
        break;
      case '\b':
        out += '\\b';
        break;
      case '\t':
        out += '\\t';
        break;
      case '\n':
        out += '\\n';
        break;
      case '\f':
        out += '\\f';
        break;
      case '\r':
        out += '\\r';
        break;
      default:
        out +=
          code < 0x20 || code === 0x7f ? `\\u${code.toString(16).padStart(4, '0')}` : ch;
    }
  }
  return `${out}"`;
}

/**
 * Scalar or nested value that can be written back as TOML
 */
export type TomlWritable =
  | string
  | boolean
  | number
  | readonly TomlWritable[]
  | { readonly [key: string]: TomlWritable | undefined };

/**
 * Render a value in inline form. `undefined` members of tables are omitted.
 */
export function formatValue(value: TomlWritable): string {
  if (typeof value === 'string') {
    return formatString(value);
  }
  if (typeof value === 'boolean' || typeof value === 'number') {
    return String(value);
  }
  if (isWritableArray(value)) {
    return `[${value.map(formatValue).join(', ')}]`;
  }
  return formatInlineTable(value);
}

export function formatInlineTable(table: { readonly [key: string]: TomlWritable | undefined }): string {
  const members: string[] = [];
  for (const [key, member] of Object.entries(table)) {
    if (member !== undefined) {
      members.push(`${formatKey(key)} = ${formatValue(member)}`);
    }
  }
  return members.length > 0 ? `{ ${members.join(', ')} }` : '{}';
}

function isWritableArray(value: TomlWritable): value is readonly TomlWritable[] {
  return Array.isArray(value);
}
