import { parse, TomlError } from 'smol-toml';
import { DocumentParseError, DocumentValidationError } from '../../errors/document.error';
import { describeError } from '../../errors/base.error';
import {
  KeySegment,
  formatKey,
  formatKeyPath,
  isBlankLine,
  isTriviaLine,
  lineEnd,
  scanKeyPath,
  scanValueEnd,
  skipBlanks,
} from './toml.scanner';

/**
 * Blank lines and comment lines
 */
export interface TriviaNode {
  kind: 'trivia';
  raw: string;
}

/**
 * `[table]` or `[[array.table]]` header line
 */
export interface HeaderNode {
  kind: 'header';
  raw: string;
  path: string[];
  /** Spans relative to the start of `raw` */
  segments: KeySegment[];
  arrayTable: boolean;
}

/**
 * `key = value`, possibly spanning several lines
 */
export interface PairNode {
  kind: 'pair';
  raw: string;
  key: string[];
  /** Spans relative to the start of `raw` */
  segments: KeySegment[];
  /** Offset of the value within `raw` */
  valueOffset: number;
}

export type TomlNode = TriviaNode | HeaderNode | PairNode;

/**
 * Header plus the nodes that follow it up to the next header.
 * The root block has an empty path and no header.
 */
export interface TomlBlock {
  path: string[];
  headerIndex?: number | undefined;
  start: number;
  end: number;
  /** Node indices of the pairs directly inside this block */
  pairs: number[];
}

/**
 * Where an entry of a section is defined
 */
export type EntryLocation =
  | { kind: 'table'; block: TomlBlock; segmentIndex: number }
  | { kind: 'pair'; index: number; segmentIndex: number };

export type DecodedTable = Record<string, unknown>;

/**
 * Format preserving TOML document.
 *
 * The text is split into a flat list of nodes whose `raw` strings concatenate
 * back to the exact input. Edits replace, insert or remove whole nodes and
 * rewrite single key spans; everything else is carried over byte for byte.
 * Every edit is re-validated and rejected if the result is not valid TOML.
 */
export class TomlDocument {
  private nodeList: TomlNode[];
  private decodedValue: DecodedTable;

  private constructor(nodes: TomlNode[], decoded: DecodedTable) {
    this.nodeList = nodes;
    this.decodedValue = decoded;
  }

  /**
   * @throws DocumentParseError with 1-based line and column
   */
  public static parse(text: string, sourcePath?: string): TomlDocument {
    let decoded: DecodedTable;
    try {
      decoded = parse(text);
    } catch (error) {
      const line = error instanceof TomlError ? error.line : 1;
      const column = error instanceof TomlError ? error.column : 1;
      const where = sourcePath ? ` in ${sourcePath}` : '';
      throw new DocumentParseError(
        `Invalid TOML${where} at line ${line}, column ${column}`,
        line,
        column,
        sourcePath,
        firstLine(describeError(error)),
      );
    }
    return new TomlDocument(buildNodes(text), decoded);
  }

  public static empty(): TomlDocument {
    return new TomlDocument([], {});
  }

  public get nodes(): readonly TomlNode[] {
    return this.nodeList;
  }

  /**
   * Plain value view of the whole document
   */
  public decoded(): DecodedTable {
    return this.decodedValue;
  }

  public toString(): string {
    return this.nodeList.map(node => node.raw).join('');
  }

  /**
   * Line terminator used by the document, `\n` for new documents
   */
  public eol(): string {
    for (const node of this.nodeList) {
      if (node.raw.endsWith('\r\n')) {
        return '\r\n';
      }
      if (node.raw.endsWith('\n')) {
        return '\n';
      }
    }
    return '\n';
  }

  public blocks(): TomlBlock[] {
    const blocks: TomlBlock[] = [];
    let current: TomlBlock = { path: [], start: 0, end: 0, pairs: [] };

    this.nodeList.forEach((node, index) => {
      if (node.kind === 'header') {
        current.end = index;
        blocks.push(current);
        current = { path: node.path, headerIndex: index, start: index, end: index, pairs: [] };
      } else if (node.kind === 'pair') {
        current.pairs.push(index);
      }
    });
    current.end = this.nodeList.length;
    blocks.push(current);

    return blocks;
  }

  /**
   * Every place that defines `section.key`: its own tables (`[section.key]`,
   * `[section.key.sub]`, `[[section.key]]`), pairs in `[section]` and dotted
   * pairs elsewhere.
   */
  public locateEntry(section: string, key: string): EntryLocation[] {
    const locations: EntryLocation[] = [];

    for (const block of this.blocks()) {
      if (block.path.length >= 2 && block.path[0] === section && block.path[1] === key) {
        locations.push({ kind: 'table', block, segmentIndex: 1 });
        continue;
      }

      for (const index of block.pairs) {
        const node = this.pairAt(index);
        const full = [...block.path, ...node.key];
        if (full.length >= 2 && full[0] === section && full[1] === key) {
          locations.push({ kind: 'pair', index, segmentIndex: 1 - block.path.length });
        }
      }
    }

    return locations;
  }

  /**
   * Whether `section` is defined by a single `section = { ... }` pair
   */
  public isInlineTable(section: string): boolean {
    return this.blocks().some(block =>
      block.pairs.some(index => {
        const full = [...block.path, ...this.pairAt(index).key];
        return full.length === 1 && full[0] === section;
      }),
    );
  }

  /**
   * Remove every definition of `section.key`
   */
  public removeEntry(section: string, key: string): void {
    const raws = this.raws();
    const ranges = mergeRanges(this.locateEntry(section, key).map(location => this.removalRange(location)));

    for (const [start, end] of ranges.reverse()) {
      raws.splice(start, end - start);
    }
    this.commit(raws);
  }

  /**
   * Rename `section.from` to `section.to`, rewriting only the key spans
   */
  public renameEntry(section: string, from: string, to: string): void {
    const raws = this.raws();
    const replacement = formatKey(to);

    for (const location of this.locateEntry(section, from)) {
      const index = location.kind === 'table' ? location.block.headerIndex : location.index;
      if (index === undefined) {
        continue;
      }
      const node = this.nodeList[index];
      if (node.kind === 'trivia') {
        continue;
      }
      const segment = node.segments[location.segmentIndex];
      raws[index] = node.raw.slice(0, segment.start) + replacement + node.raw.slice(segment.end);
    }
    this.commit(raws);
  }

  /**
   * Replace the value of the pair at `index`, keeping its key text
   */
  public replacePairValue(index: number, valueText: string): void {
    const node = this.pairAt(index);
    const raws = this.raws();
    raws[index] = node.raw.slice(0, node.valueOffset) + valueText + terminatorOf(node.raw, this.eol());
    this.commit(raws);
  }

  /**
   * Add `section.key = value`.
   *
   * Goes into the `[section]` table when there is one, next to existing
   * dotted `section.*` pairs of the root table otherwise, and into a new
   * `[section]` table at the end of the document as a last resort.
   */
  public insertSectionPair(section: string, key: string, valueText: string): void {
    const eol = this.eol();
    const blocks = this.blocks();
    const table = blocks.find(block => block.path.length === 1 && block.path[0] === section);

    if (table) {
      const after = table.pairs.length > 0 ? table.pairs[table.pairs.length - 1] + 1 : table.start + 1;
      this.insertAt(after, [`${formatKey(key)} = ${valueText}${eol}`]);
      return;
    }

    const root = blocks[0];
    const dotted = root.pairs.filter(index => this.pairAt(index).key[0] === section);
    if (dotted.length > 0) {
      const line = `${formatKeyPath([section, key])} = ${valueText}${eol}`;
      this.insertAt(dotted[dotted.length - 1] + 1, [line]);
      return;
    }

    this.insertBlock(this.nodeList.length, [
      `[${formatKey(section)}]${eol}`,
      `${formatKey(key)} = ${valueText}${eol}`,
    ]);
  }

  /**
   * Add a group of table lines for an entry of `section`, right after the
   * last table belonging to the section, or at the end of the document.
   */
  public insertSectionTables(section: string, lines: string[]): void {
    const eol = this.eol();
    const owned = this.blocks().filter(block => block.path[0] === section && block.headerIndex !== undefined);
    const last = owned[owned.length - 1];
    const position = last ? contentEnd(last) : this.nodeList.length;

    this.insertBlock(
      position,
      lines.map(line => `${line}${eol}`),
    );
  }

  /**
   * Run several edits as one; the document is restored if any of them fails
   */
  public transaction<T>(edit: () => T): T {
    const nodes = this.nodeList;
    const decoded = this.decodedValue;
    try {
      return edit();
    } catch (error) {
      this.nodeList = nodes;
      this.decodedValue = decoded;
      throw error;
    }
  }

  private pairAt(index: number): PairNode {
    const node = this.nodeList[index];
    if (node?.kind !== 'pair') {
      throw new DocumentValidationError(`Expected a key/value pair at node ${index}`);
    }
    return node;
  }

  private raws(): string[] {
    return this.nodeList.map(node => node.raw);
  }

  private insertAt(position: number, lines: string[]): void {
    const raws = this.raws();
    terminateBefore(raws, position, this.eol());
    raws.splice(position, 0, ...lines);
    this.commit(raws);
  }

  /**
   * Insert a table group, separated from surrounding content by blank lines
   */
  private insertBlock(position: number, lines: string[]): void {
    const eol = this.eol();
    const raws = this.raws();
    terminateBefore(raws, position, eol);

    const previous = position > 0 ? raws[position - 1] : undefined;
    const next = position < raws.length ? raws[position] : undefined;
    const block = [...lines];
    if (previous !== undefined && !isBlankLine(previous)) {
      block.unshift(eol);
    }
    if (next !== undefined && !isBlankLine(next)) {
      block.push(eol);
    }

    raws.splice(position, 0, ...block);
    this.commit(raws);
  }

  private removalRange(location: EntryLocation): [number, number] {
    if (location.kind === 'pair') {
      return [location.index, location.index + 1];
    }

    const { block } = location;
    let end = contentEnd(block);
    while (end < block.end && isBlankLine(this.nodeList[end].raw)) {
      end++;
    }

    // Comment lines directly above a header belong to its table.
    let start = block.start;
    while (start > 0 && isCommentLine(this.nodeList[start - 1])) {
      start--;
    }
    if (end === this.nodeList.length) {
      // Trailing table: drop the blank lines that separated it from the rest.
      while (start > 0 && isBlankLine(this.nodeList[start - 1].raw)) {
        start--;
      }
    }
    return [start, end];
  }

  private commit(raws: string[]): void {
    let next: TomlDocument;
    try {
      next = TomlDocument.parse(raws.join(''));
    } catch (error) {
      throw new DocumentValidationError(
        'Edit would produce an invalid configuration document',
        error instanceof DocumentParseError ? error.toString() : describeError(error),
      );
    }
    this.nodeList = next.nodeList;
    this.decodedValue = next.decodedValue;
  }
}

/**
 * Index just past the last pair of a block, or past its header
 */
function contentEnd(block: TomlBlock): number {
  if (block.pairs.length > 0) {
    return block.pairs[block.pairs.length - 1] + 1;
  }
  return block.headerIndex !== undefined ? block.headerIndex + 1 : block.start;
}

/**
 * Sort ranges and join the ones that touch or overlap
 */
function mergeRanges(ranges: Array<[number, number]>): Array<[number, number]> {
  const merged: Array<[number, number]> = [];
  for (const [start, end] of [...ranges].sort((a, b) => a[0] - b[0])) {
    const last = merged[merged.length - 1];
    if (last && start <= last[1]) {
      last[1] = Math.max(last[1], end);
    } else {
      merged.push([start, end]);
    }
  }
  return merged;
}

/**
 * Make sure the node before `position` ends with a line terminator
 */
function terminateBefore(raws: string[], position: number, eol: string): void {
  const index = position - 1;
  if (index >= 0 && !raws[index].endsWith('\n')) {
    raws[index] += eol;
  }
}

function isCommentLine(node: TomlNode): boolean {
  return node.kind === 'trivia' && !isBlankLine(node.raw);
}

function terminatorOf(raw: string, eol: string): string {
  if (raw.endsWith('\r\n')) {
    return '\r\n';
  }
  return raw.endsWith('\n') ? '\n' : eol;
}

function firstLine(message: string): string {
  const newline = message.indexOf('\n');
  return newline === -1 ? message : message.slice(0, newline);
}

function buildNodes(text: string): TomlNode[] {
  const nodes: TomlNode[] = [];
  let offset = 0;

  while (offset < text.length) {
    const end = lineEnd(text, offset);
    const line = text.slice(offset, end);

    if (isTriviaLine(line)) {
      nodes.push({ kind: 'trivia', raw: line });
      offset = end;
      continue;
    }

    const first = skipBlanks(text, offset);
    if (text[first] === '[') {
      const arrayTable = text[first + 1] === '[';
      const { segments } = scanKeyPath(text, first + (arrayTable ? 2 : 1));
      nodes.push({
        kind: 'header',
        raw: line,
        path: segments.map(segment => segment.name),
        segments: segments.map(segment => relative(segment, offset)),
        arrayTable,
      });
      offset = end;
      continue;
    }

    const { segments, end: keyEnd } = scanKeyPath(text, first);
    const valueStart = skipBlanks(text, skipBlanks(text, keyEnd) + 1);
    const valueEnd = scanValueEnd(text, valueStart);
    nodes.push({
      kind: 'pair',
      raw: text.slice(offset, valueEnd),
      key: segments.map(segment => segment.name),
      segments: segments.map(segment => relative(segment, offset)),
      valueOffset: valueStart - offset,
    });
    offset = valueEnd;
  }

  return nodes;
}

function relative(segment: KeySegment, offset: number): KeySegment {
  return { name: segment.name, start: segment.start - offset, end: segment.end - offset };
}
