import { Document, isAlias, isMap, isPair, isScalar, isSeq, parseDocument } from 'yaml';
import { DescriptionEntry, DescriptionIndex, formatPath, resolvePath } from './descriptions.js';
import { StructuralParseError } from './errors.js';
import { LoadWarning, ScalarValue, StructuralPath, TreeMap, TreeValue } from './types.js';

/**
 * A decoded values document plus its description side channel.
 */
export interface LoadedDocument {
  /** Decoded values; an empty document decodes to an empty mapping */
  tree: TreeValue;
  descriptions: DescriptionIndex;
  warnings: LoadWarning[];
}

/**
 * Regex patterns for the line scanner
 */

// "# @description: text" or "# @desc: text"
// Group 1: indentation, Group 2: description text
const DESCRIPTION_PATTERN = /^(\s*)#\s*@(?:description|desc):(.*)$/;

const COMMENT_PATTERN = /^#/;

// Document markers and directives carry no structure
const MARKER_PATTERN = /^(?:---|\.\.\.|%)/;

// "- rest" or a bare "-"
// Group 1: spacing after the dash, Group 2: rest of the line
const SEQUENCE_ITEM_PATTERN = /^-(?:(\s+)(.*))?$/;

// "key: rest", "'key': rest", "\"key\": rest"
// Group 1: the key as written, Group 2: rest of the line
const KEY_PATTERN = /^("(?:[^"\\]|\\.)*"|'(?:[^']|'')*'|[^\s#'"{}[\],&*!|>%@`][^#]*?)\s*:(?:\s+(.*))?$/;

// "|", ">-", "|2+ # comment"
const BLOCK_SCALAR_PATTERN = /^[|>][-+0-9]*\s*(?:#.*)?$/;

// Value slot left open on this line: nothing, a comment, or only an anchor/tag
const OPEN_VALUE_PATTERN = /^(?:[&!]\S*\s*)*(?:#.*)?$/;

/**
 * A mapping or sequence whose entries start at `indent`.
 */
interface Frame {
  indent: number;
  kind: 'map' | 'seq';
  path: StructuralPath;
  nextIndex: number;
}

/**
 * A key or item whose value continues on the following, deeper lines.
 */
interface OpenSlot {
  path: StructuralPath;
  indent: number;
}

/**
 * Contiguous description comments waiting for their node.
 */
interface PendingRun {
  indent: number;
  line: number;
  lines: string[];
  /** A blank line followed the run */
  sealed: boolean;
}

function unquoteKey(raw: string): string {
  if (raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"')) {
    return raw.slice(1, -1).replace(/\\(["\\])/g, '$1');
  }
  if (raw.length >= 2 && raw.startsWith("'") && raw.endsWith("'")) {
    return raw.slice(1, -1).replace(/''/g, "'");
  }
  return raw.trim();
}

function leadingSpaces(line: string): number {
  return line.length - line.trimStart().length;
}

/**
 * Net bracket depth of a flow collection fragment, ignoring quoted text.
 */
function flowDepthDelta(text: string): number {
  let depth = 0;
  let quote: string | null = null;
  for (const ch of text) {
    if (quote) {
      if (ch === quote) quote = null;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '#') {
      break;
    } else if (ch === '[' || ch === '{') {
      depth++;
    } else if (ch === ']' || ch === '}') {
      depth--;
    }
  }
  return depth;
}

/**
 * Walks the physical lines of a document, tracking the structural path of
 * every key and sequence item, and binds description comment runs to the
 * node that starts at their indentation on the next content line.
 */
class DescriptionScanner {
  private frames: Frame[] = [];
  private open: OpenSlot | null = null;
  private pending: PendingRun | null = null;
  private blockScalarIndent: number | null = null;
  private flowDepth = 0;

  readonly bound: DescriptionEntry[] = [];
  readonly warnings: LoadWarning[] = [];

  scan(lines: string[]): void {
    for (let i = 0; i < lines.length; i++) {
      this.scanLine(lines[i], i + 1);
    }
    if (this.pending) {
      this.unbind(this.pending, 'it is the last content in the document');
    }
  }

  private scanLine(line: string, lineNum: number): void {
    const text = line.trimStart();
    const indent = leadingSpaces(line);

    if (this.blockScalarIndent !== null) {
      if (text === '' || indent > this.blockScalarIndent) return;
      this.blockScalarIndent = null;
    }

    if (this.flowDepth > 0) {
      this.flowDepth += flowDepthDelta(text);
      return;
    }

    const description = line.match(DESCRIPTION_PATTERN);
    if (description && description[2].trim() !== '') {
      this.addDescription(description[1].length, description[2].trim(), lineNum);
      return;
    }

    if (text === '') {
      if (this.pending) this.pending.sealed = true;
      return;
    }

    if (COMMENT_PATTERN.test(text) || MARKER_PATTERN.test(text)) {
      return;
    }

    while (this.frames.length > 0 && this.top().indent > indent) {
      this.frames.pop();
    }

    this.scanNode(indent, text);

    if (this.pending) {
      this.unbind(this.pending, `no entry starts at column ${this.pending.indent + 1} on line ${lineNum}`);
    }
  }

  private addDescription(indent: number, text: string, lineNum: number): void {
    const run = this.pending;
    if (run && !run.sealed && run.indent === indent) {
      run.lines.push(text);
      return;
    }
    if (run) {
      this.unbind(run, `superseded by the description on line ${lineNum}`);
    }
    this.pending = { indent, line: lineNum, lines: [text], sealed: false };
  }

  /**
   * Handle the node starting at `col`. Recurses for the inline content of
   * sequence items ("- name: x", "- - x").
   */
  private scanNode(col: number, text: string): void {
    const item = text.match(SEQUENCE_ITEM_PATTERN);
    if (item) {
      const sequence = this.sequenceAt(col);
      const itemPath = [...sequence.path, sequence.nextIndex];
      sequence.nextIndex++;
      this.bind(col, itemPath);

      const rest = item[2] ?? '';
      this.open = { path: itemPath, indent: col };
      if (BLOCK_SCALAR_PATTERN.test(rest)) {
        this.open = null;
        this.blockScalarIndent = col;
      } else if (!OPEN_VALUE_PATTERN.test(rest)) {
        this.scanNode(col + 1 + (item[1] ?? '').length, rest);
      }
      return;
    }

    const entry = text.match(KEY_PATTERN);
    if (entry) {
      const mapping = this.mappingAt(col);
      const keyPath = [...mapping.path, unquoteKey(entry[1])];
      this.bind(col, keyPath);
      this.scanValue(col, keyPath, (entry[2] ?? '').trim());
      return;
    }

    // Scalar item content or a continuation line
    this.open = null;
    this.trackScalar(col, text);
  }

  private scanValue(col: number, path: StructuralPath, rest: string): void {
    if (OPEN_VALUE_PATTERN.test(rest)) {
      this.open = { path, indent: col };
      return;
    }
    this.open = null;
    this.trackScalar(col, rest);
  }

  private trackScalar(col: number, value: string): void {
    if (BLOCK_SCALAR_PATTERN.test(value)) {
      this.blockScalarIndent = col;
      return;
    }
    if (value.startsWith('[') || value.startsWith('{')) {
      this.flowDepth = Math.max(0, flowDepthDelta(value));
    }
  }

  private top(): Frame {
    return this.frames[this.frames.length - 1];
  }

  private sequenceAt(col: number): Frame {
    const top = this.frames.length > 0 ? this.top() : null;
    if (top && top.kind === 'seq' && top.indent === col) {
      return top;
    }
    // A sequence may sit at its parent key's own column
    const path = this.open && col >= this.open.indent ? this.open.path : top?.path ?? [];
    return this.push({ indent: col, kind: 'seq', path, nextIndex: 0 });
  }

  private mappingAt(col: number): Frame {
    // A key at a sequence's dash column ends that sequence
    while (this.frames.length > 0 && this.top().kind === 'seq' && this.top().indent === col) {
      this.frames.pop();
    }
    const top = this.frames.length > 0 ? this.top() : null;
    if (top && top.kind === 'map' && top.indent === col) {
      return top;
    }
    const path = this.open && col > this.open.indent ? this.open.path : top?.path ?? [];
    return this.push({ indent: col, kind: 'map', path, nextIndex: 0 });
  }

  private push(frame: Frame): Frame {
    this.frames.push(frame);
    this.open = null;
    return frame;
  }

  private bind(col: number, path: StructuralPath): void {
    const run = this.pending;
    if (!run || run.indent !== col) return;
    this.bound.push({ path, text: run.lines.join(' '), line: run.line });
    this.pending = null;
  }

  private unbind(run: PendingRun, reason: string): void {
    this.warnings.push({
      kind: 'unbound',
      line: run.line,
      message: `description "${run.lines.join(' ')}" was not attached: ${reason}`
    });
    this.pending = null;
  }
}

function toScalar(value: unknown): ScalarValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return String(value);
}

/**
 * Keys keep their written form (`4.10`, `~`) so they match the scanner's paths.
 */
function keyOf(key: unknown): string {
  if (isScalar(key)) {
    return typeof key.source === 'string' ? key.source : String(toScalar(key.value));
  }
  return String(toScalar(key));
}

/**
 * Convert the decoder's node graph into plain ordered values.
 */
function toTree(node: unknown, doc: Document.Parsed): TreeValue {
  if (isAlias(node)) {
    return toTree(node.resolve(doc), doc);
  }
  if (isMap(node)) {
    const map: TreeMap = new Map();
    for (const pair of node.items) {
      if (!isPair(pair)) continue;
      map.set(keyOf(pair.key), toTree(pair.value, doc));
    }
    return map;
  }
  if (isSeq(node)) {
    return node.items.map(item => toTree(item, doc));
  }
  if (isScalar(node)) {
    return toScalar(node.value);
  }
  return null;
}

/**
 * Decode a values document and extract its description comments.
 *
 * The tree comes from the YAML decoder untouched; descriptions are a pure
 * side channel keyed by structural path.
 */
export function loadDocument(content: string, documentId?: string): LoadedDocument {
  // Normalize line endings (handle Windows \r\n)
  const normalized = content.replace(/\r\n/g, '\n').replace(/\r/g, '\n');

  // Repeated keys are accepted; the last value and the last description win
  const doc = parseDocument(normalized, { uniqueKeys: false });
  if (doc.errors.length > 0) {
    const [error] = doc.errors;
    const line = error.linePos?.[0].line ?? 1;
    throw new StructuralParseError(error.message.split('\n')[0], line, documentId);
  }

  const tree: TreeValue = doc.contents === null ? new Map() : toTree(doc.contents, doc);

  const scanner = new DescriptionScanner();
  scanner.scan(normalized.split('\n'));

  const entries: DescriptionEntry[] = [];
  const warnings = [...scanner.warnings];
  for (const entry of scanner.bound) {
    if (resolvePath(tree, entry.path) === undefined) {
      warnings.push({
        kind: 'unused',
        line: entry.line,
        message: `description "${entry.text}" is bound to ${formatPath(entry.path)}, which is not in the decoded document`
      });
    } else {
      entries.push(entry);
    }
  }
  warnings.sort((a, b) => a.line - b.line);

  return { tree, descriptions: new DescriptionIndex(entries), warnings };
}
