import type {
  FlowDefinition,
  FlowEdge,
  FlowNode,
  FlowNodeKind,
  FlowNodeShape,
} from '@skillroot/core';
import { nullLogger } from '@skillroot/core';
import type { Logger } from '@skillroot/core';
import { FlowParseError } from './errors.js';

/** Language tag of the fenced block holding a skill's flowchart. */
export const FLOW_BLOCK_LANGUAGE = 'mermaid';

const BEGIN_MARKER = 'BEGIN';
const END_MARKER = 'END';

/** Outcome of looking for a flowchart in a skill body. */
export type FlowBlockResult =
  | { status: 'absent' }
  | { status: 'invalid'; reason: string }
  | { status: 'parsed'; flow: FlowDefinition };

interface FencedBlock {
  source: string;
  closed: boolean;
}

/** Shape delimiters, longest opener first. */
const SHAPES: ReadonlyArray<{ open: string; close: string; shape: FlowNodeShape }> = [
  { open: '([', close: '])', shape: 'stadium' },
  { open: '[[', close: ']]', shape: 'subroutine' },
  { open: '((', close: '))', shape: 'circle' },
  { open: '[', close: ']', shape: 'rect' },
  { open: '(', close: ')', shape: 'round' },
  { open: '{', close: '}', shape: 'diamond' },
];

const HEADER_RE = /^(?:flowchart|graph)\b/i;
const IGNORED_RE = /^(?:classDef|class|style|linkStyle|click|direction|subgraph)\b/;
const NODE_ID_RE = /[A-Za-z0-9_]+/y;
const ARROW_RE = /\s*(?:-{2,}>|={2,}>|-\.+->|-{3,})/y;
const INLINE_LABEL_RE = /\s*--(?![->])\s*(.+?)\s*-{2,}>/y;
const PIPE_LABEL_RE = /\s*\|([^|]*)\|/y;

/**
 * Find the first fenced block tagged with `language`.
 * Blocks with other tags are skipped as a whole.
 */
export function findFencedBlock(body: string, language: string): FencedBlock | null {
  const lines = body.split(/\r?\n/);
  let i = 0;

  while (i < lines.length) {
    const opener = (lines[i] ?? '').trim();
    i++;
    if (!opener.startsWith('```')) continue;

    const tag = opener.slice(3).trim().split(/\s+/)[0] ?? '';
    const content: string[] = [];
    let closed = false;
    while (i < lines.length) {
      const line = lines[i] ?? '';
      i++;
      if (line.trim().startsWith('```')) {
        closed = true;
        break;
      }
      content.push(line);
    }

    if (tag.toLowerCase() === language) {
      return { source: content.join('\n'), closed };
    }
  }

  return null;
}

function unquote(label: string): string {
  const trimmed = label.trim();
  const quoted = /^"(.*)"$/.exec(trimmed);
  return quoted ? (quoted[1] ?? '') : trimmed;
}

function isMarker(value: string, marker: string): boolean {
  return value.trim().toUpperCase() === marker;
}

function nodeKind(id: string, label: string, shape: FlowNodeShape): FlowNodeKind {
  if (isMarker(id, BEGIN_MARKER) || isMarker(label, BEGIN_MARKER)) return 'begin';
  if (isMarker(id, END_MARKER) || isMarker(label, END_MARKER)) return 'end';
  if (shape === 'diamond') return 'decision';
  return 'task';
}

interface NodeRef {
  id: string;
  label?: string;
  shape?: FlowNodeShape;
}

/** Cursor over a single flowchart statement. */
class StatementScanner {
  private pos = 0;

  constructor(
    private readonly text: string,
    private readonly lineNo: number,
  ) {}

  private sticky(re: RegExp): RegExpExecArray | null {
    re.lastIndex = this.pos;
    const match = re.exec(this.text);
    if (match) this.pos = re.lastIndex;
    return match;
  }

  private skipSpaces(): void {
    while (this.pos < this.text.length && /\s/.test(this.text.charAt(this.pos))) {
      this.pos++;
    }
  }

  readNode(): NodeRef {
    this.skipSpaces();
    const idMatch = this.sticky(NODE_ID_RE);
    if (!idMatch) {
      throw new FlowParseError(`Expected a node id at "${this.text.slice(this.pos)}"`, this.lineNo);
    }
    const id = idMatch[0];

    for (const { open, close, shape } of SHAPES) {
      if (!this.text.startsWith(open, this.pos)) continue;
      const labelStart = this.pos + open.length;
      const closeAt = this.text.indexOf(close, labelStart);
      if (closeAt === -1) {
        throw new FlowParseError(`Unclosed "${open}" in node "${id}"`, this.lineNo);
      }
      this.pos = closeAt + close.length;
      return { id, label: unquote(this.text.slice(labelStart, closeAt)), shape };
    }

    return { id };
  }

  /** Reads an edge operator; returns null when the statement has no more edges. */
  readEdge(): { label?: string } | null {
    const inline = this.sticky(INLINE_LABEL_RE);
    if (inline) {
      return { label: unquote(inline[1] ?? '') };
    }

    if (!this.sticky(ARROW_RE)) return null;

    const piped = this.sticky(PIPE_LABEL_RE);
    if (piped) {
      const label = unquote(piped[1] ?? '');
      return label === '' ? {} : { label };
    }
    return {};
  }

  expectEnd(): void {
    this.skipSpaces();
    if (this.text.startsWith(';', this.pos)) this.pos++;
    this.skipSpaces();
    if (this.pos < this.text.length) {
      throw new FlowParseError(`Unexpected text "${this.text.slice(this.pos)}"`, this.lineNo);
    }
  }
}

function isIgnoredLine(line: string): boolean {
  return (
    line === ''
    || line.startsWith('%%')
    || line === 'end'
    || HEADER_RE.test(line)
    || IGNORED_RE.test(line)
  );
}

interface Statement {
  refs: NodeRef[];
  edges: FlowEdge[];
}

/** Parse one statement line: a node, or a chain of nodes joined by edges. */
function parseStatement(line: string, lineNo: number): Statement {
  const scanner = new StatementScanner(line, lineNo);
  let from = scanner.readNode();
  const refs = [from];
  const edges: FlowEdge[] = [];

  for (let edge = scanner.readEdge(); edge !== null; edge = scanner.readEdge()) {
    const to = scanner.readNode();
    refs.push(to);
    edges.push(edge.label === undefined
      ? { from: from.id, to: to.id }
      : { from: from.id, to: to.id, label: edge.label });
    from = to;
  }

  scanner.expectEnd();
  return { refs, edges };
}

/**
 * Parse the source of a Mermaid flowchart.
 *
 * Supports node declarations with the common shapes, chained edges and
 * edge labels (`A -->|yes| B`, `A -- yes --> B`). Lines outside this
 * subset are skipped whole and logged at debug level. Exactly one node
 * must be marked BEGIN (by id or label) and have an outgoing edge; at
 * least one node must be marked END.
 *
 * @throws FlowParseError when the begin/end markers are missing.
 */
export function parseMermaidFlowchart(source: string, logger: Logger = nullLogger): FlowDefinition {
  const nodes = new Map<string, FlowNode>();
  const edges: FlowEdge[] = [];

  const declare = (ref: NodeRef): void => {
    if (ref.shape === undefined) {
      // Bare references never replace an earlier declaration.
      if (!nodes.has(ref.id)) {
        nodes.set(ref.id, { id: ref.id, label: ref.id, shape: 'plain', kind: nodeKind(ref.id, ref.id, 'plain') });
      }
      return;
    }
    const label = ref.label ?? ref.id;
    nodes.set(ref.id, { id: ref.id, label, shape: ref.shape, kind: nodeKind(ref.id, label, ref.shape) });
  };

  const lines = source.split(/\r?\n/);
  for (const [index, raw] of lines.entries()) {
    const line = raw.trim();
    if (isIgnoredLine(line)) continue;

    let statement: Statement;
    try {
      statement = parseStatement(line, index + 1);
    } catch (err) {
      if (!(err instanceof FlowParseError)) throw err;
      logger.debug(`Skipping flowchart line: ${err.message}`);
      continue;
    }

    statement.refs.forEach(declare);
    edges.push(...statement.edges);
  }

  const begins = [...nodes.values()].filter((node) => node.kind === 'begin');
  const [begin, ...extraBegins] = begins;
  if (!begin) {
    throw new FlowParseError(`Flowchart has no ${BEGIN_MARKER} node`);
  }
  if (extraBegins.length > 0) {
    throw new FlowParseError(
      `Flowchart has ${begins.length} ${BEGIN_MARKER} nodes (${begins.map((n) => n.id).join(', ')}); expected exactly one`,
    );
  }
  if (!edges.some((edge) => edge.from === begin.id)) {
    throw new FlowParseError(`${BEGIN_MARKER} node "${begin.id}" has no outgoing edges`);
  }
  if (![...nodes.values()].some((node) => node.kind === 'end')) {
    throw new FlowParseError(`Flowchart has no ${END_MARKER} node`);
  }

  return { beginId: begin.id, graph: { nodes, edges } };
}

/**
 * Locate and parse the flowchart block of a skill body.
 * Never throws: a missing block is `absent`, a broken one `invalid`.
 */
export function parseFlowBlock(body: string, logger: Logger = nullLogger): FlowBlockResult {
  const block = findFencedBlock(body, FLOW_BLOCK_LANGUAGE);
  if (!block) return { status: 'absent' };
  if (!block.closed) {
    return { status: 'invalid', reason: `Unterminated ${FLOW_BLOCK_LANGUAGE} block` };
  }

  try {
    return { status: 'parsed', flow: parseMermaidFlowchart(block.source, logger) };
  } catch (err) {
    if (err instanceof FlowParseError) {
      return { status: 'invalid', reason: err.message };
    }
    throw err;
  }
}
