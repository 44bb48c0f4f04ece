import { MissingTerminalError, ParseError } from '../errors';
import { ChainDefinition, ChainNode, INPUT_NODE_NAME, OUTPUT_NODE_NAME, TemplateSegment } from './types';

// `[[name]] =` at the start of a line opens a declaration.
const DECLARATION_PATTERN = /^[ \t]*\[\[([^\[\]\n]*)\]\][ \t]*=/gm;
const REFERENCE_PATTERN = /\[\[([^\[\]\n]+)\]\]/g;

/**
 * Splits a template body into literal text and typed references.
 * Blank references (`[[ ]]`) stay literal.
 */
export function tokenizeTemplate(text: string): TemplateSegment[] {
  const segments: TemplateSegment[] = [];
  let cursor = 0;

  for (const match of text.matchAll(REFERENCE_PATTERN)) {
    const name = match[1].trim();
    if (!name) continue;

    const start = match.index ?? 0;
    if (start > cursor) {
      segments.push({ kind: 'text', value: text.slice(cursor, start) });
    }
    segments.push({ kind: 'reference', name, raw: match[0] });
    cursor = start + match[0].length;
  }

  if (cursor < text.length) {
    segments.push({ kind: 'text', value: text.slice(cursor) });
  }
  return segments;
}

export function collectReferences(segments: TemplateSegment[]): string[] {
  const seen = new Set<string>();
  for (const segment of segments) {
    if (segment.kind === 'reference') seen.add(segment.name);
  }
  return Array.from(seen);
}

/**
 * Substitutes every reference with its resolved value. Inserted values are not
 * scanned again, so a value containing `[[...]]` is copied as-is.
 */
export function renderTemplate(node: ChainNode, values: ReadonlyMap<string, string>): string {
  return node.segments
    .map((segment) => {
      if (segment.kind === 'text') return segment.value;

      const value = values.get(segment.name);
      if (value === undefined) {
        throw new Error(`No resolved value for [[${segment.name}]] while rendering [[${node.id}]]`);
      }
      return value;
    })
    .join('');
}

function lineAt(text: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset; i++) {
    if (text.charCodeAt(i) === 10) line++;
  }
  return line;
}

export function createInputNode(): ChainNode {
  return { id: INPUT_NODE_NAME, text: '', segments: [], references: [], isReserved: true };
}

/**
 * Parses chain-file text into an ordered definition. The reserved input node is
 * always the first entry. No dependency resolution happens here.
 */
export function parseChain(content: string): ChainDefinition {
  const markers = Array.from(content.matchAll(DECLARATION_PATTERN));
  if (markers.length === 0) {
    throw new ParseError('The chain file declares no nodes; expected lines of the form "[[name]] = ..."');
  }

  const definition = new Map<string, ChainNode>([[INPUT_NODE_NAME, createInputNode()]]);

  markers.forEach((marker, index) => {
    const start = marker.index ?? 0;
    const line = lineAt(content, start);
    const id = marker[1].trim();

    if (!id) {
      throw new ParseError('Node declaration has an empty name', line);
    }
    if (id === INPUT_NODE_NAME) {
      throw new ParseError(`[[${INPUT_NODE_NAME}]] is reserved for the initial input and cannot be declared`, line);
    }
    if (definition.has(id)) {
      throw new ParseError(`Node [[${id}]] is declared more than once`, line);
    }

    const bodyStart = start + marker[0].length;
    const next = markers[index + 1];
    const bodyEnd = next ? (next.index ?? content.length) : content.length;
    const text = content.slice(bodyStart, bodyEnd).trim();
    const segments = tokenizeTemplate(text);

    definition.set(id, { id, text, segments, references: collectReferences(segments), isReserved: false, line });
  });

  if (!definition.has(OUTPUT_NODE_NAME)) {
    throw new MissingTerminalError(OUTPUT_NODE_NAME);
  }

  return definition;
}
