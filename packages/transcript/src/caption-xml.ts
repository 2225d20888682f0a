/**
 * Caption XML parsing.
 *
 * Timed-text documents look like
 *   <transcript><text start="0" dur="1.5">Hello &amp;amp; welcome</text>...</transcript>
 * Only character data inside <text> elements is kept. Inline tags nested in
 * a <text> element (<font>, <i>, ...) are dropped but their text survives.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { CaptionParseError } from './errors.js';

const ENTITY_RE = /&(amp|lt|gt|quot|#39|apos);/g;

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  '#39': "'",
  apos: "'",
};

/** Decode the basic XML entities in a single pass, so `&amp;lt;` becomes `&lt;`. */
export function decodeEntities(text: string): string {
  return text.replace(ENTITY_RE, (match, name: string) => ENTITIES[name] ?? match);
}

// Entities stay encoded so decodeEntities sees each one exactly once.
const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  processEntities: false,
  parseTagValue: false,
  trimValues: false,
});

const DECLARATION_RE = /^\s*<\?xml[\s\S]*?\?>/;
const WRAPPER_OPEN = '<captions>';
const WRAPPER_CLOSE = '</captions>';

interface Position {
  line: number;
  col: number;
}

function endOf(text: string): Position {
  const lines = text.split('\n');
  return { line: lines.length, col: (lines[lines.length - 1] ?? '').length + 1 };
}

function parseError(msg: string, position: Position): CaptionParseError {
  return new CaptionParseError(msg.replace(/\.$/, ''), position.line, position.col);
}

/**
 * Check well-formedness. Documents with several top-level elements are
 * checked again inside a wrapper element, with positions mapped back.
 */
function validate(xml: string): void {
  const result = XMLValidator.validate(xml);
  if (result === true) return;

  const { err } = result;
  if (!err.msg.startsWith('Multiple possible root nodes')) {
    throw parseError(err.msg, err);
  }

  const declaration = DECLARATION_RE.exec(xml)?.[0] ?? '';
  const body = xml.slice(declaration.length);
  const wrapped = XMLValidator.validate(declaration + WRAPPER_OPEN + body + WRAPPER_CLOSE);
  if (wrapped === true) return;

  const inserted = endOf(declaration);
  const closing = endOf(declaration + WRAPPER_OPEN + body);
  const { msg, line, col } = wrapped.err;
  if (line === closing.line && col === closing.col) {
    throw parseError('Document ends inside an open element', endOf(xml));
  }
  const shifted = line === inserted.line && col >= inserted.col + WRAPPER_OPEN.length;
  throw parseError(msg, { line, col: shifted ? col - WRAPPER_OPEN.length : col });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Walk ordered parser output. Text under a `<text>` element goes to `sink`;
 * each outermost `<text>` element becomes one fragment.
 */
function collect(nodes: unknown, sink: string[] | null, fragments: string[]): void {
  if (!Array.isArray(nodes)) return;
  for (const node of nodes) {
    if (!isRecord(node)) continue;
    for (const [key, value] of Object.entries(node)) {
      if (key === ':@') continue;
      if (key === '#text') {
        if (sink && typeof value === 'string') sink.push(value);
      } else if (key === 'text' && sink === null) {
        const parts: string[] = [];
        collect(value, parts, fragments);
        fragments.push(parts.join(''));
      } else {
        collect(value, sink, fragments);
      }
    }
  }
}

/**
 * Extract the text of every `<text>` element, in document order.
 *
 * @throws CaptionParseError on malformed markup
 */
export function parseCaptionXml(xml: string): string[] {
  validate(xml);

  const fragments: string[] = [];
  const parsed: unknown = parser.parse(xml);
  collect(parsed, null, fragments);

  return fragments
    .map((fragment) => decodeEntities(fragment.trim()))
    .filter((fragment) => fragment.length > 0);
}

/** Parse caption XML and join the fragments with single spaces. */
export function captionXmlToText(xml: string): string {
  return parseCaptionXml(xml).join(' ');
}
