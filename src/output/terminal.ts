import type { Document } from '../llm/types.js';

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';
const CYAN = '\x1b[36m';

export interface FormatOptions {
  color?: boolean;
}

function styler(color: boolean) {
  return (code: string, text: string) => (color ? `${code}${text}${RESET}` : text);
}

function sourceOf(doc: Document): string {
  const source = doc.metadata.source;
  return source === undefined ? 'unknown' : String(source);
}

/**
 * Render verbatim extracts, each under its source.
 */
export function formatExtracts(docs: readonly Document[], { color = true }: FormatOptions = {}): string {
  const style = styler(color);
  if (docs.length === 0) return style(DIM, 'No extracts.');

  return docs
    .map((doc, i) => `${style(CYAN + BOLD, `[${i + 1}] ${sourceOf(doc)}`)}\n${doc.content}`)
    .join('\n\n');
}

/**
 * Render a summary answer followed by its citation line.
 */
export function formatAnswer(doc: Document, { color = true }: FormatOptions = {}): string {
  const style = styler(color);
  const lines = [style(BOLD, 'Answer:'), doc.content, '', style(DIM, sourceOf(doc))];
  if (doc.metadata.cached === true) {
    lines.push(style(DIM, '(cached)'));
  }
  return lines.join('\n');
}
