export type LinkMatch = {
  /** Display text between the brackets, verbatim. */
  text: string;
  /** Raw target reference, before classification. */
  target: string;
  /** Optional title suffix including its leading whitespace, or "". */
  title: string;
  start: number;
  end: number;
};

// Destinations may hold one level of balanced parentheses: `foo_(bar)`.
const LINK_RE =
  /\[([^\]]+)\]\((\{\{[^}]*\}\}(?:[^\s()]|\([^\s()]*\))*|(?:[^\s()]|\([^\s()]*\))+)((?:\s+(?:"[^"]*"|'[^']*'))?)\)/g;
const FENCE_OPEN_RE = /^ {0,3}(`{3,}|~{3,})/;
const FENCE_CLOSE_RE = /^ {0,3}(`{3,}|~{3,})\s*$/;
const BACKTICK_RUN_RE = /`+/g;
// Code spans never cross a blank line. The capture keeps the separators in split().
const PARAGRAPH_BREAK_RE = /(\n[ \t]*\r?\n)/;

function blank(value: string): string {
  return value.replace(/[^\r\n]/g, " ");
}

function maskFencedBlocks(text: string): string {
  const lines = text.split("\n");
  let marker: string | null = null;

  for (let i = 0; i < lines.length; i += 1) {
    const line = lines[i];
    if (marker === null) {
      const open = line.match(FENCE_OPEN_RE);
      if (!open) continue;
      marker = open[1];
      lines[i] = blank(line);
      continue;
    }

    const close = line.match(FENCE_CLOSE_RE);
    if (
      close &&
      close[1][0] === marker[0] &&
      close[1].length >= marker.length
    ) {
      marker = null;
    }
    lines[i] = blank(line);
  }

  return lines.join("\n");
}

function maskCodeSpansInBlock(text: string): string {
  const runs = [...text.matchAll(BACKTICK_RUN_RE)].map((m) => ({
    start: m.index ?? 0,
    length: m[0].length,
  }));

  let out = "";
  let cursor = 0;
  let i = 0;
  while (i < runs.length) {
    const open = runs[i];
    let j = i + 1;
    while (j < runs.length && runs[j].length !== open.length) j += 1;
    if (j === runs.length) {
      // No closer of the same length: the run is literal text.
      i += 1;
      continue;
    }

    const end = runs[j].start + runs[j].length;
    out += text.slice(cursor, open.start) + blank(text.slice(open.start, end));
    cursor = end;
    i = j + 1;
  }

  return out + text.slice(cursor);
}

function maskCodeSpans(text: string): string {
  return text
    .split(PARAGRAPH_BREAK_RE)
    .map((part, idx) => (idx % 2 === 1 ? part : maskCodeSpansInBlock(part)))
    .join("");
}

/**
 * Blanks out fenced code blocks and inline code spans. Offsets and line
 * breaks are preserved so matches found in the masked text index the
 * original.
 */
export function maskCodeRegions(text: string): string {
  return maskCodeSpans(maskFencedBlocks(text));
}

/**
 * Yields every inline `[text](target)` link outside code, left to right.
 * Each call is an independent scan.
 */
export function* scanLinks(text: string): Generator<LinkMatch> {
  const masked = maskCodeRegions(text);
  for (const m of masked.matchAll(LINK_RE)) {
    const start = m.index ?? 0;
    const textStart = start + 1;
    const targetStart = textStart + m[1].length + 2;
    const titleStart = targetStart + m[2].length;
    const end = start + m[0].length;

    yield {
      text: text.slice(textStart, textStart + m[1].length),
      target: text.slice(targetStart, titleStart),
      title: text.slice(titleStart, titleStart + m[3].length),
      start,
      end,
    };
  }
}
