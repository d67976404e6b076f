const BOUNDARY_SEPARATORS = ['. ', '! ', '? ', '\n\n', '\n', ' '] as const;
const BOUNDARY_WINDOW = 0.8;

export interface ChunkOptions {
  chunkSize: number;
  overlap: number;
  /** Section name to section text, chunked independently in insertion order. */
  sections?: Map<string, string> | Record<string, string>;
}

export interface TextChunk {
  chunkIndex: number;
  content: string;
  sectionName: string | null;
  charStart: number | null;
  charEnd: number | null;
  tokenCount: number;
}

export interface TextSpan {
  start: number;
  end: number;
}

export function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}

/**
 * Splits text into windows of at most `chunkSize` characters. A window that stops short
 * of the end of the text is cut just after the last separator found in its final 20%,
 * trying separators in priority order, and the next window restarts `overlap`
 * characters before that cut.
 */
export function splitTextSpans(text: string, chunkSize: number, overlap: number): TextSpan[] {
  if (text.length <= chunkSize) {
    return [{ start: 0, end: text.length }];
  }

  const spans: TextSpan[] = [];
  let start = 0;

  while (start < text.length) {
    const end = start + chunkSize;

    if (end >= text.length) {
      spans.push({ start, end: text.length });
      break;
    }

    const searchStart = start + Math.floor(chunkSize * BOUNDARY_WINDOW);
    let cut = end;
    for (const separator of BOUNDARY_SEPARATORS) {
      // the separator must sit entirely inside [searchStart, end)
      const index = text.lastIndexOf(separator, end - separator.length);
      if (index >= searchStart) {
        cut = index + separator.length;
        break;
      }
    }

    spans.push({ start, end: cut });
    start = Math.max(cut - overlap, start + 1);

    if (start >= text.length - overlap) {
      if (cut < text.length) {
        spans.push({ start: cut, end: text.length });
      }
      break;
    }
  }

  return spans;
}

export function splitText(text: string, chunkSize: number, overlap: number): string[] {
  return splitTextSpans(text, chunkSize, overlap).map((span) => text.slice(span.start, span.end));
}

function sectionEntries(sections: ChunkOptions['sections']): Array<[string, string]> {
  if (!sections) {
    return [];
  }
  return sections instanceof Map ? Array.from(sections.entries()) : Object.entries(sections);
}

export function chunkDocument(text: string, options: ChunkOptions): TextChunk[] {
  const { chunkSize, overlap } = options;
  const entries = sectionEntries(options.sections);
  const chunks: TextChunk[] = [];

  if (entries.length > 0) {
    for (const [sectionName, sectionText] of entries) {
      if (!sectionText.trim()) {
        continue;
      }
      for (const content of splitText(sectionText, chunkSize, overlap)) {
        chunks.push({
          chunkIndex: chunks.length,
          content,
          sectionName,
          charStart: null,
          charEnd: null,
          tokenCount: estimateTokens(content)
        });
      }
    }
    return chunks;
  }

  for (const span of splitTextSpans(text, chunkSize, overlap)) {
    const content = text.slice(span.start, span.end);
    chunks.push({
      chunkIndex: chunks.length,
      content,
      sectionName: null,
      charStart: span.start,
      charEnd: span.end,
      tokenCount: estimateTokens(content)
    });
  }
  return chunks;
}
