import { describe, expect, it } from 'vitest';
import { chunkDocument, estimateTokens, splitText, splitTextSpans } from '../documents/chunker.js';

describe('splitTextSpans', () => {
  it('returns the whole text when it fits in one chunk', () => {
    expect(splitTextSpans('short text', 50, 10)).toEqual([{ start: 0, end: 10 }]);
  });

  it('cuts at the chunk size with overlap when no separator is near the end', () => {
    const text = 'x'.repeat(25);

    expect(splitTextSpans(text, 10, 2)).toEqual([
      { start: 0, end: 10 },
      { start: 8, end: 18 },
      { start: 16, end: 25 }
    ]);
  });

  it('prefers a sentence boundary inside the final fifth of the window', () => {
    const text = 'abcdefghij. klmnopqrstuvwxyz';

    expect(splitTextSpans(text, 13, 0)).toEqual([
      { start: 0, end: 12 },
      { start: 12, end: 25 },
      { start: 25, end: 28 }
    ]);
    expect(splitText(text, 13, 0)[0]).toBe('abcdefghij. ');
  });

  it('always moves forward even when the overlap is as large as the chunk', () => {
    const spans = splitTextSpans('y'.repeat(12), 4, 4);

    for (let i = 1; i < spans.length; i += 1) {
      expect(spans[i].start).toBeGreaterThan(spans[i - 1].start);
    }
    expect(spans[spans.length - 1].end).toBe(12);
  });
});

describe('chunkDocument', () => {
  it('records character offsets for unsectioned text', () => {
    const chunks = chunkDocument('x'.repeat(25), { chunkSize: 10, overlap: 2 });

    expect(chunks.map((chunk) => [chunk.chunkIndex, chunk.charStart, chunk.charEnd])).toEqual([
      [0, 0, 10],
      [1, 8, 18],
      [2, 16, 25]
    ]);
    expect(chunks[0].sectionName).toBeNull();
    expect(chunks[0].tokenCount).toBe(2);
  });

  it('covers sentence text end to end with overlapping windows', () => {
    const text = 'The cash rate was held. Members discussed inflation. Housing credit growth picked up. '.repeat(6);

    const chunks = chunkDocument(text, { chunkSize: 120, overlap: 20 });

    expect(chunks[0].charStart).toBe(0);
    expect(chunks[0].charEnd).toBe(110);
    expect(chunks[0].content.endsWith('held. ')).toBe(true);
    for (const [index, chunk] of chunks.entries()) {
      expect(chunk.content).toBe(text.slice(chunk.charStart ?? 0, chunk.charEnd ?? 0));
      expect(chunk.content.length).toBeLessThanOrEqual(120);
      if (index > 0) {
        const previous = chunks[index - 1];
        expect(chunk.charStart).toBeGreaterThan(previous.charStart ?? 0);
        expect(chunk.charStart).toBeLessThanOrEqual(previous.charEnd ?? 0);
      }
    }
    expect(chunks[chunks.length - 1].charEnd).toBe(text.length);
  });

  it('chunks sections independently, skips blank ones and numbers chunks across sections', () => {
    const chunks = chunkDocument('ignored when sections are given', {
      chunkSize: 10,
      overlap: 2,
      sections: { intro: 'short', empty: '   ', body: 'x'.repeat(25) }
    });

    expect(chunks.map((chunk) => [chunk.chunkIndex, chunk.sectionName, chunk.content.length])).toEqual([
      [0, 'intro', 5],
      [1, 'body', 10],
      [2, 'body', 10],
      [3, 'body', 9]
    ]);
    expect(chunks.every((chunk) => chunk.charStart === null && chunk.charEnd === null)).toBe(true);
  });

  it('estimates four characters per token', () => {
    expect(estimateTokens('abcdefgh')).toBe(2);
    expect(estimateTokens('abc')).toBe(0);
  });
});
