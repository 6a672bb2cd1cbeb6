export interface ChunkSpan {
  index: number;
  charStart: number;
  charEnd: number;
  text: string;
}

export const DEFAULT_MAX_CHUNK_CHARS = 24000;

// "Jane Doe: ..." utterance labels and "[Jane Doe] 10:35:12" caption markers.
const SPEAKER_BOUNDARY =
  /(?=^[ \t]*(?:[A-Z][\p{L}.'’-]*(?:[ \t]+[A-Z][\p{L}.'’-]*){0,4}[ \t]*:|\[[^\]\n]+\][ \t]*\d{1,2}:\d{2}:\d{2}))/mu;

const SENTENCE_ENDS = [". ", "? ", "! "];
const BOUNDARY_WINDOW = 0.3;

function splitAtSpeakers(text: string): string[] {
  return text.split(SPEAKER_BOUNDARY).filter((segment) => segment.length > 0);
}

function toSpans(pieces: string[]): ChunkSpan[] {
  const spans: ChunkSpan[] = [];
  let offset = 0;

  for (const piece of pieces) {
    spans.push({
      index: spans.length,
      charStart: offset,
      charEnd: offset + piece.length,
      text: piece
    });
    offset += piece.length;
  }

  return spans;
}

function packSegments(segments: string[], maxChars: number): string[] {
  const chunks: string[] = [];
  let current = "";

  for (const segment of segments) {
    if (current && current.length + segment.length > maxChars) {
      chunks.push(current);
      current = segment;
    } else {
      current += segment;
    }
  }

  if (current) {
    chunks.push(current);
  }

  return chunks;
}

function lastBoundary(text: string, from: number, to: number): number {
  const window = text.slice(from, to);
  let cut = -1;

  const newline = window.lastIndexOf("\n");
  if (newline !== -1) {
    cut = newline + 1;
  }

  for (const ending of SENTENCE_ENDS) {
    const idx = window.lastIndexOf(ending);
    if (idx !== -1) {
      cut = Math.max(cut, idx + ending.length);
    }
  }

  return cut === -1 ? -1 : from + cut;
}

function sliceBySize(text: string, maxChars: number): string[] {
  const slices: string[] = [];
  let pos = 0;

  while (pos < text.length) {
    let end = Math.min(pos + maxChars, text.length);

    if (end < text.length) {
      const windowStart = pos + Math.floor(maxChars * (1 - BOUNDARY_WINDOW));
      const cut = lastBoundary(text, windowStart, end);
      if (cut > pos) {
        end = cut;
      }
    }

    slices.push(text.slice(pos, end));
    pos = end;
  }

  return slices;
}

/**
 * Splits a transcript into contiguous spans of at most `maxChars` characters, preferring
 * speaker boundaries. Text without usable markers falls back to size-based slices cut at a
 * line or sentence end. A single utterance longer than `maxChars` is kept whole.
 */
export function planChunks(text: string, maxChars = DEFAULT_MAX_CHUNK_CHARS): ChunkSpan[] {
  if (!Number.isInteger(maxChars) || maxChars <= 0) {
    throw new RangeError(`maxChars must be a positive integer, got ${maxChars}`);
  }

  if (!text) {
    return [];
  }

  if (text.length <= maxChars) {
    return toSpans([text]);
  }

  const packed = packSegments(splitAtSpeakers(text), maxChars);
  if (packed.length > 1) {
    return toSpans(packed);
  }

  return toSpans(sliceBySize(text, maxChars));
}

export function chunkTranscript(text: string, maxChars = DEFAULT_MAX_CHUNK_CHARS): string[] {
  return planChunks(text, maxChars).map((span) => span.text);
}
