export type SegmentKind = "plain" | "math" | "reference";

export type Segment = {
  kind: SegmentKind;
  content: string;
  startOffset: number;
  endOffset: number;
};

type ProtectedMatch = {
  kind: Exclude<SegmentKind, "plain">;
  start: number;
  end: number;
};

const REFERENCE_RE = /\\ref\{[^}]+\}/g;
const MATH_RE = /\$[^$]+?\$/g;

function findMatches(text: string, re: RegExp, kind: ProtectedMatch["kind"]): ProtectedMatch[] {
  const out: ProtectedMatch[] = [];
  for (const m of text.matchAll(re)) {
    const start = m.index ?? 0;
    out.push({ kind, start, end: start + m[0].length });
  }
  return out;
}

function plainSegment(text: string, start: number, end: number): Segment {
  return { kind: "plain", content: text.slice(start, end), startOffset: start, endOffset: end };
}

/**
 * Splits text into plain runs and protected spans (inline math, cross
 * references). Matches are taken in start order; one that begins inside a
 * span already taken is dropped. Joining the contents gives back the input.
 */
export function segmentText(text: string): Segment[] {
  const matches = [
    ...findMatches(text, REFERENCE_RE, "reference"),
    ...findMatches(text, MATH_RE, "math"),
  ].sort((a, b) => a.start - b.start);

  const segments: Segment[] = [];
  let last = 0;
  for (const m of matches) {
    if (m.start < last) continue;
    if (m.start > last) segments.push(plainSegment(text, last, m.start));
    segments.push({
      kind: m.kind,
      content: text.slice(m.start, m.end),
      startOffset: m.start,
      endOffset: m.end,
    });
    last = m.end;
  }
  if (last < text.length) segments.push(plainSegment(text, last, text.length));
  return segments;
}

export function joinSegments(segments: Segment[]): string {
  return segments.map((s) => s.content).join("");
}
