import {
  escapeSpecialChars,
  rewriteNumericPatterns,
  transliterateLocale,
  transliterateSymbols,
} from "./escape";
import { segmentText } from "./segment";

export type HeadingCommand = "chapter" | "section" | "subsection" | "subsubsection" | "paragraph";

const HEADING_COMMANDS: readonly HeadingCommand[] = [
  "chapter",
  "section",
  "subsection",
  "subsubsection",
];

export function headingCommand(level: number): HeadingCommand {
  return HEADING_COMMANDS[level - 1] ?? "paragraph";
}

export function countLeadingHashes(text: string): number {
  const m = /^#*/.exec(text);
  return m ? m[0].length : 0;
}

// Runs after escaping, so a heading marker has already become "\#".
const ESCAPED_HEADING_RE = /^((?:\\#)+) (.+)$/gm;
const CITATION_RE = /\[([\p{L}\p{N}_]+)\]/gu;
const BOLD_RE = /\*\*(.+?)\*\*/g;
const ITALIC_RE = /\*(.+?)\*/g;

/**
 * Formats text that holds no protected spans. The order of the passes matters:
 * escaping first, then transliteration, then the markdown-like dialect.
 * `atLineStart` is false for a span that continues a line after math or a
 * reference; its first characters cannot open a heading.
 */
export function formatPlainText(text: string, atLineStart = true): string {
  let out = escapeSpecialChars(text);
  out = transliterateLocale(out);
  out = transliterateSymbols(out);
  out = out.replace(CITATION_RE, "\\cite{$1}");
  out = out.replace(
    ESCAPED_HEADING_RE,
    (m: string, marks: string, title: string, offset: number) => {
      if (offset === 0 && !atLineStart) return m;
      return `\\${headingCommand(marks.length / 2)}{${title}}`;
    },
  );
  out = out.replace(BOLD_RE, "\\textbf{$1}");
  out = out.replace(ITALIC_RE, "\\textit{$1}");
  return rewriteNumericPatterns(out);
}

/**
 * Formats free text while leaving inline math and \ref{...} untouched, then
 * turns blank lines into paragraph breaks.
 */
export function formatText(text: string): string {
  const body = segmentText(text)
    .map((s) => {
      if (s.kind !== "plain") return s.content;
      const atLineStart = s.startOffset === 0 || text[s.startOffset - 1] === "\n";
      return formatPlainText(s.content, atLineStart);
    })
    .join("");
  return body.replaceAll("\n\n", "\n\\par\n");
}

export function wrapHeading(level: number, title: string): string {
  return `\\${headingCommand(level)}{${formatText(title)}}`;
}
