import { countLeadingHashes, formatText, wrapHeading } from "./format";

type ListState = "outside" | "inList";

const LIST_MARKER = "- ";

function isListLine(line: string): boolean {
  return line.trim().startsWith(LIST_MARKER);
}

/**
 * Turns runs of "- " lines into itemize environments. One line per step, no
 * backtracking, no nesting.
 */
export function detectLists(text: string): string {
  const out: string[] = [];
  let state: ListState = "outside";
  for (const line of text.split("\n")) {
    if (isListLine(line)) {
      if (state === "outside") {
        out.push("\\begin{itemize}");
        state = "inList";
      }
      out.push(`\\item ${line.trim().slice(LIST_MARKER.length)}`);
      continue;
    }
    if (state === "inList") {
      out.push("\\end{itemize}");
      state = "outside";
    }
    out.push(line);
  }
  if (state === "inList") out.push("\\end{itemize}");
  return out.join("\n");
}

export type AssembleOptions = {
  /**
   * Detect "#" heading lines before formatting. Set for text loaded from a
   * file; inline text leaves headings to the formatter. Text on either side
   * of a heading line is formatted separately, so a blank line next to a
   * heading stays a blank line and never becomes \par.
   */
  lineHeadings: boolean;
};

function formatWithLineHeadings(text: string): string {
  const pieces: string[] = [];
  let run: string[] = [];
  const flushRun = () => {
    if (run.length > 0) {
      pieces.push(formatText(run.join("\n")));
      run = [];
    }
  };
  for (const line of text.split("\n")) {
    const trimmed = line.trim();
    if (trimmed.startsWith("#")) {
      flushRun();
      const level = countLeadingHashes(trimmed);
      pieces.push(wrapHeading(level, trimmed.slice(level).trim()));
    } else {
      run.push(line);
    }
  }
  flushRun();
  return pieces.join("\n");
}

export function assembleText(text: string, options: AssembleOptions): string {
  const formatted = options.lineHeadings ? formatWithLineHeadings(text) : formatText(text);
  return detectLists(formatted);
}
