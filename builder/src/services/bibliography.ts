import type { Page } from "pagetex-latex";

/** Merges references across pages. A later page overrides an earlier id. */
export function collectReferences(pages: Page[]): Map<string, string> {
  const out = new Map<string, string>();
  for (const page of pages) {
    for (const ref of page.references ?? []) {
      if (ref.id && ref.citation) out.set(ref.id, ref.citation);
    }
  }
  return out;
}

export function renderBibEntry(id: string, citation: string): string {
  if (citation.startsWith("@")) return citation;
  return `@misc{${id},\n  title={${id}},\n  author={Unknown}\n}`;
}

export function renderBibliography(references: Map<string, string>): string {
  let out = "";
  for (const [id, citation] of references) {
    out += `${renderBibEntry(id, citation)}\n\n`;
  }
  return out;
}
