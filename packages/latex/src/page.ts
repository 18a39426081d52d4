import { renderBlock } from "./blocks";
import { wrapHeading } from "./format";
import type { Page, Reference, RenderContext, TextLoader } from "./types";

export function renderReferenceComments(references: Reference[]): string {
  if (references.length === 0) return "";
  let out = "% References used in this page:\n";
  out += "% These will be collected into the main bibliography file\n";
  for (const ref of references) {
    out += `% ${ref.id}: ${ref.citation}\n`;
  }
  return out;
}

/** Heading, then every block in order, then the reference comments. */
export function composePage(page: Page, ctx: RenderContext): string {
  let out = `${wrapHeading(page.sectionLevel, page.title)}\n\n`;
  for (const block of page.content) {
    out += renderBlock(block, ctx);
  }
  out += renderReferenceComments(page.references ?? []);
  return out;
}

export type RenderPageOptions = {
  pageDir: string;
  outputDir: string;
  loadText?: TextLoader;
};

export type RenderedPage = {
  markup: string;
  warnings: string[];
};

/** Without a loader, external text renders empty and is reported. */
export function renderPage(page: Page, options: RenderPageOptions): RenderedPage {
  const warnings: string[] = [];
  const missingLoader: TextLoader = (textPath) => {
    warnings.push(`No text loader for external text: ${textPath}`);
    return "";
  };
  const ctx: RenderContext = {
    pageDir: options.pageDir,
    outputDir: options.outputDir,
    loadText: options.loadText ?? missingLoader,
    warnings,
  };
  const markup = composePage(page, ctx);
  return { markup, warnings };
}
