import fs from "fs";
import path from "path";
import type { Logger } from "pino";
import { renderPage, type Page, type TextLoader } from "pagetex-latex";
import type { BuildPaths } from "../config";
import { createLogger } from "../utils/logger";
import { collectReferences, renderBibliography } from "./bibliography";
import { fragmentName } from "./mainDocument";
import { PageRepository } from "./pageRepository";
import { createTextLoader } from "./textLoader";

export type AssembledPage = {
  page: number;
  path: string;
  warnings: string[];
  source: Page;
};

export type AssemblySummary = {
  succeeded: number[];
  failed: number[];
  bibliographyPath: string | null;
};

export class Assembler {
  private readonly paths: BuildPaths;
  private readonly repo: PageRepository;
  private readonly logger: Logger;
  private readonly loadText: TextLoader;

  constructor(
    paths: BuildPaths,
    logger: Logger = createLogger({ file: "assembler" }),
    repo: PageRepository = new PageRepository(paths.pagesDir, logger),
    loadText: TextLoader = createTextLoader(logger),
  ) {
    this.paths = paths;
    this.logger = logger;
    this.repo = repo;
    this.loadText = loadText;
  }

  /** Renders one page to <texDir>/page_<n>.tex. Throws when the page cannot be loaded. */
  assemblePage(pageNumber: number): AssembledPage {
    this.logger.info({ page: pageNumber }, "Processing page");
    const loaded = this.repo.loadPage(pageNumber);
    const { markup, warnings } = renderPage(loaded.page, {
      pageDir: loaded.dir,
      outputDir: this.paths.texDir,
      loadText: this.loadText,
    });
    for (const warning of warnings) {
      this.logger.warn({ page: pageNumber }, warning);
    }
    fs.mkdirSync(this.paths.texDir, { recursive: true });
    const outPath = path.join(this.paths.texDir, `${fragmentName(pageNumber)}.tex`);
    fs.writeFileSync(outPath, markup, "utf8");
    this.logger.info({ page: pageNumber }, `Generated LaTeX fragment: ${outPath}`);
    return { page: pageNumber, path: outPath, warnings, source: loaded.page };
  }

  /** Writes references.bib; returns null when no page cites anything. */
  writeBibliography(pages: Page[]): string | null {
    const references = collectReferences(pages);
    if (references.size === 0) {
      this.logger.warn("No bibliography entries found across all pages");
      return null;
    }
    fs.mkdirSync(this.paths.texDir, { recursive: true });
    const bibPath = path.join(this.paths.texDir, "references.bib");
    fs.writeFileSync(bibPath, renderBibliography(references), "utf8");
    this.logger.info(`Created bibliography file with ${references.size} entries: ${bibPath}`);
    return bibPath;
  }

  assembleAll(): AssemblySummary {
    const succeeded: number[] = [];
    const failed: number[] = [];
    const pages: Page[] = [];
    for (const n of this.repo.listPageNumbers()) {
      try {
        pages.push(this.assemblePage(n).source);
        succeeded.push(n);
      } catch (e) {
        this.logger.error({ page: n }, `Failed to assemble page: ${e instanceof Error ? e.message : String(e)}`);
        failed.push(n);
      }
    }
    const bibliographyPath = this.writeBibliography(pages);
    this.logger.info(`Assembly complete. Success: ${succeeded.length}, Failures: ${failed.length}`);
    return { succeeded, failed, bibliographyPath };
  }
}
