import fs from "fs";
import path from "path";
import type { Logger } from "pino";
import type { Page } from "pagetex-latex";
import { loadPageFile } from "../utils/pageSchema";
import { createLogger } from "../utils/logger";

export type LoadedPage = {
  number: number;
  dir: string;
  file: string;
  page: Page;
};

/**
 * Pages live in numbered directories (pages/1, pages/2, ...), each holding one
 * JSON document plus the text and image files it refers to.
 */
export class PageRepository {
  private readonly pagesDir: string;
  private readonly logger: Logger;

  constructor(pagesDir: string, logger: Logger = createLogger({ file: "pages" })) {
    this.pagesDir = pagesDir;
    this.logger = logger;
  }

  pageDir(pageNumber: number): string {
    return path.join(this.pagesDir, String(pageNumber));
  }

  listPageNumbers(): number[] {
    if (!fs.existsSync(this.pagesDir)) return [];
    return fs
      .readdirSync(this.pagesDir, { withFileTypes: true })
      .filter((e) => e.isDirectory() && /^\d+$/.test(e.name))
      .map((e) => parseInt(e.name, 10))
      .sort((a, b) => a - b);
  }

  findPageFiles(pageNumber: number): string[] {
    const dir = this.pageDir(pageNumber);
    if (!fs.existsSync(dir)) return [];
    return fs
      .readdirSync(dir)
      .filter((name) => name.endsWith(".json"))
      .sort()
      .map((name) => path.join(dir, name));
  }

  loadPage(pageNumber: number): LoadedPage {
    const files = this.findPageFiles(pageNumber);
    const file = files[0];
    if (file === undefined) {
      throw new Error(`no JSON files found in ${this.pageDir(pageNumber)}`);
    }
    if (files.length > 1) {
      this.logger.warn(
        { page: pageNumber },
        `${files.length} JSON files found, using ${path.basename(file)}`,
      );
    }
    const page = loadPageFile(file, `Page ${pageNumber}`);
    return { number: pageNumber, dir: this.pageDir(pageNumber), file, page };
  }
}
