import fs from "fs";
import type { LoadedPage, PageRepository } from "./pageRepository";
import { resolveTextPath } from "./textLoader";

export type PageValidation = {
  page: number;
  ok: boolean;
  messages: string[];
};

export function validatePage(repo: PageRepository, pageNumber: number): PageValidation {
  const messages: string[] = [];
  let loaded: LoadedPage;
  try {
    loaded = repo.loadPage(pageNumber);
  } catch (e) {
    return { page: pageNumber, ok: false, messages: [e instanceof Error ? e.message : String(e)] };
  }
  for (const block of loaded.page.content) {
    if (block.type === "unsupported") {
      messages.push(`unknown content block type: ${block.originalType}`);
      continue;
    }
    if (block.type !== "text" || block.data.textPath === undefined) continue;
    const textPath = block.data.textPath;
    if (!textPath.endsWith(".txt")) {
      messages.push(`text file must end in .txt: ${textPath}`);
    }
    const full = resolveTextPath(textPath, loaded.dir);
    if (!fs.existsSync(full)) {
      messages.push(`text file does not exist: ${full}`);
    }
  }
  return { page: pageNumber, ok: messages.length === 0, messages };
}

export function validateAll(repo: PageRepository): PageValidation[] {
  return repo.listPageNumbers().map((n) => validatePage(repo, n));
}
