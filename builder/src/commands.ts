import fs from "fs";
import path from "path";
import type { Logger } from "pino";
import { Config, type BuildPaths } from "./config";
import { createLogger } from "./utils/logger";
import { Assembler } from "./services/assembler";
import { LatexCompiler, spawnRunner, type CommandRunner } from "./services/compiler";
import { PageRepository } from "./services/pageRepository";
import { validateAll, validatePage } from "./services/validator";

export type CommandDeps = {
  paths: BuildPaths;
  logger: Logger;
  runner: CommandRunner;
};

export function defaultDeps(paths: BuildPaths = Config.paths()): CommandDeps {
  return { paths, logger: createLogger({ file: "commands" }), runner: spawnRunner };
}

function makeCompiler(deps: CommandDeps): LatexCompiler {
  return new LatexCompiler(
    deps.paths,
    {
      title: Config.DOCUMENT_TITLE,
      author: Config.DOCUMENT_AUTHOR,
      latexCommand: Config.LATEX_COMMAND,
      biberCommand: Config.BIBER_COMMAND,
      reruns: Config.LATEX_RERUNS,
    },
    deps.runner,
    deps.logger,
  );
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function runValidate(deps: CommandDeps, page?: number): boolean {
  const repo = new PageRepository(deps.paths.pagesDir, deps.logger);
  const results = page === undefined ? validateAll(repo) : [validatePage(repo, page)];
  for (const r of results) {
    if (r.ok) {
      deps.logger.info({ page: r.page }, "Page is valid");
    } else {
      for (const m of r.messages) deps.logger.error({ page: r.page }, m);
    }
  }
  return results.length > 0 && results.every((r) => r.ok);
}

export function runAssemble(deps: CommandDeps, page?: number): boolean {
  const assembler = new Assembler(deps.paths, deps.logger);
  if (page === undefined) {
    const summary = assembler.assembleAll();
    return summary.failed.length === 0 && summary.succeeded.length > 0;
  }
  try {
    assembler.assemblePage(page);
    return true;
  } catch (e) {
    deps.logger.error({ page }, `Failed to assemble page: ${errorMessage(e)}`);
    return false;
  }
}

export function runCompile(deps: CommandDeps, page?: number): boolean {
  const compiler = makeCompiler(deps);
  const result = page === undefined ? compiler.compileDocument() : compiler.compilePage(page);
  return result.ok;
}

/**
 * Assembles and typesets every page on its own, then the whole document.
 * Unless forced, a failed page stops the build before the full document.
 */
export function runBuild(deps: CommandDeps, page?: number, force = false): boolean {
  if (page !== undefined) {
    return runAssemble(deps, page) && runCompile(deps, page);
  }
  const assembler = new Assembler(deps.paths, deps.logger);
  const summary = assembler.assembleAll();
  const compiler = makeCompiler(deps);
  const failed = [...summary.failed];
  for (const n of summary.succeeded) {
    if (!compiler.compilePage(n).ok) failed.push(n);
  }
  if (summary.succeeded.length === 0) {
    deps.logger.error("No page could be assembled");
    return false;
  }
  if (failed.length > 0) {
    deps.logger.warn(`Pages failed to build: ${failed.sort((a, b) => a - b).join(", ")}`);
    if (!force) {
      deps.logger.info("Stopping before the full document; pass --force to continue");
      return false;
    }
  }
  const result = compiler.compileDocument();
  if (result.ok && result.pdfPath) {
    deps.logger.info(`Document available at: ${path.resolve(deps.paths.pdfDir, "latest.pdf")}`);
  }
  return result.ok;
}

export function runClean(deps: CommandDeps): boolean {
  for (const dir of [deps.paths.texDir, deps.paths.pdfDir, deps.paths.logDir]) {
    if (!fs.existsSync(dir)) continue;
    deps.logger.info(`Cleaning ${dir}`);
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      if (entry.isFile()) fs.unlinkSync(path.join(dir, entry.name));
    }
  }
  fs.mkdirSync(deps.paths.logDir, { recursive: true });
  return true;
}
