#!/usr/bin/env node
import path from "path";
import { Command, InvalidArgumentError } from "commander";
import { Config, type BuildPaths } from "./config";
import { createLogger } from "./utils/logger";
import {
  defaultDeps,
  runAssemble,
  runBuild,
  runClean,
  runCompile,
  runValidate,
  type CommandDeps,
} from "./commands";

const logger = createLogger({ file: "index" });

type GlobalOptions = {
  pages?: string;
  out?: string;
};

type PageOptions = {
  page?: number;
};

type BuildOptions = PageOptions & {
  force: boolean;
};

function parsePageNumber(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError(`Invalid page number: ${value}`);
  }
  return n;
}

function resolvePaths(opts: GlobalOptions): BuildPaths {
  const base = Config.paths();
  const pagesDir = opts.pages ?? base.pagesDir;
  if (opts.out === undefined) return { ...base, pagesDir };
  return {
    pagesDir,
    texDir: path.join(opts.out, "tex"),
    pdfDir: path.join(opts.out, "pdf"),
    logDir: path.join(opts.out, "logs"),
  };
}

const program = new Command();

program
  .name("pagetex")
  .description("Build a LaTeX document from per-page JSON content")
  .option("--pages <dir>", "directory holding the numbered page directories")
  .option("--out <dir>", "build directory (tex, pdf and logs go below it)");

function deps(): CommandDeps {
  return defaultDeps(resolvePaths(program.opts<GlobalOptions>()));
}

function finish(ok: boolean): void {
  process.exitCode = ok ? 0 : 1;
}

program
  .command("validate")
  .description("check page documents and the text files they refer to")
  .option("--page <n>", "only this page", parsePageNumber)
  .action((opts: PageOptions) => finish(runValidate(deps(), opts.page)));

program
  .command("assemble")
  .description("render pages to LaTeX fragments and collect the bibliography")
  .option("--page <n>", "only this page", parsePageNumber)
  .action((opts: PageOptions) => finish(runAssemble(deps(), opts.page)));

program
  .command("compile")
  .description("typeset the assembled fragments")
  .option("--page <n>", "only this page", parsePageNumber)
  .action((opts: PageOptions) => finish(runCompile(deps(), opts.page)));

program
  .command("build")
  .description("assemble and typeset")
  .option("--page <n>", "only this page", parsePageNumber)
  .option("--force", "build the full document even when a page failed", Config.CONTINUE_ON_PAGE_FAILURE)
  .action((opts: BuildOptions) => finish(runBuild(deps(), opts.page, opts.force)));

program
  .command("clean")
  .description("remove generated files")
  .action(() => finish(runClean(deps())));

try {
  program.parse();
} catch (e) {
  logger.error(e instanceof Error ? e.message : String(e));
  process.exitCode = 1;
}
