import fs from "fs";
import path from "path";
import { spawnSync } from "child_process";
import type { Logger } from "pino";
import type { BuildPaths } from "../config";
import { createLogger } from "../utils/logger";
import { fragmentName, listFragments, renderMainDocument, renderSinglePageDocument } from "./mainDocument";

export type CommandResult = {
  status: number | null;
  stdout: string;
  stderr: string;
  error?: Error;
};

export interface CommandRunner {
  run(command: string, args: string[], cwd: string): CommandResult;
}

export const spawnRunner: CommandRunner = {
  run(command, args, cwd) {
    const res = spawnSync(command, args, { cwd, encoding: "utf8" });
    return { status: res.status, stdout: res.stdout ?? "", stderr: res.stderr ?? "", error: res.error };
  },
};

export type LatexLogScan = {
  errors: string[];
  warnings: string[];
  info: string[];
};

export function scanLatexLog(stdout: string): LatexLogScan {
  const scan: LatexLogScan = { errors: [], warnings: [], info: [] };
  for (const line of stdout.split("\n")) {
    if (line.includes("Error:") || line.includes("Fatal error")) {
      scan.errors.push(line);
    } else if (line.includes("Warning:")) {
      scan.warnings.push(line);
    } else if (line.includes("Output written on")) {
      scan.info.push(line);
    }
  }
  return scan;
}

export function formatTimestamp(date: Date): string {
  const p = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${p(date.getMonth() + 1)}${p(date.getDate())}_` +
    `${p(date.getHours())}${p(date.getMinutes())}${p(date.getSeconds())}`
  );
}

export type CompilerOptions = {
  title: string;
  author: string;
  latexCommand: string;
  biberCommand: string;
  reruns: number;
};

export type CompileResult = {
  ok: boolean;
  pdfPath?: string;
  errors: string[];
};

const LATEX_FLAGS = ["-shell-escape", "-interaction=nonstopmode"];

export class LatexCompiler {
  private readonly paths: BuildPaths;
  private readonly options: CompilerOptions;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    paths: BuildPaths,
    options: CompilerOptions,
    runner: CommandRunner = spawnRunner,
    logger: Logger = createLogger({ file: "compiler" }),
    now: () => Date = () => new Date(),
  ) {
    this.paths = paths;
    this.options = options;
    this.runner = runner;
    this.logger = logger;
    this.now = now;
  }

  writeMainDocument(): string | null {
    const fragments = listFragments(this.paths.texDir);
    if (fragments.length === 0) {
      this.logger.error(`No page fragments found in ${this.paths.texDir}`);
      return null;
    }
    const hasBibliography = fs.existsSync(path.join(this.paths.texDir, "references.bib"));
    const mainPath = path.join(this.paths.texDir, "main.tex");
    fs.writeFileSync(
      mainPath,
      renderMainDocument({
        title: this.options.title,
        author: this.options.author,
        fragments,
        hasBibliography,
      }),
      "utf8",
    );
    this.logger.info(`Wrote ${mainPath} with ${fragments.length} fragments`);
    return mainPath;
  }

  private runLatex(file: string): LatexLogScan & { stdout: string } {
    const args = [...LATEX_FLAGS, file];
    this.logger.info(`Running command: ${this.options.latexCommand} ${args.join(" ")}`);
    const res = this.runner.run(this.options.latexCommand, args, this.paths.texDir);
    if (res.error) {
      this.logger.error(`Failed to run ${this.options.latexCommand}: ${res.error.message}`);
      return { errors: [res.error.message], warnings: [], info: [], stdout: res.stdout };
    }
    return { ...scanLatexLog(res.stdout), stdout: res.stdout };
  }

  private runBiber(jobName: string): void {
    this.logger.info("Running biber for bibliography");
    const res = this.runner.run(this.options.biberCommand, [jobName], this.paths.texDir);
    if (res.error) {
      this.logger.warn(`Failed to run ${this.options.biberCommand}: ${res.error.message}`);
    } else if (res.status !== 0) {
      this.logger.warn(`${this.options.biberCommand} exited with status ${String(res.status)}`);
    }
  }

  /**
   * Builds main.pdf from every page fragment: one LaTeX pass, biber, then the
   * configured number of reruns so references resolve.
   */
  compileDocument(): CompileResult {
    if (!this.writeMainDocument()) return { ok: false, errors: ["no page fragments"] };

    const first = this.runLatex("main.tex");
    for (const line of first.errors) this.logger.error(`LaTeX error: ${line}`);
    for (const line of first.warnings) this.logger.warn(`LaTeX warning: ${line}`);
    for (const line of first.info) this.logger.info(line);

    this.runBiber("main");
    for (let i = 0; i < this.options.reruns; i++) {
      this.runLatex("main.tex");
    }

    fs.mkdirSync(this.paths.logDir, { recursive: true });
    const logLines = [...first.errors, ...first.warnings];
    if (logLines.length > 0) {
      fs.writeFileSync(path.join(this.paths.logDir, "latex_errors.log"), logLines.join("\n"), "utf8");
    }

    const builtPdf = path.join(this.paths.texDir, "main.pdf");
    if (!fs.existsSync(builtPdf)) {
      this.logger.error("PDF file not generated");
      return { ok: false, errors: [...first.errors, "PDF file not generated"] };
    }
    fs.mkdirSync(this.paths.pdfDir, { recursive: true });
    const pdfPath = path.join(this.paths.pdfDir, `thesis_${formatTimestamp(this.now())}.pdf`);
    fs.copyFileSync(builtPdf, pdfPath);
    fs.copyFileSync(builtPdf, path.join(this.paths.pdfDir, "latest.pdf"));
    this.logger.info(`PDF generated successfully: ${pdfPath}`);
    return { ok: first.errors.length === 0, pdfPath, errors: first.errors };
  }

  /** Typesets a single page fragment on its own. A produced PDF counts as success. */
  compilePage(pageNumber: number): CompileResult {
    const name = fragmentName(pageNumber);
    const fragmentPath = path.join(this.paths.texDir, `${name}.tex`);
    if (!fs.existsSync(fragmentPath)) {
      this.logger.error({ page: pageNumber }, `Page fragment not found: ${fragmentPath}`);
      return { ok: false, errors: [`page fragment not found: ${fragmentPath}`] };
    }
    const jobName = `temp_${name}`;
    const body = fs.readFileSync(fragmentPath, "utf8");
    fs.writeFileSync(path.join(this.paths.texDir, `${jobName}.tex`), renderSinglePageDocument(body), "utf8");

    const run = this.runLatex(`${jobName}.tex`);
    fs.mkdirSync(this.paths.logDir, { recursive: true });
    const logPath = path.join(this.paths.logDir, `${name}_compile.log`);
    fs.writeFileSync(logPath, run.stdout, "utf8");

    const builtPdf = path.join(this.paths.texDir, `${jobName}.pdf`);
    if (!fs.existsSync(builtPdf)) {
      this.logger.error({ page: pageNumber }, `PDF was not generated, see ${logPath}`);
      return { ok: false, errors: [...run.errors, "PDF file not generated"] };
    }
    fs.mkdirSync(this.paths.pdfDir, { recursive: true });
    const pdfPath = path.join(this.paths.pdfDir, `${name}.pdf`);
    fs.copyFileSync(builtPdf, pdfPath);
    if (/Warning:|Overfull|Underfull/.test(run.stdout)) {
      this.logger.info({ page: pageNumber }, `Compiled with warnings: ${pdfPath}, see ${logPath}`);
    } else {
      this.logger.info({ page: pageNumber }, `Compiled successfully: ${pdfPath}`);
    }
    return { ok: true, pdfPath, errors: run.errors };
  }
}
