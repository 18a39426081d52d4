import path from "path";

export type BuildPaths = {
  pagesDir: string;
  texDir: string;
  pdfDir: string;
  logDir: string;
};

export class Config {
  static readonly PAGES_DIR = envStr("PAGETEX_PAGES_DIR", "pages");
  static readonly TEX_DIR = envStr("PAGETEX_TEX_DIR", path.join("build", "tex"));
  static readonly PDF_DIR = envStr("PAGETEX_PDF_DIR", path.join("build", "pdf"));
  static readonly LOG_DIR = envStr("PAGETEX_LOG_DIR", path.join("build", "logs"));
  static readonly DOCUMENT_TITLE = envStr("PAGETEX_DOCUMENT_TITLE", "Untitled Thesis");
  static readonly DOCUMENT_AUTHOR = envStr("PAGETEX_DOCUMENT_AUTHOR", "Anonymous");
  static readonly LATEX_COMMAND = envStr("PAGETEX_LATEX_COMMAND", "pdflatex");
  static readonly BIBER_COMMAND = envStr("PAGETEX_BIBER_COMMAND", "biber");
  static readonly LATEX_RERUNS = envNum("PAGETEX_LATEX_RERUNS", 2);
  static readonly LOG_FORMAT = envStr("PAGETEX_LOG_FORMAT", "");
  static readonly CONTINUE_ON_PAGE_FAILURE = envBool("PAGETEX_CONTINUE_ON_PAGE_FAILURE", false);

  static paths(): BuildPaths {
    return {
      pagesDir: Config.PAGES_DIR,
      texDir: Config.TEX_DIR,
      pdfDir: Config.PDF_DIR,
      logDir: Config.LOG_DIR,
    };
  }
}

export function envStr(name: string, def?: string, treatEmptyAsUndefined = false): string {
  const v = process.env[name];
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} not set`);
  }
  return v;
}

export function envNum(name: string, def?: number, treatEmptyAsUndefined = false): number {
  const v = process.env[name];
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} not set`);
  }
  const n = Number(v);
  if (isNaN(n)) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} is not a valid number: ${v}`);
  }
  return n;
}

export function envBool(name: string, def?: boolean, treatEmptyAsUndefined = false): boolean {
  const v = process.env[name];
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} not set`);
  }
  const vv = v.toLowerCase();
  if (["1", "true", "yes", "on"].includes(vv)) return true;
  if (["0", "false", "no", "off"].includes(vv)) return false;
  if (def !== undefined) return def;
  throw new Error(`Env var ${name} is not a valid boolean: ${v}`);
}
