import fs from "fs";
import { formatText } from "pagetex-latex";

export const FRAGMENT_RE = /^page_(\d+)\.tex$/;

export function fragmentName(pageNumber: number): string {
  return `page_${pageNumber}`;
}

/** Page fragments in a TeX directory, ordered by page number. */
export function listFragments(texDir: string): string[] {
  if (!fs.existsSync(texDir)) return [];
  return fs
    .readdirSync(texDir)
    .map((name) => FRAGMENT_RE.exec(name))
    .filter((m): m is RegExpExecArray => m !== null)
    .map((m) => ({ name: m[0], page: parseInt(m[1] ?? "0", 10) }))
    .sort((a, b) => a.page - b.page)
    .map((f) => f.name);
}

const COMMON_PACKAGES = [
  "\\usepackage[utf8]{inputenc}",
  "\\usepackage[T1]{fontenc}",
  "\\usepackage{graphicx}",
  "\\usepackage{hyperref}",
  "\\usepackage{float}",
  "\\usepackage{amsmath}",
  "\\usepackage{amssymb}",
  "\\usepackage{minted}",
  "\\usepackage{textcomp}",
];

const LOCALE_PACKAGES = ["\\usepackage{polski}", "\\usepackage[polish]{babel}"];

export type MainDocumentOptions = {
  title: string;
  author: string;
  fragments: string[];
  hasBibliography: boolean;
};

export function renderMainDocument(opts: MainDocumentOptions): string {
  const lines: string[] = [
    "\\documentclass[a4paper, 12pt]{report}",
    "",
    ...COMMON_PACKAGES,
    "\\usepackage{csquotes}",
    "\\usepackage[backend=biber, sorting=none, style=numeric]{biblatex}",
    ...LOCALE_PACKAGES,
    "",
    "\\graphicspath{{../}}",
    "",
  ];
  if (opts.hasBibliography) {
    lines.push("\\addbibresource{references.bib}", "");
  }
  lines.push(
    `\\title{${formatText(opts.title)}}`,
    `\\author{${formatText(opts.author)}}`,
    "\\date{\\today}",
    "",
    "\\begin{document}",
    "",
    "\\maketitle",
    "\\tableofcontents",
    "\\newpage",
    "",
  );
  for (const fragment of opts.fragments) {
    lines.push(`\\include{${fragment.replace(/\.tex$/, "")}}`);
  }
  lines.push(
    "",
    "\\printbibliography[heading=bibintoc, title=Bibliografia]",
    "",
    "\\end{document}",
    "",
  );
  return lines.join("\n");
}

/** A standalone document around one page fragment, for checking a page alone. */
export function renderSinglePageDocument(body: string): string {
  return [
    "\\documentclass[a4paper, 12pt]{report}",
    "",
    ...COMMON_PACKAGES,
    ...LOCALE_PACKAGES,
    "",
    "\\graphicspath{{../}}",
    "",
    "\\begin{document}",
    "",
    body,
    "\\end{document}",
    "",
  ].join("\n");
}
