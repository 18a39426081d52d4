import path from "path";
import { countLeadingHashes, formatText, wrapHeading } from "./format";
import { assembleText } from "./text";
import type {
  CodeBlockData,
  EquationBlockData,
  ImageBlockData,
  PageBlock,
  RenderContext,
  TableBlockData,
  TextBlockData,
} from "./types";

function captionAndLabel(caption?: string, label?: string): string {
  let out = "";
  if (caption) out += `\\caption{${formatText(caption)}}\n`;
  if (label) out += `\\label{${label}}\n`;
  return out;
}

export function renderTextBlock(data: TextBlockData, ctx: RenderContext): string {
  if (data.text !== undefined) {
    const text = data.text;
    if (text.startsWith("#")) {
      const level = countLeadingHashes(text);
      return `${wrapHeading(level, text.slice(level).trim())}\n\n`;
    }
    return `${assembleText(text, { lineHeadings: false })}\n\n`;
  }
  if (data.textPath !== undefined) {
    const loaded = ctx.loadText(data.textPath, ctx.pageDir);
    return assembleText(loaded, { lineHeadings: true });
  }
  ctx.warnings.push("Text block is missing both 'text' and 'textPath'");
  return "";
}

export function resolveImagePath(imagePath: string, pageDir: string, outputDir: string): string {
  const absolute = path.isAbsolute(imagePath) ? imagePath : path.resolve(pageDir, imagePath);
  return path.relative(path.resolve(outputDir), absolute).split(path.sep).join("/");
}

export function renderImageBlock(data: ImageBlockData, ctx: RenderContext): string {
  if (!data.imagePath) {
    ctx.warnings.push("Image block is missing 'imagePath'");
    return "";
  }
  const target = resolveImagePath(data.imagePath, ctx.pageDir, ctx.outputDir);
  return (
    "\\begin{figure}[htbp]\n\\centering\n" +
    `\\includegraphics[width=0.8\\textwidth]{${target}}\n` +
    captionAndLabel(data.caption, data.label) +
    "\\end{figure}\n"
  );
}

export function renderTableBlock(data: TableBlockData): string {
  const rows = data.tableData ?? [];
  const firstRow = rows[0];
  if (!firstRow) return "";
  // The first row decides the column count; later rows are not checked.
  const columns = new Array<string>(firstRow.length).fill("c").join("|");
  let out = "\\begin{table}[htbp]\n\\centering\n";
  out += `\\begin{tabular}{${columns}}\n\\hline\n`;
  for (const row of rows) {
    out += row.map((cell) => formatText(cell)).join(" & ") + " \\\\ \\hline\n";
  }
  out += "\\end{tabular}\n";
  out += captionAndLabel(data.caption, data.label);
  out += "\\end{table}\n";
  return out;
}

export function renderCodeBlock(data: CodeBlockData): string {
  const language = data.language || "text";
  return (
    "\\begin{listing}[H]\n" +
    `\\begin{minted}[breaklines, linenos]{${language}}\n` +
    `${data.code ?? ""}\n` +
    "\\end{minted}\n" +
    captionAndLabel(data.caption, data.label) +
    "\\end{listing}\n"
  );
}

export function renderEquationBlock(data: EquationBlockData): string {
  let out = "\\begin{equation}\n";
  if (data.label) out += `\\label{${data.label}}\n`;
  out += `${data.equation ?? ""}\n`;
  out += "\\end{equation}\n";
  return out;
}

function withBlankLine(fragment: string): string {
  return fragment === "" ? "" : `${fragment}\n`;
}

/**
 * Renders one block to a LaTeX fragment. Problems are pushed to
 * ctx.warnings and give an empty fragment; nothing here throws.
 */
export function renderBlock(block: PageBlock, ctx: RenderContext): string {
  switch (block.type) {
    case "text":
      return renderTextBlock(block.data, ctx);
    case "image":
      return withBlankLine(renderImageBlock(block.data, ctx));
    case "table":
      return withBlankLine(renderTableBlock(block.data));
    case "code":
    case "listing":
      return withBlankLine(renderCodeBlock(block.data));
    case "equation":
      return withBlankLine(renderEquationBlock(block.data));
    case "unsupported":
      ctx.warnings.push(`Unknown content block type: ${block.originalType}`);
      return "";
    default: {
      const unreachable: never = block;
      return unreachable;
    }
  }
}
