import fs from "fs";
import path from "path";
import { isContentBlockType } from "pagetex-latex";
import type { ContentBlockType, Page, PageBlock, Reference } from "pagetex-latex";

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function typeName(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function pageError(source: string, message: string): Error {
  return new Error(`invalid page (${source}): ${message}`);
}

function fieldTypeError(source: string, name: string, expected: string, actual: unknown): Error {
  return pageError(source, `"${name}" must be ${expected}, but got ${typeName(actual)}`);
}

function optionalString(data: JsonObject, name: string, where: string, source: string): string | undefined {
  const value = data[name];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw fieldTypeError(source, `${where}.${name}`, "a string", value);
  }
  return value;
}

function parseTableData(value: unknown, where: string, source: string): string[][] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw fieldTypeError(source, `${where}.tableData`, "an array of rows", value);
  }
  return value.map((row: unknown, i) => {
    if (!Array.isArray(row)) {
      throw fieldTypeError(source, `${where}.tableData[${i}]`, "an array of cells", row);
    }
    return row.map((cell: unknown, j) => {
      if (typeof cell !== "string") {
        throw fieldTypeError(source, `${where}.tableData[${i}][${j}]`, "a string", cell);
      }
      return cell;
    });
  });
}

function parseBlockData(type: ContentBlockType, data: JsonObject, where: string, source: string): PageBlock {
  const str = (name: string) => optionalString(data, name, where, source);
  switch (type) {
    case "text":
      return { type, data: { text: str("text"), textPath: str("textPath") } };
    case "image":
      return {
        type,
        data: { imagePath: str("imagePath"), caption: str("caption"), label: str("label") },
      };
    case "table":
      return {
        type,
        data: {
          tableData: parseTableData(data.tableData, where, source),
          caption: str("caption"),
          label: str("label"),
        },
      };
    case "code":
    case "listing":
      return {
        type,
        data: {
          code: str("code"),
          language: str("language"),
          caption: str("caption"),
          label: str("label"),
        },
      };
    case "equation":
      return { type, data: { equation: str("equation"), label: str("label") } };
  }
}

export function parseBlock(raw: unknown, index: number, source: string): PageBlock {
  const where = `content[${index}]`;
  if (!isObject(raw)) {
    throw fieldTypeError(source, where, "an object", raw);
  }
  const type = raw.type;
  if (typeof type !== "string") {
    throw fieldTypeError(source, `${where}.type`, "a string", type);
  }
  const data = raw.data ?? {};
  if (!isObject(data)) {
    throw fieldTypeError(source, `${where}.data`, "an object", data);
  }
  if (!isContentBlockType(type)) {
    return { type: "unsupported", originalType: type };
  }
  return parseBlockData(type, data, `${where}.data`, source);
}

function parseReferences(value: unknown, source: string): Reference[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw fieldTypeError(source, "references", "an array", value);
  }
  return value.map((ref: unknown, i) => {
    if (!isObject(ref)) {
      throw fieldTypeError(source, `references[${i}]`, "an object", ref);
    }
    const { id, citation } = ref;
    if (typeof id !== "string") {
      throw fieldTypeError(source, `references[${i}].id`, "a string", id);
    }
    if (typeof citation !== "string") {
      throw fieldTypeError(source, `references[${i}].citation`, "a string", citation);
    }
    return { id, citation };
  });
}

/**
 * Checks the shape of a parsed page document. Blocks of an unknown type are
 * kept as "unsupported" so that rendering can report them.
 */
export function parsePage(raw: unknown, source: string, defaultTitle: string): Page {
  if (!isObject(raw)) {
    throw pageError(source, "top-level must be an object");
  }
  const title = raw.title ?? defaultTitle;
  if (typeof title !== "string") {
    throw fieldTypeError(source, "title", "a string", title);
  }
  const sectionLevel = raw.sectionLevel ?? 1;
  if (typeof sectionLevel !== "number" || !Number.isFinite(sectionLevel)) {
    throw fieldTypeError(source, "sectionLevel", "a finite number", sectionLevel);
  }
  const content = raw.content ?? [];
  if (!Array.isArray(content)) {
    throw fieldTypeError(source, "content", "an array", content);
  }
  const page: Page = {
    title,
    sectionLevel,
    content: content.map((block: unknown, i) => parseBlock(block, i, source)),
  };
  const references = parseReferences(raw.references, source);
  if (references) page.references = references;
  return page;
}

export function loadPageFile(filePath: string, defaultTitle: string): Page {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`page file not found: ${resolved}`);
  }
  const json = fs.readFileSync(resolved, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (e) {
    throw new Error(`invalid page JSON (${resolved}): ${String(e)}`);
  }
  return parsePage(parsed, filePath, defaultTitle);
}
