import fs from "fs";
import path from "path";
import { TextDecoder } from "util";
import type { Logger } from "pino";
import type { TextLoader } from "pagetex-latex";
import { createLogger } from "../utils/logger";

// Tried in order; the first one that decodes without error wins.
const ENCODINGS = ["utf-8", "iso-8859-2"] as const;

function decode(bytes: Uint8Array): { text: string; encoding: string } | null {
  for (const encoding of ENCODINGS) {
    try {
      const text = new TextDecoder(encoding, { fatal: true }).decode(bytes);
      return { text, encoding };
    } catch {
      continue;
    }
  }
  return null;
}

/** Relative text paths are relative to the page directory. */
export function resolveTextPath(textPath: string, baseDir: string): string {
  return path.isAbsolute(textPath) ? textPath : path.join(baseDir, textPath);
}

/**
 * Reads a text file referenced by a page. Never throws: a file that cannot be
 * read or decoded yields an empty string and a logged warning.
 */
export function loadExternalText(
  textPath: string,
  baseDir: string,
  logger: Logger = createLogger({ file: "textLoader" }),
): string {
  const resolved = resolveTextPath(textPath, baseDir);
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(resolved);
  } catch (e) {
    logger.warn(`Error loading external text file ${resolved}: ${String(e)}`);
    return "";
  }
  const decoded = decode(bytes);
  if (!decoded) {
    logger.warn(`Error decoding external text file ${resolved}: tried ${ENCODINGS.join(", ")}`);
    return "";
  }
  if (decoded.encoding !== ENCODINGS[0]) {
    logger.info(`Read ${resolved} as ${decoded.encoding}`);
  }
  return decoded.text;
}

export function createTextLoader(logger?: Logger): TextLoader {
  return (textPath, baseDir) => loadExternalText(textPath, baseDir, logger);
}
