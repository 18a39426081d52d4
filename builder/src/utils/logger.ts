import { Config } from "../config";
import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from "pino";
import { Writable } from "stream";

const options: LoggerOptions = {
  level: process.env.LOG_LEVEL ?? "info",
  timestamp: stdTimeFunctions.isoTime,
  base: undefined,
  formatters: {
    level(label) {
      return { level: label.toUpperCase() };
    },
  },
};

type LogObject = Record<string, unknown>;

function parseLine(text: string): LogObject {
  const parsed: unknown = JSON.parse(text);
  if (typeof parsed !== "object" || parsed === null) return {};
  return Object.fromEntries(Object.entries(parsed));
}

class SimpleLineStream extends Writable {
  _write(chunk: Buffer, encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    const text = chunk.toString("utf8").trim();
    if (text.length > 0) {
      try {
        const obj = parseLine(text);
        const level = typeof obj.level === "string" ? obj.level : "";
        const time = (typeof obj.time === "string" ? obj.time : "").replace(/\..*/, "");
        const file = (typeof obj.file === "string" ? obj.file : "").slice(0, 9);
        const page = typeof obj.page === "number" ? `[page ${obj.page}] ` : "";
        const msg = typeof obj.msg === "string" ? obj.msg : text;
        process.stderr.write(`${level.padEnd(5)} ${time} ${file.padEnd(10)} ${page}${msg}\n`);
      } catch {
        process.stderr.write(text + "\n");
      }
    }
    callback();
  }
}

function build(): Logger {
  if (Config.LOG_FORMAT === "simple") {
    return pino(options, new SimpleLineStream());
  }
  return pino(options);
}

type GlobalWithLogger = typeof globalThis & { __PAGETEX_LOGGER__?: Logger };
const g = globalThis as GlobalWithLogger;

export const logger: Logger = g.__PAGETEX_LOGGER__ ?? (g.__PAGETEX_LOGGER__ = build());
export const createLogger = (bindings: Record<string, unknown>): Logger => logger.child(bindings);
