import { readFile } from "node:fs/promises";
import { promisify } from "node:util";
import { gunzip } from "node:zlib";
import { Injectable, Logger } from "@nestjs/common";
import { InputDataError, describeError, parseReadingDocument } from "@battery-savings/domain";
import type { ReadingSeries } from "@battery-savings/domain";

const gunzipAsync = promisify(gunzip);

const GZIP_MAGIC = [0x1f, 0x8b] as const;

const JSON_WHITESPACE = new Set([" ", "\t", "\n", "\r"]);

export function isGzip(path: string, bytes: Uint8Array): boolean {
  return path.toLowerCase().endsWith(".gz") || (bytes[0] === GZIP_MAGIC[0] && bytes[1] === GZIP_MAGIC[1]);
}

function stringEnd(text: string, openQuote: number): number {
  let idx = openQuote + 1;
  while (idx < text.length && text[idx] !== "\"") {
    idx += text[idx] === "\\" ? 2 : 1;
  }
  return idx;
}

function nextToken(text: string, from: number): number {
  let idx = from;
  while (idx < text.length && JSON_WHITESPACE.has(text[idx])) {
    idx += 1;
  }
  return idx;
}

/**
 * First key of the top-level object that occurs more than once in `text`,
 * which must be valid JSON. `JSON.parse` keeps only the last of repeated keys.
 */
export function findRepeatedTopLevelKey(text: string): string | null {
  const seen = new Set<string>();
  let depth = 0;
  for (let idx = 0; idx < text.length; idx += 1) {
    const char = text[idx];
    if (char === "{" || char === "[") {
      depth += 1;
    } else if (char === "}" || char === "]") {
      depth -= 1;
    } else if (char === "\"") {
      const end = stringEnd(text, idx);
      if (depth === 1 && text[nextToken(text, end + 1)] === ":") {
        const key: unknown = JSON.parse(text.slice(idx, end + 1));
        if (typeof key === "string") {
          if (seen.has(key)) {
            return key;
          }
          seen.add(key);
        }
      }
      idx = end;
    }
  }
  return null;
}

/** Reads a JSON or gzip-compressed JSON reading file into a validated series. */
@Injectable()
export class ReadingLoaderService {
  private readonly logger = new Logger(ReadingLoaderService.name);

  async load(path: string): Promise<ReadingSeries> {
    this.logger.log(`Reading input file ${path}`);
    let bytes: Buffer;
    try {
      bytes = await readFile(path);
    } catch (error) {
      throw new InputDataError(`cannot read file (${describeError(error)})`, path);
    }

    let text: string;
    try {
      text = isGzip(path, bytes) ? (await gunzipAsync(bytes)).toString("utf-8") : bytes.toString("utf-8");
    } catch (error) {
      throw new InputDataError(`invalid gzip data (${describeError(error)})`, path);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new InputDataError(`invalid JSON (${describeError(error)})`, path);
    }

    const repeated = findRepeatedTopLevelKey(text);
    if (repeated !== null) {
      throw new InputDataError(`duplicate timestamp key '${repeated}'`, path);
    }

    const series = parseReadingDocument(raw, path);
    const span = series.span();
    this.logger.log(`Loaded ${series.length} readings from ${span.start.toISOString()} to ${span.end.toISOString()}`);
    return series;
  }
}
