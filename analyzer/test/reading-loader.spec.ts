import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync } from "node:zlib";
import { afterAll, describe, expect, it } from "vitest";

import { InputDataError } from "@battery-savings/domain";

import { ReadingLoaderService, findRepeatedTopLevelKey, isGzip } from "../src/input/reading-loader.service";

const workDir = mkdtempSync(join(tmpdir(), "battery-readings-"));

afterAll(() => {
  rmSync(workDir, {recursive: true, force: true});
});

const DOCUMENT = {
  "2024-05-01T01:00:00Z": {Wh: -250, importPrice: 0.3, exportPrice: 0.08},
  "2024-05-01T00:00:00Z": {Wh: 400, importPrice: 0.25, exportPrice: 0.07},
};

function writeInput(name: string, content: string | Buffer): string {
  const path = join(workDir, name);
  writeFileSync(path, content);
  return path;
}

describe("isGzip", () => {
  it("detects gzip by extension or magic bytes", () => {
    expect(isGzip("data.json.GZ", new Uint8Array([0x7b]))).toBe(true);
    expect(isGzip("data.json", new Uint8Array([0x1f, 0x8b, 0x08]))).toBe(true);
    expect(isGzip("data.json", new Uint8Array([0x7b, 0x7d]))).toBe(false);
  });
});

describe("findRepeatedTopLevelKey", () => {
  it("ignores keys repeated inside nested records", () => {
    const text = JSON.stringify(DOCUMENT);

    expect(findRepeatedTopLevelKey(text)).toBeNull();
  });

  it("compares decoded keys and skips escaped quotes", () => {
    expect(findRepeatedTopLevelKey('{"a\\"b": 1, "a\\"b" : 2}')).toBe('a"b');
    expect(findRepeatedTopLevelKey('{"A": {"A": 1}, "\\u0041": 2}')).toBe("A");
    expect(findRepeatedTopLevelKey('{"x\\":": "x\\":", "y": ["x\\":"]}')).toBeNull();
  });
});

describe("ReadingLoaderService", () => {
  const loader = new ReadingLoaderService();

  it("loads plain JSON sorted by timestamp", async () => {
    const path = writeInput("plain.json", JSON.stringify(DOCUMENT));

    const series = await loader.load(path);

    expect(series.length).toBe(2);
    expect(series.at(0)).toEqual({
      timestamp: "2024-05-01T00:00:00.000Z",
      timestampMs: Date.UTC(2024, 4, 1, 0),
      netEnergyWh: 400,
      importPrice: 0.25,
      exportPrice: 0.07,
      durationMinutes: 60,
    });
    expect(series.at(1).netEnergyWh).toBe(-250);
  });

  it("loads gzip-compressed JSON", async () => {
    const path = writeInput("compressed.json.gz", gzipSync(JSON.stringify(DOCUMENT)));

    const series = await loader.load(path);

    expect(series.length).toBe(2);
    expect(series.span().end.toISOString()).toBe("2024-05-01T02:00:00.000Z");
  });

  it("recognizes gzip content behind a .json name", async () => {
    const path = writeInput("disguised.json", gzipSync(JSON.stringify(DOCUMENT)));

    const series = await loader.load(path);

    expect(series.length).toBe(2);
  });

  it("reports malformed JSON with the file name", async () => {
    const path = writeInput("broken.json", "{\"2024-05-01T00:00:00Z\": ");

    await expect(loader.load(path)).rejects.toThrow(InputDataError);
    await expect(loader.load(path)).rejects.toThrow(`${path}: invalid JSON`);
  });

  it("rejects a timestamp key that appears twice", async () => {
    const record = "{\"Wh\": 1, \"importPrice\": 0.3, \"exportPrice\": 0.1}";
    const path = writeInput("repeated.json", `{"2024-05-01T00:00:00Z": ${record},\n "2024-05-01T00:00:00Z": ${record}}`);

    await expect(loader.load(path)).rejects.toThrow(InputDataError);
    await expect(loader.load(path)).rejects.toThrow(`${path}: duplicate timestamp key '2024-05-01T00:00:00Z'`);
  });

  it("reports records missing a field", async () => {
    const path = writeInput("partial.json", JSON.stringify({"2024-05-01T00:00:00Z": {Wh: 10, importPrice: 0.2}}));

    await expect(loader.load(path)).rejects.toThrow(`${path}: invalid reading data`);
  });

  it("reports a missing file", async () => {
    const path = join(workDir, "absent.json");

    await expect(loader.load(path)).rejects.toThrow(`${path}: cannot read file`);
  });

  it("reports corrupt gzip data", async () => {
    const path = writeInput("corrupt.json.gz", Buffer.from([0x1f, 0x8b, 0x08, 0x00, 0x01, 0x02]));

    await expect(loader.load(path)).rejects.toThrow(`${path}: invalid gzip data`);
  });
});
