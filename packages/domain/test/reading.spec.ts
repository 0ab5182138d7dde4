import { describe, expect, it } from "vitest";

import { InputDataError, ReadingSeries, hourKey, monthKey, parseReadingDocument, parseTemporal } from "../src";

const record = (Wh: number) => ({Wh, importPrice: 0.3, exportPrice: 0.1});

describe("parseTemporal", () => {
  it("reads timestamps without a zone as UTC", () => {
    expect(parseTemporal("2024-05-01T06:30")?.toISOString()).toBe("2024-05-01T06:30:00.000Z");
    expect(parseTemporal("2024-05-01T06:30:00+02:00")?.toISOString()).toBe("2024-05-01T04:30:00.000Z");
  });

  it("rejects anything that is not an ISO timestamp", () => {
    expect(parseTemporal("May 1st")).toBeNull();
    expect(parseTemporal("2024-05-01")).toBeNull();
    expect(parseTemporal(Number.NaN)).toBeNull();
    expect(parseTemporal(null)).toBeNull();
  });

  it("formats month and hour keys in UTC", () => {
    const timestampMs = Date.UTC(2024, 11, 31, 23, 45);
    expect(monthKey(timestampMs)).toBe("2024-12");
    expect(hourKey(timestampMs)).toBe("2024-12-31T23:00:00Z");
  });
});

describe("parseReadingDocument", () => {
  it("sorts readings and infers step durations from the gaps", () => {
    const series = parseReadingDocument({
      "2024-05-01T00:45:00Z": record(-30),
      "2024-05-01T00:00:00Z": record(10),
      "2024-05-01T00:15:00Z": record(20),
    });

    expect([...series].map((reading) => [reading.timestamp, reading.netEnergyWh, reading.durationMinutes])).toEqual([
      ["2024-05-01T00:00:00.000Z", 10, 15],
      ["2024-05-01T00:15:00.000Z", 20, 30],
      ["2024-05-01T00:45:00.000Z", -30, 30],
    ]);
    expect(series.span().end.toISOString()).toBe("2024-05-01T01:15:00.000Z");
  });

  it("gives a lone reading a one-minute step", () => {
    const series = parseReadingDocument({"2024-05-01T00:00:00Z": record(5)});

    expect(series.at(0).durationMinutes).toBe(1);
  });

  it("rejects records with the wrong field types", () => {
    const raw = {"2024-05-01T00:00:00Z": {Wh: "12", importPrice: 0.3, exportPrice: 0.1}};

    expect(() => parseReadingDocument(raw, "input.json")).toThrow(
      "input.json: invalid reading data (2024-05-01T00:00:00Z.Wh: Expected number, received string)",
    );
  });

  it("rejects unparseable timestamp keys", () => {
    expect(() => parseReadingDocument({noon: record(1)}, "input.json")).toThrow(
      "input.json: invalid timestamp key 'noon'",
    );
  });

  it("rejects keys that resolve to the same instant", () => {
    const raw = {"2024-05-01T00:00:00Z": record(1), "2024-05-01T02:00:00+02:00": record(2)};

    expect(() => parseReadingDocument(raw, "input.json")).toThrow(
      "input.json: duplicate timestamp 2024-05-01T00:00:00.000Z",
    );
  });

  it("rejects an empty document", () => {
    expect(() => parseReadingDocument({})).toThrow(InputDataError);
    expect(() => parseReadingDocument({})).toThrow("input contains no readings");
  });
});

describe("ReadingSeries", () => {
  const startMs = Date.UTC(2024, 4, 1);
  const series = ReadingSeries.fromInputs([0, 1, 2, 3].map((hour) => ({
    timestampMs: startMs + hour * 3_600_000,
    netEnergyWh: hour * 100,
    importPrice: 0.3,
    exportPrice: 0.1,
  })));

  it("clips to an inclusive range and keeps full-series durations", () => {
    const clipped = series.clip(new Date(startMs + 3_600_000), new Date(startMs + 2 * 3_600_000));

    expect(clipped.length).toBe(2);
    expect(clipped.at(0).netEnergyWh).toBe(100);
    expect(clipped.at(1).netEnergyWh).toBe(200);
    expect(clipped.at(1).durationMinutes).toBe(60);
    expect(series.clip(null, null)).toBe(series);
  });

  it("returns an empty series when the range misses every reading", () => {
    expect(series.clip(new Date(startMs + 10 * 3_600_000), null).isEmpty()).toBe(true);
  });

  it("finds the first reading at or after a timestamp", () => {
    expect(series.indexAtOrAfter(startMs - 1)).toBe(0);
    expect(series.indexAtOrAfter(startMs + 1)).toBe(1);
    expect(series.indexAtOrAfter(startMs + 99 * 3_600_000)).toBe(4);
  });

  it("rejects out-of-range indexes", () => {
    expect(() => series.at(4)).toThrow(RangeError);
  });
});
