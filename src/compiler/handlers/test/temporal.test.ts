import { describe, expect, it } from "vitest";
import { dump, load } from "../../../marshal.ts";
import { defineRecord } from "../../../schemas/complex/record_type.ts";
import { PatternParseError } from "../../../schemas/error.ts";

const Event = defineRecord({
  name: "Event",
  fields: [
    { name: "at", type: "datetime" },
    { name: "day", type: "date", patterns: ["dd/MM/yyyy"] },
  ],
});

describe("temporal handler", () => {
  it("loads ISO 8601 text", () => {
    const loaded = load(Event, { at: "2024-03-01T10:00:00Z", day: "2024-03-05" });
    expect(loaded.at).toEqual(new Date(Date.UTC(2024, 2, 1, 10)));
    expect(loaded.day).toEqual(new Date(2024, 2, 5));
  });

  it("tries custom patterns after the ISO form", () => {
    const loaded = load(Event, { at: 0, day: "05/03/2024" });
    expect(loaded.at).toEqual(new Date(0));
    expect(loaded.day).toEqual(new Date(2024, 2, 5));
  });

  it("truncates dates to midnight", () => {
    const loaded = load(Event, { at: 0, day: new Date(2024, 2, 5, 13, 30) });
    expect(loaded.day).toEqual(new Date(2024, 2, 5));
  });

  it("lists every format tried", () => {
    let caught: unknown;
    try {
      load(Event, { at: 0, day: "yesterday" });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(PatternParseError);
    if (caught instanceof PatternParseError) {
      expect(caught.patterns).toEqual(["ISO 8601", "dd/MM/yyyy"]);
      expect(caught.message).toBe(
        'Cannot parse date/time, tried: ISO 8601, dd/MM/yyyy (at Event.day); value: "yesterday"',
      );
    }
  });

  it("reads configured patterns for a field", () => {
    const Stamp = defineRecord({
      name: "Stamp",
      fields: [{ name: "on", type: "date" }],
      meta: { customPatterns: { on: ["dd.MM.yyyy"] } },
    });
    expect(load(Stamp, { on: "05.03.2024" })).toEqual({ on: new Date(2024, 2, 5) });
  });

  it("dumps ISO text by default", () => {
    expect(dump(Event, {
      at: new Date(Date.UTC(2024, 2, 1, 10)),
      day: new Date(2024, 2, 5),
    })).toEqual({ at: "2024-03-01T10:00:00.000Z", day: "2024-03-05" });
  });

  it("dumps timestamps when configured", () => {
    expect(dump(Event, {
      at: new Date(1_700_000_000_000),
      day: new Date(2024, 2, 5),
    }, { dateTimeOutputForm: "timestamp" })).toEqual({
      at: 1_700_000_000,
      day: Math.floor(new Date(2024, 2, 5).getTime() / 1000),
    });
  });
});
