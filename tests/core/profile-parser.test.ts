import { describe, it, expect } from "vitest";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parseAutoEq, parseProfileJson, resolveProfileSource } from "../../src/core/profile-parser.js";
import { serializeProfile } from "../../src/core/profile.js";
import { ValidationError } from "../../src/core/errors.js";

const FIXTURES = path.join(path.dirname(fileURLToPath(import.meta.url)), "..", "fixtures", "profiles");

describe("parseAutoEq", () => {
  it("parses preamp and filter lines", () => {
    const profile = parseAutoEq("Preamp: -6.2 dB\nFilter 1: ON PK Fc 100 Hz Gain -3.5 dB Q 1.41\n");
    expect(serializeProfile(profile)).toEqual({
      pregain: -6.2,
      filters: [{ freq: 100, gain: -3.5, q: 1.41, type: "PK" }],
    });
  });

  it("maps shelf and pass filter codes", () => {
    const text = [
      "Filter 1: ON LS Fc 80 Hz Gain 2 dB Q 0.7",
      "Filter 2: ON LSQ Fc 90 Hz Gain 2 dB Q 0.7",
      "Filter 3: ON HSC Fc 8000 Hz Gain -1 dB Q 0.7",
      "Filter 4: ON HP Fc 25 Hz Gain 0 dB Q 0.5",
      "Filter 5: ON LPQ Fc 18000 Hz Gain 0 dB Q 0.5",
    ].join("\n");
    expect(parseAutoEq(text).filters.map((f) => f.type)).toEqual(["LSQ", "LSQ", "HSQ", "HPF", "LPF"]);
  });

  it("skips OFF filters and unrelated lines, rounds frequency", () => {
    const text = "# comment\nFilter 1: OFF PK Fc 100 Hz Gain 1 dB Q 1\nFilter 2: ON PK Fc 1234.6 Hz Gain 1 dB Q 1\r\n";
    const profile = parseAutoEq(text);
    expect(profile.pregain).toBe(0);
    expect(profile.filters.map((f) => f.freq)).toEqual([1235]);
  });

  it("defaults gain and Q for pass filters listed without them", () => {
    const profile = parseAutoEq("Filter 1: ON LP Fc 18000 Hz");
    expect(serializeProfile(profile).filters).toEqual([{ freq: 18000, gain: 0, q: 0.707, type: "LPF" }]);
  });

  it("rejects unsupported filter types", () => {
    expect(() => parseAutoEq("Preamp: -1 dB\nFilter 1: ON BP Fc 100 Hz Gain 1 dB Q 1")).toThrow(
      "Line 2: unsupported AutoEQ filter type 'BP'",
    );
  });

  it("rejects text without filters", () => {
    expect(() => parseAutoEq("Preamp: -1 dB")).toThrow(ValidationError);
  });
});

describe("parseProfileJson", () => {
  it("parses the serialized profile shape", () => {
    const profile = parseProfileJson('{"pregain": -2, "filters": [{"freq": 60, "gain": 4, "q": 0.8, "type": "LSQ"}]}');
    expect(serializeProfile(profile)).toEqual({ pregain: -2, filters: [{ freq: 60, gain: 4, q: 0.8, type: "LSQ" }] });
  });

  it("defaults pregain to 0", () => {
    expect(parseProfileJson('{"filters": []}').pregain).toBe(0);
  });

  it("rejects malformed JSON", () => {
    expect(() => parseProfileJson("{ nope")).toThrow(/^Invalid profile JSON: /);
  });

  it("names the offending field", () => {
    expect(() => parseProfileJson('{"filters": [{"freq": 100, "gain": 1, "q": 1, "type": "BP"}]}')).toThrow(
      /^Invalid profile: filters\.0\.type: /,
    );
  });
});

describe("resolveProfileSource", () => {
  const expected = {
    pregain: -4.5,
    filters: [
      { freq: 105, gain: 3.5, q: 0.707, type: "LSQ" },
      { freq: 2500, gain: -2, q: 1.41, type: "PK" },
      { freq: 9000, gain: -3, q: 0.707, type: "HSQ" },
    ],
  };

  it("parses inline JSON", async () => {
    const result = await resolveProfileSource(JSON.stringify(expected));
    expect(result.format).toBe("json");
    expect(result.filePath).toBeUndefined();
    expect(serializeProfile(result.profile)).toEqual(expected);
  });

  it("parses inline AutoEQ text", async () => {
    const result = await resolveProfileSource("Preamp: -1 dB\nFilter 1: ON PK Fc 100 Hz Gain 1 dB Q 1");
    expect(result.format).toBe("autoeq");
    expect(result.profile.pregain).toBe(-1);
  });

  it("reads a JSON file from disk", async () => {
    const filePath = path.join(FIXTURES, "warm.json");
    const result = await resolveProfileSource(filePath);
    expect(result.format).toBe("json");
    expect(result.filePath).toBe(path.resolve(filePath));
    expect(serializeProfile(result.profile)).toEqual(expected);
  });

  it("reads an AutoEQ file from disk", async () => {
    const result = await resolveProfileSource(path.join(FIXTURES, "warm-autoeq.txt"));
    expect(result.format).toBe("autoeq");
    expect(serializeProfile(result.profile)).toEqual({
      pregain: -4.5,
      filters: [
        { freq: 105, gain: 3.5, q: 0.7, type: "LSQ" },
        { freq: 2500, gain: -2, q: 1.41, type: "PK" },
        { freq: 9000, gain: -3, q: 0.7, type: "HSQ" },
      ],
    });
  });

  it("rejects a missing file", async () => {
    await expect(resolveProfileSource("/no/such/profile.json")).rejects.toThrow();
  });
});
