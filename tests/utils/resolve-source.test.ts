import { describe, it, expect } from "vitest";
import path from "node:path";
import { resolveJsonSource, resolveSource } from "../../src/utils/resolve-source.js";

const FIXTURES = path.join(import.meta.dirname, "..", "fixtures");

describe("resolveSource", () => {
  it("treats an object prefix as raw text", async () => {
    const raw = '{"tunings": []}';
    const result = await resolveSource(raw);
    expect(result.text).toBe(raw);
    expect(result.filePath).toBeUndefined();
  });

  it("treats an array prefix as raw text", async () => {
    const raw = "[1, 2]";
    const result = await resolveSource(raw);
    expect(result.text).toBe(raw);
    expect(result.filePath).toBeUndefined();
  });

  it("handles leading whitespace before the JSON", async () => {
    const raw = "  \n{}";
    const result = await resolveSource(raw);
    expect(result.text).toBe(raw);
    expect(result.filePath).toBeUndefined();
  });

  it("reads file from disk when source is a path", async () => {
    const fixturePath = path.join(FIXTURES, "compositions", "tetrachords.json");
    const result = await resolveSource(fixturePath);
    expect(result.text).toContain('"composerName": "Test Composer"');
    expect(result.filePath).toBe(path.resolve(fixturePath));
  });

  it("rejects non-existent file path", async () => {
    await expect(resolveSource("/no/such/file.json")).rejects.toThrow();
  });
});

describe("resolveJsonSource", () => {
  it("parses raw JSON", async () => {
    const result = await resolveJsonSource('{"name": "x"}');
    expect(result.value).toEqual({ name: "x" });
    expect(result.filePath).toBeUndefined();
  });

  it("reports invalid JSON", async () => {
    await expect(resolveJsonSource("{not json")).rejects.toThrow(/^Invalid JSON in source: /);
  });
});
