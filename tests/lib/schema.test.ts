import { describe, it, expect } from "vitest";
import { normalizeCatalog } from "../../src/lib/schema.js";

describe("normalizeCatalog", () => {
  it("keys entries by name", () => {
    const normalized = normalizeCatalog({
      demo: {
        origin: "https://example.com/bob/demo.git",
        customizer: "setup.sh",
        description: "Demo project",
      },
    });

    expect(normalized.data.get("demo")).toEqual({
      name: "demo",
      origin: "https://example.com/bob/demo.git",
      customizer: "setup.sh",
      description: "Demo project",
    });
    expect(normalized.changed).toBe(false);
    expect(normalized.issues).toEqual([]);
  });

  it("drops unknown fields and invalid optional values", () => {
    const normalized = normalizeCatalog({
      demo: {
        origin: "https://example.com/bob/demo.git",
        customizer: 42,
        description: "",
        branch: "main",
      },
    });

    expect(normalized.data.get("demo")).toEqual({
      name: "demo",
      origin: "https://example.com/bob/demo.git",
    });
    expect(normalized.changed).toBe(true);
    expect(normalized.issues).toEqual([
      'demo dropped unknown field "branch"',
      "demo dropped invalid customizer",
      "demo dropped invalid description",
    ]);
  });

  it("rejects entries that are not tables", () => {
    expect(() => normalizeCatalog({ demo: "https://example.com/bob/demo.git" })).toThrow(
      'entry "demo" must be a table'
    );
  });

  it("rejects entries without a string origin", () => {
    expect(() => normalizeCatalog({ demo: { origin: 7 } })).toThrow(
      'entry "demo" is missing origin'
    );
  });

  it("rejects documents that are not tables", () => {
    expect(() => normalizeCatalog(["demo"])).toThrow("expected a table of named repositories");
  });

  it("accepts an empty document", () => {
    expect(normalizeCatalog({}).data.size).toBe(0);
  });
});
