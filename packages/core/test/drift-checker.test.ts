import { describe, expect, it } from "vitest";

import { assertNoDrift, checkDrift, describeDrift, diffDocuments } from "../src/core/DriftChecker";
import { DriftDetectedError } from "../src/core/ThemeErrors";
import { ThemeErrorCode, type JsonObject } from "../src/types";

function generated(): JsonObject {
  return {
    $schema: "https://zed.dev/schema/themes/v0.2.0.json",
    name: "Test Theme",
    themes: [
      {
        name: "Test Theme",
        style: {
          "editor.background": "#241b2f",
          syntax: { keyword: { color: "#fede5d", font_weight: null } },
        },
      },
    ],
  };
}

describe("DriftChecker", () => {
  it("reports nothing for identical documents", () => {
    expect(checkDrift(generated(), generated())).toEqual([]);
  });

  it("ignores formatting and hex letter case", () => {
    const committed = JSON.parse(JSON.stringify(generated()).replace("#fede5d", "#FEDE5D"));
    expect(checkDrift(generated(), committed)).toEqual([]);
  });

  it("compares non-color strings exactly", () => {
    const committed = { ...generated(), name: "test theme" };
    expect(checkDrift(generated(), committed)).toEqual([
      { path: "$.name", kind: "changed", expected: "Test Theme", actual: "test theme" },
    ]);
  });

  it("pinpoints a changed syntax color", () => {
    const committed = JSON.parse(JSON.stringify(generated()).replace("#fede5d", "#fede5e"));
    expect(checkDrift(generated(), committed)).toEqual([
      {
        path: "$.themes[0].style.syntax.keyword.color",
        kind: "changed",
        expected: "#fede5d",
        actual: "#fede5e",
      },
    ]);
  });

  it("reports missing and unexpected keys", () => {
    const committed = generated();
    delete committed.name;
    committed.author = "someone";
    expect(diffDocuments(generated(), committed)).toEqual([
      { path: "$.name", kind: "missing", expected: "Test Theme" },
      { path: "$.author", kind: "unexpected", actual: "someone" },
    ]);
  });

  it("does not mistake inherited object members for keys", () => {
    const expected = { syntax: { constructor: { color: "#72f1b8" } } };
    expect(diffDocuments(expected, { syntax: {} })).toEqual([
      { path: "$.syntax.constructor", kind: "missing", expected: { color: "#72f1b8" } },
    ]);
    expect(diffDocuments({ syntax: {} }, { syntax: { toString: "#72f1b8" } })).toEqual([
      { path: "$.syntax.toString", kind: "unexpected", actual: "#72f1b8" },
    ]);
  });

  it("reports array length differences per index", () => {
    expect(diffDocuments(["#000000"], ["#000000", "#ffffff"])).toEqual([
      { path: "$[1]", kind: "unexpected", actual: "#ffffff" },
    ]);
    expect(diffDocuments(["#000000", "#ffffff"], ["#000000"])).toEqual([
      { path: "$[1]", kind: "missing", expected: "#ffffff" },
    ]);
  });

  it("reports type changes at the node", () => {
    expect(diffDocuments({ a: [1] }, { a: { 0: 1 } })).toEqual([
      { path: "$.a", kind: "changed", expected: [1], actual: { 0: 1 } },
    ]);
  });

  it("treats an absent artifact as drift", () => {
    expect(checkDrift(generated(), null)).toEqual([
      { path: "$", kind: "missing", expected: "generated theme document" },
    ]);
  });

  it("assertNoDrift throws with every differing path", () => {
    const committed = { ...generated(), name: "x", author: "y" };
    try {
      assertNoDrift(generated(), committed);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DriftDetectedError);
      if (err instanceof DriftDetectedError) {
        expect(err.code).toBe(ThemeErrorCode.DRIFT_DETECTED);
        expect(err.paths).toEqual(["$.name", "$.author"]);
        expect(err.message).toBe("Generated theme does not match its source (2 differences)");
      }
    }
    expect(() => assertNoDrift(generated(), generated())).not.toThrow();
  });

  it.each([
    [{ path: "$.a", kind: "missing", expected: "#000000" } as const, '$.a: missing (expected "#000000")'],
    [{ path: "$.b", kind: "unexpected", actual: 3 } as const, "$.b: unexpected 3"],
    [{ path: "$.c", kind: "changed", expected: null, actual: 700 } as const, "$.c: expected null, found 700"],
  ])("describes %o", (entry, text) => {
    expect(describeDrift(entry)).toBe(text);
  });
});
