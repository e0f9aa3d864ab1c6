import { describe, it } from "node:test";
import assert from "node:assert";
import { findHeadings } from "../src/lib/clauses/headingDetector";
import { resolveExtractionConfig } from "../src/lib/config/extractionConfig";
import { lineOf, stack } from "./helpers/lines";

const HEADING = { fontSize: 16, bold: true };

describe("findHeadings", () => {
  it("detects numbered prominent lines with inline titles", () => {
    const lines = stack(
      ["4 Safety requirements", HEADING],
      ["All systems shall be classified."],
      ["4.1 General", HEADING],
    );

    assert.deepStrictEqual(findHeadings(lines), [
      { identifier: "4", title: "Safety requirements", startLineIndex: 0, lineSpan: 1 },
      { identifier: "4.1", title: "General", startLineIndex: 2, lineSpan: 1 },
    ]);
  });

  it("ignores numbered lines that are small or not bold", () => {
    const lines = stack(
      ["6.1 Not prominent", { fontSize: 12 }],
      ["6.2 Bold but small", { fontSize: 12, bold: true }],
      ["6.3 Large but regular", { fontSize: 16 }],
    );

    assert.deepStrictEqual(findHeadings(lines), []);
  });

  it("joins prominent continuation lines into the title of a bare number", () => {
    const lines = stack(
      ["5", HEADING],
      ["Design", HEADING],
      ["basis", HEADING],
      ["The design basis is documented."],
    );

    assert.deepStrictEqual(findHeadings(lines), [
      { identifier: "5", title: "Design basis", startLineIndex: 0, lineSpan: 3 },
    ]);
  });

  it("counts blank lines inside a continuation", () => {
    const lines = [
      lineOf("5", { ...HEADING, top: 100 }),
      lineOf("", { top: 114 }),
      lineOf("Design", { ...HEADING, top: 128 }),
      lineOf("Body text follows.", { top: 142 }),
    ];

    assert.deepStrictEqual(findHeadings(lines), [
      { identifier: "5", title: "Design", startLineIndex: 0, lineSpan: 3 },
    ]);
  });

  it("drops a bare top-level number with no title", () => {
    const lines = stack(
      ["12", HEADING],
      ["5.1 Scope", HEADING],
    );

    assert.deepStrictEqual(findHeadings(lines), [
      { identifier: "5.1", title: "Scope", startLineIndex: 1, lineSpan: 1 },
    ]);
  });

  it("keeps a bare subclause number with an empty title", () => {
    const lines = stack(
      ["5.2", HEADING],
      ["Plain paragraph text."],
    );

    assert.deepStrictEqual(findHeadings(lines), [
      { identifier: "5.2", title: "", startLineIndex: 0, lineSpan: 1 },
    ]);
  });

  it("applies configured prominence thresholds", () => {
    const config = resolveExtractionConfig({ headingMinFontSize: 11 });
    const lines = stack(["7 Testing", { fontSize: 12, bold: true }]);

    assert.deepStrictEqual(findHeadings(lines, config), [
      { identifier: "7", title: "Testing", startLineIndex: 0, lineSpan: 1 },
    ]);
  });
});
