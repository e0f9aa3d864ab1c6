import { describe, it } from "node:test";
import assert from "node:assert";
import {
  assembleLines,
  boldRatio,
  cleanedLineText,
  isProminentLine,
  maxFontSize,
} from "../src/lib/layout/lines";
import { DEFAULT_EXTRACTION_CONFIG } from "../src/lib/config/extractionConfig";
import type { Fragment, Line } from "../src/types/clauses";
import { fragment } from "./helpers/lines";

const lineWith = (...fragments: Fragment[]): Line => ({
  page: 1,
  top: 100,
  fragments,
});

describe("cleanedLineText", () => {
  it("inserts a space where the horizontal gap exceeds the threshold", () => {
    const line = lineWith(
      { ...fragment("Safety"), left: 10, width: 30 },
      { ...fragment("requirements"), left: 42, width: 60 },
    );
    assert.strictEqual(cleanedLineText(line), "Safety requirements");
  });

  it("joins fragments that touch", () => {
    const line = lineWith(
      { ...fragment("Safe"), left: 10, width: 20 },
      { ...fragment("ty"), left: 31, width: 10 },
    );
    assert.strictEqual(cleanedLineText(line), "Safety");
  });

  it("orders fragments left to right before joining", () => {
    const line = lineWith(
      { ...fragment("second"), left: 200, width: 30 },
      { ...fragment("first"), left: 10, width: 25 },
    );
    assert.strictEqual(cleanedLineText(line), "first second");
  });

  it("collapses inner whitespace and trims", () => {
    const line = lineWith({ ...fragment("  4   Safety\trequirements "), left: 10 });
    assert.strictEqual(cleanedLineText(line), "4 Safety requirements");
  });
});

describe("line metrics", () => {
  it("reports the largest font size", () => {
    const line = lineWith(fragment("4", { fontSize: 16 }), fragment("Scope", { fontSize: 12, left: 120 }));
    assert.strictEqual(maxFontSize(line), 16);
    assert.strictEqual(maxFontSize(lineWith()), 0);
  });

  it("weights bold ratio by trimmed character count", () => {
    const line = lineWith(
      fragment(" ABCD ", { bold: true }),
      fragment("EFGHIJ", { left: 120 }),
    );
    assert.strictEqual(boldRatio(line), 0.4);
  });

  it("reports zero bold ratio when there is no text", () => {
    assert.strictEqual(boldRatio(lineWith(fragment("   ", { bold: true }))), 0);
  });

  it("requires both size and weight for prominence", () => {
    const config = DEFAULT_EXTRACTION_CONFIG;
    assert.strictEqual(isProminentLine(lineWith(fragment("4 Scope", { fontSize: 14, bold: true })), config), true);
    assert.strictEqual(isProminentLine(lineWith(fragment("4 Scope", { fontSize: 13.9, bold: true })), config), false);
    assert.strictEqual(isProminentLine(lineWith(fragment("4 Scope", { fontSize: 16 })), config), false);
  });
});

describe("assembleLines", () => {
  it("groups fragments by page and vertical position in reading order", () => {
    const lines = assembleLines([
      fragment("later page", { page: 2, top: 50 }),
      fragment("b", { top: 100, left: 80 }),
      fragment("a", { top: 100, left: 10 }),
      fragment("first", { top: 60 }),
    ]);

    assert.deepStrictEqual(
      lines.map((line) => [line.page, line.top, cleanedLineText(line)]),
      [
        [1, 60, "first"],
        [1, 100, "a b"],
        [2, 50, "later page"],
      ],
    );
  });

  it("joins fragments whose tops differ by less than the tolerance", () => {
    const lines = assembleLines([
      fragment("Clause", { top: 100, left: 10 }),
      fragment("text", { top: 100.5, left: 60 }),
    ]);

    assert.strictEqual(lines.length, 1);
    assert.strictEqual(cleanedLineText(lines[0]), "Clause text");
  });

  it("splits runs whose tops differ by more than the tolerance", () => {
    // Same baseline, different heights: tops 100 and 104.
    const lines = assembleLines([
      fragment("Body text with a", { top: 100, left: 10, fontSize: 11 }),
      fragment("footnote", { top: 104, left: 100, fontSize: 7 }),
    ]);

    assert.deepStrictEqual(lines.map((line) => cleanedLineText(line)), ["Body text with a", "footnote"]);
  });

  it("drops empty fragments and link annotations", () => {
    const lines = assembleLines([
      fragment("   ", { top: 10 }),
      fragment("Link to page 4", { top: 20 }),
      fragment("Kept line", { top: 30 }),
    ]);

    assert.deepStrictEqual(lines.map((line) => cleanedLineText(line)), ["Kept line"]);
  });
});
