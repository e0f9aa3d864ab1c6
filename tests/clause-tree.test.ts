import { describe, it } from "node:test";
import assert from "node:assert";
import { buildClauseTree } from "../src/lib/clauses/buildClauseTree";
import { findHeadings } from "../src/lib/clauses/headingDetector";
import type { Clause, Line } from "../src/types/clauses";
import { fragment, heading, lineOf, stack } from "./helpers/lines";

const HEADING = { fontSize: 16, bold: true };

const build = (lines: Line[]): Clause[] => buildClauseTree(lines, findHeadings(lines));

const outline = (clauses: readonly Clause[]): unknown[] =>
  clauses.map((clause) => [clause.identifier, clause.title, [...clause.bodyLines], outline(clause.children)]);

describe("buildClauseTree", () => {
  it("nests clauses under their parent identifiers", () => {
    const lines = stack(
      ["4 Safety requirements", HEADING],
      ["This clause covers safety."],
      ["4.1 General", HEADING],
      ["General text applies."],
      ["4.1.1 Detail", HEADING],
      ["Detail text applies."],
      ["5 Testing", HEADING],
      ["Testing text applies."],
    );

    assert.deepStrictEqual(outline(build(lines)), [
      [
        "4",
        "Safety requirements",
        ["This clause covers safety."],
        [
          [
            "4.1",
            "General",
            ["General text applies."],
            [["4.1.1", "Detail", ["Detail text applies."], []]],
          ],
        ],
      ],
      ["5", "Testing", ["Testing text applies."], []],
    ]);
  });

  it("marks paragraph breaks on large vertical gaps and page changes", () => {
    const lines = [
      heading("4 Safety requirements", { top: 100 }),
      lineOf("First paragraph.", { top: 120 }),
      lineOf("Still first.", { top: 134 }),
      lineOf("Second paragraph.", { top: 180 }),
      lineOf("Third paragraph.", { page: 2, top: 60 }),
    ];

    assert.deepStrictEqual(build(lines)[0].bodyLines, [
      "First paragraph.",
      "Still first.",
      "",
      "Second paragraph.",
      "",
      "Third paragraph.",
    ]);
  });

  it("measures gaps from the last kept line", () => {
    const lines = [
      heading("4 Safety requirements", { top: 100 }),
      lineOf("Before the footer.", { top: 120 }),
      lineOf("Copyright British Standards Institution", { top: 130 }),
      lineOf("After the footer.", { top: 136 }),
    ];

    assert.deepStrictEqual(build(lines)[0].bodyLines, ["Before the footer.", "After the footer."]);
  });

  it("drops boilerplate, stray numbered lines and layout fragments from bodies", () => {
    const lines = stack(
      ["6 Verification", HEADING],
      ["Provided by Accuris under license."],
      ["6.1 Not prominent", { fontSize: 12 }],
      ["Annex overview table"],
      ["Verification shall be planned."],
    );

    assert.deepStrictEqual(build(lines)[0].bodyLines, ["Verification shall be planned."]);
  });

  it("leaves a weakly styled numbered line out of the enclosing clause body", () => {
    const lines: Line[] = [
      heading("6 Verification", { top: 100 }),
      {
        page: 1,
        top: 114,
        fragments: [
          fragment("6.1", { top: 114, fontSize: 12, bold: true }),
          fragment("Not prominent", { top: 114, left: 100, fontSize: 12 }),
        ],
      },
      lineOf("Verification shall be planned.", { top: 128 }),
    ];

    assert.deepStrictEqual(findHeadings(lines).map((found) => found.identifier), ["6"]);
    assert.deepStrictEqual(outline(build(lines)), [
      ["6", "Verification", ["Verification shall be planned."], []],
    ]);
  });

  it("never attaches a subclause to its grandparent", () => {
    const lines = stack(
      ["3 General", HEADING],
      ["3.2.1 Detail", HEADING],
      ["Detail body."],
    );

    assert.deepStrictEqual(outline(build(lines)), [
      ["3", "General", [], []],
      ["3.2.1", "Detail", ["Detail body."], []],
    ]);
  });

  it("keeps the first clause for a repeated identifier", () => {
    const lines = stack(
      ["5 Scope", HEADING],
      ["First body."],
      ["5 Scope", HEADING],
      ["Second body."],
    );

    assert.deepStrictEqual(outline(build(lines)), [["5", "Scope", ["First body."], []]]);
  });

  it("promotes orphaned subclauses to roots in identifier order", () => {
    const lines = stack(
      ["7.3 Orphan", HEADING],
      ["Orphan body."],
      ["2 Scope", HEADING],
      ["Scope body."],
      ["10 Annexes", HEADING],
    );

    assert.deepStrictEqual(
      build(lines).map((clause) => clause.identifier),
      ["2", "7.3", "10"],
    );
  });

  it("starts the body after a multi-line title", () => {
    const lines = stack(
      ["8", HEADING],
      ["Maintenance", HEADING],
      ["Maintenance shall be scheduled."],
    );

    assert.deepStrictEqual(outline(build(lines)), [
      ["8", "Maintenance", ["Maintenance shall be scheduled."], []],
    ]);
  });

  it("returns frozen clauses", () => {
    const [clause] = build(stack(["9 Records", HEADING], ["Records are kept."]));

    assert.strictEqual(Object.isFrozen(clause), true);
    assert.strictEqual(Object.isFrozen(clause.bodyLines), true);
    assert.strictEqual(Object.isFrozen(clause.children), true);
  });

  it("returns nothing when no headings were found", () => {
    assert.deepStrictEqual(buildClauseTree(stack(["Loose text."]), []), []);
  });
});
