import { describe, it, expect } from "vitest";

import {
  EmptyPlaceholderError,
  LineIndex,
  MissingVariableError,
  UnbalancedBraceError,
  positionAt,
} from "@/templates/errors.js";
import { ErrorReporter, formatDiagnostics } from "@/templates/reporter.js";

describe("positionAt", () => {
  it("derives 1-based line and column", () => {
    expect(positionAt("ab\ncd", 4)).toEqual({ offset: 4, line: 2, column: 2 });
  });

  it("counts a carriage return pair as one break", () => {
    expect(positionAt("ab\r\ncd", 4)).toEqual({ offset: 4, line: 2, column: 1 });
    expect(positionAt("ab\rcd", 3)).toEqual({ offset: 3, line: 2, column: 1 });
  });

  it("clamps offsets outside the source", () => {
    expect(positionAt("abc", 10)).toEqual({ offset: 3, line: 1, column: 4 });
    expect(positionAt("abc", -2)).toEqual({ offset: 0, line: 1, column: 1 });
  });
});

describe("LineIndex", () => {
  it("resolves offsets across mixed line breaks", () => {
    const index = new LineIndex("a\r\nbc\rd\n\ne");
    expect(index.positionAt(0)).toEqual({ offset: 0, line: 1, column: 1 });
    expect(index.positionAt(2)).toEqual({ offset: 2, line: 1, column: 3 });
    expect(index.positionAt(4)).toEqual({ offset: 4, line: 2, column: 2 });
    expect(index.positionAt(6)).toEqual({ offset: 6, line: 3, column: 1 });
    expect(index.positionAt(8)).toEqual({ offset: 8, line: 4, column: 1 });
    expect(index.positionAt(9)).toEqual({ offset: 9, line: 5, column: 1 });
  });

  it("clamps offsets outside the source", () => {
    const index = new LineIndex("ab\ncd");
    expect(index.positionAt(99)).toEqual({ offset: 5, line: 2, column: 3 });
    expect(index.positionAt(-1)).toEqual({ offset: 0, line: 1, column: 1 });
  });

  it("handles an empty source", () => {
    expect(new LineIndex("").positionAt(0)).toEqual({ offset: 0, line: 1, column: 1 });
  });
});

describe("ErrorReporter", () => {
  it("collects errors ordered by offset, keeping report order on ties", () => {
    const source = "{} } {";
    const reporter = new ErrorReporter(source);
    const late = new UnbalancedBraceError(reporter.at(5), "{");
    const first = new EmptyPlaceholderError(reporter.at(0));
    const tie = new UnbalancedBraceError(reporter.at(0), "{");
    reporter.report(late);
    reporter.report(first);
    reporter.report(tie);

    expect(reporter.hasErrors()).toBe(true);
    expect(reporter.count).toBe(3);
    expect(reporter.collect()).toEqual([first, tie, late]);
  });

  it("starts empty", () => {
    const reporter = new ErrorReporter("");
    expect(reporter.hasErrors()).toBe(false);
    expect(reporter.collect()).toEqual([]);
  });
});

describe("formatDiagnostics", () => {
  it("points a caret at the offending character", () => {
    const source = "Hello {name";
    const error = new UnbalancedBraceError(positionAt(source, 6), "{");
    expect(formatDiagnostics(source, [error], { color: false, label: "greeting.txt" })).toBe(
      [
        "greeting.txt:1:7 error[UNBALANCED_BRACE] Unmatched '{' at 1:7",
        "  1 | Hello {name",
        "    |       ^",
      ].join("\n")
    );
  });

  it("shows the line the error is on", () => {
    const source = "first\nsecond {x}";
    const error = new MissingVariableError(positionAt(source, 13), "x");
    expect(formatDiagnostics(source, [error], { color: false })).toBe(
      [
        "<template>:2:8 error[MISSING_VARIABLE] Missing variable 'x' at 2:8",
        "  2 | second {x}",
        "    |        ^",
      ].join("\n")
    );
  });

  it("widens the gutter for long line numbers", () => {
    const source = `${"\n".repeat(11)}{}`;
    const error = new EmptyPlaceholderError(positionAt(source, 11));
    const lines = formatDiagnostics(source, [error], { color: false }).split("\n");
    expect(lines[1]).toBe("  12 | {}");
    expect(lines[2]).toBe("     | ^");
  });

  it("returns nothing for no errors", () => {
    expect(formatDiagnostics("x", [], { color: false })).toBe("");
  });
});
