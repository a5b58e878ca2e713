/**
 * Mustache parser: folds the scanner's flat token stream into a node tree
 * and checks section structure. Sections must close with a tag naming the
 * identifier that opened them; nesting depth is unbounded.
 */

import {
  EmptyPlaceholderError,
  SectionMismatchError,
  UnbalancedBraceError,
  UnclosedSectionError,
} from "./errors.js";
import { defaultTagScanner } from "./mustache-scanner.js";

import type { TagScanner, TagToken } from "./mustache-scanner.js";
import type { ErrorReporter } from "./reporter.js";
import type { SectionNode, TemplateNode } from "./types.js";

interface OpenSection {
  name: string;
  inverted: boolean;
  openTag: string;
  start: number;
  nodes: TemplateNode[];
}

export function parseMustache(
  source: string,
  reporter: ErrorReporter,
  scanner: TagScanner = defaultTagScanner
): TemplateNode[] {
  const root: TemplateNode[] = [];
  const open: OpenSection[] = [];
  const current = (): TemplateNode[] => open[open.length - 1]?.nodes ?? root;

  for (const token of scanner.scan(source)) {
    switch (token.type) {
      case "text":
        current().push({ type: "literal", text: token.value, raw: token.value, start: token.start, end: token.end });
        break;

      case "stray-open":
        reporter.report(new UnbalancedBraceError(reporter.at(token.start), "{"));
        break;

      case "tag":
        handleTag(token, open, current, reporter);
        break;
    }
  }

  for (const section of open) {
    reporter.report(new UnclosedSectionError(reporter.at(section.start), section.name));
  }

  return root;
}

function handleTag(
  token: TagToken,
  open: OpenSection[],
  current: () => TemplateNode[],
  reporter: ErrorReporter
): void {
  if (token.name === "") {
    reporter.report(new EmptyPlaceholderError(reporter.at(token.start)));
    return;
  }

  switch (token.sigil) {
    case "#":
    case "^":
      open.push({
        name: token.name,
        inverted: token.sigil === "^",
        openTag: token.raw,
        start: token.start,
        nodes: [],
      });
      return;

    case "/":
      closeSection(token, open, current, reporter);
      return;

    default:
      current().push({
        type: "variable",
        name: token.name,
        escaped: token.sigil === "",
        raw: token.raw,
        start: token.start,
        end: token.end,
      });
  }
}

function closeSection(
  token: TagToken,
  open: OpenSection[],
  current: () => TemplateNode[],
  reporter: ErrorReporter
): void {
  const innermost = open[open.length - 1];
  if (!innermost) {
    reporter.report(new SectionMismatchError(reporter.at(token.start), null, token.name));
    return;
  }

  if (innermost.name !== token.name) {
    reporter.report(new SectionMismatchError(reporter.at(token.start), innermost.name, token.name));
    const depth = open.map((section) => section.name).lastIndexOf(token.name);
    if (depth < 0) {
      return;
    }
    // Sections opened inside the matching one are closed along with it.
    while (open.length - 1 > depth) {
      const orphan = open.pop();
      if (orphan) {
        current().push(buildSection(orphan, "", orphan.start + orphan.openTag.length));
      }
    }
  }

  const section = open.pop();
  if (section) {
    current().push(buildSection(section, token.raw, token.end));
  }
}

function buildSection(section: OpenSection, closeTag: string, end: number): SectionNode {
  return {
    type: "section",
    name: section.name,
    inverted: section.inverted,
    body: section.nodes,
    openTag: section.openTag,
    closeTag,
    start: section.start,
    end,
  };
}
