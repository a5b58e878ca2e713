import type { Template, TemplateNode } from "./types.js";

function printNodes(nodes: readonly TemplateNode[]): string {
  let out = "";
  for (const node of nodes) {
    out += node.type === "section" ? `${node.openTag}${printNodes(node.body)}${node.closeTag}` : node.raw;
  }
  return out;
}

/**
 * Rebuild the source text from a template's nodes. Always equal to
 * `template.rawSource`.
 */
export function toSource(template: Template): string {
  return printNodes(template.root);
}

function collectNames(nodes: readonly TemplateNode[], seen: Set<string>): void {
  for (const node of nodes) {
    if (node.type === "literal") {
      continue;
    }
    if (node.name !== ".") {
      seen.add(node.name);
    }
    if (node.type === "section") {
      collectNames(node.body, seen);
    }
  }
}

/**
 * Variable names referenced by a template, in order of first appearance.
 * Section names are included; the implicit iterator `.` is not.
 */
export function inputVariables(template: Template): string[] {
  const seen = new Set<string>();
  collectNames(template.root, seen);
  return [...seen];
}
