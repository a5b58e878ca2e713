import { describe, it, expect, beforeEach } from "vitest";

import { unwrap } from "@/lib/result.js";
import {
  FormatSpecError,
  MissingVariableError,
  TemplateRenderer,
  TypeCoercionError,
  createRenderer,
  parse,
  render,
  renderWithReport,
  type Context,
  type RenderOptions,
  type Style,
} from "@/templates/index.js";

function renderSource(source: string, context: Context, options?: RenderOptions, style?: Style) {
  return render(unwrap(parse(source, { style })), context, options);
}

function renderText(source: string, context: Context = {}, options?: RenderOptions): string {
  return unwrap(renderSource(source, context, options));
}

describe("render", () => {
  describe("literal templates", () => {
    it("renders to the source", () => {
      expect(renderText("Nothing to fill in.")).toBe("Nothing to fill in.");
      expect(renderText("")).toBe("");
    });
  });

  describe("FmtString placeholders", () => {
    it("substitutes a variable", () => {
      expect(renderText("Hello, {name}!", { name: "World" })).toBe("Hello, World!");
    });

    it("renders escaped braces as single braces", () => {
      expect(renderText("Use {{ and }}")).toBe("Use { and }");
      expect(unwrap(renderSource("{{literal}}", {}, {}, "fmt-string"))).toBe("{literal}");
    });

    it("substitutes every occurrence of a repeated name", () => {
      expect(renderText("{x}-{x}", { x: "a" })).toBe("a-a");
    });

    it("uses the default when the variable is missing", () => {
      expect(renderText("Tone: {tone|friendly}")).toBe("Tone: friendly");
      expect(renderText("Tone: {tone|friendly}", { tone: "curt" })).toBe("Tone: curt");
    });

    it("applies the format spec to the default", () => {
      expect(renderText("[{w|ab:>4}]")).toBe("[  ab]");
    });
  });

  describe("Mustache variables", () => {
    it("substitutes escaped and raw variables", () => {
      expect(renderText("{{a}} {{{b}}} {{&c}}", { a: "1", b: "2", c: "3" })).toBe("1 2 3");
    });

    it("walks dotted names into maps", () => {
      expect(renderText("{{user.name}}", { user: { name: "Ada" } })).toBe("Ada");
    });

    it("treats a dotted name through a scalar as missing", () => {
      const result = renderSource("{{user.name}}", { user: "Ada" });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(MissingVariableError);
      }
    });
  });

  describe("value coercion", () => {
    it.each<[Context, string]>([
      [{ v: "text" }, "text"],
      [{ v: 3 }, "3"],
      [{ v: 3.0 }, "3"],
      [{ v: 0.1 }, "0.1"],
      [{ v: -2.5 }, "-2.5"],
      [{ v: 1e21 }, "1e+21"],
      [{ v: true }, "true"],
      [{ v: false }, "false"],
      [{ v: null }, ""],
    ])("renders %j as %j", (context, expected) => {
      expect(renderText("{v}", context)).toBe(expected);
    });

    it("rejects a list in a scalar position", () => {
      const result = renderSource("Items: {items}", { items: [1, 2] });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(TypeCoercionError);
        expect(result.error.message).toBe("Variable 'items' is a list and cannot be substituted as text at 1:8");
      }
    });

    it("rejects a map in a scalar position", () => {
      const result = renderSource("{{user}}", { user: { name: "Ada" } });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toMatchObject({ kind: "TypeCoercion", variable: "user", valueType: "map" });
      }
    });

    it("rejects a list even under the lenient policy", () => {
      const result = renderSource("{items}", { items: [] }, { missingVariablePolicy: "lenient" });
      expect(result.success).toBe(false);
    });
  });

  describe("missing variables", () => {
    it("fails under the strict policy", () => {
      const result = renderSource("{x}", {});
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(MissingVariableError);
        expect(result.error).toMatchObject({ variable: "x", offset: 0, line: 1, column: 1 });
        expect(result.error.message).toBe("Missing variable 'x' at 1:1");
      }
    });

    it("renders empty under the lenient policy", () => {
      expect(renderText("{x}", {}, { missingVariablePolicy: "lenient" })).toBe("");
    });

    it("reports lenient misses in source order", () => {
      const template = unwrap(parse("Dear {title} {name},\n{{sig}}", { style: "fmt-string" }));
      const report = unwrap(renderWithReport(template, { name: "Ada" }, { missingVariablePolicy: "lenient" }));
      expect(report.output).toBe("Dear  Ada,\n{sig}");
      expect(report.missing).toEqual([{ name: "title", offset: 5, line: 1, column: 6 }]);
    });

    it("stops at the first error", () => {
      const result = renderSource("{a}{b}", {});
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toMatchObject({ variable: "a" });
      }
    });
  });

  describe("sections", () => {
    it("repeats the body for each list element", () => {
      expect(renderText("{{#items}}{{.}},{{/items}}", { items: ["a", "b"] })).toBe("a,b,");
    });

    it("pushes each element as the innermost scope", () => {
      const context = { name: "outer", people: [{ name: "a" }, { name: "b" }] };
      expect(renderText("{{#people}}{{name}} {{/people}}{{name}}", context)).toBe("a b outer");
    });

    it("falls back to outer scopes", () => {
      expect(renderText("{{#items}}{{.}}{{sep}}{{/items}}", { items: ["x", "y"], sep: ";" })).toBe("x;y;");
    });

    it("renders a map once with the map as scope", () => {
      expect(renderText("{{#user}}Hi {{name}}{{/user}}", { user: { name: "Ada" } })).toBe("Hi Ada");
    });

    it("renders a truthy scalar once", () => {
      expect(renderText("{{#admin}}[admin]{{/admin}}", { admin: true })).toBe("[admin]");
    });

    it.each<[string, Context]>([
      ["false", { s: false }],
      ["null", { s: null }],
      ["an empty list", { s: [] }],
      ["an empty map", { s: {} }],
      ["an empty string", { s: "" }],
      ["zero", { s: 0 }],
      ["missing", {}],
    ])("skips the body when the value is %s", (_label, context) => {
      expect(renderText("[{{#s}}x{{/s}}]", context)).toBe("[]");
      expect(renderText("[{{^s}}x{{/s}}]", context)).toBe("[x]");
    });

    it("skips an inverted section for a truthy value", () => {
      expect(renderText("{{^items}}none{{/items}}", { items: [1] })).toBe("");
    });

    it("propagates errors from inside a section", () => {
      const result = renderSource("{{#items}}{{missing}}{{/items}}", { items: [1] });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toMatchObject({ variable: "missing", offset: 10 });
      }
    });
  });

  describe("output escaping", () => {
    const context = { x: "<b>&" };

    it("is off by default", () => {
      expect(renderText("{{x}}", context)).toBe("<b>&");
    });

    it("escapes HTML when enabled", () => {
      expect(renderText("{{x}}", context, { escapeOutput: true })).toBe("&lt;b&gt;&amp;");
      expect(renderText("{x}", context, { escapeOutput: true })).toBe("&lt;b&gt;&amp;");
    });

    it("never escapes raw variables", () => {
      expect(renderText("{{{x}}}{{&x}}", context, { escapeOutput: true })).toBe("<b>&<b>&");
    });

    it("uses a custom escape function", () => {
      expect(renderText("{{x}}", context, { escapeOutput: true, escapeFunction: (text) => `[${text}]` })).toBe(
        "[<b>&]"
      );
    });

    it("escapes after formatting", () => {
      expect(renderText("{x:>6}", context, { escapeOutput: true })).toBe("  &lt;b&gt;&amp;");
    });
  });

  describe("format specs", () => {
    it.each<[string, Context, string]>([
      ["{price:.2f}", { price: 3.14159 }, "3.14"],
      ["{price:f}", { price: 2 }, "2.000000"],
      ["{count:05d}", { count: 42 }, "00042"],
      ["{count:05d}", { count: -42 }, "-0042"],
      ["{count:d}", { count: 7 }, "7"],
      ["{n:>5}", { n: 42 }, "   42"],
      ["{n:<5}", { n: 42 }, "42   "],
      ["{n:x<5d}", { n: 42 }, "42xxx"],
      ["{n:5}", { n: 42 }, "   42"],
      ["{n:.2}", { n: 3.14159 }, "3.14"],
      ["{s:5}", { s: "ab" }, "ab   "],
      ["{s:*^7}", { s: "ab" }, "**ab***"],
      ["{s:.3}", { s: "abcdef" }, "abc"],
      ["{s:>1}", { s: "abc" }, "abc"],
      ["{ratio:.1%}", { ratio: 0.5 }, "50.0%"],
      ["{flag:>6}", { flag: true }, "  true"],
      ["{x:.100f}", { x: 0.5 }, `0.${"5".padEnd(100, "0")}`],
    ])("%s with %j renders %j", (source, context, expected) => {
      expect(renderText(source, context)).toBe(expected);
    });

    it.each<[string, Context, string]>([
      ["{n:zz}", { n: 1 }, "Format spec 'zz' is not recognised at 1:1"],
      ["{n:d}", { n: 2.5 }, "Format spec 'd' requires an integer, got 2.5 at 1:1"],
      ["{n:.2d}", { n: 2 }, "Format spec '.2d' does not allow a precision with 'd' at 1:1"],
      ["{s:f}", { s: "x" }, "Format spec 'f' requires a number for type 'f' at 1:1"],
      ["{s:05}", { s: "x" }, "Format spec '05' only zero-pads numbers at 1:1"],
      ["{x:.101f}", { x: 1.5 }, "Format spec '.101f' has a precision above 100 at 1:1"],
      ["{x:.200}", { x: 1.5 }, "Format spec '.200' has a precision above 100 at 1:1"],
      ["{x:.101}", { x: "text" }, "Format spec '.101' has a precision above 100 at 1:1"],
      ["{x:>9999999999}", { x: "a" }, "Format spec '>9999999999' has a width above 10000 at 1:1"],
      ["Total: {x:10001d}", { x: 1 }, "Format spec '10001d' has a width above 10000 at 1:8"],
    ])("%s with %j fails", (source, context, message) => {
      const result = renderSource(source, context);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(FormatSpecError);
        expect(result.error.message).toBe(message);
      }
    });
  });

  it("does not mutate the context", () => {
    const context: Context = { items: [{ name: "a" }], name: "outer" };
    const snapshot = JSON.stringify(context);
    renderText("{{#items}}{{name}}{{/items}}", context);
    expect(JSON.stringify(context)).toBe(snapshot);
  });

  it("renders one template independently for different contexts", () => {
    const template = unwrap(parse("Hello, {name}!"));
    expect(unwrap(render(template, { name: "Ada" }))).toBe("Hello, Ada!");
    expect(unwrap(render(template, { name: "Grace" }))).toBe("Hello, Grace!");
  });
});

describe("TemplateRenderer", () => {
  let renderer: TemplateRenderer;

  beforeEach(() => {
    renderer = createRenderer({ missingVariablePolicy: "lenient", escapeOutput: true });
  });

  it("applies its options to every call", () => {
    const template = unwrap(parse("{{a}}|{{b}}"));
    expect(unwrap(renderer.render(template, { a: "<" }))).toBe("&lt;|");
  });

  it("lets per-call options win", () => {
    const template = unwrap(parse("{{a}}|{{b}}"));
    const result = renderer.render(template, { a: "<" }, { missingVariablePolicy: "strict" });
    expect(result.success).toBe(false);
  });

  it("reports misses", () => {
    const template = unwrap(parse("{{a}}|{{b}}"));
    const report = unwrap(renderer.renderWithReport(template, {}));
    expect(report.output).toBe("|");
    expect(report.missing.map((entry) => entry.name)).toEqual(["a", "b"]);
  });

  it("defaults to strict without escaping", () => {
    const plain = new TemplateRenderer();
    const template = unwrap(parse("{{a}}"));
    expect(unwrap(plain.render(template, { a: "<" }))).toBe("<");
    expect(plain.render(template, {}).success).toBe(false);
  });
});
