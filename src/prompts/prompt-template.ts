/**
 * PromptTemplate: a parsed template with pre-bound variables and render
 * defaults.
 */

import { ok, err } from "../lib/result.js";
import { parse, render, renderWithReport, inputVariables } from "../templates/index.js";

import type { Result } from "../lib/result.js";
import type {
  Context,
  ParseError,
  ParseOptions,
  RenderError,
  RenderOptions,
  RenderReport,
  Style,
  Template,
} from "../templates/index.js";

export interface PromptTemplateOptions extends ParseOptions {
  /** Variables bound ahead of time; the call-time context wins on conflict */
  partials?: Context;
  /** Render options applied to every format call */
  renderOptions?: RenderOptions;
}

export class PromptTemplate {
  private constructor(
    readonly template: Template,
    private readonly partials: Context,
    private readonly renderOptions: RenderOptions
  ) {}

  /**
   * Parse a source into a PromptTemplate
   *
   * @example
   * ```typescript
   * const prompt = PromptTemplate.fromTemplate("Summarise {topic} in {words} words");
   * if (prompt.success) {
   *   prompt.data.format({ topic: "tides", words: 50 });
   * }
   * ```
   */
  static fromTemplate(source: string, options: PromptTemplateOptions = {}): Result<PromptTemplate, ParseError[]> {
    const { partials = {}, renderOptions = {}, ...parseOptions } = options;
    const parsed = parse(source, parseOptions);
    if (!parsed.success) {
      return err(parsed.error);
    }
    return ok(new PromptTemplate(parsed.data, { ...partials }, renderOptions));
  }

  get style(): Style {
    return this.template.style;
  }

  get source(): string {
    return this.template.rawSource;
  }

  /**
   * Variables a caller still has to supply, in order of first appearance.
   * Names bound by `partial` are left out.
   */
  get inputVariables(): string[] {
    return inputVariables(this.template).filter((name) => !Object.hasOwn(this.partials, name));
  }

  /**
   * New template with additional variables bound
   */
  partial(values: Context): PromptTemplate {
    return new PromptTemplate(this.template, { ...this.partials, ...values }, this.renderOptions);
  }

  format(context: Context = {}, options: RenderOptions = {}): Result<string, RenderError> {
    return render(this.template, { ...this.partials, ...context }, { ...this.renderOptions, ...options });
  }

  formatWithReport(context: Context = {}, options: RenderOptions = {}): Result<RenderReport, RenderError> {
    return renderWithReport(this.template, { ...this.partials, ...context }, { ...this.renderOptions, ...options });
  }
}
