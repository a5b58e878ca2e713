import { ok, err } from "../lib/result.js";

import type { Result } from "../lib/result.js";
import type { Context, RenderError, RenderOptions } from "../templates/index.js";
import type { PromptTemplate } from "./prompt-template.js";

export const DEFAULT_EXAMPLE_SEPARATOR = "\n\n";

export interface FewShotTemplateInput {
  examples: readonly PromptTemplate[];
  prefix?: PromptTemplate;
  suffix?: PromptTemplate;
  /** Joins the rendered parts (default: a blank line) */
  exampleSeparator?: string;
}

/**
 * Prefix, examples and suffix rendered against one context and joined.
 * Parts that render to "" are dropped so they leave no stray separator.
 *
 * @example
 * ```typescript
 * const fewShot = new FewShotTemplate({ examples, suffix: question });
 * fewShot.format({ input: "2 + 2" });
 * ```
 */
export class FewShotTemplate {
  readonly examples: readonly PromptTemplate[];
  readonly prefix: PromptTemplate | undefined;
  readonly suffix: PromptTemplate | undefined;
  readonly exampleSeparator: string;

  constructor(input: FewShotTemplateInput) {
    this.examples = [...input.examples];
    this.prefix = input.prefix;
    this.suffix = input.suffix;
    this.exampleSeparator = input.exampleSeparator ?? DEFAULT_EXAMPLE_SEPARATOR;
  }

  private get parts(): PromptTemplate[] {
    const parts: PromptTemplate[] = [];
    if (this.prefix) parts.push(this.prefix);
    parts.push(...this.examples);
    if (this.suffix) parts.push(this.suffix);
    return parts;
  }

  get inputVariables(): string[] {
    const seen = new Set<string>();
    for (const part of this.parts) {
      for (const name of part.inputVariables) {
        seen.add(name);
      }
    }
    return [...seen];
  }

  format(context: Context = {}, options: RenderOptions = {}): Result<string, RenderError> {
    const rendered: string[] = [];
    for (const part of this.parts) {
      const result = part.format(context, options);
      if (!result.success) {
        return err(result.error);
      }
      if (result.data.length > 0) {
        rendered.push(result.data);
      }
    }
    return ok(rendered.join(this.exampleSeparator));
  }
}
