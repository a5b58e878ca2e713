/**
 * Chat templates
 *
 * A ChatTemplate is an ordered list of message slots:
 * - a role message, whose content is a PromptTemplate
 * - a MessagesPlaceholder, filled with a list of messages from the context
 * - a FewShotChatTemplate, expanding to rendered example conversations
 */

import { z } from "zod";

import { LoomError, ValidationError } from "../lib/errors.js";
import { ok, err } from "../lib/result.js";

import { PromptTemplate } from "./prompt-template.js";

import type { Result } from "../lib/result.js";
import type { Context, ParseError, ParseOptions, RenderOptions } from "../templates/index.js";

export const CHAT_ROLES = ["system", "human", "ai"] as const;

export type ChatRole = (typeof CHAT_ROLES)[number];

export const ChatMessageSchema = z.object({
  role: z.enum(CHAT_ROLES),
  content: z.string(),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;

export const DEFAULT_MESSAGE_LIMIT = 100;

export interface MessagesPlaceholderOptions {
  /** Render nothing instead of failing when the variable is absent */
  optional?: boolean;
  /** Maximum number of messages taken from the variable; 0 means the default */
  limit?: number;
}

/**
 * A required MessagesPlaceholder whose variable is absent. Placeholders have
 * no source text, so the error names the message slot rather than a position.
 */
export class MissingMessagesError extends LoomError {
  constructor(
    public readonly variable: string,
    public readonly messageIndex?: number
  ) {
    super(
      messageIndex === undefined
        ? `Missing messages variable '${variable}'`
        : `Missing messages variable '${variable}' for message ${messageIndex}`,
      "MISSING_VARIABLE",
      { variable, messageIndex }
    );
    this.name = "MissingMessagesError";
  }
}

/**
 * Slot filled at format time with a list of `{ role, content }` messages
 */
export class MessagesPlaceholder {
  readonly optional: boolean;
  readonly limit: number;

  constructor(
    readonly variableName: string,
    options: MessagesPlaceholderOptions = {}
  ) {
    this.optional = options.optional ?? false;
    this.limit = options.limit !== undefined && options.limit > 0 ? Math.floor(options.limit) : DEFAULT_MESSAGE_LIMIT;
  }

  formatMessages(context: Context): Result<ChatMessage[], LoomError> {
    if (!Object.hasOwn(context, this.variableName)) {
      if (this.optional) {
        return ok([]);
      }
      return err(new MissingMessagesError(this.variableName));
    }

    const parsed = z.array(ChatMessageSchema).safeParse(context[this.variableName]);
    if (!parsed.success) {
      return err(
        new ValidationError(`Variable '${this.variableName}' must be a list of { role, content } messages`, {
          variable: this.variableName,
          issues: parsed.error.issues,
        })
      );
    }
    return ok(parsed.data.slice(0, this.limit));
  }
}

/**
 * Parse errors of one message template
 */
export interface MessageTemplateErrors {
  /** Position of the message in the list passed to `fromMessages` */
  index: number;
  errors: ParseError[];
}

export class ChatTemplateParseError extends LoomError {
  constructor(public readonly failures: MessageTemplateErrors[]) {
    const count = failures.reduce((total, failure) => total + failure.errors.length, 0);
    super(`Chat template has ${count} error(s) in ${failures.length} message(s)`, "CHAT_TEMPLATE_PARSE_ERROR", {
      messages: failures.map((failure) => ({
        index: failure.index,
        errors: failure.errors.map((error) => error.toJSON()),
      })),
    });
    this.name = "ChatTemplateParseError";
  }
}

interface RoleMessage {
  role: ChatRole;
  prompt: PromptTemplate;
}

type MessageSlot = RoleMessage | MessagesPlaceholder | FewShotChatTemplate;

export type MessageLike =
  | readonly [ChatRole, string]
  | readonly ["placeholder", string]
  | MessagesPlaceholder
  | FewShotChatTemplate;

function isPlaceholderTuple(
  message: readonly [ChatRole, string] | readonly ["placeholder", string]
): message is readonly ["placeholder", string] {
  return message[0] === "placeholder";
}

/**
 * Render a message list as `role: content` lines
 */
export function formatTranscript(messages: readonly ChatMessage[]): string {
  return messages.map((message) => `${message.role}: ${message.content}`).join("\n");
}

/**
 * Ordered list of chat message templates
 *
 * @example
 * ```typescript
 * const chat = ChatTemplate.fromMessages([
 *   ["system", "You answer in {language}."],
 *   new MessagesPlaceholder("history", { optional: true }),
 *   ["human", "{question}"],
 * ]);
 * ```
 */
export class ChatTemplate {
  private constructor(private readonly slots: readonly MessageSlot[]) {}

  static fromMessages(
    messages: readonly MessageLike[],
    options: ParseOptions = {}
  ): Result<ChatTemplate, ChatTemplateParseError> {
    const slots: MessageSlot[] = [];
    const failures: MessageTemplateErrors[] = [];

    messages.forEach((message, index) => {
      if (message instanceof MessagesPlaceholder || message instanceof FewShotChatTemplate) {
        slots.push(message);
        return;
      }
      if (isPlaceholderTuple(message)) {
        slots.push(new MessagesPlaceholder(message[1]));
        return;
      }
      const prompt = PromptTemplate.fromTemplate(message[1], options);
      if (!prompt.success) {
        failures.push({ index, errors: prompt.error });
        return;
      }
      slots.push({ role: message[0], prompt: prompt.data });
    });

    if (failures.length > 0) {
      return err(new ChatTemplateParseError(failures));
    }
    return ok(new ChatTemplate(slots));
  }

  get length(): number {
    return this.slots.length;
  }

  /**
   * Every variable the template reads, in order of first appearance.
   * Placeholder variables are included; few-shot examples bring their own
   * values and add none.
   */
  get inputVariables(): string[] {
    const seen = new Set<string>();
    for (const slot of this.slots) {
      if (slot instanceof MessagesPlaceholder) {
        seen.add(slot.variableName);
      } else if (!(slot instanceof FewShotChatTemplate)) {
        for (const name of slot.prompt.inputVariables) {
          seen.add(name);
        }
      }
    }
    return [...seen];
  }

  formatMessages(context: Context = {}, options: RenderOptions = {}): Result<ChatMessage[], LoomError> {
    const messages: ChatMessage[] = [];
    for (const [index, slot] of this.slots.entries()) {
      if (slot instanceof MessagesPlaceholder) {
        const filled = slot.formatMessages(context);
        if (!filled.success) {
          return err(
            filled.error instanceof MissingMessagesError ? new MissingMessagesError(slot.variableName, index) : filled.error
          );
        }
        messages.push(...filled.data);
      } else if (slot instanceof FewShotChatTemplate) {
        const examples = slot.formatMessages(options);
        if (!examples.success) {
          return examples;
        }
        messages.push(...examples.data);
      } else {
        const content = slot.prompt.format(context, options);
        if (!content.success) {
          return err(content.error);
        }
        messages.push({ role: slot.role, content: content.data });
      }
    }
    return ok(messages);
  }

  format(context: Context = {}, options: RenderOptions = {}): Result<string, LoomError> {
    const messages = this.formatMessages(context, options);
    if (!messages.success) {
      return messages;
    }
    return ok(formatTranscript(messages.data));
  }

  /**
   * New template with `other`'s messages appended
   */
  concat(other: ChatTemplate): ChatTemplate {
    return new ChatTemplate([...this.slots, ...other.slots]);
  }
}

export interface FewShotChatTemplateInput {
  /** One context per example conversation */
  examples: readonly Context[];
  /** Rendered once per example */
  examplePrompt: ChatTemplate;
}

/**
 * Example conversations rendered from a shared chat template
 */
export class FewShotChatTemplate {
  readonly examples: readonly Context[];
  readonly examplePrompt: ChatTemplate;

  constructor(input: FewShotChatTemplateInput) {
    this.examples = [...input.examples];
    this.examplePrompt = input.examplePrompt;
  }

  formatMessages(options: RenderOptions = {}): Result<ChatMessage[], LoomError> {
    const messages: ChatMessage[] = [];
    for (const example of this.examples) {
      const rendered = this.examplePrompt.formatMessages(example, options);
      if (!rendered.success) {
        return rendered;
      }
      messages.push(...rendered.data);
    }
    return ok(messages);
  }

  format(options: RenderOptions = {}): Result<string, LoomError> {
    const messages = this.formatMessages(options);
    if (!messages.success) {
      return messages;
    }
    return ok(formatTranscript(messages.data));
  }
}
