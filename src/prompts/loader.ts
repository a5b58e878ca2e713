/**
 * Template files
 *
 * Chat templates and render contexts can be kept in YAML or JSON files:
 *
 * ```yaml
 * messages:
 *   - role: system
 *     template: You answer in {language}.
 *   - placeholder: history
 *     optional: true
 *   - role: human
 *     template: "{question}"
 * ```
 */

import fs from "fs/promises";
import path from "path";

import YAML from "yaml";
import { z } from "zod";

import { ValidationError } from "../lib/errors.js";
import { ok, err, tryCatch, tryCatchAsync } from "../lib/result.js";
import { validateContext } from "../templates/index.js";

import { CHAT_ROLES, ChatTemplate, MessagesPlaceholder } from "./chat.js";

import type { LoomError } from "../lib/errors.js";
import type { Result } from "../lib/result.js";
import type { Context, ParseOptions } from "../templates/index.js";
import type { MessageLike } from "./chat.js";

export type DocumentFormat = "yaml" | "json";

const RoleMessageSchema = z.object({
  role: z.enum(CHAT_ROLES),
  template: z.string(),
});

const PlaceholderMessageSchema = z.object({
  placeholder: z.string().min(1),
  optional: z.boolean().optional(),
  limit: z.number().int().nonnegative().optional(),
});

export const ChatTemplateDocumentSchema = z.object({
  messages: z.array(z.union([RoleMessageSchema, PlaceholderMessageSchema])).min(1),
});

export type ChatTemplateDocument = z.infer<typeof ChatTemplateDocumentSchema>;

/**
 * Pick a document format from a file extension; anything other than
 * `.json` is read as YAML
 */
export function formatForPath(filePath: string): DocumentFormat {
  return path.extname(filePath).toLowerCase() === ".json" ? "json" : "yaml";
}

function parseDocument(text: string, format: DocumentFormat): Result<unknown, ValidationError> {
  const parsed = tryCatch((): unknown => (format === "json" ? JSON.parse(text) : YAML.parse(text)));
  if (!parsed.success) {
    return err(
      new ValidationError(`Invalid ${format.toUpperCase()} document`, {
        cause: parsed.error.message,
      })
    );
  }
  return parsed;
}

function toMessageLike(entry: ChatTemplateDocument["messages"][number]): MessageLike {
  if ("role" in entry) {
    return [entry.role, entry.template];
  }
  return new MessagesPlaceholder(entry.placeholder, { optional: entry.optional, limit: entry.limit });
}

/**
 * Build a ChatTemplate from the text of a template document
 */
export function parseChatTemplateDocument(
  text: string,
  format: DocumentFormat,
  options: ParseOptions = {}
): Result<ChatTemplate, LoomError> {
  const document = parseDocument(text, format);
  if (!document.success) {
    return document;
  }

  const validation = ChatTemplateDocumentSchema.safeParse(document.data);
  if (!validation.success) {
    return err(
      new ValidationError("Invalid chat template document", {
        issues: validation.error.issues,
      })
    );
  }

  return ChatTemplate.fromMessages(validation.data.messages.map(toMessageLike), options);
}

export async function readTextFile(filePath: string): Promise<Result<string, ValidationError>> {
  const result = await tryCatchAsync(() => fs.readFile(filePath, "utf-8"));
  if (!result.success) {
    return err(
      new ValidationError(`Failed to read file: ${filePath}`, {
        filePath,
        cause: result.error.message,
      })
    );
  }
  return ok(result.data);
}

/**
 * Load a chat template from a YAML or JSON file
 */
export async function loadChatTemplate(
  filePath: string,
  options: ParseOptions = {}
): Promise<Result<ChatTemplate, LoomError>> {
  const text = await readTextFile(filePath);
  if (!text.success) {
    return text;
  }
  return parseChatTemplateDocument(text.data, formatForPath(filePath), options);
}

/**
 * Parse and validate the text of a context document
 */
export function parseContextDocument(text: string, format: DocumentFormat): Result<Context, ValidationError> {
  const document = parseDocument(text, format);
  if (!document.success) {
    return document;
  }
  // An empty YAML file parses to null
  return validateContext(document.data ?? {});
}

/**
 * Load a render context from a YAML or JSON file
 */
export async function loadContext(filePath: string): Promise<Result<Context, ValidationError>> {
  const text = await readTextFile(filePath);
  if (!text.success) {
    return text;
  }
  const context = parseContextDocument(text.data, formatForPath(filePath));
  if (!context.success) {
    return err(
      new ValidationError(`${context.error.message} in ${filePath}`, {
        ...context.error.context,
        filePath,
      })
    );
  }
  return context;
}
