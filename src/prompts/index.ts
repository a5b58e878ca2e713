/**
 * Prompt Module
 *
 * Higher-level prompt building blocks on top of the template engine:
 * - PromptTemplate: a parsed template with partial variables
 * - FewShotTemplate: prefix, examples and suffix joined into one prompt
 * - ChatTemplate: role messages, message placeholders and few-shot conversations
 * - Loaders for YAML/JSON template and context files
 */

export { PromptTemplate, type PromptTemplateOptions } from "./prompt-template.js";
export { FewShotTemplate, DEFAULT_EXAMPLE_SEPARATOR, type FewShotTemplateInput } from "./few-shot.js";
export {
  ChatTemplate,
  ChatTemplateParseError,
  MissingMessagesError,
  FewShotChatTemplate,
  MessagesPlaceholder,
  ChatMessageSchema,
  CHAT_ROLES,
  DEFAULT_MESSAGE_LIMIT,
  formatTranscript,
  type ChatMessage,
  type ChatRole,
  type FewShotChatTemplateInput,
  type MessageLike,
  type MessagesPlaceholderOptions,
  type MessageTemplateErrors,
} from "./chat.js";
export {
  loadChatTemplate,
  loadContext,
  parseChatTemplateDocument,
  parseContextDocument,
  formatForPath,
  readTextFile,
  ChatTemplateDocumentSchema,
  type ChatTemplateDocument,
  type DocumentFormat,
} from "./loader.js";
