/**
 * promptloom - prompt templates in FmtString and Mustache styles
 *
 * @packageDocumentation
 */

// Template engine
export {
  detectStyle,
  scanSignals,
  parse,
  render,
  renderWithReport,
  TemplateRenderer,
  createRenderer,
  toSource,
  inputVariables,
  ErrorReporter,
  formatDiagnostics,
  TemplateError,
  UnbalancedBraceError,
  EmptyPlaceholderError,
  InvalidPlaceholderError,
  MixedFormatError,
  UnclosedSectionError,
  SectionMismatchError,
  MissingVariableError,
  TypeCoercionError,
  FormatSpecError,
  positionAt,
  LineIndex,
  MustacheEngineScanner,
  defaultTagScanner,
  parseFormatSpec,
  applyFormatSpec,
  ValueSchema,
  ContextSchema,
  validateContext,
  STYLES,
} from "./templates/index.js";

// Types
export type {
  Style,
  Template,
  TemplateNode,
  LiteralNode,
  PlaceholderNode,
  VariableNode,
  SectionNode,
  Context,
  Value,
  ValueMap,
  ParseOptions,
  RenderOptions,
  RenderReport,
  MissingVariable,
  MissingVariablePolicy,
  TemplateErrorKind,
  SourcePosition,
  ParseError,
  RenderError,
  AnyTemplateError,
  TagScanner,
  RawToken,
  FormatSpec,
  StyleSignals,
  DiagnosticFormatOptions,
} from "./templates/index.js";

// Prompt building blocks
export {
  PromptTemplate,
  FewShotTemplate,
  ChatTemplate,
  ChatTemplateParseError,
  MissingMessagesError,
  FewShotChatTemplate,
  MessagesPlaceholder,
  CHAT_ROLES,
  loadChatTemplate,
  loadContext,
  parseChatTemplateDocument,
  parseContextDocument,
} from "./prompts/index.js";
export type {
  PromptTemplateOptions,
  FewShotTemplateInput,
  ChatMessage,
  ChatRole,
  MessageLike,
  MessagesPlaceholderOptions,
  FewShotChatTemplateInput,
  DocumentFormat,
} from "./prompts/index.js";

// Library utilities
export {
  LoomError,
  ValidationError,
  ConfigError,
  ok,
  err,
  unwrap,
  unwrapOr,
  map,
  mapErr,
  andThen,
  all,
  tryCatch,
  tryCatchAsync,
  logger,
  Logger,
} from "./lib/index.js";
export type { Result, LogLevel } from "./lib/index.js";

export { VERSION } from "./version.js";
