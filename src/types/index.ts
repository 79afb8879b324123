export {
  type Result,
  ok,
  err,
  mapResult,
  mapError,
  bindResult,
  tryCatch,
  resultOrElse,
  formatResult,
} from "./result.js";
export {
  type Option,
  some,
  none,
  fromNullable,
  mapOption,
  bindOption,
  optionOrElse,
  firstSome,
  formatOption,
} from "./option.js";
export { identity, compose, composeRight, flow, pipe } from "./function.js";
export { type Matcher, match } from "./match.js";
export {
  type TopicId,
  type TopicDescriptor,
  TOPIC_IDS,
  TOPICS,
  isTopicId,
} from "./topic.js";
export {
  type Snippet,
  type SnippetSummary,
  summarizeSnippet,
} from "./snippet.js";
export {
  type LineMismatch,
  type SnippetOutcome,
  type OutcomeStatus,
  type SnippetVerification,
  type VerificationTotals,
  type VerificationReport,
} from "./report.js";
export { type OutputFormat, type RunConfig } from "./config.js";
