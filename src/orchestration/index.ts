export {
  type VerificationError,
  type VerifyOptions,
  compareLines,
  verifySnippet,
  countOutcomes,
  verify,
  allPassed,
} from "./verifier.js";

export {
  type TopicGroup,
  onlyFailures,
  groupByTopic,
} from "./report-transforms.js";
