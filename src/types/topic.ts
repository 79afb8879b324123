/**
 * Topics the snippet catalog is organised by.
 * Each snippet belongs to exactly one topic.
 */

export const TOPIC_IDS = [
  "discriminated-unions",
  "pattern-matching",
  "composition",
  "pipelines",
  "option-result",
  "active-patterns",
] as const;

export type TopicId = (typeof TOPIC_IDS)[number];

export interface TopicDescriptor {
  readonly id: TopicId;
  readonly name: string;
  readonly description: string;
}

export const TOPICS: ReadonlyMap<TopicId, TopicDescriptor> = new Map([
  [
    "discriminated-unions",
    {
      id: "discriminated-unions",
      name: "Discriminated Unions",
      description: "Closed sets of shapes told apart by a literal tag",
    },
  ],
  [
    "pattern-matching",
    {
      id: "pattern-matching",
      name: "Pattern Matching",
      description: "Choosing a branch by shape and guard conditions",
    },
  ],
  [
    "composition",
    {
      id: "composition",
      name: "Function Composition",
      description: "Building new functions by chaining existing ones",
    },
  ],
  [
    "pipelines",
    {
      id: "pipelines",
      name: "Pipelines",
      description: "Threading a value through a sequence of steps",
    },
  ],
  [
    "option-result",
    {
      id: "option-result",
      name: "Option and Result",
      description:
        "Absent values and expected failures as explicit return values",
    },
  ],
  [
    "active-patterns",
    {
      id: "active-patterns",
      name: "Active Patterns",
      description:
        "Extractor functions that classify or decompose their input",
    },
  ],
]);

export function isTopicId(value: string): value is TopicId {
  return TOPIC_IDS.some((id) => id === value);
}
