export { type Formatter, type FormatterOptions } from "./formatter.js";
export { formatJson } from "./json.js";
export { formatTerminal } from "./terminal.js";
export { formatMarkdown } from "./markdown.js";
