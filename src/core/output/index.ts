export { ReportGenerator, escapeMarkdown, type ReportOptions } from './markdown.js';
export { toPlainDescription, MAX_DESCRIPTION_BYTES } from './description.js';
