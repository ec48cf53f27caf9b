export type { Reporter, JsonReportOptions } from './base.js'
export { JsonReporter, createJsonReporter } from './json.js'
export { MarkdownReporter, createMarkdownReporter, type MarkdownReportOptions } from './markdown.js'
