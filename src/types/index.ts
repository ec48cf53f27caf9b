export * from './finding.js'
export type * from './patch.js'
export type * from './verification.js'
export type * from './report.js'
