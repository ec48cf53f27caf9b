export {
  PatternScanner,
  type PatternScannerOptions,
  type ScanException,
  type TreeScanResult
} from './pattern-scanner.js'
export { PATTERN_RULES, RELEASE_PATTERN, hasSizeArithmetic, type PatternRule } from './rules.js'
export {
  getFiles,
  readFileContent,
  matchesPattern,
  toPosix,
  DEFAULT_INCLUDE,
  type GetFilesOptions
} from './utils.js'
export { collectStats, classifyFile } from './stats.js'
