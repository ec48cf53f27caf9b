export * from './types/index.js'
export {
  PatternScanner,
  PATTERN_RULES,
  collectStats,
  getFiles,
  type PatternRule,
  type PatternScannerOptions,
  type ScanException
} from './core/scanner/index.js'
export {
  locate,
  locateExact,
  locateSignature,
  buildFunctionTable,
  functionTableFor,
  FunctionTable,
  PatchError,
  type FunctionEntry,
  type LocateResult,
  type PatchErrorCode
} from './core/locator/index.js'
export {
  applyPatch,
  applyPatches,
  readSourceFile,
  specForSource,
  writeFileAtomic,
  WriteFailureError,
  type ApplyResult,
  type PatchSetResult
} from './core/patcher/index.js'
export { verify, verifyFile } from './core/verifier/index.js'
export {
  PlanLoader,
  PlanLoadError,
  PlanSchema,
  toPatchSpec,
  toProbe,
  type Plan
} from './core/plan/index.js'
export { Remediator, ExitCodes, type RemediationInput } from './core/remediator/index.js'
export { JsonReporter, MarkdownReporter } from './core/reporter/index.js'
