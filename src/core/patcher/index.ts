export {
  applyPatch,
  applyPatches,
  spliceLines,
  reasonFor,
  describeLocator,
  type ApplyResult,
  type PatchSetResult
} from './patcher.js'
export {
  readSourceFile,
  encodeForSource,
  decodeFromSource,
  specForSource,
  writeFileAtomic,
  writeSourceFile,
  WriteFailureError,
  type SourceFile,
  type SourceEncoding
} from './source-file.js'
