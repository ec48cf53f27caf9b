import type { Locator } from '../../types/index.js'
import { locateExact } from './exact.js'
import { locateSignature } from './signature.js'
import type { LocateResult } from './types.js'

export { PatchError, type PatchErrorCode } from './errors.js'
export { locateExact, describeAnchor } from './exact.js'
export { locateSignature } from './signature.js'
export {
  buildFunctionTable,
  functionTableFor,
  functionNameOf,
  FunctionTable,
  type FunctionEntry
} from './function-table.js'
export { codeIndices, findBlockEnd } from './lexer.js'
export * from './lines.js'
export type { LocateResult, LocatedSpan } from './types.js'

/**
 * Locate the span a locator names. Read-only: the text is never modified.
 */
export function locate(text: string, locator: Locator): LocateResult {
  switch (locator.strategy) {
    case 'exact':
      return locateExact(text, locator)
    case 'signature':
      return locateSignature(text, locator)
  }
}
