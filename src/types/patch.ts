/**
 * Inclusive, 1-based line range of a function inside a file
 */
export interface Span {
  startLine: number
  endLine: number
}

/**
 * How the end of a signature-located function is found
 */
export type EndMarker =
  | {
      /** First line that is exactly `}` at column 0 */
      mode: 'column-zero-brace'
      /** Only accept the brace when the following line contains this text */
      nextLineIncludes?: string
    }
  | {
      /** Where the brace depth opened by the body returns to zero */
      mode: 'brace-depth'
    }

export interface ExactLocator {
  strategy: 'exact'
  /** Verbatim current text of the function */
  anchor: string
}

export interface SignatureLocator {
  strategy: 'signature'
  /** Substring of the line that opens the function */
  signature: string
  end: EndMarker
}

export type Locator = ExactLocator | SignatureLocator

/**
 * One intended source transformation
 */
export interface PatchSpec {
  id: string
  /** Path relative to the tree root */
  targetFile: string
  description?: string
  locator: Locator
  replacement: string
}

/**
 * Why a patch was not applied
 */
export type PatchFailureReason =
  | 'anchor-not-found'
  | 'anchor-ambiguous'
  | 'already-applied'
  | 'write-failure'
  | 'rolled-back'

export interface PatchResult {
  patchId: string
  targetFile: string
  /** Which function the patch targets, e.g. `signature "int f("` */
  locator: string
  applied: boolean
  reason?: PatchFailureReason
  message: string
  /** Span that was replaced, in the pre-patch text */
  span?: Span
}
