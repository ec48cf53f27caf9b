import type { Span } from '../../types/index.js'
import type { PatchError } from './errors.js'

/**
 * A uniquely located function
 */
export interface LocatedSpan {
  span: Span
  /** Offset of the first character of the span */
  startOffset: number
  /** Offset just past the span; for line spans, before the end line's terminator */
  endOffset: number
}

export type LocateResult =
  | { success: true; match: LocatedSpan }
  | { success: false; error: PatchError }
