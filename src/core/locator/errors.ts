/**
 * Codes for expected locate/patch failures
 */
export type PatchErrorCode = 'AnchorNotFound' | 'AnchorAmbiguous' | 'AlreadyApplied'

/**
 * A locator or patcher could not produce an unambiguous edit.
 * The source text is never modified when one of these is returned.
 */
export class PatchError extends Error {
  constructor(
    public readonly code: PatchErrorCode,
    message: string
  ) {
    super(message)
    this.name = 'PatchError'
  }
}
