import type { PatchFailureReason, PatchResult, PatchSpec, Span } from '../../types/index.js'
import {
  PatchError,
  describeAnchor,
  findAll,
  findFirstSpelling,
  lineEndingAt,
  locate,
  spellingsOf,
  splitLines,
  terminatorOf,
  toLineEnding,
  type PatchErrorCode
} from '../locator/index.js'

export type ApplyResult =
  | { success: true; text: string; span: Span }
  | { success: false; error: PatchError }

const REASONS: Record<PatchErrorCode, PatchFailureReason> = {
  AnchorNotFound: 'anchor-not-found',
  AnchorAmbiguous: 'anchor-ambiguous',
  AlreadyApplied: 'already-applied'
}

export function reasonFor(code: PatchErrorCode): PatchFailureReason {
  return REASONS[code]
}

function stripFinalLineBreak(text: string): string {
  return text.slice(0, text.length - terminatorOf(text).length)
}

/**
 * True when an occurrence of replacement, in any spelling, already covers [start, end)
 */
function coveredByReplacement(text: string, replacement: string, start: number, end: number): boolean {
  return spellingsOf(replacement, text).some(needle =>
    findAll(text, needle).some(offset => offset <= start && end <= offset + needle.length)
  )
}

function alreadyApplied(spec: PatchSpec): ApplyResult {
  return {
    success: false,
    error: new PatchError('AlreadyApplied', `already patched: replacement for ${spec.id} is present`)
  }
}

/**
 * Replace the inclusive line range with replacement. Lines outside the range
 * are kept byte for byte; the replacement's last line takes the terminator
 * the replaced end line had.
 */
export function spliceLines(text: string, span: Span, replacement: string): string {
  const lines = splitLines(text)
  const before = lines.slice(0, span.startLine - 1).join('')
  const after = lines.slice(span.endLine).join('')
  const body = replacement.length === 0
    ? ''
    : stripFinalLineBreak(replacement) + terminatorOf(lines[span.endLine - 1] ?? '')
  return before + body + after
}

/**
 * Compute the patched text for one PatchSpec. Pure: nothing is written.
 *
 * Re-applying a spec to its own output fails with AlreadyApplied instead of
 * patching twice. AnchorNotFound means neither the anchor nor a single copy
 * of the replacement is present.
 */
export function applyPatch(text: string, spec: PatchSpec): ApplyResult {
  const located = locate(text, spec.locator)

  if (!located.success) {
    // The anchor is gone: a single copy of the replacement means an earlier run applied it
    const applied = spec.locator.strategy === 'exact' ? spec.replacement : stripFinalLineBreak(spec.replacement)
    if (
      located.error.code === 'AnchorNotFound' &&
      applied.length > 0 &&
      findFirstSpelling(text, applied).offsets.length === 1
    ) {
      return alreadyApplied(spec)
    }
    return located
  }

  const { span, startOffset, endOffset } = located.match
  const replacement = toLineEnding(spec.replacement, lineEndingAt(text, startOffset, endOffset))

  if (spec.locator.strategy === 'exact') {
    if (coveredByReplacement(text, replacement, startOffset, endOffset)) {
      return alreadyApplied(spec)
    }
    return {
      success: true,
      text: text.slice(0, startOffset) + replacement + text.slice(endOffset),
      span
    }
  }

  const body = stripFinalLineBreak(replacement)
  if (body.length > 0 && coveredByReplacement(text, body, startOffset, endOffset)) {
    return alreadyApplied(spec)
  }
  return { success: true, text: spliceLines(text, span, replacement), span }
}

export interface PatchSetResult {
  /** Patched text, or the original text when the set failed */
  text: string
  results: PatchResult[]
  /** True when any patch hit AnchorNotFound or AnchorAmbiguous */
  failed: boolean
  changed: boolean
}

/**
 * Apply a file's patches in order, all or nothing.
 *
 * A hard failure on any patch discards the whole set: the original text is
 * returned and patches that succeeded in memory are reported as rolled back.
 */
export function applyPatches(text: string, specs: readonly PatchSpec[]): PatchSetResult {
  let current = text
  let failed = false
  const results: PatchResult[] = []

  for (const spec of specs) {
    const outcome = applyPatch(current, spec)
    if (outcome.success) {
      current = outcome.text
      results.push({
        patchId: spec.id,
        targetFile: spec.targetFile,
        locator: describeLocator(spec),
        applied: true,
        message: `patched lines ${outcome.span.startLine}-${outcome.span.endLine}`,
        span: outcome.span
      })
      continue
    }

    if (outcome.error.code !== 'AlreadyApplied') {
      failed = true
    }
    results.push({
      patchId: spec.id,
      targetFile: spec.targetFile,
      locator: describeLocator(spec),
      applied: false,
      reason: reasonFor(outcome.error.code),
      message: outcome.error.message
    })
  }

  if (failed) {
    return {
      text,
      failed,
      changed: false,
      results: results.map((result): PatchResult =>
        result.applied
          ? {
              ...result,
              applied: false,
              reason: 'rolled-back',
              message: 'not written: another patch for this file failed'
            }
          : result
      )
    }
  }

  return { text: current, results, failed, changed: current !== text }
}

/**
 * Short label of the locator, for status lines
 */
export function describeLocator(spec: PatchSpec): string {
  return spec.locator.strategy === 'exact'
    ? `anchor ${describeAnchor(spec.locator.anchor)}`
    : `signature ${JSON.stringify(spec.locator.signature)}`
}
