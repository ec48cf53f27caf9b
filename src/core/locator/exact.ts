import type { ExactLocator } from '../../types/index.js'
import { PatchError } from './errors.js'
import { findFirstSpelling, lineAt, lineStarts } from './lines.js'
import type { LocateResult } from './types.js'

/**
 * Locate a function by its verbatim current text.
 *
 * The anchor must occur exactly once. It is searched for as written; only
 * when that finds nothing is it retried in the file's dominant line ending,
 * so LF plan text matches a CRLF file. Nothing else is normalized.
 */
export function locateExact(text: string, locator: ExactLocator): LocateResult {
  if (text.length === 0 || locator.anchor.length === 0) {
    return {
      success: false,
      error: new PatchError('AnchorNotFound', 'anchor not found: file or anchor is empty')
    }
  }

  const { needle, offsets: occurrences } = findFirstSpelling(text, locator.anchor)

  if (occurrences.length === 0) {
    return {
      success: false,
      error: new PatchError('AnchorNotFound', `anchor not found: ${describeAnchor(needle)}`)
    }
  }

  const starts = lineStarts(text)
  if (occurrences.length > 1) {
    const lines = occurrences.map(offset => lineAt(starts, offset))
    return {
      success: false,
      error: new PatchError(
        'AnchorAmbiguous',
        `anchor ${describeAnchor(needle)} occurs ${occurrences.length} times (lines ${lines.join(', ')})`
      )
    }
  }

  const offset = occurrences[0]
  const end = offset + needle.length
  return {
    success: true,
    match: {
      span: {
        startLine: lineAt(starts, offset),
        endLine: lineAt(starts, end - 1)
      },
      startOffset: offset,
      endOffset: end
    }
  }
}

/**
 * First line of an anchor, quoted, for messages
 */
export function describeAnchor(anchor: string): string {
  const firstLine = anchor.split(/\r?\n/).find(line => line.trim().length > 0) ?? ''
  const shown = firstLine.trim()
  return JSON.stringify(shown.length > 60 ? `${shown.slice(0, 57)}...` : shown)
}
