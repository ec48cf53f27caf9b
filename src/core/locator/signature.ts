import type { SignatureLocator } from '../../types/index.js'
import { PatchError } from './errors.js'
import { functionTableFor } from './function-table.js'
import { findBlockEnd } from './lexer.js'
import { lineAt, lineStarts, splitLines, stripTerminator } from './lines.js'
import type { LocateResult } from './types.js'

function notFound(message: string): LocateResult {
  return { success: false, error: new PatchError('AnchorNotFound', message) }
}

/**
 * Offset of the brace closing the body that the header on `line` opens.
 * Function headers resolve through the file's function table; anything
 * else (a nested block, a header the table cannot name) is tracked from
 * the line itself.
 */
function bodyEnd(text: string, starts: readonly number[], line: number): number | undefined {
  const entry = functionTableFor(text).at(line)
  if (entry && line <= lineAt(starts, entry.bodyOffset)) {
    return entry.endOffset
  }
  return findBlockEnd(text, starts[line - 1])
}

/**
 * Locate a function by a signature substring and a heuristic end marker.
 *
 * The signature must appear on exactly one line that is not a prototype.
 * The forward scan for the end fails closed: reaching end-of-file without
 * satisfying the end condition is AnchorNotFound, never a guess.
 */
export function locateSignature(text: string, locator: SignatureLocator): LocateResult {
  const { signature, end } = locator
  if (text.length === 0 || signature.length === 0) {
    return notFound('signature not found: file or signature is empty')
  }

  const lines = splitLines(text).map(stripTerminator)
  const candidates: number[] = []
  lines.forEach((line, index) => {
    if (line.includes(signature) && !line.trimEnd().endsWith(';')) {
      candidates.push(index)
    }
  })

  if (candidates.length === 0) {
    return notFound(`signature not found: ${JSON.stringify(signature)}`)
  }
  if (candidates.length > 1) {
    return {
      success: false,
      error: new PatchError(
        'AnchorAmbiguous',
        `signature ${JSON.stringify(signature)} matches lines ${candidates.map(i => i + 1).join(', ')}`
      )
    }
  }

  const startIndex = candidates[0]
  const starts = lineStarts(text)
  let endIndex: number | undefined

  if (end.mode === 'column-zero-brace') {
    for (let i = startIndex + 1; i < lines.length; i++) {
      if (lines[i].trimEnd() !== '}') continue
      if (end.nextLineIncludes !== undefined) {
        const next = lines[i + 1]
        if (next === undefined || !next.includes(end.nextLineIncludes)) continue
      }
      endIndex = i
      break
    }
    if (endIndex === undefined) {
      const gate = end.nextLineIncludes !== undefined
        ? ` followed by a line containing ${JSON.stringify(end.nextLineIncludes)}`
        : ''
      return notFound(
        `no closing brace at column 0${gate} after ${JSON.stringify(signature)} (line ${startIndex + 1})`
      )
    }
  } else {
    const closing = bodyEnd(text, starts, startIndex + 1)
    if (closing === undefined) {
      return notFound(`unbalanced or missing body after ${JSON.stringify(signature)} (line ${startIndex + 1})`)
    }
    endIndex = lineAt(starts, closing) - 1
  }

  return {
    success: true,
    match: {
      span: { startLine: startIndex + 1, endLine: endIndex + 1 },
      startOffset: starts[startIndex],
      endOffset: starts[endIndex] + lines[endIndex].length
    }
  }
}
