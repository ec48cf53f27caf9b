export type LineEnding = '\n' | '\r\n'

/**
 * Split text into lines, each keeping its own terminator.
 * Empty text has no lines; a final line without a newline is kept as is.
 */
export function splitLines(text: string): string[] {
  const lines: string[] = []
  let start = 0
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') {
      lines.push(text.slice(start, i + 1))
      start = i + 1
    }
  }
  if (start < text.length) {
    lines.push(text.slice(start))
  }
  return lines
}

/**
 * Terminator of a line produced by splitLines ('' for the unterminated last line)
 */
export function terminatorOf(line: string): '' | LineEnding {
  if (line.endsWith('\r\n')) return '\r\n'
  if (line.endsWith('\n')) return '\n'
  return ''
}

export function stripTerminator(line: string): string {
  return line.slice(0, line.length - terminatorOf(line).length)
}

/**
 * Dominant line ending of a text; LF when there are no line breaks
 */
export function detectLineEnding(text: string): LineEnding {
  const crlf = text.match(/\r\n/g)?.length ?? 0
  const lf = (text.match(/\n/g)?.length ?? 0) - crlf
  return crlf > lf ? '\r\n' : '\n'
}

/**
 * Rewrite every line break in text to the given style
 */
export function toLineEnding(text: string, eol: LineEnding): string {
  const normalized = text.replace(/\r\n/g, '\n')
  return eol === '\n' ? normalized : normalized.replace(/\n/g, '\r\n')
}

/**
 * Offsets at which each line starts
 */
export function lineStarts(text: string): number[] {
  const starts = [0]
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n' && i + 1 < text.length) {
      starts.push(i + 1)
    }
  }
  return starts
}

/**
 * 1-based line number containing offset, given the result of lineStarts
 */
export function lineAt(starts: readonly number[], offset: number): number {
  let low = 0
  let high = starts.length - 1
  while (low < high) {
    const mid = (low + high + 1) >> 1
    if (starts[mid] <= offset) {
      low = mid
    } else {
      high = mid - 1
    }
  }
  return low + 1
}

/**
 * Every index at which needle occurs, overlapping occurrences included
 */
export function findAll(text: string, needle: string): number[] {
  const found: number[] = []
  if (needle.length === 0) {
    return found
  }
  let index = text.indexOf(needle)
  while (index !== -1) {
    found.push(index)
    index = text.indexOf(needle, index + 1)
  }
  return found
}

/**
 * Forms of a plan fragment to search a text for: as written first, then in
 * the text's dominant line ending, then in the other one
 */
export function spellingsOf(fragment: string, text: string): string[] {
  const dominant = detectLineEnding(text)
  const other: LineEnding = dominant === '\n' ? '\r\n' : '\n'
  return [...new Set([fragment, toLineEnding(fragment, dominant), toLineEnding(fragment, other)])]
}

/**
 * Occurrences of the first spelling of fragment found in text
 */
export function findFirstSpelling(text: string, fragment: string): { needle: string; offsets: number[] } {
  const spellings = spellingsOf(fragment, text)
  for (const needle of spellings) {
    const offsets = findAll(text, needle)
    if (offsets.length > 0) {
      return { needle, offsets }
    }
  }
  return { needle: spellings[spellings.length - 1], offsets: [] }
}

/**
 * Line ending to write into [start, end): the range's own style when it
 * spans a line break, otherwise the text's dominant style
 */
export function lineEndingAt(text: string, start: number, end: number): LineEnding {
  const range = text.slice(start, end)
  return range.includes('\n') ? detectLineEnding(range) : detectLineEnding(text)
}
