/**
 * Minimal C lexer: just enough to count braces.
 *
 * Yields the index of every non-whitespace character that is not inside a
 * comment or a preprocessor line. String and character literals yield their
 * opening quote only, so braces inside them are never seen.
 */
export function* codeIndices(text: string): Generator<number> {
  const n = text.length
  let i = 0
  let lineStart = true

  while (i < n) {
    const ch = text[i]

    if (ch === '\n') {
      lineStart = true
      i++
      continue
    }
    if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\f' || ch === '\v') {
      i++
      continue
    }
    if (lineStart && ch === '#') {
      i = skipPreprocessor(text, i)
      continue
    }
    lineStart = false

    if (ch === '/' && text[i + 1] === '/') {
      const newline = text.indexOf('\n', i)
      i = newline === -1 ? n : newline
      continue
    }
    if (ch === '/' && text[i + 1] === '*') {
      const close = text.indexOf('*/', i + 2)
      i = close === -1 ? n : close + 2
      continue
    }
    if (ch === '"' || ch === "'") {
      yield i
      i = skipLiteral(text, i, ch)
      continue
    }

    yield i
    i++
  }
}

/**
 * Index of the newline ending a directive, following backslash continuations
 */
function skipPreprocessor(text: string, from: number): number {
  let j = from
  while (j < text.length) {
    if (text[j] === '\\') {
      if (text[j + 1] === '\n') {
        j += 2
        continue
      }
      if (text[j + 1] === '\r' && text[j + 2] === '\n') {
        j += 3
        continue
      }
    }
    if (text[j] === '\n') {
      return j
    }
    j++
  }
  return text.length
}

/**
 * Index just past a literal's closing quote. An unterminated literal ends at the newline.
 */
function skipLiteral(text: string, from: number, quote: string): number {
  let j = from + 1
  while (j < text.length) {
    const ch = text[j]
    if (ch === '\\') {
      j += 2
      continue
    }
    if (ch === quote) {
      return j + 1
    }
    if (ch === '\n') {
      return j
    }
    j++
  }
  return text.length
}

/**
 * Offset of the brace closing the first block opened at or after `from`.
 * Returns undefined when a `;` ends the statement before any block opens,
 * or when the block never closes.
 */
export function findBlockEnd(text: string, from: number): number | undefined {
  let depth = 0
  for (const index of codeIndices(text)) {
    if (index < from) continue
    const ch = text[index]
    if (depth === 0 && ch === ';') {
      return undefined
    }
    if (ch === '{') {
      depth++
    } else if (ch === '}') {
      if (depth === 0) {
        return undefined
      }
      depth--
      if (depth === 0) {
        return index
      }
    }
  }
  return undefined
}
