import type { Span } from '../../types/index.js'
import { codeIndices } from './lexer.js'
import { lineAt, lineStarts } from './lines.js'

/**
 * A top-level function definition found by brace-depth tracking
 */
export interface FunctionEntry {
  name: string
  span: Span
  /** Offset of the first character of the definition */
  startOffset: number
  /** Offset of the brace opening the body */
  bodyOffset: number
  /** Offset of the closing brace */
  endOffset: number
}

const NOT_FUNCTIONS = new Set([
  'if', 'for', 'while', 'switch', 'return', 'sizeof', 'do', 'else', 'case'
])

// name(params) at the end of a header; params may nest one level (function pointers)
const HEADER_PATTERN = /([A-Za-z_]\w*)\s*\((?:[^()]|\([^()]*\))*\)\s*$/

function stripComments(header: string): string {
  return header
    .replace(/\/\*[\s\S]*?\*\//g, ' ')
    .replace(/\/\/[^\n]*/g, ' ')
}

/**
 * Name of the function a block header declares, if it declares one
 */
export function functionNameOf(header: string): string | undefined {
  const cleaned = stripComments(header)
    .replace(/__attribute__\s*\(\([^)]*\)\)\s*$/, '')
    .trimEnd()
  if (/=\s*$/.test(cleaned)) {
    return undefined
  }
  const match = HEADER_PATTERN.exec(cleaned)
  if (!match || NOT_FUNCTIONS.has(match[1])) {
    return undefined
  }
  return match[1]
}

/**
 * Every top-level function span in a file, in source order
 */
export class FunctionTable {
  constructor(readonly entries: readonly FunctionEntry[]) {}

  /**
   * Entry whose span covers the given line
   */
  at(line: number): FunctionEntry | undefined {
    return this.entries.find(e => e.span.startLine <= line && line <= e.span.endLine)
  }

  get size(): number {
    return this.entries.length
  }
}

let lastBuilt: { text: string; table: FunctionTable } | undefined

/**
 * The function table of text, reused while the same text is located against
 */
export function functionTableFor(text: string): FunctionTable {
  if (lastBuilt && lastBuilt.text === text) {
    return lastBuilt.table
  }
  const table = buildFunctionTable(text)
  lastBuilt = { text, table }
  return table
}

/**
 * Build the function table for a C source text
 */
export function buildFunctionTable(text: string): FunctionTable {
  const starts = lineStarts(text)
  const entries: FunctionEntry[] = []

  let depth = 0
  let headerStart = -1
  let open: { name?: string; startOffset: number; bodyOffset: number } | undefined

  for (const index of codeIndices(text)) {
    const ch = text[index]

    if (depth === 0) {
      if (headerStart < 0) {
        headerStart = index
      }
      if (ch === ';' || ch === '}') {
        headerStart = -1
      } else if (ch === '{') {
        open = {
          name: functionNameOf(text.slice(headerStart, index)),
          startOffset: headerStart,
          bodyOffset: index
        }
        depth = 1
      }
      continue
    }

    if (ch === '{') {
      depth++
    } else if (ch === '}') {
      depth--
      if (depth === 0) {
        if (open?.name) {
          entries.push({
            name: open.name,
            span: {
              startLine: lineAt(starts, open.startOffset),
              endLine: lineAt(starts, index)
            },
            startOffset: open.startOffset,
            bodyOffset: open.bodyOffset,
            endOffset: index
          })
        }
        open = undefined
        headerStart = -1
      }
    }
  }

  return new FunctionTable(entries)
}
