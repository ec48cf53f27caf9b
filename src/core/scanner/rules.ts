import type { FindingCategory, Severity } from '../../types/index.js'

/**
 * A line-level test for one suspicious C construct
 */
export interface PatternRule {
  readonly name: string
  readonly category: FindingCategory
  readonly severity: Severity
  readonly message: string
  /** Tested once per line; only the first match on a line is reported */
  readonly pattern: RegExp
  /** Extra condition on the line beyond the pattern */
  readonly lineCondition?: (line: string) => boolean
  /** Condition evaluated once over the whole file */
  readonly fileCondition?: (text: string) => boolean
  /** Report the whole trimmed line instead of the matched text */
  readonly evidence?: 'match' | 'line'
}

/** Anything that looks like a release call: free, jsonp_free, do_free, ... */
export const RELEASE_PATTERN = /\b\w*free\b/

const TYPE_WORD = /^(?:char|short|int|long|float|double|void|signed|unsigned|const|volatile|struct|union|enum)$|_t$/

/**
 * Whether a line carries +, - or a multiplication that is not a pointer declarator
 */
export function hasSizeArithmetic(line: string): boolean {
  const code = line.replace(/->|\+\+|--/g, ' ')
  if (/[\w)\]]\s*[+-]\s*[\w(]/.test(code)) {
    return true
  }
  for (const match of code.matchAll(/(\w+|\))\s*\*\s*[\w(]/g)) {
    if (match[1] === ')' || !TYPE_WORD.test(match[1])) {
      return true
    }
  }
  return false
}

export const PATTERN_RULES: readonly PatternRule[] = [
  // Unsafe calls
  {
    name: 'unsafe_string_copy',
    category: 'unsafe-call',
    severity: 'high',
    message: 'Unbounded string copy (strcpy/strcat)',
    pattern: /\b(?:strcpy|strcat)\s*\(/
  },
  {
    name: 'unsafe_format',
    category: 'unsafe-call',
    severity: 'high',
    message: 'Unbounded formatting (sprintf/vsprintf)',
    pattern: /\b(?:sprintf|vsprintf)\s*\(/
  },
  {
    name: 'unsafe_input',
    category: 'unsafe-call',
    severity: 'critical',
    message: 'gets() cannot bound its input',
    pattern: /\bgets\s*\(/
  },

  // File-scoped: best effort, the release may sit on another path or be missing on this one
  {
    name: 'unchecked_allocation',
    category: 'unchecked-allocation',
    severity: 'medium',
    message: 'Allocation in a file with no release call',
    pattern: /\b\w*(?:malloc|calloc|realloc)\s*\(/,
    fileCondition: text => !RELEASE_PATTERN.test(text)
  },

  // Overflow risk
  {
    name: 'size_arithmetic',
    category: 'overflow-risk',
    severity: 'low',
    message: 'Arithmetic on a size_t line may overflow',
    pattern: /\bsize_t\b/,
    lineCondition: hasSizeArithmetic,
    evidence: 'line'
  },
  {
    name: 'sizeof_multiplication',
    category: 'overflow-risk',
    severity: 'medium',
    message: 'Multiplication by sizeof may overflow',
    pattern: /\*\s*sizeof\b|\bsizeof\s*\([^)]*\)\s*\*(?!\/)/
  }
]
