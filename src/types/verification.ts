/**
 * A probe marker: literal substring, or a regular expression
 */
export type Marker = string | { regex: string; flags?: string }

/**
 * Independent check run against a file after patching
 */
export interface VerificationProbe {
  file: string
  expectedPresent: Marker[]
  expectedAbsent: Marker[]
  /** Lines containing any of these substrings are exempt from expectedAbsent */
  allowList: string[]
}

export interface ForbiddenMatch {
  line: number
  marker: string
  text: string
}

export interface VerificationOutcome {
  file: string
  passed: boolean
  missingMarkers: string[]
  forbiddenMatches: ForbiddenMatch[]
  /** Set when the file could not be read */
  error?: string
}
