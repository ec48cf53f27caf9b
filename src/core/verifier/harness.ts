import { join } from 'path'
import type {
  ForbiddenMatch,
  Marker,
  VerificationOutcome,
  VerificationProbe
} from '../../types/index.js'
import { readFileContent } from '../scanner/utils.js'

/**
 * Label used for a marker in outcomes
 */
export function markerLabel(marker: Marker): string {
  return typeof marker === 'string' ? marker : `/${marker.regex}/${marker.flags ?? ''}`
}

function toTester(marker: Marker): (text: string) => boolean {
  if (typeof marker === 'string') {
    return text => text.includes(marker)
  }
  // global and sticky flags would make test() stateful
  const regex = new RegExp(marker.regex, (marker.flags ?? '').replace(/[gy]/g, ''))
  return text => regex.test(text)
}

/**
 * Check one file's text against a probe.
 *
 * Expected-present markers are searched in the whole text, so they may span
 * lines. Expected-absent markers are tested line by line; a line containing
 * an allow-list entry is exempt, whatever its line number.
 */
export function verify(text: string, probe: VerificationProbe): VerificationOutcome {
  const missingMarkers = probe.expectedPresent
    .filter(marker => !toTester(marker)(text))
    .map(markerLabel)

  const forbiddenMatches: ForbiddenMatch[] = []
  if (probe.expectedAbsent.length > 0) {
    const testers = probe.expectedAbsent.map(marker => ({
      label: markerLabel(marker),
      test: toTester(marker)
    }))
    const lines = text.split('\n')

    lines.forEach((rawLine, index) => {
      const line = rawLine.replace(/\r$/, '')
      if (probe.allowList.some(entry => line.includes(entry))) {
        return
      }
      for (const tester of testers) {
        if (tester.test(line)) {
          forbiddenMatches.push({ line: index + 1, marker: tester.label, text: line.trim() })
        }
      }
    })
  }

  return {
    file: probe.file,
    passed: missingMarkers.length === 0 && forbiddenMatches.length === 0,
    missingMarkers,
    forbiddenMatches
  }
}

/**
 * Read a probe's file from disk and verify it. An unreadable file fails the
 * probe with every expected marker missing.
 */
export function verifyFile(rootDir: string, probe: VerificationProbe): VerificationOutcome {
  const content = readFileContent(join(rootDir, probe.file))
  if (content === null) {
    return {
      file: probe.file,
      passed: false,
      missingMarkers: probe.expectedPresent.map(markerLabel),
      forbiddenMatches: [],
      error: `Cannot read ${probe.file}`
    }
  }
  return verify(content, probe)
}

/**
 * Fold several outcomes for the same file into one
 */
export function mergeOutcomes(file: string, outcomes: readonly VerificationOutcome[]): VerificationOutcome {
  const errors = outcomes.flatMap(o => (o.error ? [o.error] : []))
  const merged: VerificationOutcome = {
    file,
    passed: outcomes.every(o => o.passed),
    missingMarkers: outcomes.flatMap(o => o.missingMarkers),
    forbiddenMatches: outcomes.flatMap(o => o.forbiddenMatches)
  }
  if (errors.length > 0) {
    merged.error = errors.join('; ')
  }
  return merged
}
