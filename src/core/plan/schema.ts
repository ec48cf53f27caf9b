import { z } from 'zod'
import type { Marker, PatchSpec, VerificationProbe } from '../../types/index.js'

function isValidRegex(source: string, flags?: string): boolean {
  try {
    new RegExp(source, flags)
    return true
  } catch {
    return false
  }
}

/**
 * Relative path inside the tree root
 */
const RelativePathSchema = z.string()
  .min(1, 'Path is required')
  .refine(
    path => !path.startsWith('/') && !/^[A-Za-z]:/.test(path) && !path.split(/[\\/]/).includes('..'),
    { message: 'Path must be relative to the tree root and stay inside it' }
  )

/**
 * Probe marker: a literal substring, or { regex, flags }
 */
export const MarkerSchema = z.union([
  z.string().min(1, 'Marker must not be empty'),
  z.object({
    regex: z.string().min(1, 'Regex must not be empty'),
    flags: z.string()
      .regex(/^[imsu]*$/, 'Only i, m, s and u flags are allowed')
      .optional()
  }).refine(
    marker => isValidRegex(marker.regex, marker.flags),
    { message: 'Invalid regular expression' }
  )
])

export const EndMarkerSchema = z.discriminatedUnion('mode', [
  z.object({
    mode: z.literal('column-zero-brace'),
    next_line_includes: z.string()
      .min(1)
      .optional()
      .describe('Only accept a closing brace when the next line contains this text')
  }),
  z.object({
    mode: z.literal('brace-depth')
  })
])

export const LocatorSchema = z.discriminatedUnion('strategy', [
  z.object({
    strategy: z.literal('exact'),
    anchor: z.string()
      .min(1, 'Anchor is required')
      .describe('Verbatim current text of the function')
  }),
  z.object({
    strategy: z.literal('signature'),
    signature: z.string()
      .min(1, 'Signature is required')
      .describe('Substring of the line that opens the function'),
    end: EndMarkerSchema.default({ mode: 'column-zero-brace' })
  })
])

export const PatchSpecSchema = z.object({
  id: z.string()
    .regex(/^[A-Za-z0-9][\w.-]*$/, 'Patch id must be alphanumeric with - _ .'),
  target_file: RelativePathSchema,
  description: z.string().optional(),
  locator: LocatorSchema,
  replacement: z.string()
    .describe('New text of the located function')
})

export const ProbeSchema = z.object({
  file: RelativePathSchema,
  expected_present: z.array(MarkerSchema).default([]),
  expected_absent: z.array(MarkerSchema).default([]),
  allow_list: z.array(z.string().min(1))
    .default([])
    .describe('Lines containing one of these are exempt from expected_absent')
}).refine(
  probe => probe.expected_present.length + probe.expected_absent.length > 0,
  { message: 'Probe must list at least one expected_present or expected_absent marker' }
)

export const ExceptionSchema = z.object({
  pattern: z.string()
    .min(1, 'Pattern is required')
    .describe('Glob pattern to match files'),
  ignore: z.array(z.string())
    .min(1, 'At least one rule or category to ignore is required')
    .describe('Rule names, categories, or * to ignore for matched files'),
  reason: z.string()
    .optional()
    .describe('Explanation for this exception')
})

export const ScanConfigSchema = z.object({
  include: z.array(z.string()).default(['**/*.c', '**/*.h']),
  exclude: z.array(z.string()).default([]),
  allow_list: z.array(z.string().min(1))
    .default([])
    .describe('Lines containing one of these are never reported'),
  exceptions: z.array(ExceptionSchema).default([])
})

/**
 * Complete remediation plan
 */
export const PlanSchema = z.object({
  version: z.string()
    .regex(/^\d+\.\d+(?:\.\d+)?$/, 'Version must be semver format')
    .describe('Plan version in semver format'),

  name: z.string()
    .min(1, 'Plan name is required')
    .max(50, 'Plan name too long'),

  description: z.string().optional(),

  extends: z.string()
    .optional()
    .describe('Base plan to extend, relative to this file'),

  scan: ScanConfigSchema.default({}),

  patches: z.array(PatchSpecSchema).default([]),

  probes: z.array(ProbeSchema).default([])
}).superRefine((plan, ctx) => {
  const seen = new Set<string>()
  plan.patches.forEach((patch, index) => {
    if (seen.has(patch.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['patches', index, 'id'],
        message: `Duplicate patch id: ${patch.id}`
      })
    }
    seen.add(patch.id)
  })
})

export type Plan = z.infer<typeof PlanSchema>
export type PlanPatch = z.infer<typeof PatchSpecSchema>
export type PlanProbe = z.infer<typeof ProbeSchema>
export type ScanConfig = z.infer<typeof ScanConfigSchema>

/**
 * Validate plan content
 */
export function validatePlan(data: unknown): Plan {
  return PlanSchema.parse(data)
}

/**
 * Validate plan with detailed errors
 */
export function validatePlanSafe(data: unknown):
  | { success: true; data: Plan }
  | { success: false; errors: z.ZodError } {
  const result = PlanSchema.safeParse(data)
  if (result.success) {
    return { success: true, data: result.data }
  }
  return { success: false, errors: result.error }
}

/**
 * Format validation errors for display
 */
export function formatValidationErrors(errors: z.ZodError): string[] {
  return errors.errors.map(err => {
    const path = err.path.join('.')
    return `${path}: ${err.message}`
  })
}

function toMarker(marker: z.infer<typeof MarkerSchema>): Marker {
  return typeof marker === 'string' ? marker : { regex: marker.regex, flags: marker.flags }
}

export function toPatchSpec(patch: PlanPatch): PatchSpec {
  const { locator } = patch
  return {
    id: patch.id,
    targetFile: patch.target_file,
    description: patch.description,
    replacement: patch.replacement,
    locator: locator.strategy === 'exact'
      ? { strategy: 'exact', anchor: locator.anchor }
      : {
          strategy: 'signature',
          signature: locator.signature,
          end: locator.end.mode === 'brace-depth'
            ? { mode: 'brace-depth' }
            : { mode: 'column-zero-brace', nextLineIncludes: locator.end.next_line_includes }
        }
  }
}

export function toProbe(probe: PlanProbe): VerificationProbe {
  return {
    file: probe.file,
    expectedPresent: probe.expected_present.map(toMarker),
    expectedAbsent: probe.expected_absent.map(toMarker),
    allowList: probe.allow_list
  }
}
