export {
  PlanSchema,
  PatchSpecSchema,
  ProbeSchema,
  LocatorSchema,
  MarkerSchema,
  validatePlan,
  validatePlanSafe,
  formatValidationErrors,
  toPatchSpec,
  toProbe,
  type Plan,
  type PlanPatch,
  type PlanProbe,
  type ScanConfig
} from './schema.js'
export {
  PlanLoader,
  PlanLoadError,
  createPlanLoader,
  mergePlan,
  DEFAULT_PLAN_FILE,
  type LoaderOptions
} from './loader.js'
