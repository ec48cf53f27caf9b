export { verify, verifyFile, mergeOutcomes, markerLabel } from './harness.js'
