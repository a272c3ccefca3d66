/**
 * Prediction Poller module — barrel exports
 */

export type { PredictionPoller, PollOutcome } from './prediction-poller.js'
export { PredictionPollerImpl, createPredictionPoller } from './prediction-poller-impl.js'
export type { PredictionPollerOptions } from './prediction-poller-impl.js'
export { publishOutcome } from './job-outcome.js'
export type { JobOutcome, JobOutcomeSink } from './job-outcome.js'
export { normalizeOutput } from './output-normalizer.js'
export { ActiveJobRegistry } from './active-job-registry.js'
