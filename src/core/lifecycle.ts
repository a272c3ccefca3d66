/**
 * Lifecycle interface — the wired-up coordination subsystem.
 *
 * Create an instance via `createLifecycle()` from lifecycle-impl.ts.
 */

import type { TypedEventBus } from './event-bus.js'
import type { ArtifactMaterializer } from '../modules/artifacts/artifact-materializer.js'
import type { LifecycleConfig } from '../modules/config/config-schema.js'
import type { JobStatusProvider } from '../modules/job-provider/job-status-provider.js'
import type { LifecycleOrchestrator } from '../modules/lifecycle-orchestrator/lifecycle-orchestrator.js'
import type { PersistenceGateway } from '../modules/persistence/persistence-gateway.js'
import type { PredictionPoller } from '../modules/prediction-poller/prediction-poller.js'

// ---------------------------------------------------------------------------
// LifecycleOptions
// ---------------------------------------------------------------------------

export interface LifecycleOptions {
  /** Client of the external generation service */
  provider: JobStatusProvider

  /**
   * Order, generation and artifact storage.
   * Without it createOrder rejects with ConfigurationError.
   */
  persistence?: PersistenceGateway

  /** @default the reference materializer (output URL kept as file reference) */
  materializer?: ArtifactMaterializer

  /**
   * Resolved configuration, typically from loadLifecycleConfig().
   * When given, its log level is applied through setLogLevel() to every
   * logger in the process, including those of other lifecycles; the last
   * lifecycle created wins.
   * @default DEFAULT_CONFIG
   */
  config?: LifecycleConfig
}

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

export interface Lifecycle {
  readonly eventBus: TypedEventBus
  readonly poller: PredictionPoller
  readonly orchestrator: LifecycleOrchestrator

  /**
   * Stop the orchestrator, then the poller. Safe to call more than once.
   */
  shutdown(): Promise<void>
}
