/**
 * createLifecycle — composition root for the coordination subsystem.
 *
 * Wires EventBus → PredictionPoller → LifecycleOrchestrator with constructor
 * injection and runs them through a ServiceRegistry. No process signal
 * handlers are installed; the embedding application owns the process.
 */

import { ServiceRegistry } from './di.js'
import { createEventBus } from './event-bus.js'
import type { TypedEventBus } from './event-bus.js'
import type { Lifecycle, LifecycleOptions } from './lifecycle.js'
import { toPollerSettings } from '../modules/config/config-loader.js'
import { DEFAULT_CONFIG } from '../modules/config/defaults.js'
import { createLifecycleOrchestrator } from '../modules/lifecycle-orchestrator/lifecycle-orchestrator-impl.js'
import type { LifecycleOrchestrator } from '../modules/lifecycle-orchestrator/lifecycle-orchestrator.js'
import { createPredictionPoller } from '../modules/prediction-poller/prediction-poller-impl.js'
import type { PredictionPoller } from '../modules/prediction-poller/prediction-poller.js'
import { createLogger, setLogLevel } from '../utils/logger.js'

const logger = createLogger('lifecycle')

// ---------------------------------------------------------------------------
// LifecycleImpl
// ---------------------------------------------------------------------------

class LifecycleImpl implements Lifecycle {
  readonly eventBus: TypedEventBus
  readonly poller: PredictionPoller
  readonly orchestrator: LifecycleOrchestrator
  private readonly _registry: ServiceRegistry
  private _shutdown: Promise<void> | null = null

  constructor(
    eventBus: TypedEventBus,
    poller: PredictionPoller,
    orchestrator: LifecycleOrchestrator,
    registry: ServiceRegistry,
  ) {
    this.eventBus = eventBus
    this.poller = poller
    this.orchestrator = orchestrator
    this._registry = registry
  }

  shutdown(): Promise<void> {
    this._shutdown ??= this._runShutdown()
    return this._shutdown
  }

  private async _runShutdown(): Promise<void> {
    logger.info('Lifecycle shutdown initiated')
    try {
      await this._registry.shutdownAll()
    } catch (err) {
      logger.error({ err }, 'Error during lifecycle shutdown')
      throw err
    }
    logger.info('Lifecycle shutdown complete')
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Build and initialize the coordination subsystem.
 *
 * Steps performed:
 *  1. Apply the configured log level (when a config is given)
 *  2. Create the TypedEventBus
 *  3. Create the PredictionPoller and LifecycleOrchestrator
 *  4. Register both in a ServiceRegistry (poller first, so it stops last)
 *  5. Call initialize() on both; on failure, shut down and rethrow
 *
 * @example
 * const lifecycle = await createLifecycle({ provider, persistence: createMemoryPersistenceGateway() })
 * const { order, jobId } = await lifecycle.orchestrator.createOrder('model-x', 'a cat', {})
 */
export async function createLifecycle(options: LifecycleOptions): Promise<Lifecycle> {
  const config = options.config ?? DEFAULT_CONFIG
  if (options.config !== undefined) {
    setLogLevel(options.config.log_level)
  }

  const settings = toPollerSettings(config)
  logger.info(settings, 'Initializing lifecycle')

  const eventBus = createEventBus()
  const poller = createPredictionPoller(eventBus, options.provider, settings)
  const orchestrator = createLifecycleOrchestrator({
    eventBus,
    poller,
    orders: options.persistence,
    generations: options.persistence,
    artifacts: options.persistence,
    materializer: options.materializer,
  })

  const registry = new ServiceRegistry()
  registry.register('poller', poller)
  registry.register('orchestrator', orchestrator)

  try {
    await registry.initializeAll()
  } catch (err) {
    logger.error({ err }, 'Service initialization failed, cleaning up')
    try {
      await registry.shutdownAll()
    } catch (shutdownErr) {
      logger.error({ err: shutdownErr }, 'Error during cleanup after failed initialization')
    }
    throw err
  }

  return new LifecycleImpl(eventBus, poller, orchestrator, registry)
}
