/**
 * Service lifecycle contract and registry.
 *
 * Every long-lived component (poller, orchestrator) implements BaseService so
 * the composition root can start it after wiring and stop it in reverse order.
 * Components never import each other's implementations; they receive
 * interfaces through their constructors and talk over the event bus.
 */

// ---------------------------------------------------------------------------
// BaseService interface
// ---------------------------------------------------------------------------

/**
 * Lifecycle interface for all coordination services.
 */
export interface BaseService {
  /**
   * Start the service: subscribe to events, open resources.
   * Called after all services are constructed.
   */
  initialize(): Promise<void>

  /**
   * Stop the service: unsubscribe, stop background work, drain queues.
   * Called in reverse registration order.
   */
  shutdown(): Promise<void>
}

// ---------------------------------------------------------------------------
// ServiceRegistry
// ---------------------------------------------------------------------------

/**
 * Named, ordered collection of services.
 *
 * @example
 * const registry = new ServiceRegistry()
 * registry.register('poller', poller)
 * registry.register('orchestrator', orchestrator)
 * await registry.initializeAll()
 * // ...
 * await registry.shutdownAll() // orchestrator first, then poller
 */
export class ServiceRegistry {
  private readonly _services = new Map<string, BaseService>()
  private readonly _order: string[] = []

  /**
   * Register a named service. Registration order drives lifecycle calls.
   * @throws {Error} if the name is already taken.
   */
  register(name: string, service: BaseService): void {
    if (this._services.has(name)) {
      throw new Error(`Service "${name}" is already registered`)
    }
    this._services.set(name, service)
    this._order.push(name)
  }

  /**
   * @throws {Error} if no service with the given name is registered.
   */
  get(name: string): BaseService {
    const service = this._services.get(name)
    if (service === undefined) {
      throw new Error(`Service "${name}" is not registered`)
    }
    return service
  }

  has(name: string): boolean {
    return this._services.has(name)
  }

  /**
   * Initialize services in registration order, stopping at the first failure.
   */
  async initializeAll(): Promise<void> {
    for (const name of this._order) {
      const service = this._services.get(name)
      if (service !== undefined) {
        await service.initialize()
      }
    }
  }

  /**
   * Shut services down in reverse registration order. Every service gets its
   * turn; failures are collected into one AggregateError at the end.
   */
  async shutdownAll(): Promise<void> {
    const errors: Error[] = []

    for (const name of [...this._order].reverse()) {
      const service = this._services.get(name)
      if (service === undefined) continue
      try {
        await service.shutdown()
      } catch (err) {
        errors.push(err instanceof Error ? err : new Error(String(err)))
      }
    }

    if (errors.length > 0) {
      throw new AggregateError(errors, `Shutdown errors in ${String(errors.length)} service(s)`)
    }
  }

  /** Names of all registered services in registration order */
  get serviceNames(): string[] {
    return [...this._order]
  }
}
