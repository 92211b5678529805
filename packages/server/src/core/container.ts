/**
 * Dependency Injection Container
 *
 * Provides service registration and lazy initialization.
 */

export type ServiceFactory<T> = () => T

interface ServiceEntry<T> {
  factory: ServiceFactory<T>
  instance?: { value: T }
}

/**
 * Services are keyed by name; the registry type records what each name holds
 */
export class ServiceContainer<Registry extends object> {
  private services = new Map<keyof Registry, ServiceEntry<Registry[keyof Registry]>>()

  /**
   * Register a service factory
   * @param name - Service identifier
   * @param factory - Factory function that creates the service instance
   */
  register<K extends keyof Registry>(name: K, factory: ServiceFactory<Registry[K]>): void {
    this.services.set(name, { factory })
  }

  /**
   * Get a service instance (lazy initialization)
   * @throws Error if service not found
   */
  get<K extends keyof Registry>(name: K): Registry[K] {
    const service = this.services.get(name)
    if (!service) {
      throw new Error(`Service "${String(name)}" not found in container`)
    }

    // Lazy initialization - create instance only on first access
    if (!service.instance) {
      service.instance = { value: service.factory() }
    }

    return service.instance.value as Registry[K]
  }

  has(name: keyof Registry): boolean {
    return this.services.has(name)
  }

  /**
   * Clear all services (useful for testing)
   */
  clear(): void {
    this.services.clear()
  }

  get size(): number {
    return this.services.size
  }
}
