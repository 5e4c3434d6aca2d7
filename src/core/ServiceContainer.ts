import type { IService, ILogger } from '../interfaces/IService';
import { toError } from './errors';

function isService(value: unknown): value is IService {
  return typeof value === 'object' && value !== null &&
    'initialize' in value && typeof value.initialize === 'function' &&
    'shutdown' in value && typeof value.shutdown === 'function' &&
    'isHealthy' in value && typeof value.isHealthy === 'function';
}

/**
 * Registry of named singletons. Entries that implement IService take part in
 * the initialize/shutdown/health lifecycle, in key order.
 */
export class ServiceContainer<TServices extends Record<string, unknown>> {
  private singletons: TServices;
  private logger?: ILogger;

  constructor(singletons: TServices, logger?: ILogger) {
    this.singletons = { ...singletons };
    this.logger = logger;
    this.logger?.debug(`Registered singletons: ${Object.keys(singletons).join(', ')}`);
  }

  // Swap in a different instance, e.g. a stand-in during tests
  registerSingleton<K extends keyof TServices & string>(name: K, instance: TServices[K]): void {
    this.singletons[name] = instance;
    this.logger?.debug(`Registered singleton: ${name}`);
  }

  get<K extends keyof TServices & string>(name: K): TServices[K] {
    return this.singletons[name];
  }

  // Initialize all registered services
  async initializeAll(): Promise<void> {
    this.logger?.info('Initializing all services...');

    let initialized = 0;
    for (const [name, instance] of this.services()) {
      try {
        await instance.initialize();
        initialized++;
      } catch (error) {
        this.logger?.error(`Failed to initialize singleton ${name}`, toError(error));
        throw error;
      }
    }

    this.logger?.info(`Initialized ${initialized} services`);
  }

  // Shutdown in reverse registration order; failures are logged, not thrown
  async shutdownAll(): Promise<void> {
    this.logger?.info('Shutting down all services...');

    for (const [name, instance] of this.services().reverse()) {
      try {
        await instance.shutdown();
      } catch (error) {
        this.logger?.error(`Failed to shutdown singleton ${name}`, toError(error));
      }
    }

    this.logger?.info('All services shut down');
  }

  // Check health of all services
  async checkHealth(): Promise<Record<string, boolean>> {
    const healthStatus: Record<string, boolean> = {};

    for (const [name, instance] of this.services()) {
      try {
        healthStatus[name] = await instance.isHealthy();
      } catch (error) {
        this.logger?.error(`Health check failed for ${name}`, toError(error));
        healthStatus[name] = false;
      }
    }

    return healthStatus;
  }

  listSingletons(): string[] {
    return Object.keys(this.singletons);
  }

  private services(): Array<[string, IService]> {
    const services: Array<[string, IService]> = [];
    for (const [name, instance] of Object.entries(this.singletons)) {
      if (isService(instance)) {
        services.push([name, instance]);
      }
    }
    return services;
  }
}
