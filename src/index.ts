import { Logger } from './core/Logger';
import { ConfigService } from './core/ConfigService';
import { ServiceContainer } from './core/ServiceContainer';
import { EventEmitter } from './core/EventEmitter';
import type { CollisionEvents } from './interfaces/ICollisionServices';
import { CollisionAvoidanceService } from './services/CollisionAvoidanceService';
import { toError } from './core/errors';

export * from './types';
export * from './geometry/Vector2D';
export * from './geometry/CollisionDetector';
export * from './services/SeparationStandards';
export * from './services/ConflictPredictor';
export * from './services/ManeuverSelector';
export * from './services/ConflictResolver';
export * from './services/CollisionAvoidanceService';
export * from './services/aircraftState';
export type { CollisionEvents, ICollisionAvoidanceService } from './interfaces/ICollisionServices';
export type { ILogger, IService, IConfigService, IEventEmitter, LogMeta } from './interfaces/IService';
export { Logger, ConfigService, ServiceContainer, EventEmitter };

export function createServices(logger: Logger, configService: ConfigService) {
  const eventEmitter = new EventEmitter<CollisionEvents>(logger);
  const collisionAvoidance = new CollisionAvoidanceService(logger, configService, eventEmitter);

  return new ServiceContainer({
    logger,
    config: configService,
    eventEmitter,
    collisionAvoidance
  }, logger);
}

async function main() {
  // Initialize core services
  const bootLogger = new Logger({ level: process.env.LOG_LEVEL || 'info' });
  const configService = new ConfigService(bootLogger);
  const { logging } = configService.getConfig();
  const logger = new Logger({ level: logging.level, directory: logging.directory });

  const serviceContainer = createServices(logger, configService);

  try {
    logger.info('Starting Collision Avoidance Engine...');

    // Initialize all services
    await serviceContainer.initializeAll();

    // Check system health
    const healthStatus = await serviceContainer.checkHealth();
    logger.info('System health check completed', { healthStatus });

    const config = configService.getConfig();
    logger.info('System configuration loaded', {
      horizonSeconds: config.prediction.horizonSeconds,
      decisionCycleIntervalMs: config.service.decisionCycleIntervalMs,
      maneuverScoring: config.maneuvers.scoring
    });

    logger.info('Collision Avoidance Engine started successfully');

    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}, shutting down gracefully...`);
      serviceContainer.shutdownAll()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('Shutdown failed:', error);
          process.exit(1);
        });
    };

    // Handle graceful shutdown
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

  } catch (error) {
    logger.error('Failed to start Collision Avoidance Engine', toError(error));
    process.exit(1);
  }
}

// Start the application
if (require.main === module) {
  main().catch((error) => {
    console.error('Unhandled error during startup:', error);
    process.exit(1);
  });
}

export { main };
