import { config } from 'dotenv';
import type { IConfigService, ILogger } from '../interfaces/IService';
import type { DeepPartial, SystemConfig } from '../types';
import { DEFAULT_SEPARATION } from '../services/SeparationStandards';
import { DEFAULT_PERFORMANCE_LIMITS } from '../services/ManeuverSelector';
import { DEFAULT_PREDICTION_HORIZON_SECONDS } from '../services/ConflictPredictor';
import { systemConfigSchema } from './configSchema';

export type ConfigOverrides = DeepPartial<SystemConfig>;

const DEFAULT_CONFIG: SystemConfig = {
  separation: DEFAULT_SEPARATION,
  prediction: {
    horizonSeconds: DEFAULT_PREDICTION_HORIZON_SECONDS
  },
  performance: DEFAULT_PERFORMANCE_LIMITS,
  maneuvers: {
    scoring: 'placeholder',
    protectedZoneMarginFeet: 0
  },
  service: {
    decisionCycleIntervalMs: 1000
  },
  logging: {
    level: 'info'
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSystemConfig(value: unknown): value is SystemConfig {
  return !systemConfigSchema.validate(value).error;
}

// Unset variables stay undefined so they do not shadow defaults
function envNumber(name: string): number | undefined {
  const raw = process.env[name];
  return raw === undefined || raw === '' ? undefined : Number(raw);
}

function envString(name: string): string | undefined {
  const raw = process.env[name];
  return raw === undefined || raw === '' ? undefined : raw;
}

// Undefined override values never shadow the base
function mergeConfig(base: SystemConfig, overrides: ConfigOverrides): SystemConfig {
  const { separation, prediction, performance, maneuvers, service, logging } = overrides;

  return {
    separation: {
      lateralMinimumFeet: separation?.lateralMinimumFeet ?? base.separation.lateralMinimumFeet,
      verticalMinimumFeet: separation?.verticalMinimumFeet ?? base.separation.verticalMinimumFeet,
      longitudinalMinimumFeet: separation?.longitudinalMinimumFeet ?? base.separation.longitudinalMinimumFeet,
      crossingMinimumFeet: separation?.crossingMinimumFeet ?? base.separation.crossingMinimumFeet,
      lowAltitudeLateralFeet: separation?.lowAltitudeLateralFeet ?? base.separation.lowAltitudeLateralFeet,
      lowAltitudeVerticalFeet: separation?.lowAltitudeVerticalFeet ?? base.separation.lowAltitudeVerticalFeet
    },
    prediction: {
      horizonSeconds: prediction?.horizonSeconds ?? base.prediction.horizonSeconds
    },
    performance: {
      maxTurnRateDegPerSec: performance?.maxTurnRateDegPerSec ?? base.performance.maxTurnRateDegPerSec,
      maxClimbRateFpm: performance?.maxClimbRateFpm ?? base.performance.maxClimbRateFpm,
      maxDescentRateFpm: performance?.maxDescentRateFpm ?? base.performance.maxDescentRateFpm,
      maxSpeedChangeKtPerSec: performance?.maxSpeedChangeKtPerSec ?? base.performance.maxSpeedChangeKtPerSec
    },
    maneuvers: {
      scoring: maneuvers?.scoring ?? base.maneuvers.scoring,
      protectedZoneMarginFeet: maneuvers?.protectedZoneMarginFeet ?? base.maneuvers.protectedZoneMarginFeet
    },
    service: {
      decisionCycleIntervalMs: service?.decisionCycleIntervalMs ?? base.service.decisionCycleIntervalMs
    },
    logging: {
      level: logging?.level ?? base.logging.level,
      directory: logging?.directory ?? base.logging.directory
    }
  };
}

export class ConfigService implements IConfigService<SystemConfig> {
  private configuration: SystemConfig;
  private logger?: ILogger;

  constructor(logger?: ILogger, overrides: ConfigOverrides = {}) {
    this.logger = logger;

    // Load environment variables
    config();

    // Defaults, then environment, then explicit overrides
    this.configuration = mergeConfig(mergeConfig(DEFAULT_CONFIG, this.readEnvironment()), overrides);

    this.validateConfiguration(this.configuration);
  }

  async initialize(): Promise<void> {
    this.logger?.info('ConfigService initialized');
  }

  async shutdown(): Promise<void> {
    this.logger?.info('ConfigService shutdown');
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }

  get<T>(key: string): T {
    let value: unknown = this.configuration;

    for (const k of key.split('.')) {
      if (isRecord(value) && k in value) {
        value = value[k];
      } else {
        throw new Error(`Configuration key '${key}' not found`);
      }
    }

    return value as T;
  }

  set(key: string, value: unknown): void {
    const keys = key.split('.');
    const draft: unknown = structuredClone(this.configuration);
    let current: unknown = draft;

    for (const k of keys.slice(0, -1)) {
      if (!isRecord(current) || !isRecord(current[k])) {
        throw new Error(`Configuration key '${key}' not found`);
      }
      current = current[k];
    }

    if (!isRecord(current)) {
      throw new Error(`Configuration key '${key}' not found`);
    }
    current[keys[keys.length - 1]] = value;

    this.validateConfiguration(draft);
    if (isSystemConfig(draft)) {
      this.configuration = draft;
    }
    this.logger?.debug(`Configuration updated: ${key} = ${JSON.stringify(value)}`);
  }

  getConfig(): SystemConfig {
    return structuredClone(this.configuration);
  }

  private readEnvironment(): ConfigOverrides {
    const scoring = envString('MANEUVER_SCORING');

    return {
      separation: {
        lateralMinimumFeet: envNumber('SEPARATION_LATERAL_FT'),
        verticalMinimumFeet: envNumber('SEPARATION_VERTICAL_FT'),
        longitudinalMinimumFeet: envNumber('SEPARATION_LONGITUDINAL_FT'),
        crossingMinimumFeet: envNumber('SEPARATION_CROSSING_FT'),
        lowAltitudeLateralFeet: envNumber('LOW_ALTITUDE_LATERAL_FT'),
        lowAltitudeVerticalFeet: envNumber('LOW_ALTITUDE_VERTICAL_FT')
      },
      prediction: {
        horizonSeconds: envNumber('PREDICTION_HORIZON_S')
      },
      performance: {
        maxTurnRateDegPerSec: envNumber('MAX_TURN_RATE_DEG_S'),
        maxClimbRateFpm: envNumber('MAX_CLIMB_RATE_FPM'),
        maxDescentRateFpm: envNumber('MAX_DESCENT_RATE_FPM'),
        maxSpeedChangeKtPerSec: envNumber('MAX_SPEED_CHANGE_KT_S')
      },
      maneuvers: {
        // Unknown modes fall back to the default
        scoring: scoring === 'placeholder' || scoring === 'predicted' ? scoring : undefined,
        protectedZoneMarginFeet: envNumber('PROTECTED_ZONE_MARGIN_FT')
      },
      service: {
        decisionCycleIntervalMs: envNumber('DECISION_CYCLE_INTERVAL_MS')
      },
      logging: {
        level: envString('LOG_LEVEL'),
        directory: envString('LOG_DIR')
      }
    };
  }

  private validateConfiguration(candidate: unknown): void {
    const { error } = systemConfigSchema.validate(candidate, { abortEarly: false });
    if (error) {
      const errorMessage = `Configuration validation failed: ${error.details.map(d => d.message).join(', ')}`;
      this.logger?.error(errorMessage);
      throw new Error(errorMessage);
    }

    this.logger?.info('Configuration validation passed');
  }
}
