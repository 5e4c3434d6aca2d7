import type { ILogger } from '../interfaces/IService';
import { ConflictType } from '../types';
import type { AircraftState, SeparationThresholds } from '../types';
import { EPSILON, Vec2D, normalizeAngle180 } from '../geometry/Vector2D';
import { assertValid, separationSchema } from '../core/configSchema';

export interface ClosestPointOfApproach {
  distanceAtCpaFeet: number;
  timeToCpaSeconds: number;
}

export interface CollisionPrediction {
  conflict: boolean;
  timeToConflictSeconds: number;
  distanceAtCpaFeet: number;
}

export const DEFAULT_SEPARATION: SeparationThresholds = {
  lateralMinimumFeet: 500,
  verticalMinimumFeet: 1000,
  longitudinalMinimumFeet: 1000,
  crossingMinimumFeet: 500,
  lowAltitudeLateralFeet: 300,
  lowAltitudeVerticalFeet: 500
};

// Pairs further apart than this are never reported as converging
const CONVERGENCE_RANGE_FEET = 2000;

/**
 * Pairwise separation classification and closest-point-of-approach
 * prediction. Stateless apart from its thresholds.
 */
export class SeparationStandards {
  private thresholds: SeparationThresholds;
  private logger?: ILogger;

  constructor(thresholds: SeparationThresholds = DEFAULT_SEPARATION, logger?: ILogger) {
    assertValid(separationSchema, thresholds, 'Separation standards');
    this.thresholds = { ...thresholds };
    this.logger = logger;
  }

  setSeparationStandards(lateral: number, vertical: number, longitudinal: number, crossing: number): void {
    this.applyThresholds({
      ...this.thresholds,
      lateralMinimumFeet: lateral,
      verticalMinimumFeet: vertical,
      longitudinalMinimumFeet: longitudinal,
      crossingMinimumFeet: crossing
    });
  }

  setLowAltitudeStandards(lateral: number, vertical: number): void {
    this.applyThresholds({
      ...this.thresholds,
      lowAltitudeLateralFeet: lateral,
      lowAltitudeVerticalFeet: vertical
    });
  }

  getThresholds(): SeparationThresholds {
    return { ...this.thresholds };
  }

  /**
   * Classify the current geometry of a pair. Rules are checked in priority
   * order and the first match wins.
   */
  classify(aircraft1: AircraftState, aircraft2: AircraftState, isLowAltitudeArea: boolean = false): ConflictType {
    const lateralSep = isLowAltitudeArea ? this.thresholds.lowAltitudeLateralFeet : this.thresholds.lateralMinimumFeet;
    const verticalSep = isLowAltitudeArea ? this.thresholds.lowAltitudeVerticalFeet : this.thresholds.verticalMinimumFeet;
    const crossingSep = this.thresholds.crossingMinimumFeet;

    const deltaPos = Vec2D.subtract(aircraft2.positionLocal, aircraft1.positionLocal);
    const horizontalDistance = Vec2D.magnitude(deltaPos);
    const altitudeDiff = Math.abs(aircraft2.altitudeFeet - aircraft1.altitudeFeet);

    if (altitudeDiff < verticalSep && horizontalDistance < lateralSep) {
      return ConflictType.SAME_ALTITUDE;
    }

    const headingDiff = Math.abs(normalizeAngle180(aircraft2.headingTrue - aircraft1.headingTrue));

    // Headings within 30° of each other
    if ((headingDiff < 30 || headingDiff > 330) && horizontalDistance < crossingSep) {
      return ConflictType.HEAD_ON;
    }

    if (headingDiff < 15 && horizontalDistance < lateralSep) {
      return ConflictType.PARALLEL;
    }

    // Within 30° of perpendicular on either side
    if (Math.abs(headingDiff - 90) < 30 && horizontalDistance < crossingSep) {
      return ConflictType.CROSSING;
    }

    const relativeVelocity = Vec2D.subtract(aircraft2.velocity, aircraft1.velocity);
    const closingRate = Vec2D.dot(Vec2D.normalize(deltaPos), relativeVelocity);

    if (closingRate < 0 && horizontalDistance < CONVERGENCE_RANGE_FEET && horizontalDistance < lateralSep) {
      return ConflictType.CONVERGING;
    }

    return ConflictType.NONE;
  }

  /**
   * Minimise |Δp + Δv·t| over t ≥ 0. A CPA already in the past is clamped
   * to now.
   */
  closestPointOfApproach(aircraft1: AircraftState, aircraft2: AircraftState): ClosestPointOfApproach {
    const deltaPos = Vec2D.subtract(aircraft2.positionLocal, aircraft1.positionLocal);
    const deltaVel = Vec2D.subtract(aircraft2.velocity, aircraft1.velocity);

    const a = Vec2D.dot(deltaVel, deltaVel);
    if (a < EPSILON) {
      return { distanceAtCpaFeet: Vec2D.magnitude(deltaPos), timeToCpaSeconds: 0 };
    }

    const timeToCpaSeconds = Math.max(0, -Vec2D.dot(deltaPos, deltaVel) / a);
    const separationAtCpa = Vec2D.add(deltaPos, Vec2D.scale(deltaVel, timeToCpaSeconds));

    return {
      distanceAtCpaFeet: Vec2D.magnitude(separationAtCpa),
      timeToCpaSeconds
    };
  }

  predictCollision(aircraft1: AircraftState, aircraft2: AircraftState, horizonSeconds: number): CollisionPrediction {
    const { distanceAtCpaFeet, timeToCpaSeconds } = this.closestPointOfApproach(aircraft1, aircraft2);

    if (timeToCpaSeconds > horizonSeconds) {
      return { conflict: false, timeToConflictSeconds: timeToCpaSeconds, distanceAtCpaFeet };
    }

    return {
      conflict: distanceAtCpaFeet < this.thresholds.lateralMinimumFeet,
      timeToConflictSeconds: timeToCpaSeconds,
      distanceAtCpaFeet
    };
  }

  private applyThresholds(thresholds: SeparationThresholds): void {
    assertValid(separationSchema, thresholds, 'Separation standards');
    this.thresholds = thresholds;
    this.logger?.debug('Separation standards updated', { ...thresholds });
  }
}
