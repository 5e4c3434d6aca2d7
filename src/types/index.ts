// Core data types for the collision avoidance engine

// Local tangent-plane coordinates in feet (x east, y north)
export interface Vector2D {
  x: number;
  y: number;
}

export interface Circle {
  center: Vector2D;
  radius: number;
}

export interface Polygon {
  vertices: Vector2D[];
}

export interface AircraftState {
  aircraftId: string;
  positionLocal: Vector2D;
  velocity: Vector2D; // ft/s
  altitudeFeet: number;
  headingTrue: number; // degrees, 0-360
  groundspeedKnots: number;
  wingspanFeet: number;
  lengthFeet: number;
}

export enum ConflictType {
  NONE = 'NONE',
  HEAD_ON = 'HEAD_ON',
  PARALLEL = 'PARALLEL',
  CROSSING = 'CROSSING',
  SAME_ALTITUDE = 'SAME_ALTITUDE',
  VERTICAL_CONFLICT = 'VERTICAL_CONFLICT',
  CONVERGING = 'CONVERGING',
  OVERTAKING = 'OVERTAKING'
}

export interface ConflictAlert {
  aircraft1Id: string;
  aircraft2Id: string;
  timeToConflictSeconds: number;
  minimumSeparationAtConflictFeet: number;
  conflictType: ConflictType;
  predictedConflictPosition: Vector2D;
}

export enum ManeuverType {
  NONE = 'NONE',
  TURN_LEFT = 'TURN_LEFT',
  TURN_RIGHT = 'TURN_RIGHT',
  CLIMB_TO = 'CLIMB_TO',
  DESCENT_TO = 'DESCENT_TO',
  SPEED_UP = 'SPEED_UP',
  SLOW_DOWN = 'SLOW_DOWN',
  GO_AROUND = 'GO_AROUND',
  HOLDING_PATTERN = 'HOLDING_PATTERN'
}

interface ManeuverBase {
  durationSeconds: number;
  pilotWorkload: number; // 0-100, higher is more demanding
  description: string;
}

export interface NoManeuver extends ManeuverBase {
  maneuverType: ManeuverType.NONE | ManeuverType.HOLDING_PATTERN;
}

export interface TurnManeuver extends ManeuverBase {
  maneuverType: ManeuverType.TURN_LEFT | ManeuverType.TURN_RIGHT;
  newHeadingTrue: number;
}

export interface AltitudeManeuver extends ManeuverBase {
  maneuverType: ManeuverType.CLIMB_TO | ManeuverType.DESCENT_TO | ManeuverType.GO_AROUND;
  newAltitudeFeet: number;
}

export interface SpeedManeuver extends ManeuverBase {
  maneuverType: ManeuverType.SPEED_UP | ManeuverType.SLOW_DOWN;
  newSpeedKnots: number;
}

export type AvoidanceManeuver = NoManeuver | TurnManeuver | AltitudeManeuver | SpeedManeuver;

export interface ResolutionPlan {
  aircraftManeuvers: Map<string, AvoidanceManeuver>;
  planEffectiveness: number; // 0-100
  resolvesAllConflicts: boolean;
  resolutionStrategy: string;
}

export interface FlightPhase {
  isDeparture: boolean;
  isArrival: boolean;
}

export interface InfrastructureContact {
  aircraftId: string;
  infrastructureId: string;
}

export interface DecisionCycleResult {
  alerts: ConflictAlert[];
  plan: ResolutionPlan;
  infrastructureContacts: InfrastructureContact[];
  processingTimeMs: number;
}

export type ManeuverScoring = 'placeholder' | 'predicted';

export interface SeparationThresholds {
  lateralMinimumFeet: number;
  verticalMinimumFeet: number;
  longitudinalMinimumFeet: number;
  crossingMinimumFeet: number;
  lowAltitudeLateralFeet: number;
  lowAltitudeVerticalFeet: number;
}

export interface PerformanceLimits {
  maxTurnRateDegPerSec: number;
  maxClimbRateFpm: number;
  maxDescentRateFpm: number;
  maxSpeedChangeKtPerSec: number;
}

export interface SystemConfig {
  separation: SeparationThresholds;
  prediction: {
    horizonSeconds: number;
  };
  performance: PerformanceLimits;
  maneuvers: {
    scoring: ManeuverScoring;
    protectedZoneMarginFeet: number;
  };
  service: {
    decisionCycleIntervalMs: number;
  };
  logging: {
    level: string;
    directory?: string;
  };
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};
