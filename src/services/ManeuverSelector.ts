import type { ILogger } from '../interfaces/IService';
import { ManeuverType } from '../types';
import type { AircraftState, AvoidanceManeuver, ManeuverScoring, PerformanceLimits } from '../types';
import { Vec2D, normalizeAngle180, normalizeAngle360 } from '../geometry/Vector2D';
import { assertValid, performanceSchema } from '../core/configSchema';
import { SeparationStandards } from './SeparationStandards';

export const DEFAULT_PERFORMANCE_LIMITS: PerformanceLimits = {
  maxTurnRateDegPerSec: 3.0,
  maxClimbRateFpm: 1500,
  maxDescentRateFpm: 1000,
  maxSpeedChangeKtPerSec: 1.5
};

const TURN_ANGLES_DEG = [15, 30, 45];
const ALTITUDE_STEP_FEET = 500;
const SPEED_STEP_KNOTS = 15;
const MIN_SPEED_KNOTS = 5;
const GO_AROUND_CLIMB_FEET = 1000;
const GO_AROUND_CEILING_FEET = 2000;
const GO_AROUND_DURATION_SECONDS = 60;
const KNOTS_TO_FEET_PER_SECOND = 1.68781;

// Score = BASE - WORKLOAD_WEIGHT * workload + separation term
const BASE_SCORE = 50;
const WORKLOAD_WEIGHT = 0.2;
const PLACEHOLDER_SEPARATION_BONUS = 20;
const MAX_SEPARATION_BONUS = 40;

export interface ScoredManeuver {
  maneuver: AvoidanceManeuver;
  score: number;
}

/**
 * Picks one avoidance maneuver for an ownship against a single intruder.
 */
export class ManeuverSelector {
  private limits: PerformanceLimits;
  private separationStandards: SeparationStandards;
  private scoring: ManeuverScoring;
  private logger?: ILogger;

  constructor(
    limits: PerformanceLimits = DEFAULT_PERFORMANCE_LIMITS,
    separationStandards: SeparationStandards = new SeparationStandards(),
    scoring: ManeuverScoring = 'placeholder',
    logger?: ILogger
  ) {
    assertValid(performanceSchema, limits, 'Aircraft limits');
    this.limits = { ...limits };
    this.separationStandards = separationStandards;
    this.scoring = scoring;
    this.logger = logger;
  }

  setAircraftLimits(turnRate: number, climbRate: number, descentRate: number, speedChange: number): void {
    const limits: PerformanceLimits = {
      maxTurnRateDegPerSec: turnRate,
      maxClimbRateFpm: climbRate,
      maxDescentRateFpm: descentRate,
      maxSpeedChangeKtPerSec: speedChange
    };
    assertValid(performanceSchema, limits, 'Aircraft limits');
    this.limits = limits;
  }

  getAircraftLimits(): PerformanceLimits {
    return { ...this.limits };
  }

  setScoring(scoring: ManeuverScoring): void {
    this.scoring = scoring;
  }

  /**
   * Select the highest-scoring candidate. Ties go to the candidate generated
   * first (turn, altitude, speed, go-around).
   */
  select(
    ownship: AircraftState,
    intruder: AircraftState,
    isDeparture: boolean = false,
    isArrival: boolean = false
  ): AvoidanceManeuver {
    let best: ScoredManeuver | null = null;

    for (const scored of this.evaluateCandidates(ownship, intruder, isArrival)) {
      if (best === null || scored.score > best.score) {
        best = scored;
      }
    }

    if (best === null) {
      return { maneuverType: ManeuverType.NONE, durationSeconds: 0, pilotWorkload: 0, description: 'No maneuver' };
    }

    this.logger?.debug('Avoidance maneuver selected', {
      ownship: ownship.aircraftId,
      intruder: intruder.aircraftId,
      isDeparture,
      isArrival,
      maneuverType: best.maneuver.maneuverType,
      score: best.score
    });

    return best.maneuver;
  }

  evaluateCandidates(ownship: AircraftState, intruder: AircraftState, isArrival: boolean = false): ScoredManeuver[] {
    return this.enumerateCandidates(ownship, intruder, isArrival).map(maneuver => ({
      maneuver,
      score: this.scoreManeuver(maneuver, ownship, intruder)
    }));
  }

  /**
   * Candidates in evaluation order. Departures get the same candidates as
   * other traffic; only arrivals add a go-around.
   */
  enumerateCandidates(ownship: AircraftState, intruder: AircraftState, isArrival: boolean = false): AvoidanceManeuver[] {
    const candidates: AvoidanceManeuver[] = [];

    // Turn: the side comes from the intruder's bearing relative to our heading
    const toIntruder = Vec2D.subtract(intruder.positionLocal, ownship.positionLocal);
    const bearingToIntruder = normalizeAngle360((Math.atan2(toIntruder.y, toIntruder.x) * 180) / Math.PI);
    const turnLeft = normalizeAngle180(bearingToIntruder - ownship.headingTrue) > 0;

    for (const turnAngle of TURN_ANGLES_DEG) {
      candidates.push({
        maneuverType: turnLeft ? ManeuverType.TURN_LEFT : ManeuverType.TURN_RIGHT,
        newHeadingTrue: normalizeAngle360(ownship.headingTrue + (turnLeft ? turnAngle : -turnAngle)),
        durationSeconds: turnAngle / this.limits.maxTurnRateDegPerSec,
        pilotWorkload: 40 + turnAngle * 0.5,
        description: `Turn ${turnLeft ? 'left' : 'right'} ${turnAngle} degrees`
      });
    }

    // Altitude change only when clear of the ground
    if (ownship.altitudeFeet > ALTITUDE_STEP_FEET) {
      const climbTo = ownship.altitudeFeet + ALTITUDE_STEP_FEET;
      candidates.push({
        maneuverType: ManeuverType.CLIMB_TO,
        newAltitudeFeet: climbTo,
        durationSeconds: ALTITUDE_STEP_FEET / (this.limits.maxClimbRateFpm / 60),
        pilotWorkload: 35,
        description: `Climb to ${Math.trunc(climbTo)} feet`
      });

      const descendTo = ownship.altitudeFeet - ALTITUDE_STEP_FEET;
      candidates.push({
        maneuverType: ManeuverType.DESCENT_TO,
        newAltitudeFeet: descendTo,
        durationSeconds: ALTITUDE_STEP_FEET / (this.limits.maxDescentRateFpm / 60),
        pilotWorkload: 35,
        description: `Descend to ${Math.trunc(descendTo)} feet`
      });
    }

    const speedChangeDuration = SPEED_STEP_KNOTS / this.limits.maxSpeedChangeKtPerSec;
    candidates.push({
      maneuverType: ManeuverType.SPEED_UP,
      newSpeedKnots: ownship.groundspeedKnots + SPEED_STEP_KNOTS,
      durationSeconds: speedChangeDuration,
      pilotWorkload: 30,
      description: `Speed up by ${SPEED_STEP_KNOTS} knots`
    });

    if (ownship.groundspeedKnots > MIN_SPEED_KNOTS) {
      candidates.push({
        maneuverType: ManeuverType.SLOW_DOWN,
        newSpeedKnots: Math.max(MIN_SPEED_KNOTS, ownship.groundspeedKnots - SPEED_STEP_KNOTS),
        durationSeconds: speedChangeDuration,
        pilotWorkload: 30,
        description: `Slow down by ${SPEED_STEP_KNOTS} knots`
      });
    }

    if (isArrival && ownship.altitudeFeet < GO_AROUND_CEILING_FEET) {
      candidates.push({
        maneuverType: ManeuverType.GO_AROUND,
        newAltitudeFeet: ownship.altitudeFeet + GO_AROUND_CLIMB_FEET,
        durationSeconds: GO_AROUND_DURATION_SECONDS,
        pilotWorkload: 80,
        description: 'Execute go-around'
      });
    }

    return candidates;
  }

  private scoreManeuver(maneuver: AvoidanceManeuver, ownship: AircraftState, intruder: AircraftState): number {
    const base = BASE_SCORE - maneuver.pilotWorkload * WORKLOAD_WEIGHT;

    switch (this.scoring) {
      case 'placeholder':
        return base + PLACEHOLDER_SEPARATION_BONUS;
      case 'predicted':
        return base + this.separationBonus(maneuver, ownship, intruder);
    }
  }

  /**
   * Fly the ownship under the maneuver and compare the resulting separation
   * with the current one. Lateral gain is measured against the lateral
   * minimum (longitudinal for speed changes), vertical gain against the
   * vertical minimum; the better of the two earns up to MAX_SEPARATION_BONUS.
   */
  private separationBonus(maneuver: AvoidanceManeuver, ownship: AircraftState, intruder: AircraftState): number {
    const thresholds = this.separationStandards.getThresholds();
    const projected = applyManeuver(ownship, maneuver);

    const before = this.separationStandards.closestPointOfApproach(ownship, intruder).distanceAtCpaFeet;
    const after = this.separationStandards.closestPointOfApproach(projected, intruder).distanceAtCpaFeet;
    const lateralScale = isSpeedManeuver(maneuver) ? thresholds.longitudinalMinimumFeet : thresholds.lateralMinimumFeet;
    const lateralGain = (after - before) / lateralScale;

    const verticalBefore = Math.abs(ownship.altitudeFeet - intruder.altitudeFeet);
    const verticalAfter = Math.abs(projected.altitudeFeet - intruder.altitudeFeet);
    const verticalGain = (verticalAfter - verticalBefore) / thresholds.verticalMinimumFeet;

    const gain = Math.max(0, Math.min(1, Math.max(lateralGain, verticalGain)));
    return gain * MAX_SEPARATION_BONUS;
  }
}

function isSpeedManeuver(maneuver: AvoidanceManeuver): boolean {
  return maneuver.maneuverType === ManeuverType.SPEED_UP || maneuver.maneuverType === ManeuverType.SLOW_DOWN;
}

/**
 * The state the ownship would be in once the maneuver is complete, holding
 * its current position.
 */
export function applyManeuver(state: AircraftState, maneuver: AvoidanceManeuver): AircraftState {
  switch (maneuver.maneuverType) {
    case ManeuverType.TURN_LEFT:
    case ManeuverType.TURN_RIGHT: {
      const headingChange = normalizeAngle180(maneuver.newHeadingTrue - state.headingTrue);
      return {
        ...state,
        headingTrue: maneuver.newHeadingTrue,
        velocity: Vec2D.rotateClockwise(state.velocity, headingChange)
      };
    }
    case ManeuverType.CLIMB_TO:
    case ManeuverType.DESCENT_TO:
    case ManeuverType.GO_AROUND:
      return { ...state, altitudeFeet: maneuver.newAltitudeFeet };
    case ManeuverType.SPEED_UP:
    case ManeuverType.SLOW_DOWN: {
      const velocity = state.groundspeedKnots > 0
        ? Vec2D.scale(state.velocity, maneuver.newSpeedKnots / state.groundspeedKnots)
        : Vec2D.scale(Vec2D.fromHeading(state.headingTrue), maneuver.newSpeedKnots * KNOTS_TO_FEET_PER_SECOND);
      return { ...state, groundspeedKnots: maneuver.newSpeedKnots, velocity };
    }
    case ManeuverType.NONE:
    case ManeuverType.HOLDING_PATTERN:
      return state;
  }
}
