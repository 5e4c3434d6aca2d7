import type { ILogger } from '../interfaces/IService';
import type { AircraftState, ConflictAlert } from '../types';
import { Vec2D } from '../geometry/Vector2D';
import { assertValid, horizonSchema } from '../core/configSchema';
import { SeparationStandards } from './SeparationStandards';

export const DEFAULT_PREDICTION_HORIZON_SECONDS = 30;

function compareAlerts(a: ConflictAlert, b: ConflictAlert): number {
  if (a.timeToConflictSeconds !== b.timeToConflictSeconds) {
    return a.timeToConflictSeconds - b.timeToConflictSeconds;
  }
  if (a.aircraft1Id !== b.aircraft1Id) {
    return a.aircraft1Id < b.aircraft1Id ? -1 : 1;
  }
  if (a.aircraft2Id !== b.aircraft2Id) {
    return a.aircraft2Id < b.aircraft2Id ? -1 : 1;
  }
  return 0;
}

/**
 * Owns the live set of tracked aircraft and sweeps every pair for a
 * predicted loss of separation inside the conflict horizon.
 */
export class ConflictPredictor {
  private aircraftStates = new Map<string, AircraftState>();
  private predictionHorizonSeconds: number;
  private separationStandards: SeparationStandards;
  private logger?: ILogger;

  constructor(
    separationStandards: SeparationStandards = new SeparationStandards(),
    horizonSeconds: number = DEFAULT_PREDICTION_HORIZON_SECONDS,
    logger?: ILogger
  ) {
    assertValid(horizonSchema, horizonSeconds, 'Prediction horizon');
    this.separationStandards = separationStandards;
    this.predictionHorizonSeconds = horizonSeconds;
    this.logger = logger;
  }

  setPredictionHorizon(seconds: number): void {
    assertValid(horizonSchema, seconds, 'Prediction horizon');
    this.predictionHorizonSeconds = seconds;
  }

  getPredictionHorizon(): number {
    return this.predictionHorizonSeconds;
  }

  // Replaces the whole record for the id
  updateAircraftState(state: AircraftState): void {
    this.aircraftStates.set(state.aircraftId, state);
  }

  removeAircraft(aircraftId: string): void {
    this.aircraftStates.delete(aircraftId);
  }

  getAircraftState(aircraftId: string): AircraftState | undefined {
    return this.aircraftStates.get(aircraftId);
  }

  getTrackedStates(): Map<string, AircraftState> {
    return new Map(this.aircraftStates);
  }

  getTrackedAircraftCount(): number {
    return this.aircraftStates.size;
  }

  /**
   * Predict conflicts for all tracked pairs. Alerts come back most urgent
   * first; equal times are ordered by aircraft ids.
   */
  predictConflicts(
    horizonSeconds: number = this.predictionHorizonSeconds,
    isLowAltitudeArea: boolean = false
  ): ConflictAlert[] {
    const alerts: ConflictAlert[] = [];
    const states = Array.from(this.aircraftStates.values());

    for (let i = 0; i < states.length; i++) {
      for (let j = i + 1; j < states.length; j++) {
        const ac1 = states[i];
        const ac2 = states[j];

        const prediction = this.separationStandards.predictCollision(ac1, ac2, horizonSeconds);
        if (!prediction.conflict) {
          continue;
        }

        const t = prediction.timeToConflictSeconds;
        const predicted1 = Vec2D.add(ac1.positionLocal, Vec2D.scale(ac1.velocity, t));
        const predicted2 = Vec2D.add(ac2.positionLocal, Vec2D.scale(ac2.velocity, t));

        alerts.push({
          aircraft1Id: ac1.aircraftId,
          aircraft2Id: ac2.aircraftId,
          timeToConflictSeconds: t,
          minimumSeparationAtConflictFeet: prediction.distanceAtCpaFeet,
          conflictType: this.separationStandards.classify(ac1, ac2, isLowAltitudeArea),
          predictedConflictPosition: Vec2D.midpoint(predicted1, predicted2)
        });
      }
    }

    alerts.sort(compareAlerts);

    this.logger?.debug('Conflict prediction completed', {
      trackedAircraft: states.length,
      horizonSeconds,
      alerts: alerts.length
    });

    return alerts;
  }
}
