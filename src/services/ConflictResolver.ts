import type { ILogger } from '../interfaces/IService';
import { ManeuverType } from '../types';
import type { AircraftState, AvoidanceManeuver, ConflictAlert, FlightPhase, ResolutionPlan } from '../types';
import { ManeuverSelector } from './ManeuverSelector';

// Fixed until plans are scored against post-maneuver separation
export const PLAN_EFFECTIVENESS = 75;
export const RESOLUTION_STRATEGY = 'Standard conflict avoidance routing';

const EN_ROUTE: FlightPhase = { isDeparture: false, isArrival: false };

/**
 * Greedy multi-aircraft resolution: walk the alerts most urgent first and
 * give each aircraft the maneuver chosen against the first intruder it is
 * paired with.
 */
export class ConflictResolver {
  private maneuverSelector: ManeuverSelector;
  private logger?: ILogger;

  constructor(maneuverSelector: ManeuverSelector, logger?: ILogger) {
    this.maneuverSelector = maneuverSelector;
    this.logger = logger;
  }

  resolve(
    alerts: ConflictAlert[],
    aircraftStates: ReadonlyMap<string, AircraftState>,
    flightPhases: ReadonlyMap<string, FlightPhase> = new Map()
  ): ResolutionPlan {
    const aircraftManeuvers = new Map<string, AvoidanceManeuver>();
    let skipped = 0;

    for (const alert of alerts) {
      const ac1 = aircraftStates.get(alert.aircraft1Id);
      const ac2 = aircraftStates.get(alert.aircraft2Id);

      if (!ac1 || !ac2) {
        skipped++;
        continue;
      }

      this.assign(aircraftManeuvers, alert.aircraft1Id, ac1, ac2, flightPhases.get(alert.aircraft1Id) ?? EN_ROUTE);
      this.assign(aircraftManeuvers, alert.aircraft2Id, ac2, ac1, flightPhases.get(alert.aircraft2Id) ?? EN_ROUTE);
    }

    const plan: ResolutionPlan = {
      aircraftManeuvers,
      planEffectiveness: PLAN_EFFECTIVENESS,
      // Coverage count only; the maneuvers are not re-checked geometrically
      resolvesAllConflicts: aircraftManeuvers.size === alerts.length * 2,
      resolutionStrategy: RESOLUTION_STRATEGY
    };

    this.logger?.debug('Resolution plan built', {
      alerts: alerts.length,
      skippedAlerts: skipped,
      maneuversAssigned: aircraftManeuvers.size,
      resolvesAllConflicts: plan.resolvesAllConflicts
    });

    return plan;
  }

  // Plans are keyed by the ids the alerts carry
  private assign(
    maneuvers: Map<string, AvoidanceManeuver>,
    aircraftId: string,
    ownship: AircraftState,
    intruder: AircraftState,
    phase: FlightPhase
  ): void {
    if (maneuvers.has(aircraftId)) {
      return;
    }

    const maneuver = this.maneuverSelector.select(ownship, intruder, phase.isDeparture, phase.isArrival);
    if (maneuver.maneuverType !== ManeuverType.NONE) {
      maneuvers.set(aircraftId, maneuver);
    }
  }
}
