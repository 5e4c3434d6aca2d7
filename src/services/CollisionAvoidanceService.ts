import type { CollisionEvents, ICollisionAvoidanceService } from '../interfaces/ICollisionServices';
import type { IConfigService, ILogger } from '../interfaces/IService';
import type {
  AircraftState,
  ConflictType,
  DecisionCycleResult,
  FlightPhase,
  InfrastructureContact,
  ManeuverType,
  Polygon,
  SystemConfig
} from '../types';
import { EventEmitter } from '../core/EventEmitter';
import { toError } from '../core/errors';
import {
  aircraftFootprint,
  aircraftProtectedZone,
  circlePolygonIntersects,
  polygonPolygonIntersects
} from '../geometry/CollisionDetector';
import { SeparationStandards } from './SeparationStandards';
import { ConflictPredictor } from './ConflictPredictor';
import { ManeuverSelector } from './ManeuverSelector';
import { ConflictResolver } from './ConflictResolver';

export interface CollisionStatistics {
  cyclesRun: number;
  totalAlerts: number;
  alertsByType: Partial<Record<ConflictType, number>>;
  maneuversByType: Partial<Record<ManeuverType, number>>;
  infrastructureContacts: number;
}

function increment<K extends string>(counts: Partial<Record<K, number>>, key: K): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * Host-facing wrapper that runs one predict → resolve decision cycle per
 * call (or per timer tick) over the tracked traffic and known
 * infrastructure, and publishes the result.
 */
export class CollisionAvoidanceService implements ICollisionAvoidanceService {
  private logger: ILogger;
  private eventEmitter: EventEmitter<CollisionEvents>;
  private predictor: ConflictPredictor;
  private selector: ManeuverSelector;
  private resolver: ConflictResolver;
  private flightPhases = new Map<string, FlightPhase>();
  private infrastructure = new Map<string, Polygon>();
  private subscribers: Array<(result: DecisionCycleResult) => void> = [];
  private decisionInterval?: ReturnType<typeof setInterval>;
  private decisionCycleIntervalMs: number;
  private protectedZoneMarginFeet: number;
  private isRunning = false;
  private statistics: CollisionStatistics = {
    cyclesRun: 0,
    totalAlerts: 0,
    alertsByType: {},
    maneuversByType: {},
    infrastructureContacts: 0
  };

  constructor(
    logger: ILogger,
    config: IConfigService<SystemConfig>,
    eventEmitter: EventEmitter<CollisionEvents>
  ) {
    this.logger = logger;
    this.eventEmitter = eventEmitter;

    // Read once; later config.set calls do not reach a running service
    const { separation, prediction, performance, maneuvers, service } = config.getConfig();
    const separationStandards = new SeparationStandards(separation, logger);
    this.predictor = new ConflictPredictor(separationStandards, prediction.horizonSeconds, logger);
    this.selector = new ManeuverSelector(performance, separationStandards, maneuvers.scoring, logger);
    this.resolver = new ConflictResolver(this.selector, logger);
    this.protectedZoneMarginFeet = maneuvers.protectedZoneMarginFeet;
    this.decisionCycleIntervalMs = service.decisionCycleIntervalMs;

    this.logger.info('Separation standards loaded', { ...separation });
  }

  async initialize(): Promise<void> {
    this.startDecisionCycle();
    this.isRunning = true;
    this.logger.info('Collision Avoidance Service initialized');
  }

  async shutdown(): Promise<void> {
    this.isRunning = false;

    this.stopDecisionCycle();
    this.subscribers = [];
    this.logger.info('Collision Avoidance Service shutdown completed');
  }

  async isHealthy(): Promise<boolean> {
    return this.isRunning;
  }

  updateAircraft(state: AircraftState): void {
    this.predictor.updateAircraftState(state);
  }

  removeAircraft(aircraftId: string): void {
    this.predictor.removeAircraft(aircraftId);
    this.flightPhases.delete(aircraftId);
  }

  setFlightPhase(aircraftId: string, phase: FlightPhase): void {
    this.flightPhases.set(aircraftId, { ...phase });
  }

  registerInfrastructure(infrastructureId: string, footprint: Polygon): void {
    this.infrastructure.set(infrastructureId, footprint);
    this.logger.debug('Infrastructure registered', {
      infrastructureId,
      vertices: footprint.vertices.length
    });
  }

  removeInfrastructure(infrastructureId: string): void {
    this.infrastructure.delete(infrastructureId);
  }

  getTrackedAircraftCount(): number {
    return this.predictor.getTrackedAircraftCount();
  }

  getManeuverSelector(): ManeuverSelector {
    return this.selector;
  }

  // One full decision cycle over the current snapshot
  runDecisionCycle(isLowAltitudeArea: boolean = false): DecisionCycleResult {
    const startTime = Date.now();

    const alerts = this.predictor.predictConflicts(this.predictor.getPredictionHorizon(), isLowAltitudeArea);
    const plan = this.resolver.resolve(alerts, this.predictor.getTrackedStates(), this.flightPhases);
    const infrastructureContacts = this.detectInfrastructureContacts();

    const result: DecisionCycleResult = {
      alerts,
      plan,
      infrastructureContacts,
      processingTimeMs: Date.now() - startTime
    };

    this.recordStatistics(result);

    this.logger.debug('Decision cycle completed', {
      trackedAircraft: this.predictor.getTrackedAircraftCount(),
      alerts: alerts.length,
      maneuvers: plan.aircraftManeuvers.size,
      infrastructureContacts: infrastructureContacts.length,
      processingTime: result.processingTimeMs
    });

    this.eventEmitter.emit('conflict:detection_completed', {
      trackedAircraft: this.predictor.getTrackedAircraftCount(),
      alerts,
      processingTimeMs: result.processingTimeMs
    });

    if (plan.aircraftManeuvers.size > 0) {
      this.eventEmitter.emit('resolution:plan_issued', { alerts, plan });
    }

    for (const contact of infrastructureContacts) {
      this.logger.warn('Aircraft footprint overlaps infrastructure', { ...contact });
      this.eventEmitter.emit('infrastructure:contact', contact);
    }

    this.notifySubscribers(result);

    return result;
  }

  subscribeToResolutions(callback: (result: DecisionCycleResult) => void): void {
    this.subscribers.push(callback);
    this.logger.debug('New resolution subscriber added', {
      subscriberCount: this.subscribers.length
    });
  }

  getStatistics(): CollisionStatistics {
    return {
      ...this.statistics,
      alertsByType: { ...this.statistics.alertsByType },
      maneuversByType: { ...this.statistics.maneuversByType }
    };
  }

  /**
   * An aircraft touches a structure when either its oriented footprint
   * overlaps the structure or its protected-zone circle reaches it.
   */
  private detectInfrastructureContacts(): InfrastructureContact[] {
    const contacts: InfrastructureContact[] = [];
    if (this.infrastructure.size === 0) {
      return contacts;
    }

    for (const state of this.predictor.getTrackedStates().values()) {
      const footprint = aircraftFootprint(state);
      const zone = aircraftProtectedZone(state, this.protectedZoneMarginFeet);

      for (const [infrastructureId, polygon] of this.infrastructure) {
        if (polygonPolygonIntersects(footprint, polygon) || circlePolygonIntersects(zone, polygon)) {
          contacts.push({ aircraftId: state.aircraftId, infrastructureId });
        }
      }
    }

    return contacts;
  }

  private recordStatistics(result: DecisionCycleResult): void {
    this.statistics.cyclesRun++;
    this.statistics.totalAlerts += result.alerts.length;
    this.statistics.infrastructureContacts += result.infrastructureContacts.length;

    for (const alert of result.alerts) {
      increment(this.statistics.alertsByType, alert.conflictType);
    }
    for (const maneuver of result.plan.aircraftManeuvers.values()) {
      increment(this.statistics.maneuversByType, maneuver.maneuverType);
    }
  }

  private startDecisionCycle(): void {
    this.stopDecisionCycle();

    const interval = this.decisionCycleIntervalMs;
    if (interval <= 0) {
      return;
    }

    this.decisionInterval = setInterval(() => {
      if (!this.isRunning) return;

      try {
        this.runDecisionCycle();
      } catch (error) {
        this.logger.error('Periodic decision cycle failed', toError(error));
      }
    }, interval);
  }

  private stopDecisionCycle(): void {
    if (this.decisionInterval) {
      clearInterval(this.decisionInterval);
      this.decisionInterval = undefined;
    }
  }

  private notifySubscribers(result: DecisionCycleResult): void {
    for (const callback of this.subscribers) {
      try {
        callback(result);
      } catch (error) {
        this.logger.error('Resolution subscriber callback failed', toError(error));
      }
    }
  }
}
