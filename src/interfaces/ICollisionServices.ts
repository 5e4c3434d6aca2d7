import type { IService } from './IService';
import type {
  AircraftState,
  ConflictAlert,
  DecisionCycleResult,
  FlightPhase,
  InfrastructureContact,
  Polygon,
  ResolutionPlan
} from '../types';

export interface ICollisionAvoidanceService extends IService {
  updateAircraft(state: AircraftState): void;
  removeAircraft(aircraftId: string): void;
  setFlightPhase(aircraftId: string, phase: FlightPhase): void;
  registerInfrastructure(infrastructureId: string, footprint: Polygon): void;
  removeInfrastructure(infrastructureId: string): void;
  runDecisionCycle(isLowAltitudeArea?: boolean): DecisionCycleResult;
  subscribeToResolutions(callback: (result: DecisionCycleResult) => void): void;
}

export interface CollisionEvents {
  'conflict:detection_completed': {
    trackedAircraft: number;
    alerts: ConflictAlert[];
    processingTimeMs: number;
  };
  'resolution:plan_issued': {
    alerts: ConflictAlert[];
    plan: ResolutionPlan;
  };
  'infrastructure:contact': InfrastructureContact;
}
