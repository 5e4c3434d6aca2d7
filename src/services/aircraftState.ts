import type { AircraftState } from '../types';

/**
 * Build a full state record for an aircraft id. Unspecified fields take the
 * values of an unknown, stationary 100 ft airframe.
 */
export function createAircraftState(aircraftId: string, fields: Partial<Omit<AircraftState, 'aircraftId'>> = {}): AircraftState {
  return {
    positionLocal: { x: 0, y: 0 },
    velocity: { x: 0, y: 0 },
    altitudeFeet: 0,
    headingTrue: 0,
    groundspeedKnots: 0,
    wingspanFeet: 100,
    lengthFeet: 100,
    ...fields,
    aircraftId
  };
}
