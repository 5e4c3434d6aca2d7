import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ConflictType, ManeuverType } from '../types';
import type { AircraftState, ConflictAlert, FlightPhase } from '../types';
import { ConflictResolver, PLAN_EFFECTIVENESS, RESOLUTION_STRATEGY } from '../services/ConflictResolver';
import { ManeuverSelector } from '../services/ManeuverSelector';
import { createAircraftState } from '../services/aircraftState';

function makeAircraft(id: string, x: number, y: number): AircraftState {
  return createAircraftState(id, {
    positionLocal: { x, y },
    altitudeFeet: 5000,
    groundspeedKnots: 250
  });
}

function makeAlert(aircraft1Id: string, aircraft2Id: string, timeToConflictSeconds: number): ConflictAlert {
  return {
    aircraft1Id,
    aircraft2Id,
    timeToConflictSeconds,
    minimumSeparationAtConflictFeet: 0,
    conflictType: ConflictType.NONE,
    predictedConflictPosition: { x: 0, y: 0 }
  };
}

describe('ConflictResolver', () => {
  let selector: ManeuverSelector;
  let resolver: ConflictResolver;
  let states: Map<string, AircraftState>;

  beforeEach(() => {
    selector = new ManeuverSelector();
    resolver = new ConflictResolver(selector);
    states = new Map([
      ['A', makeAircraft('A', 0, 0)],
      ['B', makeAircraft('B', 1000, 0)],
      ['C', makeAircraft('C', 0, 1000)]
    ]);
  });

  it('returns an empty plan when there are no alerts', () => {
    const plan = resolver.resolve([], states);

    expect(plan.aircraftManeuvers.size).toBe(0);
    expect(plan.resolvesAllConflicts).toBe(true);
    expect(plan.planEffectiveness).toBe(PLAN_EFFECTIVENESS);
    expect(plan.resolutionStrategy).toBe(RESOLUTION_STRATEGY);
  });

  it('assigns a maneuver to both aircraft of a single alert', () => {
    const plan = resolver.resolve([makeAlert('A', 'B', 10)], states);

    expect([...plan.aircraftManeuvers.keys()]).toEqual(['A', 'B']);
    expect(plan.aircraftManeuvers.get('A')?.maneuverType).toBe(ManeuverType.SPEED_UP);
    expect(plan.aircraftManeuvers.get('B')?.maneuverType).toBe(ManeuverType.SPEED_UP);
    expect(plan.resolvesAllConflicts).toBe(true);
    expect(plan.planEffectiveness).toBe(75);
    expect(plan.resolutionStrategy).toBe('Standard conflict avoidance routing');
  });

  it('keeps the maneuver chosen against the first intruder', () => {
    const select = vi.spyOn(selector, 'select');

    const plan = resolver.resolve([makeAlert('A', 'B', 5), makeAlert('A', 'C', 10)], states);

    expect(select.mock.calls.map(([own, intruder]) => `${own.aircraftId}>${intruder.aircraftId}`))
      .toEqual(['A>B', 'B>A', 'C>A']);
    expect(plan.aircraftManeuvers.size).toBe(3);
    expect(plan.resolvesAllConflicts).toBe(false);
  });

  it('skips alerts that name an untracked aircraft', () => {
    const plan = resolver.resolve([makeAlert('A', 'GHOST', 3)], states);

    expect(plan.aircraftManeuvers.size).toBe(0);
    expect(plan.resolvesAllConflicts).toBe(false);
  });

  it('passes each aircraft its own flight phase', () => {
    const select = vi.spyOn(selector, 'select');
    const phases = new Map<string, FlightPhase>([
      ['A', { isDeparture: false, isArrival: true }]
    ]);

    resolver.resolve([makeAlert('A', 'B', 10)], states, phases);

    expect(select).toHaveBeenCalledWith(states.get('A'), states.get('B'), false, true);
    expect(select).toHaveBeenCalledWith(states.get('B'), states.get('A'), false, false);
  });

  it('keys the plan and flight phases by the ids the alert carries', () => {
    const select = vi.spyOn(selector, 'select');
    const tracked = new Map([
      ['A', makeAircraft('N100', 0, 0)],
      ['B', makeAircraft('N200', 1000, 0)]
    ]);
    const phases = new Map<string, FlightPhase>([
      ['A', { isDeparture: true, isArrival: false }]
    ]);

    const plan = resolver.resolve([makeAlert('A', 'B', 10)], tracked, phases);

    expect([...plan.aircraftManeuvers.keys()]).toEqual(['A', 'B']);
    expect(plan.resolvesAllConflicts).toBe(true);
    expect(select).toHaveBeenCalledWith(tracked.get('A'), tracked.get('B'), true, false);
  });

  it('leaves out aircraft whose selection is no maneuver', () => {
    vi.spyOn(selector, 'select').mockImplementation(ownship => (
      ownship.aircraftId === 'A'
        ? { maneuverType: ManeuverType.NONE, durationSeconds: 0, pilotWorkload: 0, description: 'No maneuver' }
        : { maneuverType: ManeuverType.SPEED_UP, newSpeedKnots: 265, durationSeconds: 10, pilotWorkload: 30, description: 'Speed up by 15 knots' }
    ));

    const plan = resolver.resolve([makeAlert('A', 'B', 10)], states);

    expect([...plan.aircraftManeuvers.keys()]).toEqual(['B']);
    expect(plan.resolvesAllConflicts).toBe(false);
  });
});
