/**
 * Overlap tests between protected zones and infrastructure footprints.
 */
import { describe, it, expect } from 'vitest';
import type { Circle, Polygon } from '../types';
import {
  aircraftFootprint,
  aircraftProtectedZone,
  circleContainsPoint,
  circleIntersects,
  circlePolygonIntersects,
  distancePointToSegment,
  polygonContainsPoint,
  polygonPolygonIntersects
} from '../geometry/CollisionDetector';
import { createAircraftState } from '../services/aircraftState';

// ─── Fixtures ────────────────────────────────────────────────────────────────

function square(originX: number, originY: number, side: number): Polygon {
  return {
    vertices: [
      { x: originX, y: originY },
      { x: originX + side, y: originY },
      { x: originX + side, y: originY + side },
      { x: originX, y: originY + side }
    ]
  };
}

function circle(x: number, y: number, radius: number): Circle {
  return { center: { x, y }, radius };
}

const HANGAR = square(0, 0, 1000);

// ─── Circles ─────────────────────────────────────────────────────────────────

describe('circleIntersects', () => {
  it('detects overlapping zones', () => {
    expect(circleIntersects(circle(0, 0, 500), circle(800, 0, 500))).toBe(true);
  });

  it('rejects separated zones', () => {
    expect(circleIntersects(circle(0, 0, 500), circle(1500, 0, 500))).toBe(false);
  });

  it('counts touching zones as intersecting', () => {
    expect(circleIntersects(circle(0, 0, 500), circle(1000, 0, 500))).toBe(true);
    expect(circleIntersects(circle(0, 0, 500), circle(600, 800, 500))).toBe(true);
  });

  it('is symmetric', () => {
    const a = circle(0, 0, 200);
    const b = circle(350, 120, 180);
    expect(circleIntersects(a, b)).toBe(circleIntersects(b, a));
  });

  it('includes points on the boundary', () => {
    expect(circleContainsPoint(circle(0, 0, 5), { x: 3, y: 4 })).toBe(true);
    expect(circleContainsPoint(circle(0, 0, 5), { x: 3, y: 4.1 })).toBe(false);
  });
});

// ─── Polygons ────────────────────────────────────────────────────────────────

describe('polygonContainsPoint', () => {
  it('finds interior points', () => {
    expect(polygonContainsPoint(HANGAR, { x: 500, y: 500 })).toBe(true);
  });

  it('rejects exterior points', () => {
    expect(polygonContainsPoint(HANGAR, { x: 1500, y: 500 })).toBe(false);
    expect(polygonContainsPoint(HANGAR, { x: 500, y: -1 })).toBe(false);
  });

  it('treats degenerate polygons as empty', () => {
    expect(polygonContainsPoint({ vertices: [] }, { x: 0, y: 0 })).toBe(false);
    expect(polygonContainsPoint({ vertices: [{ x: 0, y: 0 }, { x: 10, y: 10 }] }, { x: 5, y: 5 })).toBe(false);
  });

  it('handles concave outlines', () => {
    // U shape open to the north
    const outline: Polygon = {
      vertices: [
        { x: 0, y: 0 },
        { x: 300, y: 0 },
        { x: 300, y: 300 },
        { x: 200, y: 300 },
        { x: 200, y: 100 },
        { x: 100, y: 100 },
        { x: 100, y: 300 },
        { x: 0, y: 300 }
      ]
    };
    expect(polygonContainsPoint(outline, { x: 50, y: 200 })).toBe(true);
    expect(polygonContainsPoint(outline, { x: 150, y: 200 })).toBe(false);
  });
});

describe('distancePointToSegment', () => {
  it('measures perpendicular distance inside the segment', () => {
    expect(distancePointToSegment({ x: 5, y: 3 }, { x: 0, y: 0 }, { x: 10, y: 0 })).toBe(3);
  });

  it('clamps to the nearest endpoint', () => {
    expect(distancePointToSegment({ x: 13, y: 4 }, { x: 0, y: 0 }, { x: 10, y: 0 })).toBe(5);
    expect(distancePointToSegment({ x: -3, y: -4 }, { x: 0, y: 0 }, { x: 10, y: 0 })).toBe(5);
  });

  it('falls back to point distance for a zero-length segment', () => {
    expect(distancePointToSegment({ x: 3, y: 4 }, { x: 0, y: 0 }, { x: 0, y: 0 })).toBe(5);
  });
});

describe('circlePolygonIntersects', () => {
  it('detects a center inside the polygon', () => {
    expect(circlePolygonIntersects(circle(500, 500, 10), HANGAR)).toBe(true);
  });

  it('detects a vertex inside the circle', () => {
    expect(circlePolygonIntersects(circle(-50, -50, 100), HANGAR)).toBe(true);
  });

  it('detects an edge within the radius', () => {
    expect(circlePolygonIntersects(circle(500, -100, 100), HANGAR)).toBe(true);
  });

  it('rejects a circle clear of the polygon', () => {
    expect(circlePolygonIntersects(circle(500, -300, 100), HANGAR)).toBe(false);
  });
});

describe('polygonPolygonIntersects', () => {
  it('detects overlapping squares', () => {
    expect(polygonPolygonIntersects(HANGAR, square(500, 500, 1000))).toBe(true);
  });

  it('rejects separated squares', () => {
    expect(polygonPolygonIntersects(HANGAR, square(1500, 0, 1000))).toBe(false);
  });

  it('counts shared edges as intersecting', () => {
    expect(polygonPolygonIntersects(HANGAR, square(1000, 0, 1000))).toBe(true);
  });

  it('separates on a diagonal axis when the bounding boxes overlap', () => {
    const triangle: Polygon = {
      vertices: [
        { x: 900, y: 1200 },
        { x: 1200, y: 900 },
        { x: 1200, y: 1200 }
      ]
    };
    expect(polygonPolygonIntersects(HANGAR, triangle)).toBe(false);
    expect(polygonPolygonIntersects(triangle, HANGAR)).toBe(false);
  });

  it('never reports overlap with a degenerate polygon', () => {
    const segment: Polygon = { vertices: [{ x: 0, y: 0 }, { x: 500, y: 500 }] };
    expect(polygonPolygonIntersects(HANGAR, segment)).toBe(false);
  });
});

// ─── Aircraft shapes ─────────────────────────────────────────────────────────

describe('aircraft shapes', () => {
  it('sizes the protected zone from the larger dimension plus margin', () => {
    const state = createAircraftState('N1', {
      positionLocal: { x: 10, y: 20 },
      wingspanFeet: 120,
      lengthFeet: 150
    });

    expect(aircraftProtectedZone(state)).toEqual({ center: { x: 10, y: 20 }, radius: 75 });
    expect(aircraftProtectedZone(state, 10).radius).toBe(85);
  });

  it('orients the footprint along the heading', () => {
    const state = createAircraftState('N1', { headingTrue: 0, lengthFeet: 200, wingspanFeet: 100 });
    const { vertices } = aircraftFootprint(state);
    const expected = [
      { x: 50, y: 100 },
      { x: -50, y: 100 },
      { x: -50, y: -100 },
      { x: 50, y: -100 }
    ];

    expect(vertices).toHaveLength(4);
    vertices.forEach((vertex, i) => {
      expect(vertex.x).toBeCloseTo(expected[i].x);
      expect(vertex.y).toBeCloseTo(expected[i].y);
    });
  });

  it('swaps the footprint axes for an easterly heading', () => {
    const state = createAircraftState('N1', {
      positionLocal: { x: 1000, y: 0 },
      headingTrue: 90,
      lengthFeet: 200,
      wingspanFeet: 100
    });
    const [frontRight] = aircraftFootprint(state).vertices;

    // Nose east, right wing south
    expect(frontRight.x).toBeCloseTo(1100);
    expect(frontRight.y).toBeCloseTo(-50);
  });
});
