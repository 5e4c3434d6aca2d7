import type { AircraftState, Circle, Polygon, Vector2D } from '../types';
import { EPSILON, Vec2D } from './Vector2D';

/**
 * Pure overlap tests between aircraft protected zones (circles) and
 * infrastructure footprints (polygons).
 */

export function circleContainsPoint(circle: Circle, point: Vector2D): boolean {
  return Vec2D.distance(circle.center, point) <= circle.radius;
}

// Touching circles count as intersecting
export function circleIntersects(c1: Circle, c2: Circle): boolean {
  return Vec2D.distance(c1.center, c2.center) <= c1.radius + c2.radius;
}

/**
 * Ray casting with the odd-crossing rule. Polygons with fewer than three
 * vertices contain nothing.
 */
export function polygonContainsPoint(polygon: Polygon, point: Vector2D): boolean {
  const { vertices } = polygon;
  if (vertices.length < 3) return false;

  let intersections = 0;
  for (let i = 0; i < vertices.length; i++) {
    const v1 = vertices[i];
    const v2 = vertices[(i + 1) % vertices.length];

    if ((v1.y <= point.y && point.y < v2.y) || (v2.y <= point.y && point.y < v1.y)) {
      const xIntersect = v1.x + ((point.y - v1.y) / (v2.y - v1.y)) * (v2.x - v1.x);
      if (point.x < xIntersect) {
        intersections++;
      }
    }
  }

  return intersections % 2 === 1;
}

export function distancePointToSegment(point: Vector2D, start: Vector2D, end: Vector2D): number {
  const pa = Vec2D.subtract(point, start);
  const ba = Vec2D.subtract(end, start);
  const lengthSquared = Vec2D.dot(ba, ba);

  if (lengthSquared < EPSILON) {
    return Vec2D.magnitude(pa);
  }

  const t = Math.max(0, Math.min(1, Vec2D.dot(pa, ba) / lengthSquared));
  return Vec2D.magnitude(Vec2D.subtract(pa, Vec2D.scale(ba, t)));
}

export function circlePolygonIntersects(circle: Circle, polygon: Polygon): boolean {
  if (polygonContainsPoint(polygon, circle.center)) {
    return true;
  }

  const { vertices } = polygon;
  if (vertices.some(vertex => circleContainsPoint(circle, vertex))) {
    return true;
  }

  for (let i = 0; i < vertices.length; i++) {
    const start = vertices[i];
    const end = vertices[(i + 1) % vertices.length];
    if (distancePointToSegment(circle.center, start, end) <= circle.radius) {
      return true;
    }
  }

  return false;
}

function projectOntoAxis(polygon: Polygon, axis: Vector2D): { min: number; max: number } {
  let min = Infinity;
  let max = -Infinity;
  for (const vertex of polygon.vertices) {
    const projection = Vec2D.dot(vertex, axis);
    min = Math.min(min, projection);
    max = Math.max(max, projection);
  }
  return { min, max };
}

function hasSeparatingEdgeNormal(source: Polygon, a: Polygon, b: Polygon): boolean {
  const { vertices } = source;
  for (let i = 0; i < vertices.length; i++) {
    const edge = Vec2D.subtract(vertices[(i + 1) % vertices.length], vertices[i]);
    const axis = Vec2D.normalize(Vec2D.perpendicular(edge));

    const p1 = projectOntoAxis(a, axis);
    const p2 = projectOntoAxis(b, axis);
    if (p1.max < p2.min || p2.max < p1.min) {
      return true;
    }
  }
  return false;
}

/**
 * Separating Axis Theorem over every edge normal of both polygons. Both
 * polygons are assumed convex.
 */
export function polygonPolygonIntersects(poly1: Polygon, poly2: Polygon): boolean {
  if (poly1.vertices.length < 3 || poly2.vertices.length < 3) {
    return false;
  }

  return !hasSeparatingEdgeNormal(poly1, poly1, poly2) && !hasSeparatingEdgeNormal(poly2, poly1, poly2);
}

export function aircraftProtectedZone(state: AircraftState, marginFeet: number = 0): Circle {
  return {
    center: { ...state.positionLocal },
    radius: Math.max(state.wingspanFeet, state.lengthFeet) / 2 + marginFeet
  };
}

/**
 * Rectangle of length × wingspan centered on the aircraft, long axis along
 * its true heading.
 */
export function aircraftFootprint(state: AircraftState): Polygon {
  const forward = Vec2D.scale(Vec2D.fromHeading(state.headingTrue), state.lengthFeet / 2);
  const right = Vec2D.scale(Vec2D.fromHeading(state.headingTrue + 90), state.wingspanFeet / 2);
  const center = state.positionLocal;

  return {
    vertices: [
      Vec2D.add(Vec2D.add(center, forward), right),
      Vec2D.subtract(Vec2D.add(center, forward), right),
      Vec2D.subtract(Vec2D.subtract(center, forward), right),
      Vec2D.add(Vec2D.subtract(center, forward), right)
    ]
  };
}
