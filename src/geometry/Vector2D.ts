import type { Vector2D } from '../types';

/** Magnitudes below this are treated as zero */
export const EPSILON = 1e-10;

const DEG_TO_RAD = Math.PI / 180;

/**
 * Immutable 2D vector operations over local tangent-plane coordinates (feet).
 */
export const Vec2D = {
  add(a: Vector2D, b: Vector2D): Vector2D {
    return { x: a.x + b.x, y: a.y + b.y };
  },

  subtract(a: Vector2D, b: Vector2D): Vector2D {
    return { x: a.x - b.x, y: a.y - b.y };
  },

  scale(v: Vector2D, scalar: number): Vector2D {
    return { x: v.x * scalar, y: v.y * scalar };
  },

  dot(a: Vector2D, b: Vector2D): number {
    return a.x * b.x + a.y * b.y;
  },

  magnitudeSquared(v: Vector2D): number {
    return v.x * v.x + v.y * v.y;
  },

  magnitude(v: Vector2D): number {
    return Math.sqrt(Vec2D.magnitudeSquared(v));
  },

  /**
   * Unit vector in the direction of v. A (near-)zero vector yields the zero
   * vector rather than NaN components.
   */
  normalize(v: Vector2D): Vector2D {
    const mag = Vec2D.magnitude(v);
    if (mag < EPSILON) return { x: 0, y: 0 };
    return { x: v.x / mag, y: v.y / mag };
  },

  distance(a: Vector2D, b: Vector2D): number {
    return Vec2D.magnitude(Vec2D.subtract(a, b));
  },

  midpoint(a: Vector2D, b: Vector2D): Vector2D {
    return Vec2D.scale(Vec2D.add(a, b), 0.5);
  },

  /** 90° counter-clockwise */
  perpendicular(v: Vector2D): Vector2D {
    return { x: -v.y, y: v.x };
  },

  /**
   * Rotate clockwise by a compass angle in degrees, so that a heading change
   * of +Δ applied to a velocity vector turns it right.
   */
  rotateClockwise(v: Vector2D, degrees: number): Vector2D {
    const rad = degrees * DEG_TO_RAD;
    const cos = Math.cos(rad);
    const sin = Math.sin(rad);
    return {
      x: v.x * cos + v.y * sin,
      y: -v.x * sin + v.y * cos
    };
  },

  /** Unit vector for a compass heading (0° = +y, 90° = +x) */
  fromHeading(headingDegrees: number): Vector2D {
    const rad = headingDegrees * DEG_TO_RAD;
    return { x: Math.sin(rad), y: Math.cos(rad) };
  }
};

/** Wrap an angle into (-180, 180] */
export function normalizeAngle180(degrees: number): number {
  let angle = degrees % 360;
  if (angle > 180) angle -= 360;
  if (angle <= -180) angle += 360;
  return angle;
}

/** Wrap an angle into [0, 360) */
export function normalizeAngle360(degrees: number): number {
  const angle = degrees % 360;
  const wrapped = angle < 0 ? angle + 360 : angle;
  // -1e-15 + 360 rounds to 360; -0 collapses to 0
  return wrapped >= 360 || wrapped === 0 ? 0 : wrapped;
}
