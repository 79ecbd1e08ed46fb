import type { Vector2 } from '../types/index.js';

export const GEOMETRY_EPSILON = 1e-9;

export const addVectors = (a: Vector2, b: Vector2): Vector2 => ({
  x: a.x + b.x,
  y: a.y + b.y,
});

export const subtractVectors = (a: Vector2, b: Vector2): Vector2 => ({
  x: a.x - b.x,
  y: a.y - b.y,
});

export const scaleVector = (vector: Vector2, scalar: number): Vector2 => ({
  x: vector.x * scalar,
  y: vector.y * scalar,
});

export const dot = (a: Vector2, b: Vector2): number => a.x * b.x + a.y * b.y;

/**
 * z component of the 3D cross product; positive when `b` is counter-clockwise of `a`.
 */
export const cross = (a: Vector2, b: Vector2): number => a.x * b.y - a.y * b.x;

export const magnitude = (vector: Vector2): number => Math.hypot(vector.x, vector.y);

export const distance = (a: Vector2, b: Vector2): number => Math.hypot(a.x - b.x, a.y - b.y);

export const approxEqual = (a: number, b: number, threshold = 1e-4): boolean => Math.abs(a - b) < threshold;

export const pointsApproxEqual = (a: Vector2, b: Vector2, threshold = 1e-4): boolean =>
  approxEqual(a.x, b.x, threshold) && approxEqual(a.y, b.y, threshold);

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function toDegrees(radians: number): number {
  return (radians * 180) / Math.PI;
}

/**
 * Wraps an angle into (-PI, PI].
 */
export function normaliseAngle(radians: number): number {
  const wrapped = Math.atan2(Math.sin(radians), Math.cos(radians));
  return wrapped === -Math.PI ? Math.PI : wrapped;
}

export function bearing(from: Vector2, to: Vector2): number {
  return Math.atan2(to.y - from.y, to.x - from.x);
}

/**
 * Rotates a point about the origin.
 */
export function rotatePoint(point: Vector2, radians: number): Vector2 {
  const cos = Math.cos(radians);
  const sin = Math.sin(radians);
  return {
    x: point.x * cos - point.y * sin,
    y: point.y * cos + point.x * sin,
  };
}

export function headingVector(heading: number): Vector2 {
  return { x: Math.cos(heading), y: Math.sin(heading) };
}

export function isFiniteVector(vector: Vector2): boolean {
  return Number.isFinite(vector.x) && Number.isFinite(vector.y);
}
