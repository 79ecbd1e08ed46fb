/**
 * Convex polygon helpers used to compute doorways between boxes.
 *
 * Polygons are plain vertex arrays. `clipConvexPolygon` expects both inputs to be convex and
 * wound counter-clockwise; use `toCounterClockwise` first when the winding is unknown.
 */

import type { Vector2 } from '../types/index.js';
import { GEOMETRY_EPSILON, addVectors, cross, pointsApproxEqual, scaleVector, subtractVectors } from './vector.js';

export function signedPolygonArea(polygon: readonly Vector2[]): number {
  let twiceArea = 0;
  for (let index = 0; index < polygon.length; index += 1) {
    const current = polygon[index];
    const next = polygon[(index + 1) % polygon.length];
    twiceArea += cross(current, next);
  }
  return twiceArea / 2;
}

export function polygonArea(polygon: readonly Vector2[]): number {
  return Math.abs(signedPolygonArea(polygon));
}

export function toCounterClockwise(polygon: readonly Vector2[]): Vector2[] {
  return signedPolygonArea(polygon) < 0 ? [...polygon].reverse() : [...polygon];
}

/**
 * Area centroid. Falls back to the vertex average for degenerate (zero-area) polygons.
 */
export function polygonCentroid(polygon: readonly Vector2[]): Vector2 {
  if (polygon.length === 0) {
    throw new RangeError('Cannot take the centroid of an empty polygon');
  }

  const area = signedPolygonArea(polygon);
  if (Math.abs(area) <= GEOMETRY_EPSILON) {
    const sum = polygon.reduce((total, vertex) => addVectors(total, vertex), { x: 0, y: 0 });
    return scaleVector(sum, 1 / polygon.length);
  }

  let cx = 0;
  let cy = 0;
  for (let index = 0; index < polygon.length; index += 1) {
    const current = polygon[index];
    const next = polygon[(index + 1) % polygon.length];
    const factor = cross(current, next);
    cx += (current.x + next.x) * factor;
    cy += (current.y + next.y) * factor;
  }

  return { x: cx / (6 * area), y: cy / (6 * area) };
}

const isInsideEdge = (point: Vector2, edgeStart: Vector2, edgeEnd: Vector2): boolean =>
  cross(subtractVectors(edgeEnd, edgeStart), subtractVectors(point, edgeStart)) >= -GEOMETRY_EPSILON;

function intersectWithEdgeLine(from: Vector2, to: Vector2, edgeStart: Vector2, edgeEnd: Vector2): Vector2 {
  const segment = subtractVectors(to, from);
  const edge = subtractVectors(edgeEnd, edgeStart);
  const denominator = cross(segment, edge);
  if (Math.abs(denominator) <= GEOMETRY_EPSILON) {
    // Parallel within tolerance: the segment runs along the edge line.
    return { ...to };
  }

  const t = cross(subtractVectors(edgeStart, from), edge) / denominator;
  return addVectors(from, scaleVector(segment, t));
}

function removeDuplicateVertices(polygon: Vector2[]): Vector2[] {
  const result: Vector2[] = [];
  polygon.forEach((vertex) => {
    const previous = result[result.length - 1];
    if (!previous || !pointsApproxEqual(previous, vertex, GEOMETRY_EPSILON)) {
      result.push(vertex);
    }
  });

  if (result.length > 1 && pointsApproxEqual(result[0], result[result.length - 1], GEOMETRY_EPSILON)) {
    result.pop();
  }

  return result;
}

/**
 * Sutherland-Hodgman clip of `subject` against every edge of `clip`.
 * Returns the intersection polygon, possibly empty or degenerate.
 */
export function clipConvexPolygon(subject: readonly Vector2[], clip: readonly Vector2[]): Vector2[] {
  let output = [...subject];

  for (let edgeIndex = 0; edgeIndex < clip.length && output.length > 0; edgeIndex += 1) {
    const edgeStart = clip[edgeIndex];
    const edgeEnd = clip[(edgeIndex + 1) % clip.length];
    const input = output;
    output = [];

    input.forEach((current, index) => {
      const previous = input[(index + input.length - 1) % input.length];
      const currentInside = isInsideEdge(current, edgeStart, edgeEnd);
      const previousInside = isInsideEdge(previous, edgeStart, edgeEnd);

      if (currentInside) {
        if (!previousInside) {
          output.push(intersectWithEdgeLine(previous, current, edgeStart, edgeEnd));
        }
        output.push(current);
      } else if (previousInside) {
        output.push(intersectWithEdgeLine(previous, current, edgeStart, edgeEnd));
      }
    });
  }

  return removeDuplicateVertices(output);
}
