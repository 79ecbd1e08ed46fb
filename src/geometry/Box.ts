import { BoxGeometryError } from '../errors.js';
import type { Vector2 } from '../types/index.js';
import { clipConvexPolygon, polygonArea, polygonCentroid, toCounterClockwise } from './polygon.js';
import {
  GEOMETRY_EPSILON,
  addVectors,
  bearing,
  dot,
  isFiniteVector,
  magnitude,
  rotatePoint,
  scaleVector,
  subtractVectors,
} from './vector.js';

/**
 * Three consecutive corners of a rectangle. A->B is one side and B->C the adjacent one;
 * the fourth corner is derived as A + (C - B).
 */
export interface BoxCorners {
  a: Vector2;
  b: Vector2;
  c: Vector2;
}

export interface BoxBounds {
  left: number;
  right: number;
  lower: number;
  upper: number;
}

/**
 * Shared region of two adjacent boxes. The polygon is convex and counter-clockwise.
 */
export interface Doorway {
  polygon: Vector2[];
  area: number;
  centroid: Vector2;
}

export interface BoxOptions {
  index?: number;
}

// Relative slack for boundary tests so points lying exactly on an edge count as inside.
const CONTAINS_TOLERANCE = 1e-9;
// Cosine of the angle between the two sides; anything above this is not a rectangle.
const PERPENDICULAR_TOLERANCE = 1e-6;
// Overlaps smaller than this fraction of the smaller box are treated as touching, not overlapping.
const OVERLAP_AREA_TOLERANCE = 1e-9;

export class Box {
  public readonly a: Vector2;
  public readonly b: Vector2;
  public readonly c: Vector2;
  public readonly d: Vector2;
  public readonly target: Vector2;
  public readonly index: number;
  public readonly width: number;
  public readonly height: number;
  public readonly area: number;
  public readonly center: Vector2;
  public readonly bounds: BoxBounds;
  /**
   * Direction of the A->B side in radians.
   */
  public readonly orientation: number;
  /**
   * Corners wound counter-clockwise, whatever order they were given in.
   */
  public readonly polygon: readonly Vector2[];

  private readonly ab: Vector2;
  private readonly bc: Vector2;
  private readonly dotAB: number;
  private readonly dotBC: number;

  public constructor(corners: BoxCorners, target: Vector2, options: BoxOptions = {}) {
    const { a, b, c } = corners;
    if (![a, b, c, target].every(isFiniteVector)) {
      throw new BoxGeometryError('Box corners and target must be finite numbers');
    }

    this.a = { ...a };
    this.b = { ...b };
    this.c = { ...c };
    this.ab = subtractVectors(b, a);
    this.bc = subtractVectors(c, b);
    this.d = addVectors(a, this.bc);
    this.dotAB = dot(this.ab, this.ab);
    this.dotBC = dot(this.bc, this.bc);
    this.height = magnitude(this.ab);
    this.width = magnitude(this.bc);

    if (this.height <= GEOMETRY_EPSILON || this.width <= GEOMETRY_EPSILON) {
      throw new BoxGeometryError('Box is degenerate: both sides must have a positive length');
    }

    if (Math.abs(dot(this.ab, this.bc)) / (this.height * this.width) > PERPENDICULAR_TOLERANCE) {
      throw new BoxGeometryError('Box sides A->B and B->C must be perpendicular');
    }

    this.index = options.index ?? 0;
    this.area = this.width * this.height;
    this.center = scaleVector(addVectors(a, c), 0.5);
    this.orientation = bearing(a, b);
    this.polygon = toCounterClockwise([this.a, this.b, this.c, this.d]);

    const xs = this.polygon.map((corner) => corner.x);
    const ys = this.polygon.map((corner) => corner.y);
    this.bounds = {
      left: Math.min(...xs),
      right: Math.max(...xs),
      lower: Math.min(...ys),
      upper: Math.max(...ys),
    };

    if (!this.contains(target)) {
      throw new BoxGeometryError(
        `Box target (${target.x}, ${target.y}) lies outside the box`,
      );
    }
    this.target = { ...target };
  }

  /**
   * Builds an axis-aligned box from its extents, optionally rotated about the origin.
   */
  public static aligned(bounds: BoxBounds, target: Vector2, rotation = 0, options: BoxOptions = {}): Box {
    const corners: BoxCorners = {
      a: { x: bounds.left, y: bounds.lower },
      b: { x: bounds.left, y: bounds.upper },
      c: { x: bounds.right, y: bounds.upper },
    };
    return Box.rotated(corners, target, rotation, options);
  }

  /**
   * Rotates the corners and the target about the origin before building the box.
   */
  public static rotated(corners: BoxCorners, target: Vector2, rotation: number, options: BoxOptions = {}): Box {
    if (rotation === 0) {
      return new Box(corners, target, options);
    }

    return new Box(
      {
        a: rotatePoint(corners.a, rotation),
        b: rotatePoint(corners.b, rotation),
        c: rotatePoint(corners.c, rotation),
      },
      rotatePoint(target, rotation),
      options,
    );
  }

  public withIndex(index: number): Box {
    return new Box({ a: this.a, b: this.b, c: this.c }, this.target, { index });
  }

  public contains(point: Vector2): boolean {
    const am = subtractVectors(point, this.a);
    const bm = subtractVectors(point, this.b);
    const alongAB = dot(this.ab, am);
    const alongBC = dot(this.bc, bm);
    const slackAB = this.dotAB * CONTAINS_TOLERANCE;
    const slackBC = this.dotBC * CONTAINS_TOLERANCE;

    return (
      alongAB >= -slackAB &&
      alongAB <= this.dotAB + slackAB &&
      alongBC >= -slackBC &&
      alongBC <= this.dotBC + slackBC
    );
  }

  /**
   * Region shared with `other`, or null when they only touch or are disjoint.
   */
  public overlapRegion(other: Box): Doorway | null {
    const polygon = clipConvexPolygon(this.polygon, other.polygon);
    if (polygon.length < 3) {
      return null;
    }

    const area = polygonArea(polygon);
    if (area <= OVERLAP_AREA_TOLERANCE * Math.min(this.area, other.area)) {
      return null;
    }

    return { polygon, area, centroid: polygonCentroid(polygon) };
  }
}
