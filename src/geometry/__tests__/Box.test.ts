import { describe, expect, it } from 'vitest';

import { BoxGeometryError } from '../../errors.js';
import { Box } from '../Box.js';

const unitBox = () => Box.aligned({ left: 0, right: 1, lower: 0, upper: 1 }, { x: 0.5, y: 0.5 });

describe('Box', () => {
  it('derives the fourth corner and the extents from three corners', () => {
    const box = unitBox();

    expect(box.d).toEqual({ x: 1, y: 0 });
    expect(box.width).toBe(1);
    expect(box.height).toBe(1);
    expect(box.area).toBe(1);
    expect(box.center).toEqual({ x: 0.5, y: 0.5 });
    expect(box.bounds).toEqual({ left: 0, right: 1, lower: 0, upper: 1 });
    expect(box.orientation).toBeCloseTo(Math.PI / 2);
  });

  it('treats points on an edge as inside', () => {
    const box = unitBox();

    expect(box.contains({ x: 1, y: 0.5 })).toBe(true);
    expect(box.contains({ x: 0, y: 0 })).toBe(true);
    expect(box.contains({ x: 1.1, y: 0.5 })).toBe(false);
    expect(box.contains({ x: 0.5, y: -0.01 })).toBe(false);
  });

  it('rejects corners that do not form a rectangle', () => {
    expect(() => new Box({ a: { x: 0, y: 0 }, b: { x: 0, y: 1 }, c: { x: 1, y: 2 } }, { x: 0.2, y: 0.5 })).toThrow(
      BoxGeometryError,
    );
  });

  it('rejects degenerate boxes', () => {
    expect(() => new Box({ a: { x: 0, y: 0 }, b: { x: 0, y: 0 }, c: { x: 1, y: 0 } }, { x: 0, y: 0 })).toThrow(
      'Box is degenerate: both sides must have a positive length',
    );
  });

  it('rejects a target outside the box', () => {
    expect(() => Box.aligned({ left: 0, right: 1, lower: 0, upper: 1 }, { x: 2, y: 0.5 })).toThrow(
      'Box target (2, 0.5) lies outside the box',
    );
  });

  it('rejects non-finite coordinates', () => {
    expect(() => Box.aligned({ left: 0, right: Number.NaN, lower: 0, upper: 1 }, { x: 0, y: 0 })).toThrow(
      BoxGeometryError,
    );
  });

  it('rotates corners and target about the origin', () => {
    const box = Box.aligned({ left: 0, right: 2, lower: 0, upper: 1 }, { x: 1, y: 0.5 }, Math.PI / 2);

    expect(box.target.x).toBeCloseTo(-0.5);
    expect(box.target.y).toBeCloseTo(1);
    expect(box.bounds.left).toBeCloseTo(-1);
    expect(box.bounds.right).toBeCloseTo(0);
    expect(box.bounds.upper).toBeCloseTo(2);
    expect(box.contains({ x: -0.5, y: 1.5 })).toBe(true);
    expect(box.contains({ x: 1, y: 0.5 })).toBe(false);
  });

  it('keeps the geometry when re-indexed', () => {
    const box = unitBox().withIndex(3);

    expect(box.index).toBe(3);
    expect(box.d).toEqual({ x: 1, y: 0 });
  });

  describe('overlapRegion', () => {
    it('returns the shared rectangle with its area centroid', () => {
      const shifted = Box.aligned({ left: 0.5, right: 1.5, lower: 0, upper: 1 }, { x: 1.5, y: 0 });
      const doorway = unitBox().overlapRegion(shifted);

      expect(doorway).not.toBeNull();
      expect(doorway?.area).toBeCloseTo(0.5);
      expect(doorway?.centroid.x).toBeCloseTo(0.75);
      expect(doorway?.centroid.y).toBeCloseTo(0.5);
    });

    it('treats boxes that only share an edge as not overlapping', () => {
      const neighbour = Box.aligned({ left: 1, right: 2, lower: 0, upper: 1 }, { x: 1.5, y: 0.5 });

      expect(unitBox().overlapRegion(neighbour)).toBeNull();
    });

    it('returns null for disjoint boxes', () => {
      const far = Box.aligned({ left: 3, right: 4, lower: 0, upper: 1 }, { x: 3.5, y: 0.5 });

      expect(unitBox().overlapRegion(far)).toBeNull();
    });
  });
});
