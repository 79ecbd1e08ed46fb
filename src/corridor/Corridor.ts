import { CorridorInvalidError } from '../errors.js';
import type { Box, Doorway } from '../geometry/Box.js';
import { bearing, distance, normaliseAngle, pointsApproxEqual } from '../geometry/vector.js';
import type { Pose, Vector2 } from '../types/index.js';
import { createLogger } from '../utils/debug.js';

const debug = createLogger('corridor');

export interface TargetBearing {
  distance: number;
  /**
   * Signed turn in (-PI, PI] that would make the heading face the target. Positive is counter-clockwise.
   */
  angleDelta: number;
}

/**
 * Ordered, read-only sequence of boxes. Every neighbouring pair must overlap; the overlap of
 * box i and box i + 1 is doorway i.
 */
export class Corridor {
  private readonly boxList: readonly Box[];
  private readonly doorways: readonly Doorway[];

  public constructor(boxes: readonly Box[]) {
    if (boxes.length === 0) {
      throw new CorridorInvalidError('A corridor needs at least one box');
    }

    this.boxList = Object.freeze(boxes.map((box, index) => (box.index === index ? box : box.withIndex(index))));

    const doorways: Doorway[] = [];
    for (let index = 0; index + 1 < this.boxList.length; index += 1) {
      const doorway = this.boxList[index].overlapRegion(this.boxList[index + 1]);
      if (!doorway) {
        throw new CorridorInvalidError(`Box ${index} and box ${index + 1} do not overlap`, index);
      }
      doorways.push(doorway);
    }
    this.doorways = Object.freeze(doorways);

    debug(`corridor built with ${this.boxList.length} boxes`);
  }

  public get length(): number {
    return this.boxList.length;
  }

  public get lastIndex(): number {
    return this.boxList.length - 1;
  }

  public get boxes(): readonly Box[] {
    return this.boxList;
  }

  public get finalTarget(): Vector2 {
    return this.boxList[this.lastIndex].target;
  }

  public box(index: number): Box {
    const box = this.boxList[index];
    if (!box) {
      throw new RangeError(`No box at index ${index}`);
    }
    return box;
  }

  /**
   * Doorway between box `index` and box `index + 1`.
   */
  public doorway(index: number): Doorway {
    const doorway = this.doorways[index];
    if (!doorway) {
      throw new RangeError(`No doorway after box ${index}`);
    }
    return doorway;
  }

  /**
   * Point the agent aims at while it occupies box `boxIndex`.
   */
  public targetFor(boxIndex: number): Vector2 {
    if (boxIndex >= this.lastIndex) {
      return this.finalTarget;
    }
    return this.doorway(boxIndex).centroid;
  }

  public boxesContaining(point: Vector2): number[] {
    return this.boxList.filter((box) => box.contains(point)).map((box) => box.index);
  }

  /**
   * First box at or after `fromIndex` that contains the point.
   */
  public locate(point: Vector2, fromIndex = 0): number | undefined {
    for (let index = Math.max(0, fromIndex); index < this.boxList.length; index += 1) {
      if (this.boxList[index].contains(point)) {
        return index;
      }
    }
    return undefined;
  }

  public distanceAndHeadingTo(pose: Pose, target: Vector2): TargetBearing {
    const remaining = distance(pose.position, target);
    if (pointsApproxEqual(pose.position, target, 1e-12)) {
      return { distance: remaining, angleDelta: 0 };
    }

    return {
      distance: remaining,
      angleDelta: normaliseAngle(bearing(pose.position, target) - pose.heading),
    };
  }
}
