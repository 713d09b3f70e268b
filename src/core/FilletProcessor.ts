import * as THREE from 'three';
import type { Point2D } from '../types';

// 8 divisions → 9 points per quarter arc
const ARC_DIVISIONS = 8;
const EPS = 1e-9;

export interface FilletArcs {
  bottomLeft: Point2D[];
  bottomRight: Point2D[];
  topRight: Point2D[];
  topLeft: Point2D[];
}

/**
 * Rounds the four corners of a rectangular opening outline.
 *
 * All methods take the opening's lower-left corner (x, z) in the elevation
 * plane plus its width and height.
 */
export class FilletProcessor {
  /** A zero radius disables rounding; otherwise the arcs must fit the shorter side */
  validate(radius: number, width: number, height: number): boolean {
    if (radius === 0) return true;
    if (!(radius > 0)) return false;
    return radius <= Math.min(width, height) / 2;
  }

  calculateFilletPoints(x: number, z: number, width: number, height: number, radius: number): FilletArcs {
    const r = radius;
    return {
      bottomLeft: this.arc(x + r, z + r, r, Math.PI, 1.5 * Math.PI),
      bottomRight: this.arc(x + width - r, z + r, r, 1.5 * Math.PI, 2 * Math.PI),
      topRight: this.arc(x + width - r, z + height - r, r, 0, 0.5 * Math.PI),
      topLeft: this.arc(x + r, z + height - r, r, 0.5 * Math.PI, Math.PI),
    };
  }

  /**
   * Closed counter-clockwise outline. Arcs are joined by the straight parts of
   * each side; the closing side runs from the last point back to the first.
   */
  generateFilletBoundary(x: number, z: number, width: number, height: number, radius: number): Point2D[] {
    if (radius === 0) {
      return [
        { x, z },
        { x: x + width, z },
        { x: x + width, z: z + height },
        { x, z: z + height },
      ];
    }

    const arcs = this.calculateFilletPoints(x, z, width, height, radius);
    const boundary: Point2D[] = [];
    for (const p of [...arcs.bottomLeft, ...arcs.bottomRight, ...arcs.topRight, ...arcs.topLeft]) {
      const last = boundary[boundary.length - 1];
      if (last && samePoint(last, p)) continue;
      boundary.push(p);
    }
    // Arcs meet when the radius is half a side
    if (boundary.length > 1 && samePoint(boundary[0], boundary[boundary.length - 1])) {
      boundary.pop();
    }
    return boundary;
  }

  private arc(cx: number, cz: number, r: number, start: number, end: number): Point2D[] {
    const curve = new THREE.ArcCurve(cx, cz, r, start, end, false);
    return curve.getPoints(ARC_DIVISIONS).map(v => ({ x: v.x, z: v.y }));
  }
}

function samePoint(a: Point2D, b: Point2D): boolean {
  return Math.abs(a.x - b.x) < EPS && Math.abs(a.z - b.z) < EPS;
}
