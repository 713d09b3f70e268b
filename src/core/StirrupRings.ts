import type { Level, Point3D, Side, StirrupRing } from '../types';
import type { EntityRegistry } from './EntityRegistry';
import type { SectionProfile } from './SectionProfile';

const EPS = 1e-6;

/**
 * Transverse and vertical stations of every stirrup leg, cover already
 * applied. Where a side has no flange (or one too thin to hold a leg) its
 * outer station collapses onto the web leg and its face onto the ring edge.
 */
export interface RingFrame {
  yInner: number;
  zBottom: number;
  zTop: number;
  outer: Record<Level, Record<Side, number>>;
  face: Record<Level, Record<Side, number>>;
  /** Sides whose flange can carry an outer leg */
  real: Record<Level, Record<Side, boolean>>;
}

export function ringFrame(profile: SectionProfile, cover: number): RingFrame {
  const yInner = profile.halfWeb - cover;
  const zBottom = cover;
  const zTop = profile.height - cover;

  // A leg needs cover on both faces of the flange
  const real = (level: Level, side: Side) =>
    profile.hasFlange(level, side) && profile.flange(level, side).thickness > 2 * cover + EPS;
  const outer = (level: Level, side: Side) =>
    real(level, side) ? profile.halfWeb + profile.flange(level, side).width - cover : yInner;
  const face = (level: Level, side: Side) => {
    if (!real(level, side)) return level === 'lower' ? zBottom : zTop;
    const tf = profile.flange(level, side).thickness;
    return level === 'lower' ? tf - cover : profile.height - tf + cover;
  };

  const perSide = <T>(fn: (level: Level, side: Side) => T): Record<Level, Record<Side, T>> => ({
    lower: { left: fn('lower', 'left'), right: fn('lower', 'right') },
    upper: { left: fn('upper', 'left'), right: fn('upper', 'right') },
  });

  return {
    yInner,
    zBottom,
    zTop,
    outer: perSide(outer),
    face: perSide(face),
    real: perSide(real),
  };
}

/** Leg stations from -left to +right: the two outer legs plus evenly spaced inner ones */
export function spreadLegs(left: number, right: number, legs: number): number[] {
  if (legs <= 2) return [-left, right];
  const k = legs - 2;
  const step = (left + right) / (k + 1);
  const ys = [-left];
  for (let i = 1; i <= k; i++) ys.push(round6(-left + i * step));
  ys.push(right);
  return ys;
}

/**
 * Closed stirrup rings in the y-z plane at a given x.
 *
 * The topology follows the section:
 * - rectangle around the web when legs <= 2 or no level has flanges on both sides
 * - 10-node flanged ring when a level has flanges on both sides; outer legs stop
 *   at each side's flange face, inner legs run full depth split at the face.
 *   Anchored on the lower flanges, or mirrored onto the upper ones
 * - closure rectangles confine every flange band the main ring does not reach
 */
export class StirrupRingBuilder {
  readonly frame: RingFrame;
  private anchor: Level | null;

  constructor(
    private readonly registry: EntityRegistry,
    profile: SectionProfile,
    cover: number,
  ) {
    this.frame = ringFrame(profile, cover);
    const { real } = this.frame;
    if (real.lower.left && real.lower.right) this.anchor = 'lower';
    else if (real.upper.left && real.upper.right) this.anchor = 'upper';
    else this.anchor = null;
  }

  get topology(): 'rectangle' | 'flanged' {
    return this.anchor ? 'flanged' : 'rectangle';
  }

  build(x: number, legs: number, diameter: number): StirrupRing {
    if (legs <= 2 || !this.anchor) {
      return this.rectangleRing(x, legs, diameter);
    }
    return this.flangedRing(x, this.anchor, legs, diameter);
  }

  /**
   * Ring made of a bottom row and a top row of nodes joined segment by
   * segment, with one vertical leg per station.
   */
  buildMultiLeg(x: number, z1: number, z2: number, ys: number[], diameter: number): StirrupRing {
    let stations = Array.from(new Set(ys.map(round6))).sort((a, b) => a - b);
    if (stations.length < 2) stations = [-this.frame.yInner, this.frame.yInner];

    const bottom = stations.map(y => this.node(x, y, z1));
    const top = stations.map(y => this.node(x, y, z2));
    const edges: number[] = [];
    for (let i = 0; i < stations.length - 1; i++) edges.push(this.edge(bottom[i], bottom[i + 1], diameter));
    for (let i = 0; i < stations.length - 1; i++) edges.push(this.edge(top[i], top[i + 1], diameter));
    for (let i = 0; i < stations.length; i++) edges.push(this.edge(bottom[i], top[i], diameter));

    return { x, legs: stations.length, edges, closure: [] };
  }

  // ─── Topologies ───

  private rectangleRing(x: number, legs: number, diameter: number): StirrupRing {
    const { yInner, zBottom, zTop } = this.frame;
    const edges = this.rectangle(x, -yInner, yInner, zBottom, zTop, diameter);
    const ties = legs >= 4 ? legs - 2 : 0;
    edges.push(...this.interiorTies(x, ties, diameter));

    const closure = [
      ...this.closureRing(x, 'lower', diameter),
      ...this.closureRing(x, 'upper', diameter),
    ];
    return { x, legs: 2 + ties, edges, closure };
  }

  private flangedRing(x: number, level: Level, legs: number, diameter: number): StirrupRing {
    const { yInner, zBottom, zTop, outer, face } = this.frame;
    const base = level === 'lower' ? zBottom : zTop;
    const far = level === 'lower' ? zTop : zBottom;
    const yOutL = outer[level].left;
    const yOutR = outer[level].right;
    const zfL = face[level].left;
    const zfR = face[level].right;

    const n1 = this.node(x, -yOutL, base);
    const n2 = this.node(x, -yInner, base);
    const n3 = this.node(x, yInner, base);
    const n4 = this.node(x, yOutR, base);
    const n5 = this.node(x, -yOutL, zfL);
    const n6 = this.node(x, yOutR, zfR);
    const n7 = this.node(x, -yInner, zfL);
    const n8 = this.node(x, yInner, zfR);
    const n9 = this.node(x, -yInner, far);
    const n10 = this.node(x, yInner, far);

    const pairs: [number, number][] = [
      [n1, n2], [n2, n3], [n3, n4],   // base
      [n1, n5], [n4, n6],             // outer legs, flange only
      [n2, n7], [n7, n9],             // left inner leg
      [n3, n8], [n8, n10],            // right inner leg
      [n5, n7], [n8, n6],             // flange face ties
      [n9, n10],                      // far edge
    ];
    if (Math.abs(zfL - zfR) <= EPS) pairs.push([n5, n6]);
    const edges = pairs.map(([a, b]) => this.edge(a, b, diameter));

    const ties = Math.max(4, legs) - 4;
    edges.push(...this.interiorTies(x, ties, diameter));

    const other: Level = level === 'lower' ? 'upper' : 'lower';
    return { x, legs: 4 + ties, edges, closure: this.closureRing(x, other, diameter) };
  }

  /** Full-depth ties evenly spaced between the web legs */
  private interiorTies(x: number, count: number, diameter: number): number[] {
    const { yInner, zBottom, zTop } = this.frame;
    if (count <= 0 || yInner <= EPS) return [];
    const step = (2 * yInner) / (count + 1);
    const edges: number[] = [];
    for (let i = 1; i <= count; i++) {
      const y = -yInner + i * step;
      edges.push(this.edge(this.node(x, y, zBottom), this.node(x, y, zTop), diameter));
    }
    return edges;
  }

  /** Rectangle confined to one level's flange band; empty when there is nothing to close */
  private closureRing(x: number, level: Level, diameter: number): number[] {
    const { yInner, zBottom, zTop, outer, face, real } = this.frame;
    const sides = (['left', 'right'] as const).filter(s => real[level][s]);
    if (sides.length === 0) return [];

    const yLeft = outer[level].left;
    const yRight = outer[level].right;
    if (Math.max(yLeft, yRight) <= yInner + EPS) return [];

    const faces = sides.map(s => face[level][s]);
    const [z1, z2] = level === 'lower'
      ? [zBottom, Math.min(...faces)]
      : [Math.max(...faces), zTop];
    if (z2 - z1 <= EPS) return [];

    return this.rectangle(x, -yLeft, yRight, z1, z2, diameter);
  }

  private rectangle(x: number, y1: number, y2: number, z1: number, z2: number, diameter: number): number[] {
    const a = this.node(x, y1, z1);
    const b = this.node(x, y2, z1);
    const c = this.node(x, y2, z2);
    const d = this.node(x, y1, z2);
    return [
      this.edge(a, b, diameter),
      this.edge(b, c, diameter),
      this.edge(c, d, diameter),
      this.edge(d, a, diameter),
    ];
  }

  private node(x: number, y: number, z: number): number {
    const p: Point3D = { x, y, z };
    return this.registry.addNode(p);
  }

  private edge(a: number, b: number, diameter: number): number {
    return this.registry.addEdge(a, b, diameter);
  }
}

function round6(v: number): number {
  return Math.round(v * 1e6) / 1e6;
}
