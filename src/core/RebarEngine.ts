import { GeometryError } from '../errors';
import type { EnhancementOutcome, StirrupRing, SynthesisOptions, ValidationWarning } from '../types';
import type { EntityRegistry } from './EntityRegistry';
import {
  openingBounds, type LongitudinalRebar, type OpeningBounds, type OpeningParams, type RebarSpec,
  type StirrupParams, type SupportZone,
} from './schema';
import type { SectionProfile, TransverseExtent } from './SectionProfile';
import { StirrupRingBuilder, spreadLegs } from './StirrupRings';

const EPS = 1e-6;

export const CLOSURE_GROUP = 'stirrup_closure_auto';

export interface RebarLayout {
  rings: StirrupRing[];
  enhancements: EnhancementOutcome[];
  warnings: ValidationWarning[];
}

interface BarStation {
  y: number;
  z: number;
}

/**
 * RebarEngine — longitudinal bars, stirrup rings and opening reinforcement.
 *
 * Every bar is a chain of segments along x. Segments are dropped, never
 * moved, where they would pass through an opening in the web. Every edge
 * lands in exactly one named group of the registry.
 */
export class RebarEngine {
  private rings: StirrupRingBuilder;
  private padded: OpeningBounds[];
  // Full-span longitudinal stations already occupied, used to place corner bars
  private stations: BarStation[] = [];

  constructor(
    private readonly registry: EntityRegistry,
    private readonly profile: SectionProfile,
    private readonly cover: number,
    private readonly openings: OpeningParams[],
    private readonly options: SynthesisOptions,
  ) {
    this.rings = new StirrupRingBuilder(registry, profile, cover);
    const pad = options.openingClearance;
    this.padded = openings.map(o => {
      const b = openingBounds(o);
      return { left: b.left - pad, right: b.right + pad, bottom: b.bottom - pad, top: b.top + pad };
    });
  }

  generate(longitudinal: LongitudinalRebar, stirrups: StirrupParams): RebarLayout {
    const warnings: ValidationWarning[] = [];
    const enhancements = this.createLongitudinalRebars(longitudinal);
    const rings = this.createStirrups(stirrups);
    this.openings.forEach((_, i) => {
      const result = this.createOpeningReinforcement(i);
      rings.push(...result.rings);
      warnings.push(...result.warnings);
    });
    enhancements.push(this.closureOutcome());
    return { rings, enhancements, warnings };
  }

  // ─── Longitudinal bars ───

  createLongitudinalRebars(long: LongitudinalRebar): EnhancementOutcome[] {
    const L = this.profile.length;
    const H = this.profile.height;
    const cover = this.cover;
    const { top, bottom } = long;

    const topZs = (spec: RebarSpec) => stackedZs(H - cover, top.rows, top.rowSpacing, spec.diameter, -1);
    const bottomZs = (spec: RebarSpec) => stackedZs(cover, bottom.rows, bottom.rowSpacing, spec.diameter, 1);

    // Top
    this.placeGroup('top_through', 0, L, topZs(top.through), top.through, 0, true);
    this.placeSupport('left', top.leftSupport, topZs);
    this.placeSupport('right', top.rightSupport, topZs);

    // Bottom
    this.placeGroup('bottom_through_A', 0, L, bottomZs(bottom.throughA), bottom.throughA, 0, true);
    if (bottom.throughB) {
      this.placeGroup('bottom_through_B', 0, L, bottomZs(bottom.throughB), bottom.throughB, bottom.throughA.count, true);
    }

    return [
      attempt('top_corner_bars', () => this.topCornerBars(top.through.diameter)),
      attempt('bottom_corner_bars', () => this.bottomCornerBars(bottom.throughA.diameter)),
    ];
  }

  private placeSupport(side: 'left' | 'right', zone: SupportZone, zs: (spec: RebarSpec) => number[]): void {
    const L = this.profile.length;
    const len = zone.length > 0 ? zone.length : L / 3;
    const { groupA, groupB } = zone;

    if (groupA) {
      const [x0, x1] = side === 'left' ? [0, len] : [L - len, L];
      this.placeGroup(`top_${side}_support_A`, x0, x1, zs(groupA), groupA, 0);
    }
    if (groupB) {
      const reach = len + groupB.extendLength;
      const [x0, x1] = side === 'left' ? [0, Math.min(reach, L)] : [Math.max(L - reach, 0), L];
      this.placeGroup(`top_${side}_support_B`, x0, x1, zs(groupB), groupB, groupA?.count ?? 0);
    }
  }

  private placeGroup(
    name: string, x0: number, x1: number, zs: number[], spec: RebarSpec, avoid: number, fullSpan = false,
  ): void {
    for (const z of zs) {
      const ys = this.calculateYPositions(this.profile.coveredExtentAt(z, this.cover), spec.count, avoid);
      if (fullSpan) this.stations.push(...ys.map(y => ({ y, z })));
      this.registry.addToGroup(name, this.createRebarLine(x0, x1, z, ys, spec.diameter, this.options.primarySegments));
    }
  }

  /**
   * `count` bars evenly spaced across the extent (a single bar sits on the
   * centerline). A group avoiding `avoid` primary bars takes the free slots
   * of the combined evenly spaced sequence, keeping the plain spacing when
   * the free slots do not number exactly `count`.
   */
  calculateYPositions(extent: TransverseExtent, count: number, avoid = 0): number[] {
    if (count <= 0) return [];
    if (count === 1) return [0];

    const width = extent.left + extent.right;
    const spaced = (n: number) => Array.from({ length: n }, (_, i) => -extent.left + (i * width) / (n - 1));
    const plain = spaced(count);
    if (avoid <= 0) return plain;

    const total = count + avoid;
    const used = new Set<number>();
    if (avoid === 1) {
      used.add(Math.round((total - 1) / 2));
    } else {
      for (let i = 0; i < avoid; i++) used.add(Math.round((i * (total - 1)) / (avoid - 1)));
    }
    const free = spaced(total).filter((_, i) => !used.has(i));
    return free.length === count ? free : plain;
  }

  /** Parallel bars from x0 to x1, one per y; returns the kept segment ids */
  createRebarLine(x0: number, x1: number, z: number, ys: number[], diameter: number, segments: number): number[] {
    const edges: number[] = [];
    const xs = Array.from({ length: segments + 1 }, (_, i) => x0 + (i * (x1 - x0)) / segments);
    for (const y of ys) {
      const nodes = xs.map(x => this.registry.addNode({ x, y, z }));
      for (let i = 0; i < segments; i++) {
        if (this.hitsOpening(xs[i], xs[i + 1], y, z)) continue;
        edges.push(this.registry.addEdge(nodes[i], nodes[i + 1], diameter));
      }
    }
    return edges;
  }

  /** A constant-height segment inside the web band crossing any padded opening void */
  private hitsOpening(xa: number, xb: number, y: number, z: number): boolean {
    if (Math.abs(y) > this.profile.halfWeb - EPS) return false;
    const lo = Math.min(xa, xb);
    const hi = Math.max(xa, xb);
    return this.padded.some(p =>
      z > p.bottom + EPS && z < p.top - EPS && hi > p.left + EPS && lo < p.right - EPS);
  }

  // ─── Corner bars ───

  private topCornerBars(diameter: number): EnhancementOutcome {
    const name = 'top_corner_bars';
    if (!this.profile.capabilities.hasTopFlange) {
      return { name, ok: false, reason: 'section has no top flange' };
    }
    const z = this.profile.height - this.cover;
    const corners = (['left', 'right'] as const)
      .filter(s => this.profile.hasFlange('upper', s))
      .map(s => this.cornerStation('upper', s, z));
    return this.placeCorners(name, 'top_corner_auto', corners, diameter);
  }

  /** One bar per lower flange, just under its top face; flanges too thin for cover get none */
  private bottomCornerBars(diameter: number): EnhancementOutcome {
    const name = 'bottom_corner_bars';
    if (!this.profile.capabilities.hasBottomFlange) {
      return { name, ok: false, reason: 'section has no bottom flange' };
    }
    const corners: BarStation[] = [];
    for (const side of ['left', 'right'] as const) {
      if (!this.profile.hasFlange('lower', side)) continue;
      const z = this.profile.flange('lower', side).thickness - this.cover;
      if (z <= this.cover + EPS) continue;
      corners.push(this.cornerStation('lower', side, z));
    }
    if (corners.length === 0) {
      return { name, ok: false, reason: `bottom flange leaves no room above cover ${this.cover}` };
    }
    return this.placeCorners(name, 'bottom_corner_auto', corners, diameter);
  }

  /** Outermost bar station of one flange; throws when it falls outside the concrete */
  private cornerStation(level: 'upper' | 'lower', side: 'left' | 'right', z: number): BarStation {
    const extent = this.profile.coveredExtentAt(z, this.cover);
    const reach = this.profile.halfWeb + this.profile.flange(level, side).width - this.cover;
    if (reach > extent[side] + EPS) {
      throw new GeometryError(`${side} ${level} corner at z=${z} falls outside the flange`);
    }
    return { y: side === 'left' ? -reach : reach, z };
  }

  private placeCorners(name: string, group: string, corners: BarStation[], diameter: number): EnhancementOutcome {
    const free = corners.filter(c =>
      !this.stations.some(s => Math.abs(s.y - c.y) < EPS && Math.abs(s.z - c.z) < EPS));
    if (free.length === 0) {
      return { name, ok: false, reason: 'corner stations already carry through bars' };
    }
    const edges = free.flatMap(c =>
      this.createRebarLine(0, this.profile.length, c.z, [c.y], diameter, this.options.primarySegments));
    this.registry.addToGroup(group, edges, true);
    this.stations.push(...free);
    return { name, ok: true, edgeCount: edges.length };
  }

  // ─── Stirrups ───

  createStirrups(st: StirrupParams): StirrupRing[] {
    const L = this.profile.length;
    const cover = this.cover;
    const dense = st.denseZoneLength;
    const zones: [string, number, number, number, number, number][] = [
      ['left_dense_stirrups', cover, dense, st.denseSpacing, st.denseLegs, st.denseDiameter],
      ['right_dense_stirrups', L - dense, L - cover, st.denseSpacing, st.denseLegs, st.denseDiameter],
      ['normal_stirrups', dense, L - dense, st.normalSpacing, st.normalLegs, st.normalDiameter],
    ];

    const rings: StirrupRing[] = [];
    for (const [group, x0, x1, spacing, legs, diameter] of zones) {
      for (const x of stations(x0, x1, spacing)) {
        if (this.insideOpeningSpan(x)) continue;
        rings.push(this.placeRing(group, this.rings.build(x, legs, diameter)));
      }
    }
    return rings;
  }

  private insideOpeningSpan(x: number, except = -1): boolean {
    return this.padded.some((p, i) => i !== except && x >= p.left - EPS && x <= p.right + EPS);
  }

  private placeRing(group: string, ring: StirrupRing): StirrupRing {
    this.registry.addToGroup(group, ring.edges);
    if (ring.closure.length > 0) this.registry.addToGroup(CLOSURE_GROUP, ring.closure, true);
    return ring;
  }

  private closureOutcome(): EnhancementOutcome {
    const name = 'stirrup_closure';
    const count = this.registry.group(CLOSURE_GROUP).length;
    if (count > 0) return { name, ok: true, edgeCount: count };
    const { hasTopFlange, hasBottomFlange } = this.profile.capabilities;
    const reason = hasTopFlange || hasBottomFlange
      ? 'every flange band is held by the main ring or too thin for cover'
      : 'section has no flanges';
    return { name, ok: false, reason };
  }

  // ─── Opening reinforcement ───

  createOpeningReinforcement(index: number): { rings: StirrupRing[]; warnings: ValidationWarning[] } {
    const o = this.openings[index];
    const prefix = `opening_${index + 1}`;
    const b = openingBounds(o);
    const rings: StirrupRing[] = [];
    const warnings: ValidationWarning[] = [];

    if (o.topBars || o.bottomBars) {
      warnings.push(...this.openingBars(o, prefix));
    }

    const side = o.sideStirrups;
    if (side) {
      const pad = this.options.openingClearance;
      const zones: [string, number, number, number][] = [
        [`${prefix}.left_stirrups`, b.left - side.leftLength, b.left - pad, side.leftLength],
        [`${prefix}.right_stirrups`, b.right + pad, b.right + side.rightLength, side.rightLength],
      ];
      for (const [group, x0, x1, length] of zones) {
        if (length <= 0) continue;
        for (const x of stations(x0, x1, side.spacing)) {
          if (x < this.cover - EPS || x > this.profile.length - this.cover + EPS) continue;
          if (this.insideOpeningSpan(x, index)) continue;
          rings.push(this.placeRing(group, this.rings.build(x, side.legs, side.diameter)));
        }
      }
    }

    if (o.beamStirrups) {
      rings.push(...this.openingBeamStirrups(index, b, prefix, o.beamStirrups));
    }

    return { rings, warnings };
  }

  private openingBars(o: OpeningParams, prefix: string): ValidationWarning[] {
    const L = this.profile.length;
    const H = this.profile.height;
    const cover = this.cover;
    const b = openingBounds(o);
    const extend = o.barExtend > 0 ? o.barExtend : this.options.openingBarExtend;
    const x0 = Math.max(0, b.left - extend);
    const x1 = Math.min(L, b.right + extend);
    const web = this.profile.halfWeb - cover;
    const warnings: ValidationWarning[] = [];

    const place = (group: string, spec: RebarSpec, ideal: number, z: number) => {
      if (Math.abs(z - ideal) > EPS) {
        warnings.push({ source: 'rebar', message: `${group} moved from z=${ideal} to z=${z} to stay inside the beam` });
      }
      const ys = this.calculateYPositions({ left: web, right: web }, spec.count);
      this.registry.addToGroup(group, this.createRebarLine(x0, x1, z, ys, spec.diameter, this.options.openingSegments));
    };

    if (o.topBars) place(`${prefix}.top_bars`, o.topBars, b.top + cover, Math.min(b.top + cover, H - cover));
    if (o.bottomBars) place(`${prefix}.bottom_bars`, o.bottomBars, b.bottom - cover, Math.max(b.bottom - cover, cover));
    return warnings;
  }

  /**
   * Cages of the two small beams above and below the opening, at a fixed
   * pitch over the opening span with both ends included.
   */
  private openingBeamStirrups(
    index: number,
    b: OpeningBounds,
    prefix: string,
    spec: NonNullable<OpeningParams['beamStirrups']>,
  ): StirrupRing[] {
    const H = this.profile.height;
    const cover = this.cover;
    const pad = this.options.openingClearance;
    const legs = Math.max(2, spec.legs > 0 ? spec.legs : 4);
    const { yInner, outer, face, real } = this.rings.frame;

    let x0 = b.left + pad;
    let x1 = b.right - pad;
    if (x1 <= x0 + EPS) {
      x0 = x1 = (b.left + b.right) / 2;
    }
    const xs = Array.from(new Set([...stations(x0, x1, spec.spacing), x0, x1].map(v => Math.round(v * 1e6) / 1e6)))
      .sort((p, q) => p - q);

    const rings: StirrupRing[] = [];

    // Band above the opening
    const topGroup = `${prefix}.top_beam_stirrups`;
    const topZ1 = Math.max(cover, Math.min(b.top + cover, H - cover));
    for (const x of xs) {
      const [z1, z2] = this.clearBand(x, index, topZ1, H - cover);
      if (z2 <= z1 + EPS) continue;
      rings.push(this.placeRing(topGroup,
        this.rings.buildMultiLeg(x, z1, z2, spreadLegs(yInner, yInner, legs), spec.diameter)));
    }

    // Band below the opening, wrapping the lower flanges where they exist
    const botGroup = `${prefix}.bottom_beam_stirrups`;
    const outL = outer.lower.left;
    const outR = outer.lower.right;
    const flanged = outL > yInner + EPS || outR > yInner + EPS;
    const faces = (['left', 'right'] as const).filter(s => real.lower[s]).map(s => face.lower[s]);
    const zFace = faces.length > 0 ? Math.min(...faces) : cover;
    for (const x of xs) {
      const [z1, z2] = this.clearBand(x, index, cover, Math.min(H - cover, b.bottom - cover));
      if (z2 <= z1 + EPS) continue;
      const zStep = Math.min(z2, zFace);
      if (flanged && legs >= 4 && zStep > z1 + EPS && zStep < z2 - EPS) {
        // Inner cage over the web plus a two-leg ring held within the flange band
        rings.push(this.placeRing(botGroup,
          this.rings.buildMultiLeg(x, z1, z2, spreadLegs(yInner, yInner, Math.max(2, legs - 2)), spec.diameter)));
        rings.push(this.placeRing(botGroup,
          this.rings.buildMultiLeg(x, z1, zStep, [-outL, outR], spec.diameter)));
      } else if (flanged && z1 < zFace - EPS && z2 <= zFace + EPS) {
        rings.push(this.placeRing(botGroup,
          this.rings.buildMultiLeg(x, z1, z2, spreadLegs(outL, outR, legs), spec.diameter)));
      } else {
        rings.push(this.placeRing(botGroup,
          this.rings.buildMultiLeg(x, z1, z2, spreadLegs(yInner, yInner, legs), spec.diameter)));
      }
    }

    return rings;
  }

  /**
   * Vertical band [z1, z2] at x, shortened to keep `cover` clear of every
   * other opening whose padded span contains x.
   */
  private clearBand(x: number, index: number, z1: number, z2: number): [number, number] {
    const own = openingBounds(this.openings[index]);
    for (const [i, o] of this.openings.entries()) {
      const p = this.padded[i];
      if (i === index || x < p.left - EPS || x > p.right + EPS) continue;
      const other = openingBounds(o);
      if (other.bottom >= own.top - EPS) z2 = Math.min(z2, other.bottom - this.cover);
      else if (other.top <= own.bottom + EPS) z1 = Math.max(z1, other.top + this.cover);
    }
    return [z1, z2];
  }
}

/** Row heights: the first at `base`, the rest stacked at bar diameter plus net spacing */
export function stackedZs(base: number, rows: number, spacing: number, diameter: number, direction: 1 | -1): number[] {
  const n = Math.max(1, Math.floor(rows));
  const step = diameter > EPS ? diameter + Math.max(0, spacing) : Math.max(0, spacing);
  return Array.from({ length: n }, (_, i) => base + direction * i * step);
}

/** x0, x0 + s, x0 + 2s, ... up to and including x1 */
export function stations(x0: number, x1: number, spacing: number): number[] {
  if (spacing <= 0 || x1 < x0 - EPS) return [];
  const n = Math.floor((x1 - x0) / spacing + EPS) + 1;
  const xs: number[] = [];
  for (let i = 0; i < n; i++) {
    const x = x0 + i * spacing;
    if (x <= x1 + EPS) xs.push(x);
  }
  return xs;
}

function attempt(name: string, run: () => EnhancementOutcome): EnhancementOutcome {
  try {
    return run();
  } catch (err) {
    if (err instanceof GeometryError) return { name, ok: false, reason: err.message };
    throw err;
  }
}
