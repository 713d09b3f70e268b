import { GeometryError } from '../errors';
import type { DuctCylinder, Layer, Point2D, SolidAssembly } from '../types';
import type { EntityRegistry } from './EntityRegistry';
import { FilletProcessor } from './FilletProcessor';
import { openingBounds, type OpeningParams } from './schema';
import type { SectionProfile } from './SectionProfile';

const EPS = 1e-6;

export interface SolidTag {
  label: string;
  layer: Layer;
}

/**
 * GeometryEngine — boundary representation of the beam concrete.
 *
 * Each rectangular sub-component (web, flanges) of each layer becomes one
 * box solid: 8 nodes, 12 edges, 6 faces. Openings pierce the web along y:
 * the rounded outline, clipped to the layer's height, becomes an inner loop
 * on both y-faces, and one tunnel wall per loop edge closes the hole.
 */
export class GeometryEngine {
  private fillet = new FilletProcessor();

  constructor(private readonly registry: EntityRegistry) {}

  buildComposite(
    profile: SectionProfile,
    openings: OpeningParams[],
    ducts: DuctCylinder[] = [],
  ): Record<Layer, SolidAssembly> {
    const build = (layer: Layer): SolidAssembly => {
      const solids = profile.layerComponents(layer).map(c =>
        this.buildLayerSolid(
          [0, profile.length], c.y, c.z,
          c.isWeb ? openings : [],
          { label: c.label, layer },
        ));
      return {
        layer,
        zRange: profile.layerRange(layer),
        solids,
        voids: layer === 'precast' ? [...ducts] : [],
      };
    };
    return { precast: build('precast'), cast: build('cast') };
  }

  /** Returns the solid id */
  buildLayerSolid(
    xRange: [number, number],
    yRange: [number, number],
    zRange: [number, number],
    openings: OpeningParams[],
    tag: SolidTag = { label: 'block', layer: 'precast' },
  ): number {
    const reg = this.registry;
    const [x0, x1] = xRange;
    const [y0, y1] = yRange;
    const [z0, z1] = zRange;

    // ─── Box ───

    const n = [
      reg.addNode({ x: x0, y: y0, z: z0 }),
      reg.addNode({ x: x1, y: y0, z: z0 }),
      reg.addNode({ x: x1, y: y1, z: z0 }),
      reg.addNode({ x: x0, y: y1, z: z0 }),
      reg.addNode({ x: x0, y: y0, z: z1 }),
      reg.addNode({ x: x1, y: y0, z: z1 }),
      reg.addNode({ x: x1, y: y1, z: z1 }),
      reg.addNode({ x: x0, y: y1, z: z1 }),
    ];
    const pairs: [number, number][] = [
      [0, 1], [1, 2], [2, 3], [3, 0], // bottom
      [4, 5], [5, 6], [6, 7], [7, 4], // top
      [1, 5], [2, 6], [3, 7], [0, 4], // verticals
    ];
    const e = pairs.map(([a, b]) => reg.addEdge(n[a], n[b]));

    const faceYMinInners: number[][] = [];
    const faceYMaxInners: number[][] = [];
    const tunnelWalls: number[][] = [];

    // ─── Openings ───

    openings.forEach((opening, index) => {
      const b = openingBounds(opening);
      if (b.top <= z0 + EPS || b.bottom >= z1 - EPS) return;
      if (b.left < x0 - EPS || b.right > x1 + EPS) {
        throw new GeometryError(`Opening ${index + 1} spans x ${b.left}..${b.right} outside the solid ${x0}..${x1}`);
      }

      const outline = this.fillet.generateFilletBoundary(b.left, b.bottom, opening.width, opening.height, opening.filletRadius);
      const loop = dedupe(clipToSlab(outline, z0, z1));
      if (loop.length < 3 || Math.abs(polygonArea(loop)) < EPS) {
        throw new GeometryError(`Opening ${index + 1} degenerates when clipped to z ${z0}..${z1}`);
      }

      const nodesA = loop.map(p => reg.addNode({ x: p.x, y: y0, z: p.z }));
      const nodesB = loop.map(p => reg.addNode({ x: p.x, y: y1, z: p.z }));
      const ring = (nodes: number[]) => nodes.map((id, i) => reg.addEdge(id, nodes[(i + 1) % nodes.length]));
      const loopA = ring(nodesA);
      const loopB = ring(nodesB);
      const connectors = nodesA.map((id, i) => reg.addEdge(id, nodesB[i]));

      faceYMinInners.push(loopA);
      faceYMaxInners.push(loopB);
      for (let i = 0; i < loop.length; i++) {
        tunnelWalls.push([loopA[i], connectors[(i + 1) % loop.length], loopB[i], connectors[i]]);
      }
    });

    // ─── Faces ───

    const surfaces = [
      reg.addSurface([e[0], e[1], e[2], e[3]]),                   // z min
      reg.addSurface([e[4], e[5], e[6], e[7]]),                   // z max
      reg.addSurface([e[0], e[8], e[4], e[11]], faceYMinInners),  // y min
      reg.addSurface([e[2], e[10], e[6], e[9]], faceYMaxInners),  // y max
      reg.addSurface([e[3], e[11], e[7], e[10]]),                 // x min
      reg.addSurface([e[1], e[9], e[5], e[8]]),                   // x max
      ...tunnelWalls.map(w => reg.addSurface(w)),
    ];

    return reg.addSolid(surfaces, tag.label, tag.layer);
  }
}

/** Sutherland–Hodgman against the half-planes z >= zMin and z <= zMax */
export function clipToSlab(points: Point2D[], zMin: number, zMax: number): Point2D[] {
  const below = clipAgainst(points, zMax, 'below');
  return clipAgainst(below, zMin, 'above');
}

function clipAgainst(points: Point2D[], value: number, side: 'above' | 'below'): Point2D[] {
  if (points.length < 3) return [];

  const isInside = (p: Point2D): boolean => (side === 'below' ? p.z <= value : p.z >= value);
  const intersect = (p1: Point2D, p2: Point2D): Point2D => {
    const t = (value - p1.z) / (p2.z - p1.z);
    return { x: p1.x + t * (p2.x - p1.x), z: value };
  };

  const result: Point2D[] = [];
  for (let i = 0; i < points.length; i++) {
    const current = points[i];
    const next = points[(i + 1) % points.length];
    const currentInside = isInside(current);
    const nextInside = isInside(next);
    if (currentInside) {
      result.push(current);
      if (!nextInside) result.push(intersect(current, next));
    } else if (nextInside) {
      result.push(intersect(current, next));
    }
  }
  return result;
}

function dedupe(points: Point2D[]): Point2D[] {
  const result: Point2D[] = [];
  for (const p of points) {
    const last = result[result.length - 1];
    if (last && Math.abs(last.x - p.x) < EPS && Math.abs(last.z - p.z) < EPS) continue;
    result.push(p);
  }
  while (result.length > 1) {
    const first = result[0];
    const last = result[result.length - 1];
    if (Math.abs(first.x - last.x) >= EPS || Math.abs(first.z - last.z) >= EPS) break;
    result.pop();
  }
  return result;
}

/** Signed shoelace area; positive for counter-clockwise loops */
export function polygonArea(points: Point2D[]): number {
  let area = 0;
  for (let i = 0; i < points.length; i++) {
    const a = points[i];
    const b = points[(i + 1) % points.length];
    area += a.x * b.z - b.x * a.z;
  }
  return area / 2;
}
