import * as THREE from 'three';
import type { EntityGraph, GraphNode, Layer, RebarGroup } from '../types';

export type GroupKind = 'longitudinal' | 'stirrup' | 'opening' | 'auto';

// Line colors per reinforcement kind and concrete layer
const KIND_COLORS: Record<GroupKind, number> = {
  longitudinal: 0xd04a3a,  // Red
  stirrup: 0x3a7bd0,       // Blue
  opening: 0xe0a030,       // Amber
  auto: 0x40b070,          // Green
};

const LAYER_COLORS: Record<Layer, number> = {
  precast: 0x9a9a9a,
  cast: 0xc8c0b0,
};

// Scene units are meters, the graph is in millimeters
const SCALE = 0.001;

export function groupKind(group: RebarGroup): GroupKind {
  if (group.auto) return 'auto';
  if (group.name.startsWith('opening_')) return 'opening';
  if (group.name.endsWith('_stirrups')) return 'stirrup';
  return 'longitudinal';
}

/**
 * Wireframe preview of a synthesized beam. Beam z (up) maps to scene Y,
 * beam y (transverse) to scene Z.
 */
export class MeshBuilder {
  private material_cache: Map<number, THREE.LineBasicMaterial> = new Map();

  buildBeam(graph: EntityGraph): THREE.Group {
    const group = new THREE.Group();
    group.name = 'compositeBeam';

    const nodes = new Map(graph.nodes.map(n => [n.id, n]));
    const edges = new Map(graph.edges.map(e => [e.id, e]));
    const surfaces = new Map(graph.surfaces.map(s => [s.id, s]));

    for (const solid of graph.solids) {
      const ids = new Set<number>();
      for (const sid of solid.surfaces) {
        const surface = surfaces.get(sid);
        if (!surface) continue;
        for (const loop of [surface.outer, ...surface.inners]) {
          for (const eid of loop) ids.add(eid);
        }
      }
      const lines = this.buildLines([...ids], nodes, edges, LAYER_COLORS[solid.layer]);
      lines.name = `solid-${solid.id}`;
      lines.userData = { label: solid.label, layer: solid.layer };
      group.add(lines);
    }

    for (const rebar of graph.groups) {
      if (rebar.edges.length === 0) continue;
      const kind = groupKind(rebar);
      const lines = this.buildLines(rebar.edges, nodes, edges, KIND_COLORS[kind]);
      lines.name = rebar.name;
      lines.userData = { kind, auto: rebar.auto };
      group.add(lines);
    }

    return group;
  }

  private buildLines(
    edgeIds: readonly number[],
    nodes: Map<number, GraphNode>,
    edges: Map<number, { start: number; end: number }>,
    color: number,
  ): THREE.LineSegments {
    const positions: number[] = [];
    for (const id of edgeIds) {
      const edge = edges.get(id);
      if (!edge) continue;
      const a = nodes.get(edge.start);
      const b = nodes.get(edge.end);
      if (!a || !b) continue;
      positions.push(...toScene(a), ...toScene(b));
    }
    const geometry = new THREE.BufferGeometry();
    geometry.setAttribute('position', new THREE.Float32BufferAttribute(positions, 3));
    return new THREE.LineSegments(geometry, this.getMaterial(color));
  }

  private getMaterial(color: number): THREE.LineBasicMaterial {
    let mat = this.material_cache.get(color);
    if (!mat) {
      mat = new THREE.LineBasicMaterial({ color });
      this.material_cache.set(color, mat);
    }
    return mat;
  }

  getEdgeCounts(graph: EntityGraph): Record<GroupKind, number> & { total: number } {
    const counts = { longitudinal: 0, stirrup: 0, opening: 0, auto: 0, total: 0 };
    for (const g of graph.groups) {
      counts[groupKind(g)] += g.edges.length;
      counts.total += g.edges.length;
    }
    return counts;
  }
}

function toScene(node: GraphNode): [number, number, number] {
  const { x, y, z } = node.point;
  return [x * SCALE, z * SCALE, y * SCALE];
}
