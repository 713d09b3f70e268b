import type {
  EntityGraph, GraphEdge, GraphNode, Layer, Point3D, RebarGroup, Solid, Surface,
} from '../types';

/**
 * Per-run arena for graph entities. Each kind has its own counter starting
 * at 1, so two runs over the same parameters produce identical ids.
 * Entities are write-once: there is no update or delete.
 */
export class EntityRegistry {
  private nodes: GraphNode[] = [];
  private edges: GraphEdge[] = [];
  private surfaces: Surface[] = [];
  private solids: Solid[] = [];
  private groups: Map<string, { name: string; edges: number[]; auto: boolean }> = new Map();

  private nextNodeId = 1;
  private nextEdgeId = 1;
  private nextSurfaceId = 1;
  private nextSolidId = 1;

  /** Coincident points are never merged; every call yields a fresh node */
  addNode(point: Point3D): number {
    const id = this.nextNodeId++;
    this.nodes.push({ id, point: { x: point.x, y: point.y, z: point.z } });
    return id;
  }

  addEdge(start: number, end: number, diameter?: number): number {
    this.node(start);
    this.node(end);
    const id = this.nextEdgeId++;
    this.edges.push(diameter === undefined ? { id, start, end } : { id, start, end, diameter });
    return id;
  }

  addSurface(outer: number[], inners: number[][] = []): number {
    const id = this.nextSurfaceId++;
    this.surfaces.push({ id, outer: [...outer], inners: inners.map(loop => [...loop]) });
    return id;
  }

  addSolid(surfaces: number[], label: string, layer: Layer): number {
    const id = this.nextSolidId++;
    this.solids.push({ id, surfaces: [...surfaces], label, layer });
    return id;
  }

  node(id: number): GraphNode {
    const node = this.nodes[id - 1];
    if (!node) throw new Error(`Unknown node ${id}`);
    return node;
  }

  edge(id: number): GraphEdge {
    const edge = this.edges[id - 1];
    if (!edge) throw new Error(`Unknown edge ${id}`);
    return edge;
  }

  surface(id: number): Surface {
    const surface = this.surfaces[id - 1];
    if (!surface) throw new Error(`Unknown surface ${id}`);
    return surface;
  }

  // ─── Named rebar groups ───

  /** Append edges to a group, creating it on first use */
  addToGroup(name: string, edgeIds: number[], auto = false): void {
    let group = this.groups.get(name);
    if (!group) {
      group = { name, edges: [], auto };
      this.groups.set(name, group);
    }
    group.edges.push(...edgeIds);
  }

  group(name: string): readonly number[] {
    return this.groups.get(name)?.edges ?? [];
  }

  getGroups(): RebarGroup[] {
    return Array.from(this.groups.values());
  }

  // ─── Snapshot ───

  getCounts(): { nodes: number; edges: number; surfaces: number; solids: number } {
    return {
      nodes: this.nodes.length,
      edges: this.edges.length,
      surfaces: this.surfaces.length,
      solids: this.solids.length,
    };
  }

  /** Frozen copy of everything registered so far */
  snapshot(): EntityGraph {
    return Object.freeze({
      nodes: Object.freeze([...this.nodes]),
      edges: Object.freeze([...this.edges]),
      surfaces: Object.freeze([...this.surfaces]),
      solids: Object.freeze([...this.solids]),
      groups: Object.freeze(this.getGroups().map(g => Object.freeze({ ...g, edges: Object.freeze([...g.edges]) }))),
    });
  }
}
