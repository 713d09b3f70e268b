import type {
  AnalysisStage, BoundarySupports, Embedment, EntityGraph, StageName, StagePrestress,
} from '../types';
import type { BoundaryCondition, LoadCase, PrestressParams } from './schema';

export const DEFAULT_EMBEDMENT_TOLERANCE = 5;

export interface RebarPartition {
  precast: number[];
  cast: number[];
}

export interface TwoStageInput {
  precastSolids: number[];
  castSolids: number[];
  rebar: RebarPartition;
  loadCases: LoadCase[];
  prestress: PrestressParams | null;
}

/**
 * Staged activation for the composite section: the precast shell carries the
 * construction stage alone, the cast-in-place layer joins for service.
 */
export class AnalysisConfigurator {
  /**
   * Splits reinforcement edges at the layer interface by the mean height of
   * their end nodes. Every edge lands in exactly one side.
   */
  partitionRebar(graph: Pick<EntityGraph, 'nodes' | 'edges'>, edgeIds: readonly number[], hp: number): RebarPartition {
    const nodeZ = new Map(graph.nodes.map(n => [n.id, n.point.z]));
    const edges = new Map(graph.edges.map(e => [e.id, e]));
    const partition: RebarPartition = { precast: [], cast: [] };

    for (const id of edgeIds) {
      const edge = edges.get(id);
      if (!edge) throw new Error(`Unknown edge ${id}`);
      const z0 = nodeZ.get(edge.start);
      const z1 = nodeZ.get(edge.end);
      if (z0 === undefined || z1 === undefined) throw new Error(`Edge ${id} references an unknown node`);
      if ((z0 + z1) / 2 < hp) partition.precast.push(id);
      else partition.cast.push(id);
    }
    return partition;
  }

  classifyLoadCases(loadCases: LoadCase[]): Record<StageName, LoadCase[]> {
    return {
      Construction: loadCases.filter(lc => lc.stage === 'Construction'),
      Service: loadCases.filter(lc => lc.stage === 'Service'),
    };
  }

  createTwoStagePlan(input: TwoStageInput): [AnalysisStage, AnalysisStage] {
    const loads = this.classifyLoadCases(input.loadCases);
    const prestress = this.stagePrestress(input.prestress);

    const construction: AnalysisStage = {
      name: 'Construction',
      order: 1,
      solids: [...input.precastSolids],
      rebar: [...input.rebar.precast],
      loadCases: loads.Construction.map(lc => lc.name),
      // Pretensioned strands are stressed before the shell is placed
      prestress: prestress?.method === 'pretension' ? prestress : null,
      inheritsFrom: null,
    };
    const service: AnalysisStage = {
      name: 'Service',
      order: 2,
      solids: [...input.castSolids],
      rebar: [...input.rebar.cast],
      loadCases: loads.Service.map(lc => lc.name),
      prestress: prestress?.method === 'post_tension' ? prestress : null,
      inheritsFrom: 'Construction',
    };
    return [construction, service];
  }

  /** Declared bond between bars and concrete; not checked geometrically */
  createEmbedment(
    rebarIds: readonly number[],
    solidIds: readonly number[],
    tolerance: number = DEFAULT_EMBEDMENT_TOLERANCE,
  ): Embedment {
    return { rebarEdges: [...rebarIds], hostSolids: [...solidIds], tolerance };
  }

  createBoundaryConditions(boundary: BoundaryCondition, leftNodeId: number, rightNodeId: number): BoundarySupports {
    return {
      left: { nodeId: leftNodeId, constraints: { ...boundary.left.constraints }, forces: { ...boundary.left.forces } },
      right: { nodeId: rightNodeId, constraints: { ...boundary.right.constraints }, forces: { ...boundary.right.forces } },
    };
  }

  private stagePrestress(prestress: PrestressParams | null): StagePrestress | null {
    if (!prestress?.enabled) return null;
    return { method: prestress.method, force: prestress.force };
  }
}
