/** 3D point in beam coordinates (mm): x along the span, y transverse, z up from the soffit */
export interface Point3D {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/** 2D point in the elevation plane of the web (x along the span, z up) */
export interface Point2D {
  x: number;
  z: number;
}

export type Side = 'left' | 'right';
export type Level = 'upper' | 'lower';
export type Layer = 'precast' | 'cast';
export type StageName = 'Construction' | 'Service';

// ─── Entity graph ───

export interface GraphNode {
  readonly id: number;
  readonly point: Point3D;
}

/** Boundary edge of a solid, or a reinforcement segment when `diameter` is set */
export interface GraphEdge {
  readonly id: number;
  readonly start: number;
  readonly end: number;
  readonly diameter?: number;
}

/** One outer loop plus any number of inner loops, all as ordered edge ids */
export interface Surface {
  readonly id: number;
  readonly outer: readonly number[];
  readonly inners: readonly (readonly number[])[];
}

export interface Solid {
  readonly id: number;
  readonly surfaces: readonly number[];
  readonly label: string;
  readonly layer: Layer;
}

/** Ordered edge ids of one named reinforcement group (e.g. `top_through`) */
export interface RebarGroup {
  readonly name: string;
  readonly edges: readonly number[];
  /** Auto-generated enhancement bars, excluded from acceptance counts downstream */
  readonly auto: boolean;
}

export interface EntityGraph {
  readonly nodes: readonly GraphNode[];
  readonly edges: readonly GraphEdge[];
  readonly surfaces: readonly Surface[];
  readonly solids: readonly Solid[];
  readonly groups: readonly RebarGroup[];
}

// ─── Geometry products ───

export interface DuctCylinder {
  center: Point3D;
  radius: number;
  length: number;
  direction: Point3D;
}

/** Union of the component solids of one layer, minus its duct voids */
export interface SolidAssembly {
  layer: Layer;
  zRange: [number, number];
  solids: number[];
  voids: DuctCylinder[];
}

// ─── Reinforcement products ───

/** Edge ids of one stirrup ring, split into the base ring and its closure enhancement */
export interface StirrupRing {
  x: number;
  legs: number;
  edges: number[];
  closure: number[];
}

export type EnhancementOutcome =
  | { name: string; ok: true; edgeCount: number }
  | { name: string; ok: false; reason: string };

export interface ValidationWarning {
  source: 'prestress' | 'rebar' | 'geometry';
  message: string;
}

// ─── Analysis products ───

export type ConstraintState = 'Fixed' | 'Free';
export type ConstraintDof = 'Dx' | 'Dy' | 'Dz' | 'Rx' | 'Ry' | 'Rz';
export type EndForce = 'N' | 'Vy' | 'Vz' | 'Mx' | 'My' | 'Mz';
export type LoadDirection = 'X' | 'Y' | 'Z' | 'MX' | 'MY' | 'MZ';

export interface StagePrestress {
  method: 'post_tension' | 'pretension';
  force: number;
}

export interface AnalysisStage {
  name: StageName;
  order: number;
  solids: number[];
  rebar: number[];
  loadCases: string[];
  prestress: StagePrestress | null;
  /** Stage whose state carries over without re-initialization */
  inheritsFrom: StageName | null;
}

export interface Embedment {
  rebarEdges: number[];
  hostSolids: number[];
  tolerance: number;
}

export interface EndSupport {
  nodeId: number;
  constraints: Record<ConstraintDof, ConstraintState>;
  forces: Record<EndForce, number>;
}

export interface BoundarySupports {
  left: EndSupport;
  right: EndSupport;
}

// ─── Run result ───

export interface SynthesisReport {
  enhancements: EnhancementOutcome[];
  warnings: ValidationWarning[];
  counts: {
    nodes: number;
    edges: number;
    surfaces: number;
    solids: number;
    rebarEdges: number;
    stirrupRings: number;
  };
}

export interface SynthesisResult {
  graph: EntityGraph;
  assemblies: Record<Layer, SolidAssembly>;
  stages: [AnalysisStage, AnalysisStage];
  embedment: Embedment;
  supports: BoundarySupports;
  report: SynthesisReport;
}

/** Run-wide tunables; parameters describe the beam, these describe the synthesis */
export interface SynthesisOptions {
  /** Clearance kept around every opening by bars and stirrups (mm) */
  openingClearance: number;
  /** Segments per primary longitudinal bar */
  primarySegments: number;
  /** Segments per opening bar */
  openingSegments: number;
  /** Default anchorage of opening bars past the opening edges (mm) */
  openingBarExtend: number;
  /** Embedment tolerance (mm) */
  embedmentTolerance: number;
}

export const DEFAULT_SYNTHESIS_OPTIONS: SynthesisOptions = {
  openingClearance: 2,
  primarySegments: 30,
  openingSegments: 10,
  openingBarExtend: 300,
  embedmentTolerance: 5,
};
