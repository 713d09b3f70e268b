import {
  DEFAULT_SYNTHESIS_OPTIONS,
  type SynthesisOptions, type SynthesisResult, type ValidationWarning,
} from '../types';
import { AnalysisConfigurator } from './AnalysisConfigurator';
import { EntityRegistry } from './EntityRegistry';
import { GeometryEngine } from './GeometryEngine';
import { PrestressDuctGenerator } from './PrestressDuctGenerator';
import { RebarEngine } from './RebarEngine';
import { createBeamParameters, openingBounds, type BeamParameters } from './schema';
import { SectionProfile } from './SectionProfile';

/**
 * One synthesis pass: parameters in, frozen entity graph out.
 *
 * Every run owns a fresh EntityRegistry. A run either returns the complete
 * result or throws; a failed run leaves nothing behind.
 */
export class CompositeBeamSynthesizer {
  private options: SynthesisOptions;

  constructor(options: Partial<SynthesisOptions> = {}) {
    this.options = { ...DEFAULT_SYNTHESIS_OPTIONS, ...options };
  }

  /** Validate raw input, then synthesize */
  run(input: unknown): SynthesisResult {
    return this.synthesize(createBeamParameters(input));
  }

  synthesize(params: BeamParameters): SynthesisResult {
    const registry = new EntityRegistry();
    const profile = new SectionProfile(params.section);
    const warnings: ValidationWarning[] = [];

    // Concrete
    const ducts = new PrestressDuctGenerator().generate(params.prestress, profile);
    warnings.push(...ducts.warnings);
    const assemblies = new GeometryEngine(registry).buildComposite(profile, params.openings, ducts.cylinders);
    params.openings.forEach((o, i) => {
      const b = openingBounds(o);
      if (b.bottom < profile.hp && b.top > profile.hp) {
        warnings.push({
          source: 'geometry',
          message: `opening ${i + 1} crosses the layer interface at z=${profile.hp} and is cut in both layers`,
        });
      }
    });

    // Reinforcement
    const rebar = new RebarEngine(registry, profile, params.cover, params.openings, this.options)
      .generate(params.longitudinal, params.stirrups);
    warnings.push(...rebar.warnings);

    // Support points on the soffit centerline at both ends
    const leftSupport = registry.addNode({ x: 0, y: 0, z: 0 });
    const rightSupport = registry.addNode({ x: profile.length, y: 0, z: 0 });

    const graph = registry.snapshot();
    const rebarIds = graph.groups.flatMap(g => g.edges);

    // Analysis
    const configurator = new AnalysisConfigurator();
    const partition = configurator.partitionRebar(graph, rebarIds, profile.hp);
    const stages = configurator.createTwoStagePlan({
      precastSolids: assemblies.precast.solids,
      castSolids: assemblies.cast.solids,
      rebar: partition,
      loadCases: params.loadCases,
      prestress: params.prestress,
    });
    const embedment = configurator.createEmbedment(
      rebarIds,
      [...assemblies.precast.solids, ...assemblies.cast.solids],
      this.options.embedmentTolerance,
    );
    const supports = configurator.createBoundaryConditions(params.boundary, leftSupport, rightSupport);

    return {
      graph,
      assemblies,
      stages,
      embedment,
      supports,
      report: {
        enhancements: rebar.enhancements,
        warnings,
        counts: {
          ...registry.getCounts(),
          rebarEdges: rebarIds.length,
          stirrupRings: rebar.rings.length,
        },
      },
    };
  }
}
