import { readFileSync, writeFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { CompositeBeamSynthesizer } from './core/CompositeBeamSynthesizer';
import { ParameterError } from './errors';
import type { SynthesisResult } from './types';
import { MeshBuilder } from './viewer/MeshBuilder';

// Usage: tsx src/main.ts [params.json] [--preview out.json]
let paramsPath = fileURLToPath(new URL('./data/example-beam.json', import.meta.url));
let previewPath: string | undefined;
const args = process.argv.slice(2);
for (let i = 0; i < args.length; i++) {
  if (args[i] === '--preview') previewPath = args[++i];
  else paramsPath = args[i];
}

function synthesize(input: unknown): SynthesisResult | null {
  try {
    return new CompositeBeamSynthesizer().run(input);
  } catch (err) {
    if (err instanceof ParameterError) {
      console.error(`Invalid parameters in ${paramsPath}:`);
      for (const issue of err.issues) console.error(`  - ${issue}`);
      return null;
    }
    throw err;
  }
}

function main(): number {
  const result = synthesize(JSON.parse(readFileSync(paramsPath, 'utf8')));
  if (!result) return 1;

  const { report, stages, graph } = result;
  const c = report.counts;
  console.log(`Synthesized ${paramsPath}`);
  console.log(`  ${c.nodes} nodes, ${c.edges} edges, ${c.surfaces} surfaces, ${c.solids} solids`);
  console.log(`  ${c.rebarEdges} rebar segments, ${c.stirrupRings} stirrup rings`);
  for (const stage of stages) {
    console.log(`  Stage ${stage.order} ${stage.name}: ${stage.solids.length} solids, ${stage.rebar.length} rebar segments, loads [${stage.loadCases.join(', ')}]`);
  }
  const perKind = new MeshBuilder().getEdgeCounts(graph);
  console.log(`  rebar by kind: ${perKind.longitudinal} longitudinal, ${perKind.stirrup} stirrup, ${perKind.opening} opening, ${perKind.auto} auto`);
  for (const group of graph.groups) {
    console.log(`  ${group.auto ? '*' : ' '} ${group.name}: ${group.edges.length}`);
  }
  for (const e of report.enhancements) {
    console.log(e.ok ? `  + ${e.name}: ${e.edgeCount} segments` : `  - ${e.name} skipped: ${e.reason}`);
  }
  for (const w of report.warnings) {
    console.warn(`  [${w.source}] ${w.message}`);
  }

  if (previewPath) {
    const builder = new MeshBuilder();
    writeFileSync(previewPath, JSON.stringify(builder.buildBeam(graph).toJSON()));
    console.log(`Preview written to ${previewPath}`);
  }
  return 0;
}

process.exitCode = main();
