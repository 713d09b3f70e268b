import { describe, expect, it } from 'vitest';
import example from '../data/example-beam.json';
import { DEFAULT_SYNTHESIS_OPTIONS, type EntityGraph } from '../types';
import { EntityRegistry } from './EntityRegistry';
import { CLOSURE_GROUP, RebarEngine, stackedZs, stations } from './RebarEngine';
import {
  createBeamParameters, LongitudinalSchema, openingBounds, OpeningSchema, SectionSchema, StirrupSchema,
  type OpeningParams,
} from './schema';
import { SectionProfile } from './SectionProfile';

const options = { ...DEFAULT_SYNTHESIS_OPTIONS, primarySegments: 6 };

const rectangle = () => new SectionProfile(SectionSchema.parse({
  length: 6000, height: 800, webWidth: 300, precastHeight: 500,
}));

const flange = { width: 125, thickness: 150 };
const iBeam = () => new SectionProfile(SectionSchema.parse({
  length: 7800,
  height: 1100,
  webWidth: 250,
  flanges: { upper: { left: flange, right: flange }, lower: { left: flange, right: flange } },
  precastHeight: 800,
}));

const longitudinal = LongitudinalSchema.parse({
  top: { through: { diameter: 20, count: 3 } },
  bottom: { throughA: { diameter: 25, count: 3 } },
});

const stirrups = StirrupSchema.parse({
  denseZoneLength: 1000,
  denseSpacing: 100,
  denseLegs: 2,
  denseDiameter: 10,
  normalSpacing: 200,
  normalLegs: 2,
  normalDiameter: 8,
});

const webOpening = () => OpeningSchema.parse({
  x: 3000,
  z: 400,
  width: 1000,
  height: 200,
  topBars: { diameter: 16, count: 2 },
  bottomBars: { diameter: 16, count: 2 },
  beamStirrups: { diameter: 8, spacing: 250, legs: 2 },
  sideStirrups: { leftLength: 200, rightLength: 200, spacing: 100, diameter: 10 },
});

function engineFor(profile: SectionProfile, openings: OpeningParams[] = []) {
  const registry = new EntityRegistry();
  return { registry, engine: new RebarEngine(registry, profile, 25, openings, options) };
}

function xExtent(registry: EntityRegistry, group: string): [number, number] {
  const xs = registry.group(group).flatMap(id => {
    const e = registry.edge(id);
    return [registry.node(e.start).point.x, registry.node(e.end).point.x];
  });
  return [Math.min(...xs), Math.max(...xs)];
}

/** Sample points of every edge that fall strictly inside an opening void of the web */
function pointsInsideOpenings(graph: EntityGraph, halfWeb: number, openings: OpeningParams[]): number {
  const nodes = new Map(graph.nodes.map(n => [n.id, n.point]));
  let hits = 0;
  for (const edge of graph.edges) {
    const a = nodes.get(edge.start);
    const b = nodes.get(edge.end);
    if (!a || !b) continue;
    for (const t of [0.1, 0.3, 0.5, 0.7, 0.9]) {
      const x = a.x + t * (b.x - a.x);
      const y = a.y + t * (b.y - a.y);
      const z = a.z + t * (b.z - a.z);
      if (Math.abs(y) >= halfWeb) continue;
      for (const o of openings) {
        const ob = openingBounds(o);
        if (x > ob.left && x < ob.right && z > ob.bottom && z < ob.top) hits++;
      }
    }
  }
  return hits;
}

describe('stackedZs', () => {
  it('stacks rows by bar diameter plus spacing', () => {
    expect(stackedZs(25, 2, 25, 25, 1)).toEqual([25, 75]);
    expect(stackedZs(775, 3, 10, 20, -1)).toEqual([775, 745, 715]);
    expect(stackedZs(775, 1, 0, 20, -1)).toEqual([775]);
  });
});

describe('stations', () => {
  it('steps from the start and includes the end when it lands on the pitch', () => {
    expect(stations(0, 1000, 300)).toEqual([0, 300, 600, 900]);
    expect(stations(0, 1000, 250)).toEqual([0, 250, 500, 750, 1000]);
    expect(stations(25, 1000, 100)).toHaveLength(10);
  });

  it('is empty for reversed ranges or a non-positive pitch', () => {
    expect(stations(10, 5, 100)).toEqual([]);
    expect(stations(0, 100, 0)).toEqual([]);
  });
});

describe('RebarEngine.calculateYPositions', () => {
  const { engine } = engineFor(rectangle());
  const extent = { left: 150, right: 150 };

  it('spaces bars evenly across the extent', () => {
    expect(engine.calculateYPositions(extent, 4)).toEqual([-150, -50, 50, 150]);
    expect(engine.calculateYPositions({ left: 100, right: 200 }, 2)).toEqual([-100, 200]);
  });

  it('puts a single bar on the centerline', () => {
    expect(engine.calculateYPositions(extent, 1)).toEqual([0]);
    expect(engine.calculateYPositions(extent, 0)).toEqual([]);
  });

  it('takes the free slots left by the primary group', () => {
    // 6 slots at 60 mm, primary bars on slots 0, 2, 3, 5
    expect(engine.calculateYPositions(extent, 2, 4)).toEqual([-90, 90]);
    // 5 slots, primary bars on the two outer slots
    expect(engine.calculateYPositions(extent, 3, 2)).toEqual([-75, 0, 75]);
    // 3 slots, a single primary bar in the middle
    expect(engine.calculateYPositions(extent, 2, 1)).toEqual([-150, 150]);
  });
});

describe('RebarEngine.createRebarLine', () => {
  it('drops the segments that pass through an opening in the web', () => {
    const { registry, engine } = engineFor(rectangle(), [webOpening()]);
    // Segments of 1000 mm; 2000-3000 and 3000-4000 cross the opening at mid height
    expect(engine.createRebarLine(0, 6000, 400, [0], 20, 6)).toHaveLength(4);
    expect(registry.getCounts().nodes).toBe(7);
  });

  it('keeps bars outside the web band or above the opening', () => {
    const { engine } = engineFor(rectangle(), [webOpening()]);
    expect(engine.createRebarLine(0, 6000, 400, [200], 20, 6)).toHaveLength(6);
    expect(engine.createRebarLine(0, 6000, 700, [0], 20, 6)).toHaveLength(6);
  });

  it('tags every segment with the bar diameter', () => {
    const { registry, engine } = engineFor(rectangle());
    for (const id of engine.createRebarLine(0, 6000, 100, [-50, 50], 16, 3)) {
      expect(registry.edge(id).diameter).toBe(16);
    }
  });
});

describe('RebarEngine.createLongitudinalRebars', () => {
  it('places support groups over their zones, clear of the primary bars', () => {
    const { registry, engine } = engineFor(rectangle());
    engine.createLongitudinalRebars(LongitudinalSchema.parse({
      top: {
        through: { diameter: 20, count: 3 },
        leftSupport: {
          groupA: { diameter: 20, count: 2 },
          groupB: { diameter: 16, count: 2, extendLength: 500 },
        },
        rightSupport: { groupA: { diameter: 20, count: 2 }, length: 1500 },
      },
      bottom: { throughA: { diameter: 25, count: 3 } },
    }));

    expect(registry.getGroups().map(g => g.name)).toEqual([
      'top_through',
      'top_left_support_A',
      'top_left_support_B',
      'top_right_support_A',
      'bottom_through_A',
    ]);
    expect(xExtent(registry, 'top_left_support_A')).toEqual([0, 2000]);
    expect(xExtent(registry, 'top_left_support_B')).toEqual([0, 2500]);
    expect(xExtent(registry, 'top_right_support_A')).toEqual([4500, 6000]);

    const ysB = new Set(registry.group('top_left_support_B').map(id => registry.node(registry.edge(id).start).point.y));
    expect([...ysB].map(y => Math.round(y * 100) / 100)).toEqual([-41.67, 41.67]);
  });

  it('stacks the bottom rows upward from the cover', () => {
    const { registry, engine } = engineFor(rectangle());
    engine.createLongitudinalRebars(LongitudinalSchema.parse({
      top: { through: { diameter: 20, count: 2 } },
      bottom: {
        throughA: { diameter: 25, count: 2 },
        throughB: { diameter: 20, count: 1 },
        rows: 2,
        rowSpacing: 25,
      },
    }));
    const zsOf = (group: string) =>
      [...new Set(registry.group(group).map(id => registry.node(registry.edge(id).start).point.z))];
    expect(zsOf('bottom_through_A')).toEqual([25, 75]);
    expect(zsOf('bottom_through_B')).toEqual([25, 70]);
    expect(registry.group('bottom_through_A')).toHaveLength(2 * 2 * 6);
  });

  it('reports no corner bars on a rectangular section', () => {
    const { engine } = engineFor(rectangle());
    expect(engine.createLongitudinalRebars(longitudinal)).toEqual([
      { name: 'top_corner_bars', ok: false, reason: 'section has no top flange' },
      { name: 'bottom_corner_bars', ok: false, reason: 'section has no bottom flange' },
    ]);
  });

  it('adds corner bars only where the flange corners are still free', () => {
    const { registry, engine } = engineFor(iBeam());
    const outcomes = engine.createLongitudinalRebars(LongitudinalSchema.parse({
      top: { through: { diameter: 20, count: 4 } },
      bottom: { throughA: { diameter: 25, count: 4 } },
    }));
    expect(outcomes).toEqual([
      { name: 'top_corner_bars', ok: false, reason: 'corner stations already carry through bars' },
      { name: 'bottom_corner_bars', ok: true, edgeCount: 12 },
    ]);
    const corner = registry.getGroups().find(g => g.name === 'bottom_corner_auto');
    expect(corner?.auto).toBe(true);
    const points = registry.group('bottom_corner_auto').map(id => registry.node(registry.edge(id).start).point);
    expect(new Set(points.map(p => p.z))).toEqual(new Set([125]));
    expect(new Set(points.map(p => p.y))).toEqual(new Set([-225, 225]));
  });
});

describe('RebarEngine bottom corner bars', () => {
  it('places a corner bar on a thick flange even when the other side is too thin', () => {
    const profile = new SectionProfile(SectionSchema.parse({
      length: 7800,
      height: 1100,
      webWidth: 250,
      flanges: { lower: { left: { width: 125, thickness: 40 }, right: flange } },
      precastHeight: 800,
    }));
    const { registry, engine } = engineFor(profile);
    const [, bottom] = engine.createLongitudinalRebars(LongitudinalSchema.parse({
      top: { through: { diameter: 20, count: 2 } },
      bottom: { throughA: { diameter: 25, count: 4 } },
    }));
    expect(bottom).toEqual({ name: 'bottom_corner_bars', ok: true, edgeCount: 6 });
    const points = registry.group('bottom_corner_auto').map(id => registry.node(registry.edge(id).start).point);
    expect(new Set(points.map(p => `${p.y},${p.z}`))).toEqual(new Set(['225,125']));
  });

  it('skips when no lower flange clears the cover', () => {
    const thin = { width: 125, thickness: 40 };
    const profile = new SectionProfile(SectionSchema.parse({
      length: 7800, height: 1100, webWidth: 250, flanges: { lower: { left: thin, right: thin } }, precastHeight: 800,
    }));
    const [, bottom] = engineFor(profile).engine.createLongitudinalRebars(longitudinal);
    expect(bottom).toEqual({ name: 'bottom_corner_bars', ok: false, reason: 'bottom flange leaves no room above cover 25' });
  });
});

describe('RebarEngine.createStirrups', () => {
  it('skips ring stations inside an opening span', () => {
    const { engine } = engineFor(rectangle(), [webOpening()]);
    const rings = engine.createStirrups(stirrups);
    // 10 per dense zone, 21 normal stations less the 5 from 2600 to 3400
    expect(rings).toHaveLength(36);
    expect(rings.every(r => r.x < 2498 || r.x > 3502)).toBe(true);
  });

  it('groups rings by zone', () => {
    const { registry, engine } = engineFor(rectangle());
    engine.createStirrups(stirrups);
    expect(registry.getGroups().map(g => [g.name, g.edges.length])).toEqual([
      ['left_dense_stirrups', 40],
      ['right_dense_stirrups', 40],
      ['normal_stirrups', 84],
    ]);
  });

  it('collects closure rings into the auto group', () => {
    const { registry, engine } = engineFor(iBeam());
    const layout = engine.generate(longitudinal, StirrupSchema.parse({ ...stirrups, denseLegs: 4, normalLegs: 4 }));
    const closure = registry.getGroups().find(g => g.name === CLOSURE_GROUP);
    expect(closure?.auto).toBe(true);
    expect(closure?.edges).toHaveLength(4 * layout.rings.length);
    expect(layout.enhancements[2]).toEqual({ name: 'stirrup_closure', ok: true, edgeCount: 4 * layout.rings.length });
  });
});

describe('RebarEngine opening reinforcement', () => {
  it('reinforces around an opening in named groups', () => {
    const { registry, engine } = engineFor(rectangle(), [webOpening()]);
    const layout = engine.generate(longitudinal, stirrups);

    expect(registry.getGroups().map(g => [g.name, g.edges.length])).toEqual([
      ['top_through', 18],
      ['bottom_through_A', 18],
      ['left_dense_stirrups', 40],
      ['right_dense_stirrups', 40],
      ['normal_stirrups', 64],
      ['opening_1.top_bars', 20],
      ['opening_1.bottom_bars', 20],
      ['opening_1.left_stirrups', 8],
      ['opening_1.right_stirrups', 8],
      ['opening_1.top_beam_stirrups', 20],
      ['opening_1.bottom_beam_stirrups', 20],
    ]);
    expect(layout.rings).toHaveLength(50);
    expect(layout.warnings).toEqual([]);
    expect(layout.enhancements.map(e => e.ok)).toEqual([false, false, false]);
  });

  it('places side stirrups up to the opening clearance', () => {
    const { engine } = engineFor(rectangle(), [webOpening()]);
    const { rings } = engine.createOpeningReinforcement(0);
    expect(rings.slice(0, 4).map(r => r.x)).toEqual([2300, 2400, 3502, 3602]);
    // beam stirrups at the pitch plus the far end
    expect(rings.slice(4, 9).map(r => r.x)).toEqual([2502, 2752, 3002, 3252, 3498]);
  });

  it('moves opening bars back inside the beam and says so', () => {
    const opening = OpeningSchema.parse({
      x: 3000, z: 400, width: 1000, height: 720,
      topBars: { diameter: 16, count: 2 },
      bottomBars: { diameter: 16, count: 2 },
    });
    const { registry, engine } = engineFor(rectangle(), [opening]);
    const { warnings } = engine.createOpeningReinforcement(0);
    expect(warnings).toEqual([
      { source: 'rebar', message: 'opening_1.top_bars moved from z=785 to z=775 to stay inside the beam' },
      { source: 'rebar', message: 'opening_1.bottom_bars moved from z=15 to z=25 to stay inside the beam' },
    ]);
    expect(xExtent(registry, 'opening_1.top_bars')).toEqual([2200, 3800]);
  });

  it('steps the lower cage around the flanges and keeps every bar out of the void', () => {
    const params = createBeamParameters(example);
    const profile = new SectionProfile(params.section);
    const registry = new EntityRegistry();
    const engine = new RebarEngine(registry, profile, params.cover, params.openings, DEFAULT_SYNTHESIS_OPTIONS);
    engine.generate(params.longitudinal, params.stirrups);

    const graph = registry.snapshot();
    expect(pointsInsideOpenings(graph, profile.halfWeb, params.openings)).toBe(0);

    const bottomCage = registry.group('opening_1.bottom_beam_stirrups');
    const zs = new Set(bottomCage.map(id => registry.node(registry.edge(id).end).point.z));
    expect(zs).toEqual(new Set([25, 125, 325]));
  });

  it('stops the small-beam cages short of a stacked opening', () => {
    const stacked = (z: number, height: number) => OpeningSchema.parse({
      x: 3000, z, width: 600, height,
      beamStirrups: { diameter: 8, spacing: 200, legs: 2 },
    });
    const openings = [stacked(300, 200), stacked(700, 200)];
    const profile = iBeam();
    const { registry, engine } = engineFor(profile, openings);
    engine.generate(longitudinal, stirrups);

    expect(pointsInsideOpenings(registry.snapshot(), profile.halfWeb, openings)).toBe(0);
    const zs = (group: string) => new Set(registry.group(group).map(id => registry.node(registry.edge(id).end).point.z));
    expect(zs('opening_1.bottom_beam_stirrups')).toEqual(new Set([25, 175]));
    expect(zs('opening_1.top_beam_stirrups')).toEqual(new Set([425, 575]));
    expect(zs('opening_2.bottom_beam_stirrups')).toEqual(new Set([425, 575]));
    expect(zs('opening_2.top_beam_stirrups')).toEqual(new Set([825, 1075]));
    expect(registry.group('opening_1.top_beam_stirrups')).toHaveLength(16);
  });

  it('drops a cage squeezed shut between stacked openings', () => {
    const openings = [
      OpeningSchema.parse({ x: 3000, z: 300, width: 600, height: 200, beamStirrups: { diameter: 8, spacing: 200 } }),
      OpeningSchema.parse({ x: 3000, z: 500, width: 600, height: 100, beamStirrups: { diameter: 8, spacing: 200 } }),
    ];
    const { registry, engine } = engineFor(iBeam(), openings);
    const { rings } = engine.createOpeningReinforcement(0);
    expect(registry.group('opening_1.top_beam_stirrups')).toEqual([]);
    expect(registry.group('opening_1.bottom_beam_stirrups').length).toBeGreaterThan(0);
    expect(rings.every(r => r.edges.length > 0)).toBe(true);
  });

  it('files every reinforcement segment under exactly one group', () => {
    const params = createBeamParameters(example);
    const registry = new EntityRegistry();
    new RebarEngine(registry, new SectionProfile(params.section), params.cover, params.openings, DEFAULT_SYNTHESIS_OPTIONS)
      .generate(params.longitudinal, params.stirrups);
    const grouped = registry.getGroups().flatMap(g => g.edges);
    expect(new Set(grouped).size).toBe(grouped.length);
    expect(grouped.length).toBe(registry.getCounts().edges);
  });
});
