import { z } from 'zod';
import { ParameterError } from '../errors';
import { FilletProcessor } from './FilletProcessor';

// Openings must keep this distance from either beam end (mm)
export const MIN_OPENING_END_DISTANCE = 200;

const EPS = 1e-6;

const positive = () => z.number().positive();
const nonNegative = () => z.number().nonnegative();

const evenLegs = () =>
  z.number().int().min(2).refine(n => n % 2 === 0, { message: 'leg count must be even' });

export const Point3DSchema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number(),
});

// ─── Section ───

/** Flange outstand beyond the web face; zero width or thickness means no flange on that side */
export const FlangeSchema = z.object({
  width: nonNegative().default(0),
  thickness: nonNegative().default(0),
});

const FlangePairSchema = z.object({
  left: FlangeSchema.default({}),
  right: FlangeSchema.default({}),
});

export const SectionSchema = z.object({
  length: positive(),
  height: positive(),
  webWidth: positive(),
  flanges: z.object({
    upper: FlangePairSchema.default({}),
    lower: FlangePairSchema.default({}),
  }).default({}),
  precastHeight: nonNegative(),
  castCapThickness: nonNegative().default(0),
});

// ─── Reinforcement ───

export const RebarSpecSchema = z.object({
  diameter: positive(),
  count: z.number().int().positive(),
  extendLength: nonNegative().default(0),
});

export const SupportZoneSchema = z.object({
  groupA: RebarSpecSchema.nullable().default(null),
  groupB: RebarSpecSchema.nullable().default(null),
  /** 0 selects a third of the span */
  length: nonNegative().default(0),
});

export const LongitudinalSchema = z.object({
  top: z.object({
    through: RebarSpecSchema,
    leftSupport: SupportZoneSchema.default({}),
    rightSupport: SupportZoneSchema.default({}),
    rows: z.number().int().min(1).default(1),
    rowSpacing: nonNegative().default(0),
  }),
  bottom: z.object({
    throughA: RebarSpecSchema,
    throughB: RebarSpecSchema.nullable().default(null),
    rows: z.number().int().min(1).default(1),
    rowSpacing: nonNegative().default(0),
  }),
});

export const StirrupSchema = z.object({
  denseZoneLength: positive(),
  denseSpacing: positive(),
  denseLegs: evenLegs(),
  denseDiameter: positive(),
  normalSpacing: positive(),
  normalLegs: evenLegs(),
  normalDiameter: positive(),
});

// ─── Openings ───

export const OpeningSchema = z.object({
  /** Center along the span */
  x: z.number(),
  /** Center above the soffit */
  z: z.number(),
  width: positive(),
  height: positive(),
  filletRadius: nonNegative().default(0),
  topBars: RebarSpecSchema.nullable().default(null),
  bottomBars: RebarSpecSchema.nullable().default(null),
  /** Anchorage of the opening bars past each edge; 0 uses the run default */
  barExtend: nonNegative().default(0),
  beamStirrups: z.object({
    diameter: positive(),
    spacing: positive(),
    /** 0 selects four legs */
    legs: z.number().int().nonnegative().default(0)
      .refine(n => n % 2 === 0, { message: 'leg count must be even' }),
  }).nullable().default(null),
  sideStirrups: z.object({
    leftLength: nonNegative(),
    rightLength: nonNegative(),
    spacing: positive(),
    diameter: positive(),
    legs: evenLegs().default(2),
  }).nullable().default(null),
});

// ─── Loads, supports, prestress ───

const LoadDirectionSchema = z.enum(['X', 'Y', 'Z', 'MX', 'MY', 'MZ']);

export const LoadCaseSchema = z.object({
  name: z.string().min(1),
  stage: z.enum(['Construction', 'Service']),
  concentrated: z.array(z.object({
    x: z.number(),
    direction: LoadDirectionSchema,
    magnitude: z.number(),
  })).default([]),
  distributed: z.array(z.object({
    x1: z.number(),
    x2: z.number(),
    direction: LoadDirectionSchema,
    magnitude: z.number(),
  })).default([]),
});

const ConstraintStateSchema = z.enum(['Fixed', 'Free']);

export const EndConditionSchema = z.object({
  constraints: z.object({
    Dx: ConstraintStateSchema.default('Fixed'),
    Dy: ConstraintStateSchema.default('Fixed'),
    Dz: ConstraintStateSchema.default('Fixed'),
    Rx: ConstraintStateSchema.default('Free'),
    Ry: ConstraintStateSchema.default('Free'),
    Rz: ConstraintStateSchema.default('Free'),
  }).default({}),
  forces: z.object({
    N: z.number().default(0),
    Vy: z.number().default(0),
    Vz: z.number().default(0),
    Mx: z.number().default(0),
    My: z.number().default(0),
    Mz: z.number().default(0),
  }).default({}),
});

export const BoundarySchema = z.object({
  left: EndConditionSchema.default({}),
  right: EndConditionSchema.default({}),
});

export const DuctPathSchema = z.object({
  type: z.enum(['straight', 'parabolic']).default('straight'),
  /** Defaults to the left end of the span at mid precast height */
  start: Point3DSchema.optional(),
  /** Defaults to the right end of the span at mid precast height */
  end: Point3DSchema.optional(),
  sag: z.number().default(0),
  segments: z.number().int().positive().optional(),
});

export const PrestressSchema = z.object({
  enabled: z.boolean().default(false),
  method: z.enum(['post_tension', 'pretension']).default('post_tension'),
  force: nonNegative().default(0),
  ductDiameter: nonNegative().default(0),
  path: DuctPathSchema.default({}),
});

// ─── Top level ───

export const BeamParametersSchema = z.object({
  section: SectionSchema,
  cover: positive().default(25),
  openings: z.array(OpeningSchema).default([]),
  longitudinal: LongitudinalSchema,
  stirrups: StirrupSchema,
  loadCases: z.array(LoadCaseSchema).default([]),
  boundary: BoundarySchema.default({}),
  prestress: PrestressSchema.nullable().default(null),
}).superRefine((params, ctx) => {
  const issue = (path: (string | number)[], message: string) =>
    ctx.addIssue({ code: z.ZodIssueCode.custom, path, message });

  const { section, cover } = params;
  const { length: L, height: H, webWidth: Tw } = section;

  // Section
  const upperFlanges = [section.flanges.upper.left, section.flanges.upper.right]
    .filter(f => f.width > 0 && f.thickness > 0);
  if (section.castCapThickness > 0) {
    if (upperFlanges.length === 0) {
      issue(['section', 'castCapThickness'], 'a cast cap requires a top flange');
    } else {
      const tfUpper = Math.max(...upperFlanges.map(f => f.thickness));
      if (section.castCapThickness >= tfUpper) {
        issue(['section', 'castCapThickness'], `cast cap ${section.castCapThickness} must be thinner than the top flange (${tfUpper})`);
      }
    }
    if (section.castCapThickness >= H) {
      issue(['section', 'castCapThickness'], 'cast cap must be thinner than the beam height');
    }
  } else if (!(section.precastHeight > 0 && section.precastHeight < H)) {
    issue(['section', 'precastHeight'], `precast height must lie strictly between 0 and ${H}`);
  }
  for (const side of ['left', 'right'] as const) {
    const upper = section.flanges.upper[side];
    const lower = section.flanges.lower[side];
    if (upper.thickness + lower.thickness > H) {
      issue(['section', 'flanges'], `${side} flanges are thicker than the beam height`);
    }
  }
  if (Tw <= 2 * cover) {
    issue(['cover'], `cover ${cover} leaves no room inside a ${Tw} web`);
  }

  // Stirrup zones
  if (params.stirrups.denseZoneLength * 2 > L) {
    issue(['stirrups', 'denseZoneLength'], 'dense zones overlap at midspan');
  }

  // Openings
  const fillet = new FilletProcessor();
  params.openings.forEach((o, i) => {
    const { left, right, bottom, top } = openingBounds(o);
    if (left < MIN_OPENING_END_DISTANCE - EPS || right > L - MIN_OPENING_END_DISTANCE + EPS) {
      issue(['openings', i], `opening spans x ${left}..${right}, must stay within ${MIN_OPENING_END_DISTANCE}..${L - MIN_OPENING_END_DISTANCE}`);
    }
    if (bottom <= 0 || top >= H) {
      issue(['openings', i], `opening spans z ${bottom}..${top}, must stay inside 0..${H}`);
    }
    if (!fillet.validate(o.filletRadius, o.width, o.height)) {
      issue(['openings', i, 'filletRadius'], `fillet radius ${o.filletRadius} exceeds half of min(${o.width}, ${o.height})`);
    }
    for (let j = 0; j < i; j++) {
      if (openingsOverlap(params.openings[j], o)) {
        issue(['openings', i], `opening ${i + 1} overlaps opening ${j + 1}`);
      }
    }
  });

  // Loads
  params.loadCases.forEach((lc, i) => {
    lc.concentrated.forEach((p, j) => {
      if (p.x < 0 || p.x > L) issue(['loadCases', i, 'concentrated', j, 'x'], `load position ${p.x} is off the span`);
    });
    lc.distributed.forEach((d, j) => {
      if (d.x1 < 0 || d.x2 > L || d.x1 > d.x2) {
        issue(['loadCases', i, 'distributed', j], `load range ${d.x1}..${d.x2} must be ordered and on the span`);
      }
    });
  });

  // Prestress
  const ps = params.prestress;
  if (ps?.enabled) {
    if (ps.force <= 0) issue(['prestress', 'force'], 'prestress force must be positive');
    if (ps.method === 'post_tension' && ps.ductDiameter <= 0) {
      issue(['prestress', 'ductDiameter'], 'post-tensioning needs a duct diameter');
    }
  }
});

export type FlangeDims = z.infer<typeof FlangeSchema>;
export type SectionGeometry = z.infer<typeof SectionSchema>;
export type RebarSpec = z.infer<typeof RebarSpecSchema>;
export type SupportZone = z.infer<typeof SupportZoneSchema>;
export type LongitudinalRebar = z.infer<typeof LongitudinalSchema>;
export type StirrupParams = z.infer<typeof StirrupSchema>;
export type OpeningParams = z.infer<typeof OpeningSchema>;
export type LoadCase = z.infer<typeof LoadCaseSchema>;
export type BoundaryCondition = z.infer<typeof BoundarySchema>;
export type DuctPathParams = z.infer<typeof DuctPathSchema>;
export type PrestressParams = z.infer<typeof PrestressSchema>;
export type BeamParameters = z.infer<typeof BeamParametersSchema>;
/** Input accepted by createBeamParameters, before defaults are filled in */
export type BeamParametersInput = z.input<typeof BeamParametersSchema>;

/** Axis-aligned opening bounds: x along the span, z up */
export interface OpeningBounds {
  left: number;
  right: number;
  bottom: number;
  top: number;
}

export function openingBounds(o: Pick<OpeningParams, 'x' | 'z' | 'width' | 'height'>): OpeningBounds {
  return {
    left: o.x - o.width / 2,
    right: o.x + o.width / 2,
    bottom: o.z - o.height / 2,
    top: o.z + o.height / 2,
  };
}

/** Strict overlap in both x and z; touching edges do not overlap */
export function openingsOverlap(
  a: Pick<OpeningParams, 'x' | 'z' | 'width' | 'height'>,
  b: Pick<OpeningParams, 'x' | 'z' | 'width' | 'height'>,
): boolean {
  const ba = openingBounds(a);
  const bb = openingBounds(b);
  const xOverlap = !(ba.right <= bb.left || bb.right <= ba.left);
  const zOverlap = !(ba.top <= bb.bottom || bb.top <= ba.bottom);
  return xOverlap && zOverlap;
}

/** Validate raw input into a complete parameter set, or throw ParameterError listing every issue */
export function createBeamParameters(input: unknown): BeamParameters {
  const result = BeamParametersSchema.safeParse(input);
  if (!result.success) {
    throw new ParameterError(
      result.error.issues.map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)),
    );
  }
  return result.data;
}
