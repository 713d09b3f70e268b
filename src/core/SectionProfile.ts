import type { FlangeDims, SectionGeometry } from './schema';
import type { Layer, Level, Side } from '../types';

const EPS = 1e-6;
const NO_FLANGE: FlangeDims = { width: 0, thickness: 0 };

export interface SectionCapabilities {
  hasTopFlange: boolean;
  hasBottomFlange: boolean;
}

/** Rectangular sub-component of the cross-section, prismatic along the span */
export interface ComponentBox {
  label: string;
  y: [number, number];
  z: [number, number];
  /** Openings are cut through the web only */
  isWeb: boolean;
}

/** Covered half-widths either side of the web centerline, cover already taken off */
export interface TransverseExtent {
  left: number;
  right: number;
}

/**
 * Cross-section of the beam: a web centered on y = 0 with up to four flange
 * outstands, split at hp into a precast layer and a cast-in-place layer.
 */
export class SectionProfile {
  readonly length: number;
  readonly height: number;
  readonly webWidth: number;
  /** Effective precast/cast split height */
  readonly hp: number;
  readonly capabilities: SectionCapabilities;

  constructor(private readonly section: SectionGeometry) {
    this.length = section.length;
    this.height = section.height;
    this.webWidth = section.webWidth;

    const hasTopFlange = this.hasFlange('upper', 'left') || this.hasFlange('upper', 'right');
    const hasBottomFlange = this.hasFlange('lower', 'left') || this.hasFlange('lower', 'right');
    this.capabilities = { hasTopFlange, hasBottomFlange };

    this.hp = hasTopFlange && section.castCapThickness > 0
      ? section.height - section.castCapThickness
      : section.precastHeight;
  }

  get halfWeb(): number {
    return this.webWidth / 2;
  }

  hasFlange(level: Level, side: Side): boolean {
    const f = this.section.flanges[level][side];
    return f.width > EPS && f.thickness > EPS;
  }

  /** Flange dimensions, or zeros where the flange does not exist */
  flange(level: Level, side: Side): FlangeDims {
    return this.hasFlange(level, side) ? this.section.flanges[level][side] : NO_FLANGE;
  }

  /** Both sides of a level carry a flange */
  hasFlangePair(level: Level): boolean {
    return this.hasFlange(level, 'left') && this.hasFlange(level, 'right');
  }

  layerRange(layer: Layer): [number, number] {
    return layer === 'precast' ? [0, this.hp] : [this.hp, this.height];
  }

  /** Web plus every existing flange, spanning the full height */
  components(): ComponentBox[] {
    const hw = this.halfWeb;
    const H = this.height;
    const boxes: ComponentBox[] = [
      { label: 'web', y: [-hw, hw], z: [0, H], isWeb: true },
    ];
    for (const level of ['lower', 'upper'] as const) {
      for (const side of ['left', 'right'] as const) {
        if (!this.hasFlange(level, side)) continue;
        const f = this.flange(level, side);
        boxes.push({
          label: `${level}-${side}-flange`,
          y: side === 'left' ? [-hw - f.width, -hw] : [hw, hw + f.width],
          z: level === 'lower' ? [0, f.thickness] : [H - f.thickness, H],
          isWeb: false,
        });
      }
    }
    return boxes;
  }

  /** Components intersected with one layer's height range; empty slices are dropped */
  layerComponents(layer: Layer): ComponentBox[] {
    const [z0, z1] = this.layerRange(layer);
    const result: ComponentBox[] = [];
    for (const c of this.components()) {
      const lo = Math.max(c.z[0], z0);
      const hi = Math.min(c.z[1], z1);
      if (hi - lo <= EPS) continue;
      result.push({ ...c, z: [lo, hi] });
    }
    return result;
  }

  /**
   * Transverse room for a bar center at height z: the web plus any flange
   * whose thickness band contains z, less cover, per side.
   */
  coveredExtentAt(z: number, cover: number): TransverseExtent {
    const side = (s: Side): number => {
      let outstand = 0;
      const lower = this.flange('lower', s);
      if (lower.width > 0 && z <= lower.thickness + EPS) outstand = Math.max(outstand, lower.width);
      const upper = this.flange('upper', s);
      if (upper.width > 0 && z >= this.height - upper.thickness - EPS) outstand = Math.max(outstand, upper.width);
      return this.halfWeb + outstand - cover;
    };
    return { left: side('left'), right: side('right') };
  }
}
