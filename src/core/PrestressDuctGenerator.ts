import * as THREE from 'three';
import { GeometryError, ParameterError } from '../errors';
import type { DuctCylinder, Point3D, ValidationWarning } from '../types';
import type { PrestressParams } from './schema';
import type { SectionProfile } from './SectionProfile';

// Minimum concrete kept above and below a duct inside the precast layer (mm)
const DUCT_MIN_COVER = 50;
const STRAIGHT_SEGMENTS = 10;
const PARABOLIC_SEGMENTS = 20;
const EPS = 1e-6;

export interface DuctPathValidation {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export interface DuctLayout {
  path: Point3D[];
  cylinders: DuctCylinder[];
  warnings: ValidationWarning[];
}

/**
 * Post-tensioning duct centerline and its discretization into cylinders
 * subtracted from the precast layer.
 */
export class PrestressDuctGenerator {
  generateStraightPath(start: Point3D, end: Point3D, segments: number = STRAIGHT_SEGMENTS): Point3D[] {
    const a = toVector(start);
    const b = toVector(end);
    const points: Point3D[] = [];
    for (let i = 0; i <= segments; i++) {
      if (i === 0) points.push({ ...start });
      else if (i === segments) points.push({ ...end });
      else points.push(fromVector(new THREE.Vector3().lerpVectors(a, b, i / segments)));
    }
    return points;
  }

  /**
   * x advances linearly; z follows the chord plus a parabola that is zero at
   * both anchors and equals `sag` at mid-span.
   */
  generateParabolicPath(start: Point3D, end: Point3D, sag: number, segments: number = PARABOLIC_SEGMENTS): Point3D[] {
    const span = end.x - start.x;
    const points: Point3D[] = [];
    for (let i = 0; i <= segments; i++) {
      const t = i / segments;
      const lx = t * span;
      const offset = Math.abs(span) > EPS ? (4 * sag / (span * span)) * lx * (span - lx) : 0;
      points.push({
        x: start.x + lx,
        y: start.y + t * (end.y - start.y),
        z: start.z + t * (end.z - start.z) + offset,
      });
    }
    return points;
  }

  createDuctCylinders(path: Point3D[], ductDiameter: number): DuctCylinder[] {
    if (path.length < 2) {
      throw new GeometryError(`Duct path needs at least 2 points, got ${path.length}`);
    }
    const radius = ductDiameter / 2;
    const cylinders: DuctCylinder[] = [];
    for (let i = 0; i < path.length - 1; i++) {
      const a = toVector(path[i]);
      const b = toVector(path[i + 1]);
      const delta = new THREE.Vector3().subVectors(b, a);
      const length = delta.length();
      const direction = length < EPS ? new THREE.Vector3(1, 0, 0) : delta.normalize();
      cylinders.push({
        center: fromVector(new THREE.Vector3().addVectors(a, b).multiplyScalar(0.5)),
        radius,
        length,
        direction: fromVector(direction),
      });
    }
    return cylinders;
  }

  validateDuctPath(
    path: Point3D[],
    ductDiameter: number,
    bounds: { length: number; hp: number },
  ): DuctPathValidation {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (path.length < 2) {
      errors.push(`Duct path needs at least 2 points, got ${path.length}`);
    }
    path.forEach((p, i) => {
      if (p.x < -EPS || p.x > bounds.length + EPS) {
        errors.push(`Duct point ${i} at x=${p.x} lies outside the span 0..${bounds.length}`);
      }
      if (p.z < -EPS || p.z > bounds.hp + EPS) {
        warnings.push(`Duct point ${i} at z=${p.z} lies outside the precast layer 0..${bounds.hp}`);
      }
    });
    const allowance = bounds.hp - 2 * DUCT_MIN_COVER;
    if (ductDiameter > allowance) {
      errors.push(`Duct diameter ${ductDiameter} exceeds the precast layer allowance ${allowance}`);
    }

    return { valid: errors.length === 0, errors, warnings };
  }

  /** Configured centerline; anchors default to the span ends at mid precast height */
  buildPath(prestress: PrestressParams, profile: SectionProfile): Point3D[] {
    const { path } = prestress;
    const start = path.start ?? { x: 0, y: 0, z: profile.hp / 2 };
    const end = path.end ?? { x: profile.length, y: 0, z: profile.hp / 2 };
    if (path.type === 'parabolic') {
      return this.generateParabolicPath(start, end, path.sag, path.segments ?? PARABOLIC_SEGMENTS);
    }
    return this.generateStraightPath(start, end, path.segments ?? STRAIGHT_SEGMENTS);
  }

  /**
   * Duct voids for the precast layer. Only an enabled post-tensioned member
   * has a duct; path errors raise ParameterError, path warnings are returned.
   */
  generate(prestress: PrestressParams | null, profile: SectionProfile): DuctLayout {
    if (!prestress?.enabled || prestress.method !== 'post_tension' || prestress.ductDiameter <= 0) {
      return { path: [], cylinders: [], warnings: [] };
    }

    const path = this.buildPath(prestress, profile);
    const check = this.validateDuctPath(path, prestress.ductDiameter, { length: profile.length, hp: profile.hp });
    if (!check.valid) {
      throw new ParameterError(check.errors);
    }

    return {
      path,
      cylinders: this.createDuctCylinders(path, prestress.ductDiameter),
      warnings: check.warnings.map(message => ({ source: 'prestress' as const, message })),
    };
  }
}

function toVector(p: Point3D): THREE.Vector3 {
  return new THREE.Vector3(p.x, p.y, p.z);
}

function fromVector(v: THREE.Vector3): Point3D {
  return { x: v.x, y: v.y, z: v.z };
}
