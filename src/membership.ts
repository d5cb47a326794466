/**
 * Membership Functions and Numeric Helpers
 *
 * Piecewise-linear membership evaluation, axis sampling and centroid
 * computation shared by the fuzzy controller. Nothing here knows about
 * label names or rule bases.
 */

import { ControlPoints, LinguisticVariable } from './types.js';

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// ============================================================================
// MEMBERSHIP EVALUATION
// ============================================================================

/**
 * Trapezoid with feet at a, d and plateau [b, c].
 * Shoulders (a == b or c == d) give full membership at that edge.
 */
export function trapezoid(x: number, a: number, b: number, c: number, d: number): number {
  if (x < a || x > d) return 0;
  if (x >= b && x <= c) return 1;
  if (x < b) return (x - a) / (b - a);
  return (d - x) / (d - c);
}

/** Triangle with feet at a, c and peak at b */
export function triangle(x: number, a: number, b: number, c: number): number {
  return trapezoid(x, a, b, b, c);
}

export function membership(points: ControlPoints, x: number): number {
  if (points.length === 3) {
    return triangle(x, points[0], points[1], points[2]);
  }
  return trapezoid(x, points[0], points[1], points[2], points[3]);
}

// ============================================================================
// SAMPLING
// ============================================================================

/**
 * Points `step` apart from min, with max always the last point; the final
 * gap is shorter when step does not divide the range.
 * Points are computed from the index so rounding does not accumulate.
 */
export function sampleAxis(range: readonly [number, number], step: number): number[] {
  const [min, max] = range;
  // Tolerance keeps an exact division from gaining a duplicate end point
  const count = Math.ceil((max - min) / step - 1e-9);
  const points: number[] = [];
  for (let i = 0; i < count; i++) {
    points.push(min + i * step);
  }
  points.push(max);
  return points;
}

export interface MembershipCurve {
  label: string;
  x: number[];
  y: number[];
}

/** Curves of every set of a variable, e.g. for charting outside the core */
export function sampleMembership(variable: LinguisticVariable, step: number = 1): MembershipCurve[] {
  const x = sampleAxis(variable.range, step);
  return variable.sets.map(set => ({
    label: set.label,
    x,
    y: x.map(value => membership(set.points, value)),
  }));
}

// ============================================================================
// CENTROID
// ============================================================================

/**
 * Weighted center of mass of a sampled shape: Σ x·μ / Σ μ.
 * Returns null when the shape has no mass.
 */
export function centroid(xs: readonly number[], degrees: readonly number[]): number | null {
  let weighted = 0;
  let mass = 0;
  const n = Math.min(xs.length, degrees.length);
  for (let i = 0; i < n; i++) {
    weighted += xs[i] * degrees[i];
    mass += degrees[i];
  }
  return mass > 0 ? weighted / mass : null;
}
