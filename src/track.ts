// ============================================================================
// TRACK - Oval course the vehicle laps
// ============================================================================

import { DEFAULT_TRACK, TrackConfig, TrackPosition } from './types.js';
import { validateTrackConfig } from './validation.js';

export class OvalTrack {
  readonly config: TrackConfig;
  readonly perimeter: number;

  private readonly a: number;   // semi-major axis
  private readonly b: number;   // semi-minor axis

  constructor(config: Partial<TrackConfig> = {}) {
    this.config = validateTrackConfig({ ...DEFAULT_TRACK, ...config });
    this.a = this.config.width / 2;
    this.b = this.config.height / 2;
    this.perimeter = ellipsePerimeter(this.a, this.b);
  }

  /**
   * Position and tangent heading after travelling `distance` meters
   * counter-clockwise from the rightmost point.
   */
  getPosition(distance: number): TrackPosition {
    const t = this.parameterAt(distance);
    return {
      x: this.a * Math.cos(t),
      y: this.b * Math.sin(t),
      heading: normalizeAngle(Math.atan2(this.b * Math.cos(t), -this.a * Math.sin(t))),
    };
  }

  /**
   * Target speed at a point of the lap: maxSpeed along the flat top and
   * bottom, easing down to minSpeed at the tight left and right ends.
   */
  getTargetSpeed(distance: number): number {
    const { y } = this.getPosition(distance);
    const { minSpeed, maxSpeed } = this.config;
    const straightness = Math.abs(y) / this.b;
    return minSpeed + (maxSpeed - minSpeed) * straightness;
  }

  lapCount(distance: number): number {
    return Math.floor(distance / this.perimeter);
  }

  private parameterAt(distance: number): number {
    const wrapped = ((distance % this.perimeter) + this.perimeter) % this.perimeter;
    return (wrapped / this.perimeter) * 2 * Math.PI;
  }
}

// ----------------------------------------------------------------------------
// GEOMETRY HELPERS
// ----------------------------------------------------------------------------

/**
 * Ramanujan's second approximation of an ellipse perimeter.
 */
export function ellipsePerimeter(a: number, b: number): number {
  const h = (a - b) ** 2 / (a + b) ** 2;
  return Math.PI * (a + b) * (1 + (3 * h) / (10 + Math.sqrt(4 - 3 * h)));
}

/**
 * Normalize angle to [-π, π].
 */
export function normalizeAngle(angle: number): number {
  while (angle > Math.PI) angle -= 2 * Math.PI;
  while (angle < -Math.PI) angle += 2 * Math.PI;
  return angle;
}
