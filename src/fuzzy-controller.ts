/**
 * Fuzzy Throttle Controller
 *
 * Mamdani inference over two inputs and one output:
 *   1. Fuzzify speed error and acceleration against their labeled sets
 *   2. Fire every rule with AND = min
 *   3. Aggregate rules sharing a consequent with OR = max
 *   4. Clip each consequent set at its aggregated degree, take the pointwise
 *      max and return the centroid of that shape
 *
 * The rule base and membership functions are plain data, so the same
 * evaluator runs any well-formed configuration.
 */

import {
  RANGES,
  DEFAULT_RESOLUTION,
  FuzzyControllerConfig,
  FuzzyControllerOptions,
  FuzzyRule,
  FuzzySet,
  InferenceResult,
  LinguisticVariable,
  Memberships,
  AccelerationLabel,
  SpeedErrorLabel,
  ThrottleLabel,
  RuleActivation,
  DegenerateListener,
} from './types.js';
import { centroid, clamp, membership, sampleAxis } from './membership.js';
import { validateControllerConfig } from './validation.js';

// ============================================================================
// DEFAULT CONFIGURATION
// ============================================================================

export const SPEED_ERROR: LinguisticVariable<SpeedErrorLabel> = {
  name: 'speed_error',
  range: RANGES.SPEED_ERROR,
  sets: [
    { label: 'negative_large', points: [-30, -30, -20, -10] },  // far too fast
    { label: 'negative_small', points: [-15, -5, 0] },
    { label: 'zero', points: [-5, 0, 5] },
    { label: 'positive_small', points: [0, 5, 15] },
    { label: 'positive_large', points: [10, 20, 30, 30] },      // far too slow
  ],
};

export const ACCELERATION: LinguisticVariable<AccelerationLabel> = {
  name: 'acceleration',
  range: RANGES.ACCELERATION,
  sets: [
    { label: 'negative', points: [-10, -10, -5, 0] },
    { label: 'zero', points: [-3, 0, 3] },
    { label: 'positive', points: [0, 5, 10, 10] },
  ],
};

export const THROTTLE: LinguisticVariable<ThrottleLabel> = {
  name: 'throttle',
  range: RANGES.THROTTLE,
  sets: [
    { label: 'very_low', points: [0, 0, 10, 20] },
    { label: 'low', points: [10, 25, 40] },
    { label: 'medium', points: [30, 50, 70] },
    { label: 'high', points: [60, 75, 90] },
    { label: 'very_high', points: [80, 90, 100, 100] },
  ],
};

function rule(
  speedError: SpeedErrorLabel,
  acceleration: AccelerationLabel,
  throttle: ThrottleLabel
): FuzzyRule {
  return { speedError, acceleration, throttle };
}

// One rule per (speed error, acceleration) combination
export const DEFAULT_RULES: readonly FuzzyRule[] = [
  // Too fast: back off
  rule('negative_large', 'negative', 'very_low'),
  rule('negative_large', 'zero', 'very_low'),
  rule('negative_large', 'positive', 'very_low'),
  rule('negative_small', 'negative', 'very_low'),
  rule('negative_small', 'zero', 'low'),
  rule('negative_small', 'positive', 'medium'),

  // On target: hold
  rule('zero', 'negative', 'low'),
  rule('zero', 'zero', 'medium'),
  rule('zero', 'positive', 'medium'),

  // Too slow: add throttle
  rule('positive_small', 'negative', 'medium'),
  rule('positive_small', 'zero', 'high'),
  rule('positive_small', 'positive', 'medium'),
  rule('positive_large', 'negative', 'very_high'),
  rule('positive_large', 'zero', 'very_high'),
  rule('positive_large', 'positive', 'very_high'),
];

export const DEFAULT_CONTROLLER_CONFIG: FuzzyControllerConfig = deepFreeze({
  speedError: SPEED_ERROR,
  acceleration: ACCELERATION,
  throttle: THROTTLE,
  rules: DEFAULT_RULES,
  resolution: DEFAULT_RESOLUTION,
});

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

// ============================================================================
// CONTROLLER
// ============================================================================

// Labels are arbitrary strings, so degree maps only ever read own keys
export function fuzzify(variable: LinguisticVariable, value: number): Memberships {
  return Object.fromEntries(variable.sets.map(set => [set.label, membership(set.points, value)]));
}

function degreeOf(memberships: Memberships, label: string): number {
  return Object.hasOwn(memberships, label) ? memberships[label] : 0;
}

export class FuzzyController {
  readonly config: FuzzyControllerConfig;

  private readonly outputAxis: number[];
  private readonly outputSets: Map<string, FuzzySet>;
  private readonly onDegenerate?: DegenerateListener;

  /**
   * The configuration is validated and frozen here; pass the same object to
   * every controller that should share it.
   */
  constructor(
    config: FuzzyControllerConfig = DEFAULT_CONTROLLER_CONFIG,
    options: FuzzyControllerOptions = {}
  ) {
    validateControllerConfig(config);
    this.config = deepFreeze(config);
    this.outputAxis = sampleAxis(config.throttle.range, config.resolution);
    this.outputSets = new Map<string, FuzzySet>(config.throttle.sets.map(set => [set.label, set]));
    this.onDegenerate = options.onDegenerate;
  }

  computeThrottle(speedError: number, acceleration: number): number {
    return this.evaluate(speedError, acceleration).throttle;
  }

  evaluate(speedError: number, acceleration: number): InferenceResult {
    const { config } = this;

    const e = clamp(speedError, config.speedError.range[0], config.speedError.range[1]);
    const a = clamp(acceleration, config.acceleration.range[0], config.acceleration.range[1]);

    const speedErrorMemberships = fuzzify(config.speedError, e);
    const accelerationMemberships = fuzzify(config.acceleration, a);

    // AND = min, OR across rules = max
    const activations: RuleActivation[] = [];
    const strengths = new Map<string, number>();
    for (const r of config.rules) {
      const strength = Math.min(
        degreeOf(speedErrorMemberships, r.speedError),
        degreeOf(accelerationMemberships, r.acceleration)
      );
      activations.push({ rule: r, strength });
      strengths.set(r.throttle, Math.max(strengths.get(r.throttle) ?? 0, strength));
    }

    const shape = this.aggregatedShape(strengths);
    const center = centroid(this.outputAxis, shape);
    const degenerate = center === null;

    if (degenerate) {
      this.onDegenerate?.(e, a);
    }

    return {
      speedError: e,
      acceleration: a,
      speedErrorMemberships,
      accelerationMemberships,
      activations,
      aggregated: Object.fromEntries(strengths),
      throttle: center ?? 0,
      degenerate,
    };
  }

  /** Pointwise max of every consequent set clipped at its aggregated degree */
  private aggregatedShape(strengths: ReadonlyMap<string, number>): number[] {
    const active: Array<[FuzzySet, number]> = [];
    for (const [label, degree] of strengths) {
      const set = this.outputSets.get(label);
      if (set && degree > 0) {
        active.push([set, degree]);
      }
    }

    return this.outputAxis.map(x => {
      let y = 0;
      for (const [set, degree] of active) {
        y = Math.max(y, Math.min(degree, membership(set.points, x)));
      }
      return y;
    });
  }
}

// ============================================================================
// CONTROL SURFACE
// ============================================================================

export interface ControlSurface {
  speedErrors: number[];
  accelerations: number[];
  throttle: number[][];       // throttle[accelerationIndex][speedErrorIndex]
}

/** Throttle sampled over a grid of inputs, for charting outside the core */
export function computeControlSurface(
  controller: FuzzyController,
  options: { speedErrorStep?: number; accelerationStep?: number } = {}
): ControlSurface {
  const { speedErrorStep = 2, accelerationStep = 1 } = options;
  const speedErrors = sampleAxis(controller.config.speedError.range, speedErrorStep);
  const accelerations = sampleAxis(controller.config.acceleration.range, accelerationStep);

  const throttle = accelerations.map(a =>
    speedErrors.map(e => controller.computeThrottle(e, a))
  );

  return { speedErrors, accelerations, throttle };
}
