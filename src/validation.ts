import { z } from 'zod';
import { InvalidParameterError } from './errors.js';
import {
  FuzzyControllerConfig,
  SimConfig,
  TrackConfig,
  VehicleParams,
} from './types.js';

// ============================================================================
// SCHEMAS
// ============================================================================

const finite = z.number().finite();

export const ControlPointsSchema = z
  .union([
    z.tuple([finite, finite, finite]),
    z.tuple([finite, finite, finite, finite]),
  ])
  .refine(
    (points: readonly number[]) => points.every((p, i) => i === 0 || points[i - 1] <= p),
    { message: 'control points must be non-decreasing' },
  )
  .refine(
    (points: readonly number[]) => points[0] < points[points.length - 1],
    { message: 'membership function must have a non-empty support' },
  );

export const FuzzySetSchema = z.object({
  label: z.string().min(1),
  points: ControlPointsSchema,
});

export const LinguisticVariableSchema = z
  .object({
    name: z.string().min(1),
    range: z.tuple([finite, finite]).refine(([min, max]) => min < max, {
      message: 'range minimum must be below its maximum',
    }),
    sets: z.array(FuzzySetSchema).min(1),
  })
  .superRefine((variable, ctx) => {
    const [min, max] = variable.range;
    const seen = new Set<string>();

    variable.sets.forEach((set, i) => {
      if (seen.has(set.label)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate label "${set.label}"`,
          path: ['sets', i, 'label'],
        });
      }
      seen.add(set.label);

      if (set.points.some(p => p < min || p > max)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `control points of "${set.label}" leave the range [${min}, ${max}]`,
          path: ['sets', i, 'points'],
        });
      }
    });
  });

export const FuzzyRuleSchema = z.object({
  speedError: z.string().min(1),
  acceleration: z.string().min(1),
  throttle: z.string().min(1),
});

export const FuzzyControllerConfigSchema = z
  .object({
    speedError: LinguisticVariableSchema,
    acceleration: LinguisticVariableSchema,
    throttle: LinguisticVariableSchema,
    rules: z.array(FuzzyRuleSchema).min(1),
    resolution: z.number().positive().max(1),
  })
  .superRefine((config, ctx) => {
    const labels = {
      speedError: new Set(config.speedError.sets.map(s => s.label)),
      acceleration: new Set(config.acceleration.sets.map(s => s.label)),
      throttle: new Set(config.throttle.sets.map(s => s.label)),
    };

    config.rules.forEach((rule, i) => {
      for (const key of ['speedError', 'acceleration', 'throttle'] as const) {
        if (!labels[key].has(rule[key])) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `rule references undefined ${key} label "${rule[key]}"`,
            path: ['rules', i, key],
          });
        }
      }
    });
  });

export const VehicleParamsSchema = z.object({
  mass: finite.positive(),
  maxDriveForce: finite.positive(),
  dragCoefficient: finite.positive(),
});

export const VehicleStateSchema = z.object({
  position: finite,
  speed: finite.nonnegative(),
  acceleration: finite,
});

export const SimConfigSchema = z.object({
  dt: finite.positive(),
  targetSpeed: finite.nonnegative(),
  targetSpeedSource: z.enum(['FIXED', 'TRACK']),
  speedErrorScale: finite.positive(),
  mode: z.enum(['FUZZY', 'MANUAL']),
  manualThrottle: finite,
  running: z.boolean(),
  enableLogging: z.boolean(),
  logInterval: finite.nonnegative(),
});

export const TrackConfigSchema = z
  .object({
    width: finite.positive(),
    height: finite.positive(),
    minSpeed: finite.nonnegative(),
    maxSpeed: finite.nonnegative(),
  })
  .refine(track => track.minSpeed <= track.maxSpeed, {
    message: 'minSpeed must not exceed maxSpeed',
    path: ['minSpeed'],
  });

// ============================================================================
// VALIDATORS
// ============================================================================

export function validateOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  context: string
): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new InvalidParameterError(
      context,
      result.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }
  return result.data;
}

export function validateControllerConfig(config: unknown): FuzzyControllerConfig {
  return validateOrThrow(FuzzyControllerConfigSchema, config, 'fuzzy controller config');
}

export function validateVehicleParams(params: unknown): VehicleParams {
  return validateOrThrow(VehicleParamsSchema, params, 'vehicle params');
}

export function validateSimConfig(config: unknown): SimConfig {
  return validateOrThrow(SimConfigSchema, config, 'simulation config');
}

export function validateTrackConfig(config: unknown): TrackConfig {
  return validateOrThrow(TrackConfigSchema, config, 'track config');
}

/** Time steps are checked on every tick, so this skips zod */
export function assertTimeStep(dt: number, context: string = 'update'): void {
  if (!Number.isFinite(dt) || dt <= 0) {
    throw new InvalidParameterError(context, [
      { path: 'dt', message: `time step must be a positive finite number, got ${dt}` },
    ]);
  }
}
