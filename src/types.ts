// ============================================================================
// FUZZY CRUISE CONTROL - TYPE DEFINITIONS
// ============================================================================
// Architecture: Controller + Dynamics feedback loop
// - Fuzzy controller: (speedError, acceleration) -> throttle
// - Vehicle dynamics: (throttle, dt) -> { position, speed, acceleration }
// - Cruise simulation: drives one controller call + one update per tick
// ============================================================================

// ----------------------------------------------------------------------------
// LINGUISTIC VARIABLE RANGES
// ----------------------------------------------------------------------------
export const RANGES = {
  SPEED_ERROR: [-30, 30],     // speed units
  ACCELERATION: [-10, 10],    // speed units per time unit
  THROTTLE: [0, 100],         // percent
} as const;

// Sample spacing on the throttle axis used by centroid defuzzification
export const DEFAULT_RESOLUTION = 0.5;

// ============================================================================
// FUZZY SETS
// ============================================================================

/**
 * Control points of a piecewise-linear membership function.
 * Three points describe a triangle, four a trapezoid; points are non-decreasing.
 */
export type ControlPoints =
  | readonly [number, number, number]
  | readonly [number, number, number, number];

export interface FuzzySet<L extends string = string> {
  label: L;
  points: ControlPoints;
}

export interface LinguisticVariable<L extends string = string> {
  name: string;
  range: readonly [number, number];
  sets: readonly FuzzySet<L>[];
}

// ----------------------------------------------------------------------------
// DEFAULT LABELS
// ----------------------------------------------------------------------------
export type SpeedErrorLabel =
  | 'negative_large'
  | 'negative_small'
  | 'zero'
  | 'positive_small'
  | 'positive_large';

export type AccelerationLabel = 'negative' | 'zero' | 'positive';

export type ThrottleLabel = 'very_low' | 'low' | 'medium' | 'high' | 'very_high';

// ============================================================================
// RULE BASE
// ============================================================================

/** IF speedError IS a AND acceleration IS b THEN throttle IS c */
export interface FuzzyRule {
  speedError: string;
  acceleration: string;
  throttle: string;
}

export interface FuzzyControllerConfig {
  speedError: LinguisticVariable;
  acceleration: LinguisticVariable;
  throttle: LinguisticVariable;
  rules: readonly FuzzyRule[];
  resolution: number;
}

/** label -> membership degree in [0, 1] */
export type Memberships = Record<string, number>;

export interface RuleActivation {
  rule: FuzzyRule;
  strength: number;
}

/** Full trace of one inference, exposed for diagnosis and tests */
export interface InferenceResult {
  speedError: number;           // after clamping
  acceleration: number;         // after clamping
  speedErrorMemberships: Memberships;
  accelerationMemberships: Memberships;
  activations: RuleActivation[];
  aggregated: Memberships;      // consequent label -> max firing strength
  throttle: number;
  degenerate: boolean;          // no rule fired; throttle fell back to 0
}

export type DegenerateListener = (speedError: number, acceleration: number) => void;

export interface FuzzyControllerOptions {
  onDegenerate?: DegenerateListener;
}

// ============================================================================
// VEHICLE DYNAMICS
// ============================================================================

export interface VehicleState {
  position: number;
  speed: number;
  acceleration: number;
}

export interface VehicleParams {
  mass: number;               // kg
  maxDriveForce: number;      // N at 100 % throttle
  dragCoefficient: number;    // N·s/m, linear drag
}

// 50 % throttle balances drag at 20 m/s, the zero-error output of the default rule base
export const VEHICLE_PARAMS: VehicleParams = {
  mass: 1000,
  maxDriveForce: 8000,
  dragCoefficient: 200,
};

export const ZERO_STATE: Readonly<VehicleState> = Object.freeze({
  position: 0,
  speed: 0,
  acceleration: 0,
});

// ============================================================================
// TRACK
// ============================================================================

export interface TrackConfig {
  width: number;              // meters, horizontal extent of the oval
  height: number;             // meters, vertical extent of the oval
  minSpeed: number;           // target speed at the tight ends
  maxSpeed: number;           // target speed on the straights
}

export const DEFAULT_TRACK: TrackConfig = {
  width: 100,
  height: 60,
  minSpeed: 15,
  maxSpeed: 30,
};

export interface TrackPosition {
  x: number;
  y: number;
  heading: number;            // radians, tangent to the track
}

// ============================================================================
// CRUISE SIMULATION
// ============================================================================
export type ControlMode = 'FUZZY' | 'MANUAL';

export type TargetSpeedSource = 'FIXED' | 'TRACK';

export interface SimConfig {
  dt: number;                 // seconds per tick
  targetSpeed: number;        // used when targetSpeedSource is FIXED
  targetSpeedSource: TargetSpeedSource;
  speedErrorScale: number;    // multiplies (target - speed) before the controller sees it
  mode: ControlMode;
  manualThrottle: number;     // percent, used in MANUAL mode
  running: boolean;
  enableLogging: boolean;     // capture tick history
  logInterval: number;        // seconds between log captures (0 = every tick)
}

export const DEFAULT_CONFIG: SimConfig = {
  dt: 0.1,
  targetSpeed: 20,
  targetSpeedSource: 'FIXED',
  speedErrorScale: 1,
  mode: 'FUZZY',
  manualThrottle: 0,
  running: true,
  enableLogging: true,
  logInterval: 0,
};

export interface SimulationState {
  time: number;               // simulation time in seconds
  tick: number;
  targetSpeed: number;
  speedError: number;         // last value handed to the controller
  throttle: number;           // last value handed to the dynamics
  vehicle: VehicleState;
  degenerateCount: number;
}

/** Result of one tick */
export interface TickRecord {
  tick: number;
  time: number;
  targetSpeed: number;
  speedError: number;
  throttle: number;
  mode: ControlMode;
  vehicle: VehicleState;
}

// ----------------------------------------------------------------------------
// SIMULATION LOGGING (for debugging)
// ----------------------------------------------------------------------------

/** Snapshot of the vehicle and controller at a point in time */
export interface TickSnapshot {
  tick: number;
  timestamp: number;
  targetSpeed: number;
  speedError: number;
  throttle: number;
  position: number;
  speed: number;
  acceleration: number;
  mode: ControlMode;
}

/** Discrete events that occur during simulation */
export interface SimulationEvent {
  timestamp: number;
  tick: number;
  type:
    | 'TARGET_CHANGED'
    | 'TARGET_SOURCE_CHANGED'
    | 'MODE_CHANGED'
    | 'RUNNING_CHANGED'
    | 'RESET'
    | 'DEGENERATE_AGGREGATE';
  details?: Record<string, unknown>;
}

/** Complete simulation log */
export interface SimulationLog {
  startTime: Date;
  snapshots: TickSnapshot[];
  events: SimulationEvent[];
}

// ----------------------------------------------------------------------------
// RESPONSE ANALYSIS
// ----------------------------------------------------------------------------
export interface ResponseMetrics {
  target: number;
  band: number;
  peakSpeed: number;
  overshoot: number;              // peak above target, 0 if never exceeded
  settlingTime: number | null;    // first time after which speed stays in band
  steadyStateError: number;       // |target - final speed|
  oscillation: number;            // peak-to-peak speed after settling
}
