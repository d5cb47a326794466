// ============================================================================
// CRUISE SIMULATION - Controller/dynamics feedback loop
// ============================================================================

import {
  ControlMode,
  DEFAULT_CONFIG,
  FuzzyControllerConfig,
  RANGES,
  SimConfig,
  SimulationEvent,
  SimulationLog,
  SimulationState,
  TargetSpeedSource,
  TickRecord,
  TickSnapshot,
  VehicleParams,
  ResponseMetrics,
} from './types.js';
import { DEFAULT_CONTROLLER_CONFIG, FuzzyController } from './fuzzy-controller.js';
import { VehicleDynamics } from './vehicle-dynamics.js';
import { OvalTrack } from './track.js';
import { analyzeResponse } from './analysis.js';
import { clamp } from './membership.js';
import { InvalidParameterError } from './errors.js';
import { assertTimeStep, validateSimConfig } from './validation.js';

const LOG_TIME_EPSILON = 1e-9;

export interface SimulationComponents {
  controllerConfig?: FuzzyControllerConfig;
  vehicleParams?: Partial<VehicleParams>;
  track?: OvalTrack;
}

export interface LogSummary {
  totalSnapshots: number;
  totalEvents: number;
  duration: number;
  degenerateCount: number;
  response: ResponseMetrics | null;
}

// ----------------------------------------------------------------------------
// SIMULATION CLASS
// ----------------------------------------------------------------------------

export class CruiseSimulation {
  state: SimulationState;
  config: SimConfig;

  readonly controller: FuzzyController;
  readonly vehicle: VehicleDynamics;
  readonly track: OvalTrack;

  // Logging
  private log: SimulationLog;
  private lastLogTime = 0;

  constructor(config: Partial<SimConfig> = {}, components: SimulationComponents = {}) {
    this.config = validateSimConfig({ ...DEFAULT_CONFIG, ...config });

    this.controller = new FuzzyController(
      components.controllerConfig ?? DEFAULT_CONTROLLER_CONFIG,
      {
        onDegenerate: (speedError, acceleration) => {
          this.state.degenerateCount++;
          this.logEvent('DEGENERATE_AGGREGATE', { speedError, acceleration });
        },
      }
    );
    this.vehicle = new VehicleDynamics(components.vehicleParams);
    this.track = components.track ?? new OvalTrack();

    this.log = this.createLog();
    this.state = this.createState();
  }

  // --------------------------------------------------------------------------
  // MAIN SIMULATION LOOP
  // --------------------------------------------------------------------------

  /** One tick: controller call + one dynamics update. Returns null while paused. */
  step(dt: number = this.config.dt): TickRecord | null {
    if (!this.config.running) return null;
    assertTimeStep(dt, 'step');

    const current = this.vehicle.getState();
    const targetSpeed = this.targetSpeedAt(current.position);
    const speedError = (targetSpeed - current.speed) * this.config.speedErrorScale;

    // Update time first so events raised by the controller carry this tick
    this.state.tick++;
    this.state.time += dt;

    const throttle = this.config.mode === 'MANUAL'
      ? clamp(this.config.manualThrottle, RANGES.THROTTLE[0], RANGES.THROTTLE[1])
      : this.controller.computeThrottle(speedError, current.acceleration);

    const vehicle = this.vehicle.update(throttle, dt);

    this.state.targetSpeed = targetSpeed;
    this.state.speedError = speedError;
    this.state.throttle = throttle;
    this.state.vehicle = vehicle;

    if (this.config.enableLogging) {
      this.captureLogSnapshot();
    }

    return {
      tick: this.state.tick,
      time: this.state.time,
      targetSpeed,
      speedError,
      throttle,
      mode: this.config.mode,
      vehicle: { ...vehicle },
    };
  }

  /** Run whole ticks covering `seconds` of simulated time */
  run(seconds: number, dt: number = this.config.dt): TickRecord[] {
    assertTimeStep(dt, 'run');
    const records: TickRecord[] = [];
    const ticks = Math.round(seconds / dt);

    for (let i = 0; i < ticks; i++) {
      const record = this.step(dt);
      if (!record) break;
      records.push(record);
    }

    return records;
  }

  private targetSpeedAt(position: number): number {
    return this.config.targetSpeedSource === 'TRACK'
      ? this.track.getTargetSpeed(position)
      : this.config.targetSpeed;
  }

  // --------------------------------------------------------------------------
  // CONTROLS
  // --------------------------------------------------------------------------

  setTargetSpeed(targetSpeed: number): void {
    if (!Number.isFinite(targetSpeed) || targetSpeed < 0) {
      throw new InvalidParameterError('setTargetSpeed', [
        { path: 'targetSpeed', message: `must be a non-negative finite number, got ${targetSpeed}` },
      ]);
    }
    const from = this.config.targetSpeed;
    this.config.targetSpeed = targetSpeed;
    this.logEvent('TARGET_CHANGED', { from, to: targetSpeed });
  }

  setTargetSpeedSource(source: TargetSpeedSource): void {
    if (source === this.config.targetSpeedSource) return;
    const from = this.config.targetSpeedSource;
    this.config.targetSpeedSource = source;
    this.logEvent('TARGET_SOURCE_CHANGED', { from, to: source });
  }

  setMode(mode: ControlMode): void {
    if (mode === this.config.mode) return;
    const from = this.config.mode;
    this.config.mode = mode;
    this.logEvent('MODE_CHANGED', { from, to: mode });
  }

  /** Clamped to [0, 100] */
  setManualThrottle(throttle: number): void {
    this.config.manualThrottle = clamp(throttle, RANGES.THROTTLE[0], RANGES.THROTTLE[1]);
  }

  setRunning(running: boolean): void {
    if (running === this.config.running) return;
    this.config.running = running;
    this.logEvent('RUNNING_CHANGED', { running });
  }

  setVehicleParams(params: Partial<VehicleParams>): void {
    this.vehicle.setParams(params);
  }

  /** Back to rest at time zero; the log restarts with a RESET event */
  reset(options: { pause?: boolean } = {}): void {
    this.vehicle.reset();
    this.state = this.createState();

    if (options.pause) {
      this.config.running = false;
    }

    this.log = this.createLog();
    this.lastLogTime = 0;
    this.logEvent('RESET', { paused: !this.config.running });
  }

  private createState(): SimulationState {
    return {
      time: 0,
      tick: 0,
      targetSpeed: this.targetSpeedAt(0),
      speedError: 0,
      throttle: 0,
      vehicle: this.vehicle.getState(),
      degenerateCount: 0,
    };
  }

  private createLog(): SimulationLog {
    return {
      startTime: new Date(),
      snapshots: [],
      events: [],
    };
  }

  // --------------------------------------------------------------------------
  // LOGGING
  // --------------------------------------------------------------------------

  private captureLogSnapshot(): void {
    const interval = this.config.logInterval;

    // Only capture at configured interval; time is a float sum of steps
    if (interval > 0 && this.state.time - this.lastLogTime < interval - LOG_TIME_EPSILON) {
      return;
    }
    this.lastLogTime = this.state.time;

    const { vehicle } = this.state;
    const snapshot: TickSnapshot = {
      tick: this.state.tick,
      timestamp: round(this.state.time, 3),
      targetSpeed: round(this.state.targetSpeed),
      speedError: round(this.state.speedError),
      throttle: round(this.state.throttle),
      position: round(vehicle.position),
      speed: round(vehicle.speed),
      acceleration: round(vehicle.acceleration),
      mode: this.config.mode,
    };

    this.log.snapshots.push(snapshot);
  }

  /** Log a discrete event */
  logEvent(type: SimulationEvent['type'], details?: Record<string, unknown>): void {
    if (!this.config.enableLogging) return;

    this.log.events.push({
      timestamp: this.state.time,
      tick: this.state.tick,
      type,
      details,
    });
  }

  /** Get the complete simulation log */
  getLog(): SimulationLog {
    return this.log;
  }

  /** Export log as JSON string */
  exportLog(): string {
    return JSON.stringify(this.log, null, 2);
  }

  getLogSummary(band: number = 2): LogSummary {
    const { snapshots, events } = this.log;

    return {
      totalSnapshots: snapshots.length,
      totalEvents: events.length,
      duration: this.state.time,
      degenerateCount: this.state.degenerateCount,
      response: this.responseToCurrentTarget(band),
    };
  }

  /**
   * Metrics over the trailing snapshots logged with the current fixed target,
   * i.e. since the last target change. Timestamps stay absolute.
   */
  private responseToCurrentTarget(band: number): ResponseMetrics | null {
    if (this.config.targetSpeedSource !== 'FIXED') return null;

    const { snapshots } = this.log;
    const target = round(this.config.targetSpeed);
    let start = snapshots.length;
    while (start > 0 && snapshots[start - 1].targetSpeed === target) {
      start--;
    }

    const segment = snapshots.slice(start);
    return segment.length > 0
      ? analyzeResponse(segment, this.config.targetSpeed, band)
      : null;
  }
}

function round(value: number, decimals: number = 2): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
