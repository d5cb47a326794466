// ============================================================================
// VEHICLE DYNAMICS - Longitudinal point-mass model
// ============================================================================
//
//   F_drive = throttle/100 * maxDriveForce
//   F_drag  = dragCoefficient * v
//   a       = (F_drive - F_drag) / m
//   v      += a * dt          (explicit Euler, clamped at 0: no reversing)
//   x      += v * dt
//
// ============================================================================

import {
  RANGES,
  VEHICLE_PARAMS,
  ZERO_STATE,
  VehicleParams,
  VehicleState,
} from './types.js';
import { clamp } from './membership.js';
import {
  assertTimeStep,
  validateOrThrow,
  validateVehicleParams,
  VehicleStateSchema,
} from './validation.js';

export class VehicleDynamics {
  private params: VehicleParams;
  private state: VehicleState;

  constructor(
    params: Partial<VehicleParams> = {},
    initialState: VehicleState = ZERO_STATE
  ) {
    this.params = validateVehicleParams({ ...VEHICLE_PARAMS, ...params });
    this.state = validateOrThrow(VehicleStateSchema, initialState, 'initial vehicle state');
  }

  // --------------------------------------------------------------------------
  // STEP
  // --------------------------------------------------------------------------

  /** Advance one step and return a snapshot of the new state */
  update(throttle: number, dt: number): VehicleState {
    assertTimeStep(dt);

    const { mass, maxDriveForce, dragCoefficient } = this.params;
    const fraction = clamp(throttle, RANGES.THROTTLE[0], RANGES.THROTTLE[1]) / 100;

    const driveForce = fraction * maxDriveForce;
    const dragForce = dragCoefficient * this.state.speed;
    const acceleration = (driveForce - dragForce) / mass;

    const speed = Math.max(0, this.state.speed + acceleration * dt);
    const position = this.state.position + speed * dt;

    this.state = { position, speed, acceleration };
    return this.getState();
  }

  reset(): void {
    this.state = { ...ZERO_STATE };
  }

  getState(): VehicleState {
    return { ...this.state };
  }

  // --------------------------------------------------------------------------
  // PARAMETERS
  // --------------------------------------------------------------------------

  getParams(): VehicleParams {
    return { ...this.params };
  }

  /** Takes effect from the next update */
  setParams(params: Partial<VehicleParams>): void {
    this.params = validateVehicleParams({ ...this.params, ...params });
  }

  /** Speed at which drag balances a constant throttle */
  steadyStateSpeed(throttle: number): number {
    const fraction = clamp(throttle, RANGES.THROTTLE[0], RANGES.THROTTLE[1]) / 100;
    return (fraction * this.params.maxDriveForce) / this.params.dragCoefficient;
  }
}
