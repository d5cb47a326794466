/**
 * DEMO CLI
 * ========
 * Prints controller decisions and simulation runs to the terminal.
 *
 * Usage:
 *   npx tsx src/cli.ts [options]
 */

import * as fs from 'fs';
import { FuzzyController } from './fuzzy-controller.js';
import { VehicleDynamics } from './vehicle-dynamics.js';
import { CruiseSimulation } from './simulation.js';
import { InvalidParameterError } from './errors.js';

// ============================================================================
// CLI ARGUMENT PARSING
// ============================================================================

interface DemoOptions {
  runScenarios: boolean;
  constantThrottle: number | null;
  runClosedLoop: boolean;
  target: number;
  seconds: number;
  useTrack: boolean;
  exportPath: string | null;
}

function readNumber(args: string[], flag: string): number | null {
  const index = args.indexOf(flag);
  if (index === -1 || args[index + 1] === undefined) return null;
  const value = Number(args[index + 1]);
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError('cli', [
      { path: flag, message: `expected a number, got "${args[index + 1]}"` },
    ]);
  }
  return value;
}

function parseArgs(): DemoOptions {
  const args = process.argv.slice(2);

  const exportIndex = args.indexOf('--export');
  const options: DemoOptions = {
    runScenarios: args.includes('--scenarios'),
    constantThrottle: args.includes('--constant') ? readNumber(args, '--constant') ?? 50 : null,
    runClosedLoop: args.includes('--closed-loop'),
    target: readNumber(args, '--target') ?? 20,
    seconds: readNumber(args, '--seconds') ?? 20,
    useTrack: args.includes('--track'),
    exportPath: exportIndex !== -1 ? args[exportIndex + 1] ?? null : null,
  };

  if (options.useTrack || options.exportPath) {
    options.runClosedLoop = true;
  }

  // If no section selected, run all
  if (!options.runScenarios && options.constantThrottle === null && !options.runClosedLoop) {
    options.runScenarios = true;
    options.constantThrottle = 50;
    options.runClosedLoop = true;
  }

  return options;
}

// ============================================================================
// SECTIONS
// ============================================================================

const SCENARIOS: Array<[number, number, string]> = [
  [-25, -5, 'Far too fast, slowing down'],
  [-10, 0, 'Somewhat too fast, steady'],
  [-5, 3, 'Slightly too fast, speeding up'],
  [0, 0, 'On target, steady'],
  [5, -2, 'Slightly too slow, slowing down'],
  [10, 0, 'Too slow, steady'],
  [20, 5, 'Far too slow, already speeding up'],
  [25, -3, 'Far too slow, slowing down'],
];

function printScenarios(controller: FuzzyController): void {
  console.log('\nCONTROLLER DECISIONS');
  console.log('='.repeat(70));
  console.log(`${'Scenario'.padEnd(40)}${'Error'.padStart(8)}${'Accel'.padStart(8)}${'Throttle'.padStart(12)}`);
  console.log('-'.repeat(70));

  for (const [error, accel, description] of SCENARIOS) {
    const throttle = controller.computeThrottle(error, accel);
    console.log(
      `${description.padEnd(40)}${error.toFixed(1).padStart(8)}${accel.toFixed(1).padStart(8)}${(throttle.toFixed(1) + ' %').padStart(12)}`
    );
  }
}

function printConstantThrottle(throttle: number, seconds: number): void {
  const vehicle = new VehicleDynamics();
  const dt = 0.1;
  const ticks = Math.round(seconds / dt);

  for (let i = 0; i < ticks; i++) {
    vehicle.update(throttle, dt);
  }

  const state = vehicle.getState();
  const vMax = vehicle.steadyStateSpeed(throttle);

  console.log(`\nCONSTANT THROTTLE ${throttle} % FOR ${seconds} s`);
  console.log('='.repeat(70));
  console.log(`  Position:     ${state.position.toFixed(2)} m`);
  console.log(`  Speed:        ${state.speed.toFixed(2)} m/s (${(state.speed * 3.6).toFixed(2)} km/h)`);
  console.log(`  Acceleration: ${state.acceleration.toFixed(3)} m/s²`);
  console.log(`  v_max:        ${vMax.toFixed(2)} m/s`);
  if (vMax > 0) {
    console.log(`  Reached:      ${((state.speed / vMax) * 100).toFixed(1)} % of v_max`);
  }
}

function printClosedLoop(options: DemoOptions): void {
  const sim = new CruiseSimulation({
    targetSpeed: options.target,
    targetSpeedSource: options.useTrack ? 'TRACK' : 'FIXED',
  });
  const records = sim.run(options.seconds);

  console.log(`\nCLOSED LOOP ${options.useTrack ? '(track target)' : `target ${options.target} m/s`} FOR ${options.seconds} s`);
  console.log('='.repeat(70));
  console.log(`${'t [s]'.padStart(8)}${'target'.padStart(10)}${'speed'.padStart(10)}${'error'.padStart(10)}${'throttle'.padStart(12)}`);

  const perSecond = Math.max(1, Math.round(1 / sim.config.dt));
  records
    .filter(r => r.tick % perSecond === 0)
    .forEach(r => {
      console.log(
        `${r.time.toFixed(1).padStart(8)}${r.targetSpeed.toFixed(2).padStart(10)}${r.vehicle.speed.toFixed(2).padStart(10)}${r.speedError.toFixed(2).padStart(10)}${r.throttle.toFixed(1).padStart(12)}`
      );
    });

  const summary = sim.getLogSummary();
  if (summary.response) {
    const { overshoot, settlingTime, steadyStateError, oscillation } = summary.response;
    console.log('-'.repeat(70));
    console.log(`  Overshoot:          ${overshoot.toFixed(2)} m/s`);
    console.log(`  Settling time (±2): ${settlingTime === null ? 'not settled' : `${settlingTime.toFixed(1)} s`}`);
    console.log(`  Steady-state error: ${steadyStateError.toFixed(2)} m/s`);
    console.log(`  Oscillation:        ${oscillation.toFixed(2)} m/s`);
  }
  if (summary.degenerateCount > 0) {
    console.log(`  Degenerate ticks:   ${summary.degenerateCount}`);
  }

  if (options.exportPath) {
    fs.writeFileSync(options.exportPath, sim.exportLog());
    console.log(`\n📄 Log written to: ${options.exportPath}`);
  }
}

// ============================================================================
// MAIN
// ============================================================================

function main(): void {
  try {
    const options = parseArgs();
    const controller = new FuzzyController();

    if (options.runScenarios) {
      printScenarios(controller);
    }
    if (options.constantThrottle !== null) {
      printConstantThrottle(options.constantThrottle, options.seconds);
    }
    if (options.runClosedLoop) {
      printClosedLoop(options);
    }
    console.log('');
  } catch (error) {
    if (error instanceof InvalidParameterError) {
      console.error(`❌ ${error.message}`);
    } else {
      console.error('Fatal error:', error);
    }
    process.exit(1);
  }
}

if (process.argv.includes('--help') || process.argv.includes('-h')) {
  console.log(`
Fuzzy Cruise Control Demo
=========================

Usage:
  npx tsx src/cli.ts [options]

Options:
  --scenarios        Print the controller's throttle for a set of situations
  --constant <T>     Hold throttle T % and report the final state (default 50)
  --closed-loop      Run the controller against the vehicle model
  --target <v>       Target speed for the closed loop (default 20)
  --seconds <s>      Simulated duration (default 20)
  --track            Take the target speed from the oval track
  --export <path>    Write the closed-loop log as JSON
  --help, -h         Show this help message

With no section flag all three sections run.

Examples:
  npx tsx src/cli.ts --closed-loop --target 25 --seconds 30
  npx tsx src/cli.ts --track --export ./cruise-log.json
  npx tsx src/tests/run-all-tests.ts --log ./cruise-log.json
`);
  process.exit(0);
}

main();
