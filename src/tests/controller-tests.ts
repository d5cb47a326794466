/**
 * FUZZY CONTROLLER TESTS
 * ======================
 * Properties of the inference engine under the default rule base and under
 * hand-built configurations with gaps.
 */

import {
  expectWithin,
  expectInRange,
  expectEqual,
  expectThrows,
  expectAll,
  AssertionResult,
  TestCase,
  TestSuiteResult,
  runTestSuite,
  printTestSuiteResults,
} from './test-harness.js';
import {
  FuzzyController,
  DEFAULT_CONTROLLER_CONFIG,
  DEFAULT_RULES,
  THROTTLE,
  computeControlSurface,
} from '../fuzzy-controller.js';
import { InvalidParameterError } from '../errors.js';
import { FuzzyControllerConfig, FuzzyRule } from '../types.js';

const controller = new FuzzyController();

// Rule base covering only "too fast" situations
const TOO_FAST_ONLY: FuzzyRule[] = [
  { speedError: 'negative_large', acceleration: 'negative', throttle: 'very_low' },
  { speedError: 'negative_large', acceleration: 'zero', throttle: 'very_low' },
  { speedError: 'negative_large', acceleration: 'positive', throttle: 'very_low' },
  { speedError: 'negative_small', acceleration: 'zero', throttle: 'low' },
];

function gappedConfig(rules: FuzzyRule[]): FuzzyControllerConfig {
  return { ...DEFAULT_CONTROLLER_CONFIG, rules };
}

/** Default config with one throttle label renamed in its sets and rules */
function withThrottleLabel(from: string, to: string): FuzzyControllerConfig {
  const rename = (label: string): string => (label === from ? to : label);
  return {
    ...DEFAULT_CONTROLLER_CONFIG,
    throttle: { ...THROTTLE, sets: THROTTLE.sets.map(set => ({ ...set, label: rename(set.label) })) },
    rules: DEFAULT_RULES.map(r => ({ ...r, throttle: rename(r.throttle) })),
  };
}

// ============================================================================
// TEST DEFINITIONS
// ============================================================================

const controllerTests: TestCase[] = [
  // -------------------------------------------------------------------------
  // Output range & clamping
  // -------------------------------------------------------------------------
  {
    name: 'Throttle stays within [0, 100] over the whole input grid',
    category: 'Range',
    run: () => {
      let min = Infinity;
      let max = -Infinity;
      for (let e = -30; e <= 30; e += 1) {
        for (let a = -10; a <= 10; a += 0.5) {
          const t = controller.computeThrottle(e, a);
          if (Number.isNaN(t)) {
            return { passed: false, message: `NaN throttle at (${e}, ${a})` };
          }
          min = Math.min(min, t);
          max = Math.max(max, t);
        }
      }
      return expectAll([
        expectInRange(min, 0, 100, 'smallest throttle'),
        expectInRange(max, 0, 100, 'largest throttle'),
      ]);
    },
  },
  {
    name: 'Out-of-range inputs are clamped to the nearest boundary',
    category: 'Range',
    run: () => {
      const result = controller.evaluate(45, -20);
      return expectAll([
        expectEqual(result.speedError, 30, 'clamped speed error'),
        expectEqual(result.acceleration, -10, 'clamped acceleration'),
        expectEqual(controller.computeThrottle(45, -20), controller.computeThrottle(30, -10), 'throttle'),
        expectEqual(controller.computeThrottle(-1000, 0), controller.computeThrottle(-30, 0), 'far below'),
      ]);
    },
  },

  // -------------------------------------------------------------------------
  // Qualitative behavior
  // -------------------------------------------------------------------------
  {
    name: 'Zero error with zero acceleration gives medium throttle',
    category: 'Behavior',
    run: () => {
      const throttle = controller.computeThrottle(0, 0);
      return expectAll([
        expectInRange(throttle, 30, 70, 'throttle(0, 0)'),
        expectWithin(throttle, 50, 1e-9, 'throttle(0, 0)'),
      ]);
    },
  },
  {
    name: 'Throttle does not decrease as speed error grows (acceleration 0)',
    category: 'Behavior',
    run: (): AssertionResult => {
      let previous = -Infinity;
      for (let e = -30; e <= 30; e += 0.5) {
        const t = controller.computeThrottle(e, 0);
        if (t < previous - 1e-6) {
          return {
            passed: false,
            message: `Throttle dropped from ${previous} to ${t} at error ${e}`,
            details: { e, previous, t },
          };
        }
        previous = t;
      }
      return { passed: true, message: 'Sweep from -30 to 30 is non-decreasing' };
    },
  },
  {
    name: 'Far too slow asks for high throttle, far too fast for little',
    category: 'Behavior',
    run: () => expectAll([
      expectInRange(controller.computeThrottle(20, 0), 85, 100, 'throttle(20, 0)'),
      expectInRange(controller.computeThrottle(-25, -5), 0, 15, 'throttle(-25, -5)'),
    ]),
  },
  {
    name: 'Slowing down while slightly slow adds less throttle than holding steady',
    category: 'Behavior',
    run: () => {
      const steady = controller.computeThrottle(5, 0);
      const slowing = controller.computeThrottle(5, -5);
      return {
        passed: slowing < steady,
        message: `throttle(5, -5) = ${slowing.toFixed(2)}, throttle(5, 0) = ${steady.toFixed(2)}`,
      };
    },
  },
  {
    name: 'Identical inputs give identical outputs',
    category: 'Behavior',
    run: () => {
      const inputs: Array<[number, number]> = [[0, 0], [7.3, -1.2], [-12.5, 4.4], [29.9, 9.9]];
      const mismatched = inputs.filter(([e, a]) =>
        !Object.is(controller.computeThrottle(e, a), controller.computeThrottle(e, a))
      );
      return expectEqual(mismatched.length, 0, 'mismatched inputs');
    },
  },
  {
    name: 'Separate controllers on the same config agree',
    category: 'Behavior',
    run: () => {
      const other = new FuzzyController(DEFAULT_CONTROLLER_CONFIG);
      return expectEqual(other.computeThrottle(3.7, 1.1), controller.computeThrottle(3.7, 1.1), 'throttle');
    },
  },

  // -------------------------------------------------------------------------
  // Inference trace
  // -------------------------------------------------------------------------
  {
    name: 'Fuzzification splits a value between neighboring labels',
    category: 'Inference',
    run: () => {
      const { speedErrorMemberships: m } = controller.evaluate(2.5, 0);
      return expectAll([
        expectWithin(m.zero, 0.5, 1e-12, 'zero'),
        expectWithin(m.positive_small, 0.5, 1e-12, 'positive_small'),
        expectEqual(m.negative_small, 0, 'negative_small'),
        expectEqual(m.positive_large, 0, 'positive_large'),
      ]);
    },
  },
  {
    name: 'Rules fire with min and aggregate with max',
    category: 'Inference',
    run: () => {
      const result = controller.evaluate(2.5, 1.5);
      const zeroZero = result.activations.find(
        a => a.rule.speedError === 'zero' && a.rule.acceleration === 'zero'
      );
      return expectAll([
        expectWithin(result.accelerationMemberships.zero, 0.5, 1e-12, 'acceleration zero'),
        expectWithin(result.accelerationMemberships.positive, 0.3, 1e-12, 'acceleration positive'),
        expectWithin(zeroZero?.strength ?? NaN, 0.5, 1e-12, 'zero/zero strength'),
        expectWithin(result.aggregated.medium, 0.5, 1e-12, 'aggregated medium'),
        expectWithin(result.aggregated.high, 0.5, 1e-12, 'aggregated high'),
        expectEqual(result.aggregated.very_high, 0, 'aggregated very_high'),
        expectEqual(result.activations.length, 15, 'activations'),
        expectEqual(result.degenerate, false, 'degenerate'),
      ]);
    },
  },

  // -------------------------------------------------------------------------
  // Degenerate aggregate
  // -------------------------------------------------------------------------
  {
    name: 'Input that only falls in a rule gap returns exactly 0',
    category: 'Degenerate Aggregate',
    run: () => {
      const gapped = new FuzzyController(gappedConfig(TOO_FAST_ONLY));
      const result = gapped.evaluate(20, 0);
      return expectAll([
        expectEqual(result.throttle, 0, 'throttle'),
        expectEqual(result.degenerate, true, 'degenerate'),
        expectEqual(gapped.computeThrottle(20, 0), 0, 'computeThrottle'),
      ]);
    },
  },
  {
    name: 'Degenerate evaluations are reported to the listener',
    category: 'Degenerate Aggregate',
    run: () => {
      const calls: Array<[number, number]> = [];
      const gapped = new FuzzyController(gappedConfig(TOO_FAST_ONLY), {
        onDegenerate: (e, a) => calls.push([e, a]),
      });
      gapped.computeThrottle(20, 0);
      gapped.computeThrottle(-25, 0);     // covered, not reported
      gapped.computeThrottle(50, 0);      // clamped to 30, still in the gap
      return expectAll([
        expectEqual(calls.length, 2, 'reports'),
        expectEqual(calls[0]?.[0], 20, 'first speed error'),
        expectEqual(calls[1]?.[0], 30, 'second speed error (clamped)'),
      ]);
    },
  },
  {
    name: 'Covered input in a gapped rule base still defuzzifies',
    category: 'Degenerate Aggregate',
    run: () => {
      const gapped = new FuzzyController(gappedConfig(TOO_FAST_ONLY));
      const result = gapped.evaluate(-25, 0);
      return expectAll([
        expectEqual(result.degenerate, false, 'degenerate'),
        expectInRange(result.throttle, 0, 20, 'throttle'),
      ]);
    },
  },
  {
    name: 'Single-rule controller outputs that rule\'s centroid',
    category: 'Degenerate Aggregate',
    run: () => {
      const single = new FuzzyController(gappedConfig([
        { speedError: 'zero', acceleration: 'zero', throttle: 'medium' },
      ]));
      return expectAll([
        expectWithin(single.computeThrottle(0, 0), 50, 1e-9, 'throttle(0, 0)'),
        expectEqual(single.computeThrottle(0, 5), 0, 'throttle(0, 5)'),
      ]);
    },
  },

  // -------------------------------------------------------------------------
  // Configuration
  // -------------------------------------------------------------------------
  {
    name: 'Default configuration is frozen and shared by reference',
    category: 'Configuration',
    run: () => {
      const a = new FuzzyController();
      const b = new FuzzyController();
      return expectAll([
        expectEqual(a.config, b.config, 'shared config'),
        expectEqual(Object.isFrozen(a.config), true, 'config frozen'),
        expectEqual(Object.isFrozen(a.config.rules), true, 'rules frozen'),
        expectEqual(Object.isFrozen(a.config.throttle.sets[0].points), true, 'control points frozen'),
      ]);
    },
  },
  {
    name: 'Labels named like object built-ins behave as any other label',
    category: 'Configuration',
    run: () => expectAll(['constructor', 'toString', '__proto__'].flatMap(label => {
      const result = new FuzzyController(withThrottleLabel('medium', label)).evaluate(0, 0);
      return [
        expectWithin(result.throttle, 50, 1e-9, `throttle with "${label}"`),
        expectEqual(result.degenerate, false, `degenerate with "${label}"`),
        expectEqual(Object.hasOwn(result.aggregated, label) ? result.aggregated[label] : NaN, 1, `aggregated "${label}"`),
      ];
    })),
  },
  {
    name: 'Rule base with an undefined label refuses to construct',
    category: 'Configuration',
    run: () => expectThrows(
      () => new FuzzyController(gappedConfig([
        { speedError: 'zero', acceleration: 'sideways', throttle: 'medium' },
      ])),
      InvalidParameterError,
      'undefined acceleration label "sideways"'
    ),
  },
  {
    name: 'Coarser resolution keeps the zero-error output',
    category: 'Configuration',
    run: () => {
      const coarse = new FuzzyController({ ...DEFAULT_CONTROLLER_CONFIG, resolution: 1 });
      return expectWithin(coarse.computeThrottle(0, 0), 50, 1e-9, 'throttle(0, 0)');
    },
  },

  // -------------------------------------------------------------------------
  // Control surface
  // -------------------------------------------------------------------------
  {
    name: 'Control surface covers the input grid',
    category: 'Control Surface',
    run: () => {
      const surface = computeControlSurface(controller);
      return expectAll([
        expectEqual(surface.speedErrors.length, 31, 'speed error samples'),
        expectEqual(surface.accelerations.length, 21, 'acceleration samples'),
        expectEqual(surface.throttle.length, 21, 'rows'),
        expectEqual(surface.throttle[0].length, 31, 'columns'),
        expectWithin(surface.throttle[10][15], 50, 1e-9, 'throttle at (0, 0)'),
      ]);
    },
  },
];

// ============================================================================
// MAIN RUNNER
// ============================================================================

let lastResults: TestSuiteResult | null = null;

export async function runControllerTests(): Promise<void> {
  const results = await runTestSuite('Controller Tests - Fuzzy Inference', controllerTests);
  lastResults = results;
  printTestSuiteResults(results);

  if (results.failed > 0) {
    console.log('\n⚠️  Some controller tests failed!');
  }
}

export function getControllerTestResults(): TestSuiteResult | null {
  return lastResults;
}

// Use: npx tsx src/tests/run-all-tests.ts --controller
