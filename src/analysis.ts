/**
 * Step-response metrics over a recorded speed trace.
 */

import { InvalidParameterError } from './errors.js';
import { ResponseMetrics } from './types.js';

export interface SpeedSample {
  timestamp: number;
  speed: number;
}

export function analyzeResponse(
  samples: readonly SpeedSample[],
  target: number,
  band: number = 2
): ResponseMetrics {
  if (samples.length === 0) {
    throw new InvalidParameterError('analyzeResponse', [
      { path: 'samples', message: 'at least one sample is required' },
    ]);
  }

  let peakSpeed = -Infinity;
  for (const s of samples) {
    peakSpeed = Math.max(peakSpeed, s.speed);
  }

  // Index of the first sample after the last excursion outside the band
  let settledFrom = 0;
  for (let i = samples.length - 1; i >= 0; i--) {
    if (Math.abs(samples[i].speed - target) > band) {
      settledFrom = i + 1;
      break;
    }
  }
  const settled = settledFrom < samples.length;

  const tail = settled ? samples.slice(settledFrom) : samples;
  let tailMin = Infinity;
  let tailMax = -Infinity;
  for (const s of tail) {
    tailMin = Math.min(tailMin, s.speed);
    tailMax = Math.max(tailMax, s.speed);
  }

  const last = samples[samples.length - 1];

  return {
    target,
    band,
    peakSpeed,
    overshoot: Math.max(0, peakSpeed - target),
    settlingTime: settled ? samples[settledFrom].timestamp : null,
    steadyStateError: Math.abs(target - last.speed),
    oscillation: tailMax - tailMin,
  };
}
