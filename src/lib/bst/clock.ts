// Slack for accumulated float error, so a timer fed exactly `interval` seconds
// in several slices still fires.
const EPSILON = 1e-9;

export function hasElapsed(timer: number, interval: number): boolean {
  return timer >= interval - EPSILON;
}

export function reachedZero(value: number): boolean {
  return value <= EPSILON;
}

export function reachedThreshold(value: number, threshold: number): boolean {
  return value >= threshold - EPSILON;
}
