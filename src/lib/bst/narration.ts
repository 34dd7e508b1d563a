import type { NarrationClock, TraversalOrder } from "./types";
import { hasElapsed } from "./clock";

// ─── Step scripts ─────────────────────────────────────────────────────────────

export const INSERT_STEPS = [
  "Start at root",
  "Compare values",
  "Move left / right",
  "Insert at leaf",
  "Recalculate layout",
] as const;

export const SEARCH_STEPS = [
  "Start at root",
  "Compare target",
  "Move left or right",
  "Repeat until found or NULL",
] as const;

/** Indexed by delete phase: locate, flash, drop, fade, commit. */
export const DELETE_STEPS = [
  "Find node",
  "Flash target node",
  "Drop node",
  "Fade node",
  "Delete & restructure",
] as const;

export const TRAVERSAL_STEPS: Record<TraversalOrder, readonly string[]> = {
  "in-order": ["In-order traversal:", "Go Left", "Visit Node", "Go Right"],
  "pre-order": ["Pre-order traversal:", "Visit Node", "Go Left", "Go Right"],
  "post-order": ["Post-order traversal:", "Go Left", "Go Right", "Visit Node"],
};

// ─── Clock ────────────────────────────────────────────────────────────────────

export function createNarration(steps: readonly string[] = []): NarrationClock {
  return { steps: [...steps], index: 0, timer: 0 };
}

export function isNarrationComplete(clock: NarrationClock): boolean {
  return clock.index >= clock.steps.length - 1;
}

/** Reveals at most one more entry per call; stays on the last entry once there. */
export function advanceNarration(clock: NarrationClock, dt: number, interval: number): void {
  clock.timer += dt;
  if (hasElapsed(clock.timer, interval) && !isNarrationComplete(clock)) {
    clock.index++;
    clock.timer = 0;
  }
}

/** Pulls the reveal index forward so it is never behind a machine's own phase. */
export function syncNarration(clock: NarrationClock, atLeast: number): void {
  const clamped = Math.min(atLeast, clock.steps.length - 1);
  if (clamped > clock.index) {
    clock.index = clamped;
    clock.timer = 0;
  }
}

export function revealedSteps(clock: NarrationClock): string[] {
  return clock.steps.slice(0, clock.index + 1);
}

export function secondsUntilNextReveal(clock: NarrationClock, interval: number): number | null {
  if (isNarrationComplete(clock)) return null;
  return Math.max(0, interval - clock.timer);
}
