import type { BstEngine, SearchActivity } from "./types";
import { hasElapsed } from "./clock";
import { advanceNarration } from "./narration";
import { appendLog, finishActivity, moveCursor } from "./state";

export function createSearch(target: number): SearchActivity {
  return { kind: "searching", target, hopTimer: 0 };
}

/**
 * One comparison at the cursor: stop on a match, otherwise step to the child
 * on the target's side. Walking off a leaf leaves the cursor null, which ends
 * the search as not found on the next update.
 */
export function searchHop(engine: BstEngine, activity: SearchActivity): void {
  const current = engine.cursor;
  if (!current) return;

  const { target } = activity;
  appendLog(engine, `  Compare ${target} with ${current.key}`);

  if (target === current.key) {
    engine.found = true;
    engine.searchOutcome = "found";
    current.tag = "found";
    appendLog(engine, `  Found ${target}!`);
    finishActivity(engine);
    return;
  }

  if (target < current.key) {
    appendLog(engine, `  ${target} < ${current.key}, go left`);
    moveCursor(engine, current.left);
  } else {
    appendLog(engine, `  ${target} > ${current.key}, go right`);
    moveCursor(engine, current.right);
  }
}

export function updateSearch(engine: BstEngine, activity: SearchActivity, dt: number): void {
  if (!engine.cursor) {
    appendLog(engine, `  ${activity.target} not found`);
    engine.searchOutcome = "not-found";
    finishActivity(engine);
    return;
  }

  advanceNarration(engine.narration, dt, engine.config.narrationInterval);

  activity.hopTimer += dt;
  if (!hasElapsed(activity.hopTimer, engine.config.searchHopInterval)) return;
  activity.hopTimer = 0;

  searchHop(engine, activity);
}

export function secondsUntilSearchHop(engine: BstEngine, activity: SearchActivity): number {
  if (!engine.cursor) return 0;
  return Math.max(0, engine.config.searchHopInterval - activity.hopTimer);
}
