import type { BstEngine, InsertActivity } from "./types";
import { advanceNarration, isNarrationComplete, secondsUntilNextReveal } from "./narration";
import { finishActivity, moveCursor } from "./state";

// Insertion itself is instant; only the narration is paced, with the new node
// held under the cursor until the last step is revealed.

export function updateInsert(engine: BstEngine, activity: InsertActivity, dt: number): void {
  advanceNarration(engine.narration, dt, engine.config.narrationInterval);
  if (isNarrationComplete(engine.narration)) {
    if (engine.cursor === activity.node) moveCursor(engine, null);
    finishActivity(engine);
  }
}

export function secondsUntilInsertEvent(engine: BstEngine): number {
  return secondsUntilNextReveal(engine.narration, engine.config.narrationInterval) ?? 0;
}
