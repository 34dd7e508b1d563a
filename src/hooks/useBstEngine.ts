import { useState, useEffect, useRef, useCallback } from "react";
import {
  adjustPendingKey,
  createEngine,
  findScenario,
  loadScenario,
  readFrame,
  resetEngine,
  setPendingKey,
  startDelete,
  startInsert,
  startSearch,
  startTraversal,
  stepEngine,
  updateEngine,
  type EngineConfig,
  type EngineFrame,
  type TraversalOrder,
} from "@/lib/bst";

// A backgrounded tab resumes with one huge delta; cap it so a hop timer
// can't swallow several seconds of animation in a single frame.
const MAX_FRAME_SECONDS = 0.1;

export interface BstEngineControls {
  frame: EngineFrame;
  isPlaying: boolean;
  speed: number;
  play: () => void;
  pause: () => void;
  step: () => void;
  setSpeed: (speed: number) => void;
  insert: (key?: number) => void;
  search: (key?: number) => void;
  remove: (key?: number) => void;
  traverse: (order: TraversalOrder) => void;
  reset: () => void;
  adjustKey: (delta: number) => void;
  setKey: (key: number) => void;
  loadPreset: (id: string) => void;
}

/**
 * Owns one engine instance and drives it from requestAnimationFrame.
 * Elapsed time is scaled by `speed` and withheld while paused; node easing
 * pauses with it.
 */
export function useBstEngine(overrides?: Partial<EngineConfig>): BstEngineControls {
  const [engine] = useState(() => createEngine(overrides));
  const [frame, setFrame] = useState<EngineFrame>(() => readFrame(engine));
  const [isPlaying, setIsPlaying] = useState(true);
  const [speed, setSpeed] = useState(1);

  const animationRef = useRef<number | null>(null);
  const lastTickRef = useRef<number | null>(null);
  const isPlayingRef = useRef(isPlaying);
  const speedRef = useRef(speed);

  // Keep refs in sync
  useEffect(() => {
    isPlayingRef.current = isPlaying;
  }, [isPlaying]);
  useEffect(() => {
    speedRef.current = speed;
  }, [speed]);

  const publish = useCallback(() => {
    setFrame(readFrame(engine));
  }, [engine]);

  // ── Animation loop ──────────────────────────────────────────────────────────
  useEffect(() => {
    const loop = (timestamp: number) => {
      const last = lastTickRef.current;
      lastTickRef.current = timestamp;
      if (last !== null && isPlayingRef.current) {
        const seconds = Math.min(MAX_FRAME_SECONDS, (timestamp - last) / 1000);
        updateEngine(engine, seconds * speedRef.current);
      }
      publish();
      animationRef.current = requestAnimationFrame(loop);
    };

    animationRef.current = requestAnimationFrame(loop);
    return () => {
      if (animationRef.current !== null) cancelAnimationFrame(animationRef.current);
      animationRef.current = null;
      lastTickRef.current = null;
    };
  }, [engine, publish]);

  // ── Playback ────────────────────────────────────────────────────────────────
  const play = useCallback(() => setIsPlaying(true), []);
  const pause = useCallback(() => setIsPlaying(false), []);

  const step = useCallback(() => {
    setIsPlaying(false);
    isPlayingRef.current = false;
    stepEngine(engine);
    publish();
  }, [engine, publish]);

  // ── Operations ──────────────────────────────────────────────────────────────
  const insert = useCallback(
    (key?: number) => {
      startInsert(engine, key);
      publish();
    },
    [engine, publish]
  );

  const search = useCallback(
    (key?: number) => {
      startSearch(engine, key);
      publish();
    },
    [engine, publish]
  );

  const remove = useCallback(
    (key?: number) => {
      startDelete(engine, key);
      publish();
    },
    [engine, publish]
  );

  const traverse = useCallback(
    (order: TraversalOrder) => {
      startTraversal(engine, order);
      publish();
    },
    [engine, publish]
  );

  const reset = useCallback(() => {
    resetEngine(engine);
    publish();
  }, [engine, publish]);

  const adjustKey = useCallback(
    (delta: number) => {
      adjustPendingKey(engine, delta);
      publish();
    },
    [engine, publish]
  );

  const setKey = useCallback(
    (key: number) => {
      setPendingKey(engine, key);
      publish();
    },
    [engine, publish]
  );

  const loadPreset = useCallback(
    (id: string) => {
      const scenario = findScenario(id);
      if (!scenario) return;
      loadScenario(engine, scenario.keys, scenario.id);
      publish();
    },
    [engine, publish]
  );

  return {
    frame,
    isPlaying,
    speed,
    play,
    pause,
    step,
    setSpeed,
    insert,
    search,
    remove,
    traverse,
    reset,
    adjustKey,
    setKey,
    loadPreset,
  };
}
