import { EngineConfigError } from "./errors";

/** Pacing and layout constants. Times are in seconds, distances in canvas units. */
export interface EngineConfig {
  searchHopInterval: number;
  traversalHopInterval: number;
  narrationInterval: number;
  flashInterval: number;
  flashToggles: number;
  dropSpeed: number;
  dropThreshold: number;
  fadeSpeed: number;
  easeRate: number;
  originX: number;
  originY: number;
  halfSpread: number;
  rowHeight: number;
  spawnY: number;
  initialKey: number;
  maxLogLines: number;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = {
  searchHopInterval: 0.6,
  traversalHopInterval: 0.8,
  narrationInterval: 0.5,
  flashInterval: 0.12,
  flashToggles: 7,
  dropSpeed: 300,
  dropThreshold: 900,
  fadeSpeed: 3,
  easeRate: 5,
  originX: 350,
  originY: 80,
  halfSpread: 200,
  rowHeight: 80,
  spawnY: -100,
  initialKey: 10,
  maxLogLines: 200,
};

const POSITIVE_FIELDS = [
  "searchHopInterval",
  "traversalHopInterval",
  "narrationInterval",
  "flashInterval",
  "dropSpeed",
  "fadeSpeed",
  "easeRate",
  "rowHeight",
] as const satisfies readonly (keyof EngineConfig)[];

const INTEGER_FIELDS = [
  "flashToggles",
  "initialKey",
  "maxLogLines",
] as const satisfies readonly (keyof EngineConfig)[];

export function resolveConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...overrides };

  for (const [field, value] of Object.entries(config)) {
    if (!Number.isFinite(value)) {
      throw new EngineConfigError(field, "must be a finite number");
    }
  }
  for (const field of POSITIVE_FIELDS) {
    if (config[field] <= 0) {
      throw new EngineConfigError(field, "must be greater than zero");
    }
  }
  for (const field of INTEGER_FIELDS) {
    if (!Number.isInteger(config[field])) {
      throw new EngineConfigError(field, "must be an integer");
    }
  }
  if (config.flashToggles < 1) {
    throw new EngineConfigError("flashToggles", "must be at least 1");
  }
  if (config.maxLogLines < 1) {
    throw new EngineConfigError("maxLogLines", "must be at least 1");
  }
  if (config.halfSpread < 0) {
    throw new EngineConfigError("halfSpread", "must not be negative");
  }

  return config;
}
