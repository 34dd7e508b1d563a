export interface ScenarioPreset {
  id: string;
  label: string;
  keys: number[];
  description: string;
}

export const SCENARIO_PRESETS: ScenarioPreset[] = [
  {
    id: "balanced",
    label: "Balanced",
    keys: [50, 25, 75, 12, 37, 62, 87],
    description: "Insertion order that fills every level before the next",
  },
  {
    id: "degenerate",
    label: "Degenerate",
    keys: [10, 20, 30, 40, 50, 60],
    description: "Sorted input turns the tree into a right-leaning list",
  },
  {
    id: "two-child-delete",
    label: "Two-Child Delete",
    keys: [50, 30, 70, 20, 40],
    description: "Delete 30 to watch its successor 40 move up",
  },
  {
    id: "zigzag",
    label: "Zigzag",
    keys: [50, 20, 45, 25, 40, 30],
    description: "Alternating left/right links make a deep, narrow path",
  },
];

export function findScenario(id: string): ScenarioPreset | undefined {
  return SCENARIO_PRESETS.find((s) => s.id === id);
}
