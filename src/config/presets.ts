import { defaultSettings, EngineSettings, mergeSettings, parseSettings, SettingsPatch } from "./settings";

export type PresetName = "SAFE" | "MEDIUM" | "AGGRESSIVE" | "INSANE";

export const PRESET_ORDER: readonly PresetName[] = ["SAFE", "MEDIUM", "AGGRESSIVE", "INSANE"];

/**
 * Named risk profiles. Each one only touches the fields listed here;
 * everything else keeps its current value.
 */
export const PRESETS: Record<PresetName, SettingsPatch> = {
  SAFE: {
    execution: { dryRun: true, spreadGuardBps: 2, maxSlippageBps: 8, edgeSafetyFactor: 0.55 },
    risk: {
      orderValuePctEquity: 0.5,
      maxLeverage: 3,
      maxPositions: 1,
      maxDailyLossPct: 1,
      symbolCooldownMs: 180_000,
      maxTradesPerHour: 6,
      volatilityKillThreshold: 0.004,
    },
    strategy: {
      regimeFilterEnabled: true,
      trendStrengthThresholdPct: 0.18,
      hardTimeStopMs: 90_000,
      impulseThresholdPct: 3.5,
      exhaustionRatioThreshold: 0.35,
    },
  },
  MEDIUM: {
    execution: { dryRun: true, spreadGuardBps: 3, maxSlippageBps: 12, edgeSafetyFactor: 0.65 },
    risk: {
      orderValuePctEquity: 1,
      maxLeverage: 5,
      maxPositions: 2,
      maxDailyLossPct: 2,
      symbolCooldownMs: 120_000,
      maxTradesPerHour: 10,
      volatilityKillThreshold: 0.006,
    },
    strategy: {
      regimeFilterEnabled: true,
      trendStrengthThresholdPct: 0.25,
      hardTimeStopMs: 120_000,
      impulseThresholdPct: 3,
      exhaustionRatioThreshold: 0.4,
    },
  },
  AGGRESSIVE: {
    execution: { dryRun: true, spreadGuardBps: 4.5, maxSlippageBps: 18, edgeSafetyFactor: 0.75 },
    risk: {
      orderValuePctEquity: 2,
      maxLeverage: 8,
      maxPositions: 3,
      maxDailyLossPct: 3.5,
      symbolCooldownMs: 60_000,
      maxTradesPerHour: 16,
      volatilityKillThreshold: 0.009,
    },
    strategy: {
      regimeFilterEnabled: true,
      trendStrengthThresholdPct: 0.35,
      hardTimeStopMs: 150_000,
      impulseThresholdPct: 2.5,
      exhaustionRatioThreshold: 0.45,
    },
  },
  INSANE: {
    execution: { dryRun: true, spreadGuardBps: 8, maxSlippageBps: 35, edgeSafetyFactor: 0.9 },
    risk: {
      orderValuePctEquity: 4,
      maxLeverage: 15,
      maxPositions: 5,
      maxDailyLossPct: 6,
      symbolCooldownMs: 20_000,
      maxTradesPerHour: 30,
      volatilityKillThreshold: 0.015,
    },
    strategy: {
      regimeFilterEnabled: true,
      trendStrengthThresholdPct: 0.5,
      hardTimeStopMs: 180_000,
      impulseThresholdPct: 2,
      exhaustionRatioThreshold: 0.5,
    },
  },
};

export function isPresetName(value: string): value is PresetName {
  return PRESET_ORDER.some((name) => name === value);
}

function matchesSection(actual: Record<string, unknown>, expected: Record<string, unknown>): boolean {
  return Object.entries(expected).every(([key, value]) => actual[key] === value);
}

/** Name of the preset the settings currently match, or CUSTOM. */
export function detectPreset(settings: EngineSettings): PresetName | "CUSTOM" {
  for (const name of PRESET_ORDER) {
    const preset = PRESETS[name];
    const matches =
      matchesSection(settings.execution, preset.execution ?? {}) &&
      matchesSection(settings.risk, preset.risk ?? {}) &&
      matchesSection(settings.strategy, preset.strategy ?? {});
    if (matches) return name;
  }
  return "CUSTOM";
}

/**
 * Startup settings: defaults, then the preset, then the settings file.
 * Throws ConfigurationError when the result does not validate.
 */
export function composeSettings(preset: PresetName | undefined, fileContents: unknown = {}): EngineSettings {
  const withPreset = preset ? mergeSettings(defaultSettings(), PRESETS[preset]) : defaultSettings();
  return parseSettings(mergeSettings(withPreset, fileContents));
}
