import { config } from "dotenv";
import { ConfigurationError } from "../utils/errors";
import { isPresetName, PresetName } from "./presets";

// Load environment variables from .env file
config();

export type EngineMode = "DEMO" | "REAL";

export interface EnvironmentConfig {
  engineMode: EngineMode;
  binanceApiKey?: string;
  binanceApiSecret?: string;
  binanceTestnet: boolean;
  mongoUri?: string;
  settingsFile?: string;
  settingsPreset?: PresetName;
  snapshotPath: string;
  replayFile?: string;
}

type EnvSource = Record<string, string | undefined>;

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function validateEnvironment(source: EnvSource = process.env): EnvironmentConfig {
  const rawMode = (source.ENGINE_MODE || "DEMO").toUpperCase();
  if (rawMode !== "DEMO" && rawMode !== "REAL") {
    throw new ConfigurationError(`ENGINE_MODE must be DEMO or REAL, got "${rawMode}"`);
  }

  const binanceApiKey = optional(source.BINANCE_API_KEY);
  const binanceApiSecret = optional(source.BINANCE_API_SECRET);

  // Validate mode-specific requirements
  if (rawMode === "REAL") {
    if (!binanceApiKey) {
      throw new ConfigurationError("BINANCE_API_KEY is required for REAL mode");
    }
    if (!binanceApiSecret) {
      throw new ConfigurationError("BINANCE_API_SECRET is required for REAL mode");
    }
  }

  const preset = optional(source.SETTINGS_PRESET)?.toUpperCase();
  if (preset !== undefined && !isPresetName(preset)) {
    throw new ConfigurationError(`Unknown SETTINGS_PRESET "${preset}"`);
  }

  return {
    engineMode: rawMode,
    binanceApiKey,
    binanceApiSecret,
    binanceTestnet: source.BINANCE_TESTNET === "true",
    mongoUri: optional(source.MONGODB_URI),
    settingsFile: optional(source.SETTINGS_FILE),
    settingsPreset: preset,
    snapshotPath: optional(source.SNAPSHOT_PATH) ?? "data/engine_state.json",
    replayFile: optional(source.REPLAY_FILE),
  };
}

/** Mask all but the first and last four characters. */
export function maskSecret(value: string | undefined): string {
  if (!value) return "";
  if (value.length <= 8) return "****";
  return `${value.slice(0, 4)}****${value.slice(-4)}`;
}
