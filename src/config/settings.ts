import * as fs from "fs";
import { z } from "zod";
import { ConfigurationError } from "../utils/errors";
import { logger } from "../utils/logger";

const positive = () => z.number().finite().positive();
const nonNegative = () => z.number().finite().nonnegative();
const ratio = () => z.number().finite().min(0).max(1);
const intMs = () => z.number().int().positive();

// ==================== SECTIONS ====================

const AccountSchema = z
  .object({
    startingEquity: positive().default(10_000),
  })
  .default({});

const FeedSchema = z
  .object({
    wsBaseUrl: z.string().url().default("wss://fstream.binance.com"),
    symbolsPerConnection: z.number().int().positive().max(200).default(10),
    staleAfterMs: intMs().default(5_000),
    staleCheckIntervalMs: intMs().default(1_000),
    reconnectBaseMs: intMs().default(1_000),
    reconnectMaxMs: intMs().default(30_000),
    reconnectJitter: ratio().default(0.2),
  })
  .default({});

const FeatureSchema = z
  .object({
    windowMs: intMs().default(60_000),
    rateHorizonMs: intMs().default(5_000),
    baselineWindows: z.number().int().positive().default(30),
    minBaselineWindows: z.number().int().nonnegative().default(5),
    stdFloorRatio: nonNegative().default(0.1),
  })
  .default({})
  .refine((f) => f.rateHorizonMs <= f.windowMs, {
    message: "rateHorizonMs must not exceed windowMs",
    path: ["rateHorizonMs"],
  })
  .refine((f) => f.minBaselineWindows <= f.baselineWindows, {
    message: "minBaselineWindows must not exceed baselineWindows",
    path: ["minBaselineWindows"],
  });

const ConfidenceWeightsSchema = z
  .object({
    displacement: nonNegative().default(0.3),
    volume: nonNegative().default(0.25),
    tradeRate: nonNegative().default(0.2),
    exhaustion: nonNegative().default(0.25),
  })
  .default({})
  .refine((w) => w.displacement + w.volume + w.tradeRate + w.exhaustion > 0, {
    message: "at least one confidence weight must be positive",
  });

const StrategySchema = z
  .object({
    impulseThresholdPct: positive().default(3),
    tradeRateBurstThreshold: positive().default(3),
    volumeZScoreThreshold: positive().default(2),
    exhaustionRatioThreshold: z.number().finite().gt(0).max(1).default(0.4),
    regimeFilterEnabled: z.boolean().default(true),
    trendStrengthThresholdPct: positive().default(0.25),
    hardTimeStopMs: intMs().default(120_000),
    confidenceWeights: ConfidenceWeightsSchema,
    // Feature value at which its confidence score saturates, as a multiple of its threshold
    confidenceSaturation: z.number().finite().min(1).default(2),
    positionTimeStopMs: intMs().default(300_000),
    takeProfitPct: positive().default(1.2),
  })
  .default({});

const RiskSchema = z
  .object({
    maxDailyLossPct: z.number().finite().positive().max(100).default(3),
    includeUnrealizedPnl: z.boolean().default(true),
    maxTradeRiskPct: z.number().finite().positive().max(100).default(0.5),
    stopDistancePct: positive().default(1),
    stopLossPct: positive().default(1),
    maxNotionalPerTrade: positive().default(250),
    orderValuePctEquity: z.number().finite().positive().max(100).default(2.5),
    maxLeverage: positive().default(5),
    maxPositions: z.number().int().positive().default(3),
    maxPositionsPerSymbol: z.number().int().positive().default(1),
    maxExposurePerSymbol: positive().default(500),
    maxAccountExposure: positive().default(2_000),
    symbolCooldownMs: z.number().int().nonnegative().default(45_000),
    lossCooldownMs: z.number().int().nonnegative().default(90_000),
    maxConsecutiveLosses: z.number().int().positive().default(4),
    maxTradesPerHour: z.number().int().positive().default(20),
    volatilityKillThreshold: positive().default(0.006),
    volatilityCooldownMs: z.number().int().nonnegative().default(60_000),
  })
  .default({});

const ExecutionSchema = z
  .object({
    dryRun: z.boolean().default(true),
    maxSlippageBps: positive().default(8),
    spreadGuardBps: positive().default(15),
    minDepthNotional: nonNegative().default(50_000),
    edgeSafetyFactor: positive().default(0.65),
    edgeBpsAtFullConfidence: positive().default(40),
    maxRetryAttempts: z.number().int().positive().max(10).default(3),
    retryBaseDelayMs: intMs().default(250),
    retryMaxDelayMs: intMs().default(4_000),
    retryJitter: ratio().default(0.2),
    fillPollIntervalMs: intMs().default(250),
    fillTimeoutMs: intMs().default(5_000),
    idempotencyTtlMs: intMs().default(600_000),
  })
  .default({});

const PaperSchema = z
  .object({
    slippageBps: nonNegative().default(2),
    feeBps: nonNegative().default(4),
  })
  .default({});

const SnapshotSchema = z
  .object({
    intervalMs: intMs().default(5_000),
  })
  .default({});

export const EngineSettingsSchema = z.object({
  symbols: z
    .array(z.string().regex(/^[A-Z0-9]+$/, "symbols are upper-case exchange tickers"))
    .min(1)
    .default(["BTCUSDT", "ETHUSDT", "SOLUSDT"]),
  account: AccountSchema,
  feed: FeedSchema,
  features: FeatureSchema,
  strategy: StrategySchema,
  risk: RiskSchema,
  execution: ExecutionSchema,
  paper: PaperSchema,
  snapshot: SnapshotSchema,
});

export type EngineSettings = z.infer<typeof EngineSettingsSchema>;
export type FeedSettings = EngineSettings["feed"];
export type FeatureSettings = EngineSettings["features"];
export type StrategySettings = EngineSettings["strategy"];
export type RiskSettings = EngineSettings["risk"];
export type ExecutionSettings = EngineSettings["execution"];

/** Recursive partial used for presets and runtime patches. */
export type SettingsPatch = {
  [K in keyof EngineSettings]?: EngineSettings[K] extends unknown[]
    ? EngineSettings[K]
    : { [F in keyof EngineSettings[K]]?: EngineSettings[K][F] extends Record<string, number> ? Partial<EngineSettings[K][F]> : EngineSettings[K][F] };
};

// ==================== PARSING ====================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/**
 * Validate raw settings input. Invalid settings never reach a component.
 */
export function parseSettings(input: unknown): EngineSettings {
  const result = EngineSettingsSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigurationError("Invalid engine settings", formatIssues(result.error));
  }
  return result.data;
}

export function defaultSettings(): EngineSettings {
  return parseSettings({});
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Deep merge where arrays and scalars from `patch` replace the base. */
export function mergeSettings(base: unknown, patch: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(patch)) {
    return patch === undefined ? base : patch;
  }
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    merged[key] = mergeSettings(base[key], value);
  }
  return merged;
}

export function loadSettingsFile(path: string): unknown {
  if (!fs.existsSync(path)) {
    logger.warning(`[Settings] Settings file ${path} not found, using defaults`);
    return {};
  }
  try {
    return JSON.parse(fs.readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Settings file ${path} is not valid JSON`, [String(err)]);
  }
}

// ==================== STORE ====================

export type SettingsListener = (next: EngineSettings, previous: EngineSettings) => void;

export type PatchResult =
  | { ok: true; version: number; settings: EngineSettings }
  | { ok: false; version: number; issues: string[] };

/**
 * Holds the one immutable settings object. A patch is validated as a whole
 * and swapped in atomically; readers always see a complete version.
 */
export class SettingsStore {
  private settings: Readonly<EngineSettings>;
  private versionNumber = 1;
  private listeners: SettingsListener[] = [];

  constructor(initial: EngineSettings = defaultSettings()) {
    this.settings = Object.freeze(parseSettings(initial));
  }

  get current(): Readonly<EngineSettings> {
    return this.settings;
  }

  get version(): number {
    return this.versionNumber;
  }

  patch(partial: unknown): PatchResult {
    const candidate = EngineSettingsSchema.safeParse(mergeSettings(this.settings, partial));
    if (!candidate.success) {
      const issues = formatIssues(candidate.error);
      logger.warning(`[Settings] Rejected patch: ${issues.join("; ")}`);
      return { ok: false, version: this.versionNumber, issues };
    }

    const previous = this.settings;
    this.settings = Object.freeze(candidate.data);
    this.versionNumber += 1;
    logger.info(`[Settings] Applied settings version ${this.versionNumber}`);

    for (const listener of this.listeners) {
      try {
        listener(this.settings, previous);
      } catch (err) {
        logger.error("[Settings] Listener failed", err);
      }
    }
    return { ok: true, version: this.versionNumber, settings: this.settings };
  }

  onChange(listener: SettingsListener): void {
    this.listeners.push(listener);
  }
}
