import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { IEventSink } from "../types/event.types";
import { IPosition } from "../types/execution.types";
import { IRiskState } from "../types/risk.types";
import { ISymbolStateView } from "../types/signal.types";
import { Clock, systemClock } from "../utils/clock";
import { errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { WriteLock } from "../utils/writeLock";

export const SNAPSHOT_VERSION = 1;

export type RunState = "stopped" | "running" | "paused" | "killed";

export interface EngineSnapshot {
  version: typeof SNAPSHOT_VERSION;
  savedAt: number;
  runState: RunState;
  settingsVersion: number;
  symbols: ISymbolStateView[];
  positions: IPosition[];
  risk: IRiskState;
}

export type SnapshotSource = () => Omit<EngineSnapshot, "version" | "savedAt">;

const numberRecord = z.record(z.number());

const PositionSchema = z.object({
  symbol: z.string(),
  side: z.enum(["LONG", "SHORT"]),
  qty: z.number().positive(),
  entryPrice: z.number().positive(),
  openedAt: z.number(),
  markPrice: z.number(),
  unrealizedPnl: z.number(),
});

const SymbolViewSchema = z.object({
  symbol: z.string(),
  state: z.enum(["BUILDUP", "IMPULSE", "CLIMAX", "EXHAUSTION", "REBALANCE"]),
  direction: z.enum(["UP", "DOWN"]).nullable(),
  cycleStartedAt: z.number().nullable(),
  armed: z.boolean(),
});

const RiskStateSchema = z.object({
  equity: z.number(),
  startingEquity: z.number(),
  dailyPnl: z.number(),
  unrealizedPnl: z.number(),
  tradingDay: z.string(),
  openPositionsBySymbol: numberRecord,
  exposureBySymbol: numberRecord,
  reservedNotional: numberRecord,
  consecutiveLosses: z.number().int().nonnegative(),
  cooldownUntil: z.number(),
  cooldownReason: z.string().nullable(),
  symbolCooldownUntil: numberRecord,
  killSwitchEngaged: z.boolean(),
  killSwitchReason: z.string().nullable(),
  entriesPaused: z.boolean(),
  pausedSymbols: z.array(z.string()),
  staleSymbols: z.array(z.string()),
  tradesLastHour: z.number().int().nonnegative(),
});

const EngineSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  savedAt: z.number(),
  runState: z.enum(["stopped", "running", "paused", "killed"]),
  settingsVersion: z.number().int(),
  symbols: z.array(SymbolViewSchema),
  positions: z.array(PositionSchema),
  risk: RiskStateSchema,
});

/**
 * Periodic JSON snapshot of engine state for crash recovery.
 * Writes go to a temp file that is renamed over the target, so a reader
 * never sees a half-written snapshot.
 */
export class SnapshotManager {
  private lock = new WriteLock();
  private timer: NodeJS.Timeout | null = null;
  private saves = 0;
  private failures = 0;

  constructor(
    private readonly filePath: string,
    private readonly source: SnapshotSource,
    private readonly events: IEventSink,
    private readonly clock: Clock = systemClock
  ) {}

  start(intervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.saveNow().catch((err) => logger.error("[Snapshot] Unexpected save failure", err));
    }, intervalMs);
    logger.info(`[Snapshot] Saving every ${intervalMs}ms to ${this.filePath}`);
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  /** Write one snapshot. Resolves false on failure; never rejects. */
  saveNow(): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      const tmpPath = `${this.filePath}.tmp`;
      try {
        const snapshot: EngineSnapshot = {
          version: SNAPSHOT_VERSION,
          savedAt: this.clock.now(),
          ...this.source(),
        };
        await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.promises.writeFile(tmpPath, JSON.stringify(snapshot, null, 2), "utf-8");
        await fs.promises.rename(tmpPath, this.filePath);
        this.saves++;
        return true;
      } catch (err) {
        this.failures++;
        this.events.publish({
          level: "ERROR",
          category: "SYSTEM",
          message: `Snapshot failed: ${errorMessage(err)}`,
          payload: { path: this.filePath },
        });
        return false;
      }
    });
  }

  /** Last saved snapshot, or null when none exists or it cannot be trusted. */
  load(): EngineSnapshot | null {
    if (!fs.existsSync(this.filePath)) return null;

    let json: unknown;
    try {
      json = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
    } catch (err) {
      this.reportCorrupt(errorMessage(err));
      return null;
    }

    const parsed = EngineSnapshotSchema.safeParse(json);
    if (!parsed.success) {
      this.reportCorrupt(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
      return null;
    }
    logger.info(`[Snapshot] Loaded snapshot saved at ${new Date(parsed.data.savedAt).toISOString()}`);
    return parsed.data;
  }

  getStats(): { saves: number; failures: number } {
    return { saves: this.saves, failures: this.failures };
  }

  private reportCorrupt(detail: string): void {
    this.events.publish({
      level: "ERROR",
      category: "SYSTEM",
      message: "Snapshot unreadable, starting fresh",
      payload: { path: this.filePath, detail },
    });
  }
}
