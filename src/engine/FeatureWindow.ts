import { FeatureSettings } from "../config/settings";
import { IFeatureSnapshot, ITick } from "../types/market.types";
import { clamp, stddevFromSums } from "../utils/mathUtils";

interface WindowEntry {
  timestamp: number;
  price: number;
  size: number;
  logReturnSq: number;
}

interface VelocitySample {
  timestamp: number;
  velocity: number;
}

interface BaselineBucket {
  volume: number;
  count: number;
  open: number;
  close: number;
}

const COMPACT_THRESHOLD = 1_024;

/**
 * Rolling per-symbol features over one time-based window.
 *
 * Entries are appended at the tail and expired from the head. Sums are kept
 * incrementally so each tick costs O(1) amortized. Completed window-sized
 * buckets form the baseline the volume z-score and trade rate compare
 * against.
 */
export class FeatureWindow {
  private entries: WindowEntry[] = [];
  private head = 0;
  private rateHead = 0;
  private windowVolume = 0;
  private windowReturnSq = 0;

  // Monotonic (decreasing) deque of short-horizon velocity
  private velocity: VelocitySample[] = [];
  private velocityHead = 0;

  private baseline: BaselineBucket[] = [];
  private baselineVolumeSum = 0;
  private baselineVolumeSumSq = 0;
  private baselineCountSum = 0;
  private currentBucketIndex: number | null = null;
  private currentBucket: BaselineBucket = { volume: 0, count: 0, open: 0, close: 0 };

  private lastTimestamp = Number.NEGATIVE_INFINITY;
  private lastPrice = 0;

  constructor(
    readonly symbol: string,
    private readonly settings: FeatureSettings
  ) {}

  get size(): number {
    return this.entries.length - this.head;
  }

  get baselineSize(): number {
    return this.baseline.length;
  }

  /**
   * Fold one tick into the window. Returns null for a tick older than the
   * last one observed; such ticks leave the window untouched.
   */
  observe(tick: ITick): IFeatureSnapshot | null {
    if (tick.timestamp < this.lastTimestamp) return null;

    this.rollBaseline(tick);

    const previous = this.lastPrice;
    const logReturn = previous > 0 ? Math.log(tick.price / previous) : 0;
    const entry: WindowEntry = {
      timestamp: tick.timestamp,
      price: tick.price,
      size: tick.size,
      logReturnSq: logReturn * logReturn,
    };
    this.entries.push(entry);
    this.windowVolume += entry.size;
    this.windowReturnSq += entry.logReturnSq;
    this.lastTimestamp = tick.timestamp;
    this.lastPrice = tick.price;

    this.currentBucket.volume += tick.size;
    this.currentBucket.count += 1;
    this.currentBucket.close = tick.price;

    this.expire(tick.timestamp);
    this.advanceRateHead(tick.timestamp);
    this.pushVelocity(tick.timestamp, this.shortHorizonVelocity(tick.price));

    return this.snapshot(tick);
  }

  private expire(now: number): void {
    const cutoff = now - this.settings.windowMs;
    // The newest entry always stays, whatever its age
    while (this.head < this.entries.length - 1 && this.entries[this.head].timestamp <= cutoff) {
      const old = this.entries[this.head];
      this.windowVolume -= old.size;
      this.windowReturnSq -= old.logReturnSq;
      this.head++;
    }
    if (this.windowVolume < 0) this.windowVolume = 0;
    if (this.windowReturnSq < 0) this.windowReturnSq = 0;

    if (this.head > COMPACT_THRESHOLD && this.head * 2 > this.entries.length) {
      this.entries = this.entries.slice(this.head);
      this.rateHead = Math.max(0, this.rateHead - this.head);
      this.head = 0;
    }
  }

  private advanceRateHead(now: number): void {
    const cutoff = now - this.settings.rateHorizonMs;
    if (this.rateHead < this.head) this.rateHead = this.head;
    while (this.rateHead < this.entries.length - 1 && this.entries[this.rateHead].timestamp <= cutoff) {
      this.rateHead++;
    }
  }

  private shortHorizonVelocity(price: number): number {
    const anchor = this.entries[this.rateHead].price;
    return anchor > 0 ? (Math.abs(price - anchor) / anchor) * 100 : 0;
  }

  private pushVelocity(now: number, velocity: number): void {
    while (this.velocity.length > this.velocityHead && this.velocity[this.velocity.length - 1].velocity <= velocity) {
      this.velocity.pop();
    }
    this.velocity.push({ timestamp: now, velocity });

    const cutoff = now - this.settings.windowMs;
    while (this.velocityHead < this.velocity.length - 1 && this.velocity[this.velocityHead].timestamp <= cutoff) {
      this.velocityHead++;
    }
    if (this.velocityHead > COMPACT_THRESHOLD && this.velocityHead * 2 > this.velocity.length) {
      this.velocity = this.velocity.slice(this.velocityHead);
      this.velocityHead = 0;
    }
  }

  /**
   * Close every window-sized bucket that ended before this tick. Gaps
   * become empty buckets so quiet periods lower the baseline.
   */
  private rollBaseline(tick: ITick): void {
    const index = Math.floor(tick.timestamp / this.settings.windowMs);
    if (this.currentBucketIndex === null) {
      this.currentBucketIndex = index;
      this.currentBucket = { volume: 0, count: 0, open: tick.price, close: tick.price };
      return;
    }
    if (index <= this.currentBucketIndex) return;

    this.pushBaseline(this.currentBucket);
    const gap = Math.min(index - this.currentBucketIndex - 1, this.settings.baselineWindows);
    for (let i = 0; i < gap; i++) {
      this.pushBaseline({ volume: 0, count: 0, open: this.lastPrice, close: this.lastPrice });
    }
    this.currentBucketIndex = index;
    this.currentBucket = { volume: 0, count: 0, open: tick.price, close: tick.price };
  }

  private pushBaseline(bucket: BaselineBucket): void {
    this.baseline.push(bucket);
    this.baselineVolumeSum += bucket.volume;
    this.baselineVolumeSumSq += bucket.volume * bucket.volume;
    this.baselineCountSum += bucket.count;
    while (this.baseline.length > this.settings.baselineWindows) {
      const dropped = this.baseline.shift();
      if (!dropped) break;
      this.baselineVolumeSum -= dropped.volume;
      this.baselineVolumeSumSq -= dropped.volume * dropped.volume;
      this.baselineCountSum -= dropped.count;
    }
  }

  private snapshot(tick: ITick): IFeatureSnapshot {
    const { windowMs, rateHorizonMs, minBaselineWindows, stdFloorRatio } = this.settings;
    const oldest = this.entries[this.head];
    const displacementPct = oldest.price > 0 ? ((tick.price - oldest.price) / oldest.price) * 100 : 0;

    const n = this.baseline.length;
    const warmingUp = n < Math.max(1, minBaselineWindows);
    let volumeZScore = 0;
    let lowLiquidity = false;
    if (!warmingUp) {
      const baselineMean = this.baselineVolumeSum / n;
      if (baselineMean <= 0) {
        lowLiquidity = true;
      } else {
        const std = Math.max(
          stddevFromSums(this.baselineVolumeSum, this.baselineVolumeSumSq, n),
          baselineMean * stdFloorRatio
        );
        volumeZScore = std > 0 ? (this.windowVolume - baselineMean) / std : 0;
      }
    }

    const shortCount = this.entries.length - this.rateHead;
    const shortRate = shortCount / (rateHorizonMs / 1000);
    const baselineCount = n > 0 ? this.baselineCountSum / n : 0;
    const baselineRate = Math.max(baselineCount, 1) / (windowMs / 1000);
    const tradeRateRatio = shortRate / baselineRate;

    const current = this.velocity[this.velocity.length - 1].velocity;
    const peak = this.velocity[this.velocityHead].velocity;
    const exhaustionRatio = peak > 0 ? clamp(1 - current / peak, 0, 1) : 0;

    // Trend over closed buckets; the live bucket is excluded
    const trendOpen = n > 0 ? this.baseline[0].open : 0;
    const trendClose = n > 0 ? this.baseline[n - 1].close : 0;
    const trendStrengthPct = trendOpen > 0 ? ((trendClose - trendOpen) / trendOpen) * 100 : 0;

    const returns = Math.max(this.size - 1, 1);
    const volatility = Math.sqrt(this.windowReturnSq / returns);

    return {
      symbol: this.symbol,
      timestamp: tick.timestamp,
      price: tick.price,
      displacementPct,
      volumeZScore,
      tradeRateRatio,
      exhaustionRatio,
      trendStrengthPct,
      volatility,
      lowLiquidity,
      warmingUp,
    };
  }
}
