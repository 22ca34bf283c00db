import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FeedSupervisor } from "../src/engine/FeedSupervisor";
import { MarketBook } from "../src/exchange/MarketBook";
import { LivenessChange } from "../src/types/market.types";
import { BASE_TIME, FakeConnectionFactory, makeBook, makeSettings, makeTick, ManualClock, RecordingSink } from "./helpers";

function setup() {
  const clock = new ManualClock();
  const settings = makeSettings({
    feed: { symbolsPerConnection: 2, staleCheckIntervalMs: 60_000, staleAfterMs: 5_000, reconnectJitter: 0 },
  });
  const events = new RecordingSink(clock);
  const book = new MarketBook();
  const factory = new FakeConnectionFactory();
  const feed = new FeedSupervisor({ settings, events, book, connect: factory.connect, clock, random: () => 0 });
  const changes: [string, LivenessChange][] = [];
  feed.onLiveness((symbol, change) => changes.push([symbol, change]));
  return { clock, events, book, factory, feed, changes };
}

describe("FeedSupervisor", () => {
  let active: FeedSupervisor | null = null;

  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    active?.stop();
    active = null;
    vi.useRealTimers();
  });

  it("splits symbols across connections", () => {
    const { feed, factory } = setup();
    active = feed;
    feed.start();

    expect(factory.connections.map((c) => c.symbols)).toEqual([["BTCUSDT", "ETHUSDT"], ["SOLUSDT"]]);
    expect(feed.isRunning()).toBe(true);
  });

  it("yields valid ticks in order and drops duplicates", async () => {
    const { feed, factory, changes } = setup();
    active = feed;
    feed.start();
    const connection = factory.latestFor("BTCUSDT");
    const stream = feed.ticks();

    connection.tick(makeTick({ tradeId: 1, price: 100 }));
    connection.tick(makeTick({ tradeId: 1, price: 101 }));
    connection.tick(makeTick({ tradeId: 2, price: 0 }));
    connection.tick(makeTick({ tradeId: 3, timestamp: BASE_TIME - 1 }));
    connection.tick(makeTick({ tradeId: 4, price: 102 }));

    expect((await stream.next()).value?.price).toBe(100);
    expect((await stream.next()).value?.price).toBe(102);
    expect(feed.isLive("BTCUSDT")).toBe(true);
    expect(feed.isLive("ETHUSDT")).toBe(false);
    expect(changes).toEqual([["BTCUSDT", "RESTORED"]]);
  });

  it("forwards book updates to the market book", () => {
    const { feed, factory, book } = setup();
    active = feed;
    feed.start();
    factory.latestFor("SOLUSDT").book(makeBook("SOLUSDT", 20, 20.01));
    expect(book.mid("SOLUSDT")).toBeCloseTo(20.005, 10);
  });

  it("marks a silent symbol stale and restores it on the next tick", () => {
    const { feed, factory, clock, events, changes } = setup();
    active = feed;
    feed.start();
    const connection = factory.latestFor("BTCUSDT");
    connection.tick(makeTick({ tradeId: 1 }));

    clock.advance(5_000);
    expect(feed.checkStaleness()).toEqual([]);
    clock.advance(1);
    expect(feed.checkStaleness()).toEqual(["BTCUSDT"]);
    expect(feed.isLive("BTCUSDT")).toBe(false);
    expect(events.messages("WS")).toContain("STALE: no ticks for 5001ms");

    connection.tick(makeTick({ tradeId: 2, timestamp: BASE_TIME + 5_001 }));
    expect(feed.isLive("BTCUSDT")).toBe(true);
    expect(changes).toEqual([
      ["BTCUSDT", "RESTORED"],
      ["BTCUSDT", "STALE"],
      ["BTCUSDT", "RESTORED"],
    ]);
    expect(events.messages("WS").slice(-1)).toEqual(["RESTORED"]);
  });

  it("reconnects a dropped connection with growing backoff", () => {
    const { feed, factory, events } = setup();
    active = feed;
    feed.start();
    const first = factory.latestFor("BTCUSDT");

    first.drop();
    expect(events.messages("WS").slice(-2)).toEqual([
      "Connection 1 closed: socket closed (1006)",
      "Reconnecting connection 1 in 1000ms (attempt 1)",
    ]);
    vi.advanceTimersByTime(999);
    expect(factory.connections).toHaveLength(2);
    vi.advanceTimersByTime(1);
    expect(factory.connections).toHaveLength(3);

    // A late close from the replaced socket is ignored
    first.drop();
    const second = factory.latestFor("BTCUSDT");
    second.drop();
    expect(events.messages("WS").slice(-1)).toEqual(["Reconnecting connection 1 in 2000ms (attempt 2)"]);

    vi.advanceTimersByTime(2_000);
    const third = factory.latestFor("BTCUSDT");
    third.open();
    third.drop();
    expect(events.messages("WS").slice(-1)).toEqual(["Reconnecting connection 1 in 1000ms (attempt 1)"]);
  });

  it("ends the tick stream and closes connections on stop", async () => {
    const { feed, factory } = setup();
    feed.start();
    const pending = feed.ticks().next();

    feed.stop();

    expect((await pending).done).toBe(true);
    expect(factory.connections.every((c) => c.closed)).toBe(true);
    expect(feed.isRunning()).toBe(false);
  });
});
