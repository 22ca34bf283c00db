import { validateEnvironment } from "./config/environment";
import { connectToDatabase, disconnectFromDatabase } from "./config/mongoose";
import { composeSettings } from "./config/presets";
import { loadSettingsFile, SettingsStore } from "./config/settings";
import { Orchestrator } from "./engine/Orchestrator";
import { BinanceFuturesClient } from "./exchange/BinanceFuturesClient";
import { loadReplayFile, replayFactory } from "./exchange/ReplayMarketSource";
import { MongoHistoryStore } from "./services/MongoHistoryStore";
import { ConfigurationError } from "./utils/errors";
import { logger } from "./utils/logger";

async function main() {
  // 1. Environment and settings; configuration errors are fatal
  const env = validateEnvironment();
  const fileContents = env.settingsFile ? loadSettingsFile(env.settingsFile) : {};
  const settings = new SettingsStore(composeSettings(env.settingsPreset, fileContents));

  // 2. Optional history database
  if (env.mongoUri) await connectToDatabase(env.mongoUri);

  // 3. Live venue only in REAL mode
  const live =
    env.engineMode === "REAL" && env.binanceApiKey && env.binanceApiSecret
      ? new BinanceFuturesClient({
          apiKey: env.binanceApiKey,
          apiSecret: env.binanceApiSecret,
          testnet: env.binanceTestnet,
        })
      : null;

  const orchestrator = new Orchestrator({
    settings,
    live,
    connect: env.replayFile ? replayFactory(loadReplayFile(env.replayFile)) : undefined,
    history: env.mongoUri ? new MongoHistoryStore() : null,
    snapshotPath: env.snapshotPath,
  });

  const started = await orchestrator.start();
  if (!started.ok) {
    logger.error(`Engine did not start: ${started.message}`);
    await orchestrator.shutdown();
    process.exit(1);
  }
  logger.success(
    `Impulse reversal engine started | ${env.engineMode} | ${settings.current.execution.dryRun ? "dry run" : "live orders"}`
  );

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await orchestrator.shutdown();
    if (env.mongoUri) await disconnectFromDatabase();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    shutdown("SIGINT").catch((err) => {
      logger.error("Shutdown failed", err);
      process.exit(1);
    });
  });
  process.on("SIGTERM", () => {
    shutdown("SIGTERM").catch((err) => {
      logger.error("Shutdown failed", err);
      process.exit(1);
    });
  });
}

main().catch((err) => {
  if (err instanceof ConfigurationError) {
    logger.error(`Configuration error: ${err.message}`);
  } else {
    logger.error("Failed to start engine", err);
  }
  process.exit(1);
});
