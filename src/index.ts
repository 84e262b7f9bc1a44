import { createApp } from "./app";
import { TelegramNotifier, createBot } from "./bot";
import { loadConfig } from "./config";
import { ChainOracle } from "./services/chain";
import { ClockAnchor } from "./services/clock";
import { ResolutionEngine } from "./services/engine";
import { errorMessage } from "./services/errors";
import { ResolutionExecutor } from "./services/executor";
import { createCodeGenerator } from "./services/generator";
import { LifecycleStore } from "./services/lifecycle";
import { ConsoleNotifier, FanoutNotifier } from "./services/notifier";
import { HttpSandbox } from "./services/sandbox";
import { ResolutionScheduler } from "./services/scheduler";
import { SettlementSubmitter } from "./services/settlement";
import { ResultVerifier } from "./services/verifier";
import { RequestWatcher } from "./services/watcher";

async function main() {
  const config = loadConfig();

  const store = new LifecycleStore(config.dbPath);
  const chain = new ChainOracle(config);
  const clock = new ClockAnchor(chain, { staleAfterMs: config.clockStaleAfterMs });
  const notifier = new FanoutNotifier([new ConsoleNotifier()]);

  const executor = new ResolutionExecutor(
    new HttpSandbox(config.sandboxUrl),
    createCodeGenerator(config.codegen),
    store,
    { timeoutMs: config.executionTimeoutMs }
  );
  const settlement = new SettlementSubmitter(chain, chain, store, {
    signer: chain.address,
    txRetries: config.txRetries,
    txRetryDelayMs: config.txRetryDelayMs,
    confirmationTimeoutMs: config.confirmationTimeoutMs,
    confirmationPollMs: config.confirmationPollMs,
  });
  const scheduler = new ResolutionScheduler(store, clock, executor, new ResultVerifier(), settlement, notifier, {
    maxAttempts: config.maxAttempts,
    backoff: { baseMs: config.retryBaseMs, maxMs: config.retryMaxMs },
    workerPoolSize: config.workerPoolSize,
    defaultOutcome: config.defaultOutcome,
    submitDefaultOutcome: config.submitDefaultOutcome,
    tickIntervalMs: config.tickIntervalMs,
  });
  const watcher = new RequestWatcher(chain, store, {
    policy: {
      settlementGraceMs: config.settlementGraceMs,
      defaultDeadlineWindowMs: config.defaultDeadlineWindowMs,
    },
    now: () => clock.now().time,
  });
  const engine = new ResolutionEngine(store, clock, watcher, scheduler, config);

  const app = createApp(engine);
  const server = app.listen(config.port, () => {
    console.log(`Resolution engine API running on port ${config.port}`);
    console.log(`Chain: ${config.rpcUrl}`);
    console.log(`Oracle: ${config.oracleAddress}`);
    console.log(`Resolver: ${chain.address}`);
    console.log(`Code generation: ${config.codegen.provider} (${config.codegen.model})`);
  });

  // Start Telegram bot if token is configured
  const bot = config.telegramBotToken ? createBot(config.telegramBotToken, engine, config.operatorChatId) : null;
  if (bot) {
    if (config.operatorChatId) notifier.add(new TelegramNotifier(bot, config.operatorChatId));
    bot.start().catch((e) => console.error(`[Bot] Stopped: ${errorMessage(e)}`));
    console.log("Telegram bot started");
  } else {
    console.log("No TELEGRAM_BOT_TOKEN set, bot not started");
  }

  await engine.start();

  const shutdown = async () => {
    console.log("Shutting down...");
    server.close();
    if (bot) await bot.stop();
    await engine.stop();
    store.close();
    process.exit(0);
  };
  process.once("SIGINT", () => void shutdown());
  process.once("SIGTERM", () => void shutdown());
}

main().catch((e) => {
  console.error("Fatal:", e);
  process.exit(1);
});
