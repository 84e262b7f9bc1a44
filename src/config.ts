import dotenv from "dotenv";
import { parseOutcome } from "./services/evidence";
import { Outcome } from "./services/types";
dotenv.config();

type Env = Record<string, string | undefined>;

function required(env: Env, name: string): string {
  const val = env[name];
  if (!val) throw new Error(`Missing required env var: ${name}`);
  return val;
}

function num(env: Env, name: string, fallback: string): number {
  const raw = env[name] || fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`Env var ${name} must be a number, got "${raw}"`);
  return n;
}

function seconds(env: Env, name: string, fallback: string): number {
  return num(env, name, fallback) * 1000;
}

function outcome(env: Env, name: string, fallback: string): Outcome {
  const raw = env[name] || fallback;
  const parsed = parseOutcome(raw);
  if (!parsed) throw new Error(`Env var ${name} must be yes, no, invalid or a number, got "${raw}"`);
  return parsed;
}

function codegenProvider(env: Env): "openai" | "gemini" {
  const raw = (env.CODEGEN_PROVIDER || "openai").toLowerCase();
  if (raw === "openai" || raw === "gemini") return raw;
  throw new Error(`CODEGEN_PROVIDER must be openai or gemini, got "${raw}"`);
}

export function loadConfig(env: Env = process.env) {
  const provider = codegenProvider(env);
  return {
    rpcUrl: env.RPC_URL || "http://127.0.0.1:8545",
    chainId: num(env, "CHAIN_ID", "31337"),
    privateKey: required(env, "PRIVATE_KEY"),
    oracleAddress: required(env, "ORACLE_ADDRESS"),
    gasLimit: BigInt(env.GAS_LIMIT || "800000"),

    dbPath: env.DB_PATH || "resolver.db",
    sandboxUrl: env.SANDBOX_URL || "http://localhost:8080",

    codegen: {
      provider,
      model: env.CODEGEN_MODEL || (provider === "gemini" ? "gemini-2.5-flash" : "qwen2.5-coder:7b"),
      baseUrl: env.CODEGEN_BASE_URL || "http://localhost:11434/v1",
      apiKey: env.CODEGEN_API_KEY || "ollama",
      geminiApiKey: env.GEMINI_API_KEY || "",
      temperature: num(env, "CODEGEN_TEMPERATURE", "0.3"),
      maxTokens: num(env, "CODEGEN_MAX_TOKENS", "2000"),
    },

    clockSyncIntervalMs: seconds(env, "CLOCK_SYNC_INTERVAL_SECONDS", "30"),
    clockStaleAfterMs: seconds(env, "CLOCK_STALE_AFTER_SECONDS", "120"),
    pollIntervalMs: seconds(env, "POLL_INTERVAL_SECONDS", "15"),
    tickIntervalMs: seconds(env, "TICK_INTERVAL_SECONDS", "1"),

    settlementGraceMs: seconds(env, "SETTLEMENT_GRACE_SECONDS", "0"),
    defaultDeadlineWindowMs: seconds(env, "DEFAULT_DEADLINE_WINDOW_SECONDS", "3600"),

    maxAttempts: num(env, "MAX_ATTEMPTS", "5"),
    retryBaseMs: seconds(env, "RETRY_BASE_SECONDS", "5"),
    retryMaxMs: seconds(env, "RETRY_MAX_SECONDS", "300"),
    workerPoolSize: num(env, "WORKER_POOL_SIZE", "4"),
    executionTimeoutMs: seconds(env, "EXECUTION_TIMEOUT_SECONDS", "30"),

    txRetries: num(env, "TX_RETRIES", "3"),
    txRetryDelayMs: seconds(env, "TX_RETRY_DELAY_SECONDS", "2"),
    confirmationTimeoutMs: seconds(env, "CONFIRMATION_TIMEOUT_SECONDS", "120"),
    confirmationPollMs: seconds(env, "CONFIRMATION_POLL_SECONDS", "3"),

    defaultOutcome: outcome(env, "DEFAULT_OUTCOME", "invalid"),
    submitDefaultOutcome: (env.SUBMIT_DEFAULT_OUTCOME || "false").toLowerCase() === "true",

    port: num(env, "PORT", "3000"),
    telegramBotToken: env.TELEGRAM_BOT_TOKEN || "",
    operatorChatId: env.OPERATOR_CHAT_ID || "",
  };
}

export type Config = ReturnType<typeof loadConfig>;
