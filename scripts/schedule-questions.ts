import { ethers } from "ethers";
import dotenv from "dotenv";
import { ChainOracle } from "../src/services/chain";
import { delay } from "../src/services/async";
import { errorMessage } from "../src/services/errors";
import { DIA_BTC_URL, buildThresholdQuestion, fetchPrice, randomThreshold } from "../src/services/questions";
dotenv.config();

const IDENTIFIER = ethers.id("YES_OR_NO_QUERY");

function env(name: string, fallback: string): string {
  return process.env[name] || fallback;
}

async function main() {
  const privateKey = process.env.REQUESTER_PRIVATE_KEY || process.env.PRIVATE_KEY;
  const oracleAddress = process.env.ORACLE_ADDRESS;
  if (!privateKey || !oracleAddress) {
    throw new Error("REQUESTER_PRIVATE_KEY (or PRIVATE_KEY) and ORACLE_ADDRESS must be set");
  }

  const intervalMs = Number(env("QUESTION_INTERVAL_SECONDS", "300")) * 1000;
  const lookaheadSeconds = Number(env("QUESTION_LOOKAHEAD_SECONDS", "300"));
  const spread = Number(env("QUESTION_PRICE_SPREAD", "0.001"));
  const priceUrl = env("DIA_API_URL", DIA_BTC_URL);
  const submitRetries = Math.max(1, Number(env("QUESTION_SUBMIT_RETRIES", "2")));
  const retryBackoffMs = Math.max(1, Number(env("QUESTION_RETRY_BACKOFF_SECONDS", "30"))) * 1000;

  const oracle = new ChainOracle({
    rpcUrl: env("RPC_URL", "http://127.0.0.1:8545"),
    chainId: Number(env("CHAIN_ID", "31337")),
    privateKey,
    oracleAddress,
    gasLimit: BigInt(env("QUESTION_GAS_LIMIT", "500000")),
  });

  console.log(
    `[Questions] Running as ${oracle.address} (interval=${intervalMs / 1000}s, lookahead=${lookaheadSeconds}s, spread=${spread * 100}%)`
  );

  while (true) {
    try {
      const price = await fetchPrice(priceUrl);
      const threshold = randomThreshold(price, spread);
      const timestamp = Math.floor(Date.now() / 1000) + lookaheadSeconds;
      const ancillary = ethers.hexlify(ethers.toUtf8Bytes(buildThresholdQuestion(threshold, priceUrl)));

      let txHash = "";
      for (let attempt = 1; attempt <= submitRetries; attempt++) {
        try {
          txHash = await oracle.requestPrice(IDENTIFIER, timestamp, ancillary);
          break;
        } catch (e) {
          console.warn(`[Questions] requestPrice failed (attempt ${attempt}/${submitRetries}): ${errorMessage(e)}`);
          if (attempt === submitRetries) throw e;
          await delay(retryBackoffMs * attempt);
        }
      }

      console.log(
        `[Questions] Queued question | price=${price.toFixed(2)} threshold=${threshold.toFixed(2)} timestamp=${timestamp} tx=${txHash}`
      );
    } catch (e) {
      console.error(`[Questions] Failed to queue question: ${errorMessage(e)}`);
    }
    await delay(intervalMs);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
