import { Bot, Context } from "grammy";
import { ResolutionEngine } from "./services/engine";
import { errorMessage } from "./services/errors";
import { describeOutcome, parseOutcome } from "./services/evidence";
import { OperatorNotifier, ResolutionRequest } from "./services/types";

function escMd(text: string) {
  return text.replace(/[_*[\]()~`>#+\-=|{}.!]/g, "\\$&");
}

function shortId(id: string) {
  return `${id.slice(0, 10)}…${id.slice(-4)}`;
}

function formatRequest(r: ResolutionRequest) {
  const lines = [
    `🧾 *Request* \`${r.id}\``,
    `🔖 State: *${escMd(r.finalReason ? `${r.state} (${r.finalReason})` : r.state)}*`,
    `⏰ Eligible: ${escMd(new Date(r.earliestResolveTime).toUTCString())}`,
    `⌛ Deadline: ${escMd(new Date(r.deadline).toUTCString())}`,
    `🔁 Attempts: ${r.attemptCount} \\(failures: ${r.failureCount}\\)`,
  ];
  if (r.operatorHold) lines.push("✋ On hold for operator");
  if (r.lastError) lines.push(`⚠️ ${escMd(r.lastError.slice(0, 300))}`);
  return lines.join("\n");
}

/** Sends operator alerts to one Telegram chat. */
export class TelegramNotifier implements OperatorNotifier {
  constructor(private readonly bot: Bot, private readonly chatId: string) {}

  async alert(message: string): Promise<void> {
    await this.bot.api.sendMessage(this.chatId, `🚨 ${message}`);
  }
}

export function createBot(token: string, engine: ResolutionEngine, operatorChatId: string): Bot {
  const bot = new Bot(token);

  // Only the operator chat may drive the engine when one is configured
  bot.use(async (ctx: Context, next) => {
    if (operatorChatId && String(ctx.chat?.id) !== operatorChatId) {
      await ctx.reply("Not authorized.");
      return;
    }
    await next();
  });

  // /start
  bot.command("start", async (ctx) => {
    await ctx.reply(
      "🔮 *Resolution Engine*\n\n" +
        "Commands:\n" +
        "/requests \\- List active requests\n" +
        "/request \\<id\\> \\- Show one request\n" +
        "/retry \\<id\\> \\- Clear a hold and retry now\n" +
        "/override \\<id\\> \\<yes\\|no\\|invalid\\|number\\> \\- Settle an operator outcome",
      { parse_mode: "MarkdownV2" }
    );
  });

  // /requests
  bot.command("requests", async (ctx) => {
    const active = engine.list().filter((r) => r.state !== "finalized");
    if (active.length === 0) return ctx.reply("No active requests.");
    const lines = active.map(
      (r) => `${shortId(r.id)}  ${r.state}${r.operatorHold ? " (hold)" : ""}  attempts ${r.attemptCount}`
    );
    await ctx.reply(lines.join("\n"));
  });

  // /request <id>
  bot.command("request", async (ctx) => {
    const id = ctx.match.trim();
    if (!id) return ctx.reply("Usage: /request <id>");
    const status = engine.status(id);
    if (!status) return ctx.reply(`Request not found: ${id}`);
    let text = formatRequest(status.request);
    if (status.evidence) text += `\n📦 Outcome: *${escMd(describeOutcome(status.evidence.outcome))}*`;
    if (status.settlement) {
      text += `\n⛓ Tx \`${status.settlement.txHash}\` ${escMd(status.settlement.confirmationState)}`;
    }
    await ctx.reply(text, { parse_mode: "MarkdownV2" });
  });

  // /retry <id>
  bot.command("retry", async (ctx) => {
    const id = ctx.match.trim();
    if (!id) return ctx.reply("Usage: /retry <id>");
    try {
      const request = await engine.override(id, { action: "retry" });
      await ctx.reply(`🔁 ${shortId(request.id)} will retry now.`);
    } catch (e) {
      await ctx.reply(`Error: ${errorMessage(e)}`);
    }
  });

  // /override <id> <outcome>
  bot.command("override", async (ctx) => {
    const [id, raw] = ctx.match.trim().split(/\s+/);
    const outcome = raw ? parseOutcome(raw) : null;
    if (!id || !outcome) return ctx.reply("Usage: /override <id> <yes|no|invalid|number>");
    try {
      const operator = ctx.from?.username ?? String(ctx.from?.id ?? "unknown");
      await engine.override(id, { action: "outcome", outcome, reason: `operator ${operator} via Telegram` });
      await ctx.reply(`✅ Settling ${shortId(id)} as ${describeOutcome(outcome)}.`);
    } catch (e) {
      await ctx.reply(`Error: ${errorMessage(e)}`);
    }
  });

  bot.catch((err) => {
    console.error(`[Bot] Update ${err.ctx.update.update_id} failed: ${errorMessage(err.error)}`);
  });

  return bot;
}
