import { sha256, toUtf8Bytes } from "ethers";
import { z } from "zod";
import { ResolutionRules, restorePlaceholders, sanitizeAncillary } from "./ancillary";
import { withTimeout } from "./async";
import {
  ExecutionFailedError,
  ExecutionTimeoutError,
  ResolutionError,
  SandboxUnavailableError,
  UnusableCodeError,
  errorMessage,
} from "./errors";
import { analyzeCode, extractCode } from "./generator";
import { buildResolutionPrompt } from "./prompts";
import { selectTemplate } from "./templates";
import {
  Attempt,
  CodeGenerator,
  CodeSource,
  ResolutionRequest,
  Sandbox,
  SandboxResult,
  SourceEvidence,
  SourceExchange,
  TranscriptSink,
} from "./types";

export interface ExecutorOptions {
  timeoutMs: number;
  /** extra time the sandbox call may take beyond `timeoutMs` before it is abandoned */
  overrunGraceMs?: number;
}

const ReportedSourcesSchema = z.object({
  sources: z.array(
    z.union([
      z.string(),
      z.object({ url: z.string(), hash: z.string().optional(), sha256: z.string().optional() }),
    ])
  ),
});

/** The sandbox return value when present, else the last stdout line that parses as JSON. */
export function extractOutput(returnValue: unknown, stdout: string): unknown {
  if (returnValue !== undefined && returnValue !== null) {
    if (typeof returnValue !== "string") return returnValue;
    try {
      return JSON.parse(returnValue);
    } catch {
      return returnValue;
    }
  }
  const lines = stdout.split(/\r?\n/).map((l) => l.trim());
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i];
    if (!line.startsWith("{") && !line.startsWith("[")) continue;
    try {
      return JSON.parse(line);
    } catch {
      continue;
    }
  }
  return null;
}

function hashExchanges(exchanges: SourceExchange[]): SourceEvidence[] {
  return exchanges.map((x) => ({ url: x.url, hash: sha256(toUtf8Bytes(x.body)) }));
}

function reportedSources(output: unknown): SourceEvidence[] {
  const parsed = ReportedSourcesSchema.safeParse(output);
  if (!parsed.success) return [];
  return parsed.data.sources.map((s) =>
    typeof s === "string" ? { url: s, hash: "" } : { url: s.url, hash: s.hash ?? s.sha256 ?? "" }
  );
}

interface PreparedCode {
  code: string;
  codeSource: CodeSource;
  templateId: string | null;
}

/**
 * Runs one resolution attempt: picks a vetted template or generates code,
 * executes it in the sandbox under a hard deadline and collects evidence.
 * Every execution leaves a transcript, whatever its outcome.
 */
export class ResolutionExecutor {
  private readonly lastFailure = new Map<string, { code: string; error: string }>();
  private readonly timeoutMs: number;
  private readonly overrunGraceMs: number;

  constructor(
    private readonly sandbox: Sandbox,
    private readonly generator: CodeGenerator,
    private readonly transcripts: TranscriptSink,
    options: ExecutorOptions
  ) {
    this.timeoutMs = options.timeoutMs;
    this.overrunGraceMs = options.overrunGraceMs ?? 5000;
  }

  async run(request: ResolutionRequest, rules: ResolutionRules, startedAt: number): Promise<Attempt> {
    const prepared = await this.prepare(request, rules, startedAt);

    let result: SandboxResult;
    try {
      result = await withTimeout(
        this.sandbox.execute({ code: prepared.code, timeoutMs: this.timeoutMs, allowedHosts: rules.allowedHosts }),
        this.timeoutMs + this.overrunGraceMs,
        () => new ExecutionTimeoutError(this.timeoutMs)
      );
    } catch (e) {
      const error = e instanceof ResolutionError ? e : new SandboxUnavailableError(errorMessage(e));
      this.record(request.id, startedAt, prepared, null, error.message);
      throw error;
    }

    if (result.exitCode !== 0) {
      const detail = (result.stderr || result.stdout).trim().slice(-500) || `exit code ${result.exitCode}`;
      this.record(request.id, startedAt, prepared, result, detail);
      if (prepared.codeSource === "generated") this.lastFailure.set(request.id, { code: prepared.code, error: detail });
      throw new ExecutionFailedError(`Resolution code failed: ${detail}`);
    }

    this.record(request.id, startedAt, prepared, result, null);
    this.lastFailure.delete(request.id);

    const output = extractOutput(result.returnValue, result.stdout);
    const sourceEvidence =
      result.transcript.length > 0 ? hashExchanges(result.transcript) : reportedSources(output);

    console.log(
      `[Executor] ${request.id} ran ${prepared.templateId ?? prepared.codeSource} code, ${sourceEvidence.length} source(s)`
    );

    return {
      requestId: request.id,
      startedAt,
      codeSource: prepared.codeSource,
      templateId: prepared.templateId,
      generatedCode: prepared.code,
      rawOutput: {
        stdout: result.stdout,
        stderr: result.stderr,
        returnValue: result.returnValue,
        exitCode: result.exitCode,
      },
      output,
      sourceEvidence,
      transcript: result.transcript,
    };
  }

  /** Forgets the failed code kept for a corrective prompt. */
  forget(requestId: string): void {
    this.lastFailure.delete(requestId);
  }

  private async prepare(request: ResolutionRequest, rules: ResolutionRules, startedAt: number): Promise<PreparedCode> {
    const template = selectTemplate(rules);
    if (template) return { code: template.code, codeSource: "template", templateId: template.id };

    const { sanitized, placeholders } = sanitizeAncillary(rules.text);
    const prompt = buildResolutionPrompt({
      requestId: request.id,
      identifier: request.identifier,
      requestTimestamp: request.requestTimestamp,
      rules,
      sanitized,
      placeholders,
      previous: this.lastFailure.get(request.id),
    });

    const response = await this.generator.generate(prompt);
    const code = restorePlaceholders(extractCode(response), placeholders);
    const prepared: PreparedCode = { code, codeSource: "generated", templateId: null };

    const analysis = analyzeCode(code);
    if (analysis.warnings.length > 0) {
      console.log(`[Executor] ${request.id} analysis warnings: ${analysis.warnings.join("; ")}`);
    }
    if (!analysis.ok) {
      const reason = analysis.issues.join("; ");
      this.record(request.id, startedAt, prepared, null, `unusable code: ${reason}`);
      this.lastFailure.set(request.id, { code, error: reason });
      throw new UnusableCodeError(`Generated code rejected: ${reason}`);
    }
    return prepared;
  }

  private record(
    requestId: string,
    startedAt: number,
    prepared: PreparedCode,
    result: SandboxResult | null,
    error: string | null
  ): void {
    try {
      this.transcripts.recordTranscript({
        requestId,
        startedAt,
        codeSource: prepared.codeSource,
        code: prepared.code,
        stdout: result?.stdout ?? "",
        stderr: result?.stderr ?? "",
        returnValue: result?.returnValue,
        exchanges: result?.transcript ?? [],
        error,
      });
    } catch (e) {
      console.error(`[Executor] Failed to persist transcript for ${requestId}: ${errorMessage(e)}`);
    }
  }
}
