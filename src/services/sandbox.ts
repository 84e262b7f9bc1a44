import { z } from "zod";
import { SandboxUnavailableError, errorMessage } from "./errors";
import { Sandbox, SandboxRequest, SandboxResult } from "./types";

const ExchangeSchema = z.object({
  url: z.string(),
  method: z.string().default("GET"),
  status: z.number().int(),
  body: z.string().default(""),
});

const ExecuteResponseSchema = z.object({
  success: z.boolean(),
  message: z.string().optional(),
  data: z
    .object({
      status: z.string().default("error"),
      exit_code: z.number().int().default(1),
      stdout: z.string().default(""),
      stderr: z.string().default(""),
      return_value: z.unknown().optional(),
      transcript: z.array(ExchangeSchema).default([]),
    })
    .optional(),
});

/** Client for the code-execution service's Node.js endpoint. Isolation is the service's job. */
export class HttpSandbox implements Sandbox {
  constructor(private readonly baseUrl: string) {}

  async execute(request: SandboxRequest): Promise<SandboxResult> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/v1/nodejs/execute`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          code: request.code,
          timeout: Math.ceil(request.timeoutMs / 1000),
          allowed_hosts: request.allowedHosts,
        }),
        // the service enforces the real timeout; this only bounds the HTTP round trip
        signal: AbortSignal.timeout(request.timeoutMs + 5000),
      });
    } catch (e) {
      throw new SandboxUnavailableError(`Sandbox unreachable: ${errorMessage(e)}`);
    }

    if (!response.ok) {
      const text = await response.text();
      throw new SandboxUnavailableError(`Sandbox execute failed (${response.status}): ${text.slice(0, 200)}`);
    }

    const parsed = ExecuteResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new SandboxUnavailableError(`Sandbox returned a malformed response: ${parsed.error.message}`);
    }
    const { success, message, data } = parsed.data;
    if (!success || !data) {
      throw new SandboxUnavailableError(`Sandbox error: ${message ?? "unknown sandbox error"}`);
    }

    return {
      stdout: data.stdout,
      stderr: data.stderr,
      returnValue: data.return_value,
      exitCode: data.status === "ok" ? data.exit_code : Math.max(1, data.exit_code),
      transcript: data.transcript,
    };
  }
}
