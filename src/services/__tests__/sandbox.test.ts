import { afterEach, describe, it, expect, vi } from "vitest";
import { SandboxUnavailableError } from "../errors";
import { HttpSandbox } from "../sandbox";

const sandbox = new HttpSandbox("http://sandbox.test");
const REQUEST = { code: "console.log(1)", timeoutMs: 2500, allowedHosts: ["api.example.com"] };

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

describe("HttpSandbox", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("posts the code and maps the execution result", async () => {
    const fetchMock = vi.spyOn(globalThis, "fetch").mockResolvedValueOnce(
      json({
        success: true,
        data: {
          status: "ok",
          exit_code: 0,
          stdout: '{"decision":true}\n',
          stderr: "",
          return_value: { decision: true },
          transcript: [{ url: "https://api.example.com/x", status: 200, body: "{}" }],
        },
      })
    );

    const result = await sandbox.execute(REQUEST);

    expect(result).toEqual({
      stdout: '{"decision":true}\n',
      stderr: "",
      returnValue: { decision: true },
      exitCode: 0,
      transcript: [{ url: "https://api.example.com/x", method: "GET", status: 200, body: "{}" }],
    });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://sandbox.test/v1/nodejs/execute");
    expect(JSON.parse(String(init?.body))).toEqual({
      code: "console.log(1)",
      timeout: 3,
      allowed_hosts: ["api.example.com"],
    });
  });

  it("reports a non-ok status as a failed exit", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValueOnce(
      json({ success: true, data: { status: "timeout", exit_code: 0, stderr: "killed" } })
    );

    const result = await sandbox.execute(REQUEST);
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe("killed");
    expect(result.transcript).toEqual([]);
  });

  it("treats transport and service errors as unavailability", async () => {
    vi.spyOn(globalThis, "fetch")
      .mockRejectedValueOnce(new Error("ECONNREFUSED"))
      .mockResolvedValueOnce(new Response("boom", { status: 500 }))
      .mockResolvedValueOnce(json({ success: false, message: "no capacity" }))
      .mockResolvedValueOnce(json({ success: "yes" }));

    await expect(sandbox.execute(REQUEST)).rejects.toThrow(
      new SandboxUnavailableError("Sandbox unreachable: ECONNREFUSED")
    );
    await expect(sandbox.execute(REQUEST)).rejects.toThrow(
      new SandboxUnavailableError("Sandbox execute failed (500): boom")
    );
    await expect(sandbox.execute(REQUEST)).rejects.toThrow(new SandboxUnavailableError("Sandbox error: no capacity"));
    await expect(sandbox.execute(REQUEST)).rejects.toBeInstanceOf(SandboxUnavailableError);
  });
});
