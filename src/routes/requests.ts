import { Router, Request, Response } from "express";
import { z } from "zod";
import { ResolutionEngine } from "../services/engine";
import {
  IllegalTransitionError,
  OverrideConflictError,
  RequestNotFoundError,
  errorMessage,
} from "../services/errors";
import { parseOutcome } from "../services/evidence";
import { Override } from "../services/scheduler";
import { RequestState } from "../services/types";

const StateQuerySchema = z.object({
  state: z.enum(["scheduled", "resolving", "waiting_retry", "finalized"]).optional(),
});

const OverrideSchema = z.discriminatedUnion("action", [
  z.object({ action: z.literal("retry") }),
  z.object({
    action: z.literal("outcome"),
    outcome: z.union([z.boolean(), z.number(), z.string().min(1)]),
    reason: z.string().max(500).optional(),
  }),
]);

function sendError(res: Response, label: string, e: unknown) {
  if (e instanceof z.ZodError) {
    return res.status(400).json({ error: "Validation failed", details: e.errors });
  }
  if (e instanceof RequestNotFoundError) {
    return res.status(404).json({ error: e.message });
  }
  if (e instanceof OverrideConflictError || e instanceof IllegalTransitionError) {
    return res.status(409).json({ error: e.message });
  }
  console.error(`[API] ${label} error:`, e);
  return res.status(500).json({ error: errorMessage(e) });
}

export function requestsRouter(engine: ResolutionEngine): Router {
  const router = Router();

  // GET /requests?state=waiting_retry
  router.get("/", (req: Request, res: Response) => {
    try {
      const { state } = StateQuerySchema.parse(req.query);
      const filter: RequestState | undefined = state;
      res.json(engine.list(filter));
    } catch (e) {
      sendError(res, "List requests", e);
    }
  });

  // GET /requests/:id
  router.get("/:id", (req: Request, res: Response) => {
    try {
      const status = engine.status(req.params.id);
      if (!status) return res.status(404).json({ error: `Request not found: ${req.params.id}` });
      res.json(status);
    } catch (e) {
      sendError(res, "Get request", e);
    }
  });

  // GET /requests/:id/evidence (read-only audit trail)
  router.get("/:id/evidence", (req: Request, res: Response) => {
    try {
      res.json(engine.evidence(req.params.id));
    } catch (e) {
      sendError(res, "Get evidence", e);
    }
  });

  // GET /requests/:id/transcripts (every execution, failed ones included)
  router.get("/:id/transcripts", (req: Request, res: Response) => {
    try {
      res.json(engine.transcripts(req.params.id));
    } catch (e) {
      sendError(res, "Get transcripts", e);
    }
  });

  // POST /requests/:id/override  { "action": "retry" } or { "action": "outcome", "outcome": "yes" }
  router.post("/:id/override", async (req: Request, res: Response) => {
    try {
      const body = OverrideSchema.parse(req.body);
      let override: Override;
      if (body.action === "retry") {
        override = { action: "retry" };
      } else {
        const outcome = parseOutcome(String(body.outcome));
        if (!outcome) {
          return res.status(400).json({ error: `Unrecognized outcome: ${String(body.outcome)}` });
        }
        override = { action: "outcome", outcome, reason: body.reason };
      }
      const request = await engine.override(req.params.id, override);
      res.status(202).json(request);
    } catch (e) {
      sendError(res, "Override", e);
    }
  });

  return router;
}
