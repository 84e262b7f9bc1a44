import express from "express";
import { requestsRouter } from "./routes/requests";
import { ResolutionEngine } from "./services/engine";

export function createApp(engine: ResolutionEngine) {
  const app = express();

  app.use(express.json());

  app.get("/health", (_req, res) => {
    const health = engine.health();
    res.status(health.status === "ok" ? 200 : 503).json(health);
  });

  app.use("/requests", requestsRouter(engine));

  return app;
}
