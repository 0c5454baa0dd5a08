import express from "express";
import type { NextFunction, Request, Response } from "express";
import cors from "cors";
import { createChatHandlers, type ChatDeps } from "./routes/chat.js";

export function createApp(deps: ChatDeps) {
  const app = express();
  const { postChat, postParse, postRoute } = createChatHandlers(deps);

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  app.post("/api/chat", (req, res, next) => {
    postChat(req, res).catch(next);
  });
  app.post("/api/parse", postParse);
  app.post("/api/route", postRoute);

  app.get("/health", (_req, res) => {
    res.status(200).json({ ok: true });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error("[app] unhandled error:", error);
    res.status(500).json({ error: "Internal error" });
  });

  return app;
}
