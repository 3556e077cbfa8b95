import express from "express";
import { authRouter, type StatusSource } from "./auth/router.js";

export function createApp(source: StatusSource) {
  const app = express();

  // Health
  app.get("/health", (_req, res) => res.json({ ok: true }));

  // Status do token
  app.use("/auth", authRouter(source));

  return app;
}
