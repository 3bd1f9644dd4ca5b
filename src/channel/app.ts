import express from "express";
import cors from "cors";
import { z } from "zod";
import type { Role } from "../roles.js";
import { NotificationSchema, fromPushBody, type DispatchFn } from "../notifications.js";
import { listFilesRecursive, roleOutputDirAbs } from "../pipeline/utils.js";

export type ChannelStatus = {
  running: boolean;
  phase: string;
  queued: number;
};

/** What the push endpoints need from the service that owns them. */
export type ChannelHost = {
  role: Role;
  project: string;
  dispatch: DispatchFn;
  submit: (input: string) => void;
  status: () => ChannelStatus;
};

const RunBodySchema = z
  .object({
    input: z.string().trim().min(1).max(200_000)
  })
  .strict();

export function createChannelApp(host: ChannelHost) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "10mb" }));

  app.get("/health", (_req, res) => {
    res.json({
      ok: true,
      role: host.role,
      hasKey: Boolean(process.env.LLM_API_KEY && process.env.LLM_API_KEY.trim().length > 0)
    });
  });

  app.post("/notify", (req, res) => {
    const parsed = NotificationSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    // Acknowledge first; gating and processing happen off the request path.
    res.json({ status: "ok" });
    host.dispatch(fromPushBody(parsed.data));
  });

  app.post("/run", (req, res) => {
    const parsed = RunBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    res.json({ status: "queued" });
    host.submit(parsed.data.input);
  });

  app.get("/status", (_req, res) => {
    const status = host.status();
    res.json({
      service: host.role,
      status: status.running ? "running" : "stopped",
      project: host.project,
      phase: status.phase,
      queued: status.queued
    });
  });

  app.get("/artifacts", async (_req, res) => {
    const artifacts = await listFilesRecursive(roleOutputDirAbs(host.project, host.role));
    res.json({ service: host.role, artifacts });
  });

  return app;
}
