import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import request from "supertest";
import path from "node:path";
import { createChannelApp, type ChannelHost } from "../src/channel/app.js";
import type { Notification } from "../src/notifications.js";
import { roleOutputDirAbs, writeTextFile } from "../src/pipeline/utils.js";
import { useTempProjectsDir } from "./helpers.js";

let cleanup: (() => Promise<void>) | null = null;

beforeEach(async () => {
  cleanup = (await useTempProjectsDir()).cleanup;
});

afterEach(async () => {
  if (cleanup) await cleanup();
  cleanup = null;
});

function makeHost(overrides?: Partial<ChannelHost>): ChannelHost & { received: Notification[]; inputs: string[] } {
  const received: Notification[] = [];
  const inputs: string[] = [];
  return {
    role: "audit",
    project: "demo",
    dispatch: (n) => received.push(n),
    submit: (input) => inputs.push(input),
    status: () => ({ running: true, phase: "watching", queued: 0 }),
    received,
    inputs,
    ...(overrides ?? {})
  };
}

describe("channel app", () => {
  it("GET /health reports the role and key presence", async () => {
    const prev = process.env.LLM_API_KEY;
    process.env.LLM_API_KEY = "test-secret";
    try {
      const res = await request(createChannelApp(makeHost())).get("/health");
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ ok: true, role: "audit", hasKey: true });
    } finally {
      if (prev === undefined) delete process.env.LLM_API_KEY;
      else process.env.LLM_API_KEY = prev;
    }
  });

  it("POST /notify acknowledges and dispatches a valid notification", async () => {
    const host = makeHost();
    const res = await request(createChannelApp(host))
      .post("/notify")
      .send({ source: "qa", kind: "update", payload: { plan: 1 }, timestamp: "2024-05-01T10:00:00.000Z" });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "ok" });
    expect(host.received).toEqual([
      { source: "qa", kind: "update", payload: { plan: 1 }, timestamp: "2024-05-01T10:00:00.000Z", origin: "push" }
    ]);
  });

  it("POST /notify stamps a missing timestamp", async () => {
    const host = makeHost();
    await request(createChannelApp(host)).post("/notify").send({ source: "qa", kind: "error", payload: { error: "x" } });
    expect(host.received).toHaveLength(1);
    expect(Number.isNaN(Date.parse(host.received[0].timestamp))).toBe(false);
  });

  it("POST /notify rejects malformed bodies without dispatching", async () => {
    const host = makeHost();
    const app = createChannelApp(host);

    const unknownRole = await request(app).post("/notify").send({ source: "ops", kind: "update", payload: {} });
    expect(unknownRole.status).toBe(400);
    expect(unknownRole.body.error.fieldErrors).toHaveProperty("source");

    const badKind = await request(app).post("/notify").send({ source: "qa", kind: "done", payload: {} });
    expect(badKind.status).toBe(400);

    const extraKey = await request(app).post("/notify").send({ source: "qa", kind: "update", payload: {}, x: 1 });
    expect(extraKey.status).toBe(400);

    expect(host.received).toEqual([]);
  });

  it("POST /notify leaves gating to the host", async () => {
    // The app dispatches every valid body, upstream or not.
    const dispatch = vi.fn();
    await request(createChannelApp(makeHost({ dispatch }))).post("/notify").send({ source: "business", kind: "update", payload: 1 });
    expect(dispatch).toHaveBeenCalledTimes(1);
  });

  it("POST /run queues a manual job", async () => {
    const host = makeHost();
    const app = createChannelApp(host);

    const ok = await request(app).post("/run").send({ input: "  Build a todo app  " });
    expect(ok.status).toBe(200);
    expect(ok.body).toEqual({ status: "queued" });
    expect(host.inputs).toEqual(["Build a todo app"]);

    const empty = await request(app).post("/run").send({ input: "   " });
    expect(empty.status).toBe(400);
    expect(host.inputs).toHaveLength(1);
  });

  it("GET /status reports the coordinator view", async () => {
    const host = makeHost({ status: () => ({ running: false, phase: "stopped", queued: 2 }) });
    const res = await request(createChannelApp(host)).get("/status");
    expect(res.body).toEqual({ service: "audit", status: "stopped", project: "demo", phase: "stopped", queued: 2 });
  });

  it("GET /artifacts lists the role's files", async () => {
    const root = roleOutputDirAbs("demo", "audit");
    await writeTextFile(path.join(root, "result.json"), "{}");
    await writeTextFile(path.join(root, "state.json"), "{}");

    const res = await request(createChannelApp(makeHost())).get("/artifacts");
    expect(res.body).toEqual({ service: "audit", artifacts: ["result.json", "state.json"] });
  });

  it("GET /artifacts lists nothing before the first run", async () => {
    const res = await request(createChannelApp(makeHost())).get("/artifacts");
    expect(res.body).toEqual({ service: "audit", artifacts: [] });
  });
});
