import http from "http";
import fs from "fs";
import path from "path";
import { WebSocketServer } from "ws";
import { z } from "zod";
import { loadConfig } from "./config/index.js";
import { createRunCore } from "./core.js";
import { errorMessage } from "./errors.js";
import { createWebSocketTransport, createWsBroadcaster } from "./intervention/ws-transport.js";
import { loadPlanFile, parsePlan } from "./plan/loader.js";
import type { TestPlan } from "./plan/types.js";
import type { ErrorPayload, RunPlanPayload, RunResultPayload, RunStartedPayload, WSMessage } from "./protocol.js";
import { createWsSink } from "./ws-sink.js";

const RunPlanSchema: z.ZodType<RunPlanPayload> = z.object({
  plan: z.unknown().optional(),
  planPath: z.string().optional(),
});

async function resolvePlan(payload: unknown): Promise<TestPlan> {
  const parsed = RunPlanSchema.safeParse(payload);
  if (parsed.success) {
    const { plan, planPath } = parsed.data;
    if (plan !== undefined) return parsePlan(plan);
    if (planPath !== undefined) return loadPlanFile(planPath);
  }
  throw new Error("run_plan needs a plan object or a planPath");
}

async function main() {
  const config = loadConfig();
  const screenshotsDir = path.resolve(config.screenshotsDir);

  const httpServer = http.createServer((req, res) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    if (req.method === "GET" && req.url?.startsWith("/screenshots/")) {
      const safeName = path.basename(decodeURIComponent(req.url.slice("/screenshots/".length)));
      const filePath = path.join(screenshotsDir, safeName);
      if (!fs.existsSync(filePath)) {
        res.writeHead(404, { "Content-Type": "text/plain" });
        res.end("Not found");
        return;
      }
      res.writeHead(200, { "Content-Type": "image/png" });
      fs.createReadStream(filePath).pipe(res);
      return;
    }

    res.writeHead(404, { "Content-Type": "text/plain" });
    res.end("Not found");
  });

  const wss = new WebSocketServer({ server: httpServer });
  const broadcaster = createWsBroadcaster(wss);
  let activeRun: string | null = null;

  async function handleRun(msg: WSMessage) {
    const runId = msg.id ?? `run-${Date.now()}`;
    if (activeRun) {
      broadcaster.broadcast({
        type: "error",
        id: runId,
        payload: { message: `Run ${activeRun} is still in progress`, code: "busy" } satisfies ErrorPayload,
      });
      return;
    }

    activeRun = runId;
    const sink = createWsSink(broadcaster, runId);
    try {
      const plan = await resolvePlan(msg.payload);
      broadcaster.broadcast({
        type: "run_started",
        id: runId,
        payload: { testName: plan.testName, totalSteps: plan.steps.length } satisfies RunStartedPayload,
      });

      const transport = createWebSocketTransport(broadcaster, config.interventionTimeoutMs);
      const core = createRunCore(config, sink, transport);
      const result = await core.run(plan);
      broadcaster.broadcast({ type: "run_result", id: runId, payload: result satisfies RunResultPayload });
    } catch (err) {
      broadcaster.broadcast({ type: "error", id: runId, payload: { message: errorMessage(err) } satisfies ErrorPayload });
    } finally {
      activeRun = null;
    }
  }

  broadcaster.onMessage((msg) => {
    if (msg.type !== "run_plan") return;
    handleRun(msg).catch((err: unknown) => {
      console.error("[server] Run handler failed:", err);
    });
  });

  wss.on("connection", (ws) => {
    console.log(`[server] Client connected (${wss.clients.size} total)`);
    ws.on("close", () => {
      console.log(`[server] Client disconnected (${wss.clients.size} total)`);
    });
  });

  httpServer.listen(config.port, () => {
    console.log(`[server] Listening on http://localhost:${config.port}`);
    console.log(`[server] WebSocket: ws://localhost:${config.port}`);
    console.log(`[server] Screenshots: http://localhost:${config.port}/screenshots/`);
  });

  process.on("SIGINT", () => {
    console.log("\n[server] Shutting down...");
    wss.close();
    httpServer.close();
    process.exit(0);
  });
}

main().catch((err) => {
  console.error("[server] Fatal error:", err);
  process.exit(1);
});
