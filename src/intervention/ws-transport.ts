import { randomUUID } from "crypto";
import { WebSocket } from "ws";
import type { WebSocketServer } from "ws";
import type { InterventionRequiredPayload, WSMessage } from "../protocol.js";
import { CallbackTransport } from "./callback-transport.js";
import type { InterventionContext } from "./types.js";

/** The slice of a WebSocket server the transport needs. */
export interface Broadcaster {
  broadcast(msg: WSMessage): void;
  onMessage(handler: (msg: WSMessage) => void): () => void;
}

/**
 * Broadcasts `intervention_required` to every client and resolves with the
 * payload of the first `intervention_response` carrying the same id.
 */
export function createWebSocketTransport(
  broadcaster: Broadcaster,
  timeoutMs?: number,
): CallbackTransport {
  return new CallbackTransport(
    (context: InterventionContext, signal: AbortSignal) =>
      new Promise<unknown>((resolve, reject) => {
        const id = randomUUID();

        const cleanup = () => {
          unsubscribe();
          signal.removeEventListener("abort", onAbort);
        };
        const onAbort = () => {
          cleanup();
          reject(signal.reason);
        };
        const unsubscribe = broadcaster.onMessage((msg) => {
          if (msg.type !== "intervention_response" || msg.id !== id) return;
          cleanup();
          resolve(msg.payload);
        });

        if (signal.aborted) {
          onAbort();
          return;
        }
        signal.addEventListener("abort", onAbort, { once: true });

        broadcaster.broadcast({
          type: "intervention_required",
          id,
          payload: { context, timeoutMs } satisfies InterventionRequiredPayload,
        });
      }),
    "websocket",
  );
}

/** Parses incoming frames; frames that are not JSON messages are ignored. */
export function createWsBroadcaster(wss: WebSocketServer): Broadcaster {
  return {
    broadcast(msg) {
      const data = JSON.stringify(msg);
      for (const ws of wss.clients) {
        if (ws.readyState === WebSocket.OPEN) ws.send(data);
      }
    },
    onMessage(handler) {
      const onFrame = (data: WebSocket.RawData) => {
        const msg = parseWsMessage(data.toString());
        if (msg) handler(msg);
      };
      const attach = (ws: WebSocket) => ws.on("message", onFrame);
      for (const ws of wss.clients) attach(ws);
      wss.on("connection", attach);
      return () => {
        wss.off("connection", attach);
        for (const ws of wss.clients) ws.off("message", onFrame);
      };
    },
  };
}

export function parseWsMessage(raw: string): WSMessage | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof data !== "object" || data === null || !("type" in data) || typeof data.type !== "string") {
    return null;
  }
  const id = "id" in data && typeof data.id === "string" ? data.id : undefined;
  const payload = "payload" in data ? data.payload : undefined;
  switch (data.type) {
    case "run_plan":
    case "intervention_response":
      return { type: data.type, id, payload };
    default:
      return null;
  }
}
