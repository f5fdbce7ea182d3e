import type { FastifyInstance } from "fastify";
import type { WebSocket } from "@fastify/websocket";

// ---------------------------------------------------------------------------
// Connected clients registry
// Used by the runtime manager's progress listener to push install progress
// without the runtime-cache module knowing about Fastify.
// ---------------------------------------------------------------------------
const clients = new Set<WebSocket>();

export function broadcast(payload: unknown): void {
  const message = JSON.stringify(payload);
  for (const ws of clients) {
    if (ws.readyState === 1 /* OPEN */) {
      ws.send(message);
    }
  }
}

// ---------------------------------------------------------------------------
// Route
// ---------------------------------------------------------------------------
export async function registerWsRoutes(app: FastifyInstance) {
  app.get("/ws", { websocket: true }, (socket) => {
    clients.add(socket);

    socket.send(
      JSON.stringify({ type: "connected", timestamp: Date.now() })
    );

    socket.on("message", (raw: Buffer) => {
      // Clients can send ping to keep connection alive
      let msg: unknown;
      try {
        msg = JSON.parse(raw.toString());
      } catch {
        app.log.debug("Ignoring malformed WebSocket message");
        return;
      }
      if (typeof msg === "object" && msg !== null && "type" in msg && msg.type === "ping") {
        socket.send(JSON.stringify({ type: "pong", timestamp: Date.now() }));
      }
    });

    socket.on("close", () => {
      clients.delete(socket);
    });

    socket.on("error", () => {
      clients.delete(socket);
    });
  });
}
