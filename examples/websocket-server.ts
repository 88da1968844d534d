/**
 * WebSocket server example
 * Supervises every inbound connection and keeps one outbound upstream connection alive
 */

import WebSocket, { WebSocketServer } from "ws";
import { v4 as uuidv4 } from "uuid";
import { ConnectionSupervisor, WebSocketTransport } from "../src";

// Load configuration from environment variables
const PORT = Number(process.env.PORT || 8080);
const UPSTREAM_URL = process.env.UPSTREAM_URL;
const DEFAULT_REPOSITORY = process.env.DEFAULT_REPOSITORY || "docs";

async function main() {
  const config = ConnectionSupervisor.builder()
    .withMaxConnections(1000)
    .withHeartbeat({ pingInterval: 15000, pongTimeout: 45000 })
    .withRecovery({ maxRetries: 8, initialBackoff: 500 })
    .withLogging("info")
    .build();

  const supervisor = new ConnectionSupervisor(config);
  setupEventListeners(supervisor);
  supervisor.start();

  const wss = new WebSocketServer({ port: PORT });

  wss.on("connection", (socket, request) => {
    const id = uuidv4();
    const url = new URL(request.url ?? "/", `http://${request.headers.host ?? "localhost"}`);
    const accepted = supervisor.registerConnection(id, new WebSocketTransport(socket), {
      repository: url.searchParams.get("repository") || DEFAULT_REPOSITORY,
      sessionId: url.searchParams.get("session") || id,
      protocolVersion: url.searchParams.get("version") || "1"
    });

    if (!accepted) {
      socket.close(1013, "Try again later");
      return;
    }

    socket.on("message", (data, isBinary) => {
      const bytes = Array.isArray(data)
        ? data.reduce((total, chunk) => total + chunk.length, 0)
        : data instanceof ArrayBuffer
          ? data.byteLength
          : data.length;
      supervisor.recordMessage(id, "inbound", isBinary ? "binary" : "text", bytes);
    });
    socket.on("close", () => supervisor.unregisterConnection(id));
  });

  console.log(`✓ Listening on ws://localhost:${PORT}`);

  if (UPSTREAM_URL) {
    await connectUpstream(supervisor, UPSTREAM_URL);
  }

  // Print a health summary every minute
  const report = setInterval(() => {
    const health = supervisor.getHealth();
    const metrics = supervisor.getMetricsSnapshot();
    console.log(
      `\n→ ${health.status}: ${health.connections.active}/${health.connections.capacity} connections, ` +
        `${metrics.performance.messagesPerSecond.toFixed(1)} msg/s, ` +
        `avg latency ${metrics.performance.averageLatency.toFixed(1)}ms`
    );
    for (const alert of supervisor.getAlerts()) {
      console.log(`  ⚠ [${alert.severity}] ${alert.type}: ${alert.message}`);
    }
  }, 60000);

  // Graceful shutdown
  process.on("SIGINT", async () => {
    console.log("\n→ Shutting down...");
    clearInterval(report);
    await supervisor.close();
    wss.close();
    console.log("✓ Closed");
    process.exit(0);
  });
}

async function connectUpstream(supervisor: ConnectionSupervisor, url: string) {
  const socket = new WebSocket(url);
  // The transport keeps its own error listener from here on
  const transport = new WebSocketTransport(socket);
  await new Promise<void>((resolve, reject) => {
    socket.once("open", () => {
      socket.off("error", reject);
      resolve();
    });
    socket.once("error", reject);
  });

  supervisor.registerOutboundConnection(
    {
      id: "upstream",
      url,
      attributes: { repository: DEFAULT_REPOSITORY, sessionId: "relay", protocolVersion: "1" },
      priority: "high"
    },
    transport
  );
  console.log(`✓ Upstream connected: ${url}`);
}

function setupEventListeners(supervisor: ConnectionSupervisor) {
  supervisor.on("ready", () => {
    console.log("✓ Supervisor started");
  });

  supervisor.on("connection:accepted", (info) => {
    console.log(`+ ${info.id} (${info.repository}, session ${info.sessionId})`);
  });

  supervisor.on("connection:rejected", (id, reason) => {
    console.log(`✗ ${id} rejected: ${reason}`);
  });

  supervisor.on("connection:removed", (info, reason) => {
    console.log(`- ${info.id} removed: ${reason}`);
  });

  supervisor.on("health:changed", (id, previous, current, score) => {
    console.log(`  ${id}: ${previous} → ${current} (score ${score.toFixed(2)})`);
  });

  supervisor.on("recovery:attempt", (id, attempt, delayMs) => {
    console.log(`↻ ${id}: reconnect attempt ${attempt} after ${delayMs}ms`);
  });

  supervisor.on("recovery:succeeded", (id, _transport, attempts) => {
    console.log(`✓ ${id} recovered after ${attempts} attempt(s)`);
  });

  supervisor.on("recovery:failed", (id, attempts, error) => {
    console.error(`✗ ${id} gave up after ${attempts} attempts: ${error.message}`);
  });

  supervisor.on("error", (error) => {
    console.error(`✗ ${error.code}: ${error.message}`);
  });
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
