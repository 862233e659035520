import { WebSocketServer, WebSocket, type RawData } from "ws";
import { Server } from "http";
import { SEVERITY_RANK } from "../contract.js";
import type { CompliancePlatform } from "../platform.js";
import type { AlertRecord, Severity } from "../types.js";
import { isRecord } from "../utils/isRecord.js";

interface AlertStreamClient extends WebSocket {
  isAlive?: boolean;
  alerts?: { minSeverity: Severity };
  ledger?: boolean;
}

function isSeverity(value: unknown): value is Severity {
  return value === "medium" || value === "high" || value === "critical";
}

export function shouldDeliver(alert: AlertRecord, minSeverity: Severity): boolean {
  return SEVERITY_RANK[alert.severity] >= SEVERITY_RANK[minSeverity];
}

/**
 * Live feed of new alerts (SUBSCRIBE_ALERTS) and ledger appends (SUBSCRIBE_LEDGER).
 */
export function initializeAlertStream(server: Server, platform: CompliancePlatform): WebSocketServer {
  const wss = new WebSocketServer({ server });

  const heartbeat = setInterval(() => {
    wss.clients.forEach((ws: WebSocket) => {
      const client: AlertStreamClient = ws;
      if (client.isAlive === false) {
        return client.terminate();
      }
      client.isAlive = false;
      client.ping();
    });
  }, 30000);

  const broadcast = (filter: (client: AlertStreamClient) => boolean, message: unknown) => {
    const encoded = JSON.stringify(message);
    wss.clients.forEach((ws: WebSocket) => {
      const client: AlertStreamClient = ws;
      if (client.readyState === WebSocket.OPEN && filter(client)) {
        client.send(encoded);
      }
    });
  };

  const offAlert = platform.onAlert(alert => {
    broadcast(client => client.alerts !== undefined && shouldDeliver(alert, client.alerts.minSeverity), {
      type: "ALERT",
      alert,
    });
  });

  const offBlock = platform.onBlock(({ channel, block }) => {
    broadcast(client => client.ledger === true, { type: "BLOCK", channel, block: block.toRow() });
  });

  wss.on("connection", (ws: WebSocket) => {
    const client: AlertStreamClient = ws;
    client.isAlive = true;

    client.on("pong", () => {
      client.isAlive = true;
    });

    client.on("message", (message: RawData) => {
      try {
        const data: unknown = JSON.parse(message.toString());
        if (!isRecord(data)) return;

        if (data.type === "SUBSCRIBE_ALERTS") {
          const minSeverity = isSeverity(data.minSeverity) ? data.minSeverity : "medium";
          client.alerts = { minSeverity };
          console.log(`Client subscribed to alerts (min severity ${minSeverity})`);
          client.send(JSON.stringify({ type: "RECENT_ALERTS", alerts: platform.listAlerts(20) }));
        } else if (data.type === "SUBSCRIBE_LEDGER") {
          client.ledger = true;
          client.send(JSON.stringify({ type: "CHANNELS", channels: platform.listChannels() }));
        }
      } catch (error) {
        console.error("Error processing WebSocket message:", error);
      }
    });

    client.on("close", code => {
      console.log(`Alert stream client disconnected, code: ${code}`);
    });

    client.on("error", error => {
      console.error("WebSocket error:", error);
    });
  });

  wss.on("close", () => {
    clearInterval(heartbeat);
    offAlert();
    offBlock();
  });

  return wss;
}
