import type { IncomingMessage } from "http";
import type { RawData, WebSocket } from "ws";
import type pino from "pino";
import type { TrafficEventBus } from "./inspection/event-bus.js";
import { InspectionSession } from "./inspection/inspection-session.js";
import { WebSocketOutboundSink } from "./inspection/outbound-sink.js";

export interface WebSocketSessionBridgeOptions {
  bus: TrafficEventBus;
  eventsEnabled: boolean;
  pollIntervalMs?: number;
}

/**
 * Binds each dashboard WebSocket to its own inspection session and maps the
 * socket's events onto the session's lifecycle hooks.
 */
export class WebSocketSessionBridge {
  private readonly logger: pino.Logger;
  private readonly sessions: Map<WebSocket, InspectionSession> = new Map();
  private clientIdCounter = 0;
  private readonly bus: TrafficEventBus;
  private readonly eventsEnabled: boolean;
  private readonly pollIntervalMs: number | undefined;

  constructor(logger: pino.Logger, options: WebSocketSessionBridgeOptions) {
    this.logger = logger.child({ module: "websocket-session-bridge" });
    this.bus = options.bus;
    this.eventsEnabled = options.eventsEnabled;
    this.pollIntervalMs = options.pollIntervalMs;
  }

  public getSessionCount(): number {
    return this.sessions.size;
  }

  public getSession(ws: WebSocket): InspectionSession | undefined {
    return this.sessions.get(ws);
  }

  public attach(ws: WebSocket, request?: IncomingMessage): InspectionSession {
    const clientId = `client-${++this.clientIdCounter}`;
    const connectionLogger = this.logger.child({ clientId });

    const session = new InspectionSession({
      clientId,
      bus: this.bus,
      sink: new WebSocketOutboundSink(ws, connectionLogger.child({ module: "outbound-sink" })),
      logger: connectionLogger.child({ module: "inspection-session" }),
      eventsEnabled: this.eventsEnabled,
      pollIntervalMs: this.pollIntervalMs,
    });

    this.sessions.set(ws, session);

    connectionLogger.info(
      {
        clientId,
        remoteAddress: request?.socket.remoteAddress,
        totalSessions: this.sessions.size,
      },
      "Client connected"
    );
    session.onOpen();

    ws.on("message", (data, isBinary) => {
      void this.handleRawMessage(ws, connectionLogger, data, isBinary);
    });

    ws.on("close", () => {
      void this.detach(ws, connectionLogger, clientId);
    });

    ws.on("error", (error) => {
      const err = error instanceof Error ? error : new Error(String(error));
      connectionLogger.error({ err }, "Client error");
      void this.detach(ws, connectionLogger, clientId);
    });

    return session;
  }

  private async detach(ws: WebSocket, connectionLogger: pino.Logger, clientId: string): Promise<void> {
    const session = this.sessions.get(ws);
    if (!session) return;
    this.sessions.delete(ws);

    connectionLogger.info(
      { clientId, totalSessions: this.sessions.size },
      "Client disconnected"
    );

    try {
      await session.onClose();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      connectionLogger.error({ err }, "Failed to tear down session");
    }
  }

  private async handleRawMessage(
    ws: WebSocket,
    connectionLogger: pino.Logger,
    data: RawData,
    isBinary: boolean
  ): Promise<void> {
    const session = this.sessions.get(ws);
    if (!session) {
      connectionLogger.error("No session found for client");
      return;
    }

    if (isBinary) {
      connectionLogger.debug("Decoding binary frame as UTF-8 text");
    }

    try {
      await session.onMessage(rawDataToString(data));
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      connectionLogger.error({ err }, "Failed to handle message");
    }
  }

  public async closeAll(): Promise<void> {
    const pending: Promise<void>[] = [];
    for (const [ws, session] of this.sessions) {
      pending.push(session.onClose());
      pending.push(
        new Promise<void>((resolve) => {
          // WebSocket.CLOSED = 3
          if (ws.readyState === 3) {
            resolve();
            return;
          }
          ws.once("close", () => resolve());
          ws.close();
        })
      );
    }
    this.sessions.clear();
    await Promise.all(pending);
  }
}

export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf-8");
  }
  if (Buffer.isBuffer(data)) {
    return data.toString("utf-8");
  }
  return Buffer.from(data).toString("utf-8");
}
