import express, { type Express } from "express";
import { createServer as createHTTPServer, type Server as HTTPServer } from "http";
import { WebSocketServer } from "ws";
import type pino from "pino";
import type { InspectionDaemonConfig } from "./config.js";
import { InProcessTrafficEventBus } from "./inspection/event-bus.js";
import { WebSocketSessionBridge } from "./websocket-session-bridge.js";

export type InspectionDaemonHandles = {
  httpServer: HTTPServer;
  app: Express;
  wsServer: WebSocketServer;
  bridge: WebSocketSessionBridge;
  bus: InProcessTrafficEventBus;
  start: () => Promise<void>;
  close: () => Promise<void>;
};

export function createInspectionDaemon(
  config: InspectionDaemonConfig,
  rootLogger: pino.Logger
): InspectionDaemonHandles {
  const logger = rootLogger.child({ module: "bootstrap" });
  const bus = new InProcessTrafficEventBus(rootLogger);
  const bridge = new WebSocketSessionBridge(rootLogger, {
    bus,
    eventsEnabled: config.eventsEnabled,
    pollIntervalMs: config.pollIntervalMs,
  });

  const app = express();

  app.get("/api/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      inspection: {
        eventsEnabled: config.eventsEnabled,
        sessions: bridge.getSessionCount(),
        subscribers: bus.getSubscriberCount(),
      },
    });
  });

  const httpServer = createHTTPServer(app);
  const wsServer = new WebSocketServer({ server: httpServer, path: config.inspectionPath });

  wsServer.on("connection", (ws, request) => {
    bridge.attach(ws, request);
  });

  wsServer.on("error", (error) => {
    logger.error({ err: error }, "WebSocket server error");
  });

  const start = (): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        httpServer.off("listening", onListening);
        reject(error);
      };
      const onListening = () => {
        httpServer.off("error", onError);
        logger.info(
          {
            host: config.listen.host,
            port: config.listen.port,
            inspectionPath: config.inspectionPath,
            eventsEnabled: config.eventsEnabled,
          },
          "Inspection daemon listening"
        );
        resolve();
      };
      httpServer.once("error", onError);
      httpServer.once("listening", onListening);
      httpServer.listen(config.listen.port, config.listen.host);
    });

  const close = async (): Promise<void> => {
    await bridge.closeAll();
    await new Promise<void>((resolve) => {
      wsServer.close(() => resolve());
    });
    if (httpServer.listening) {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
      });
    }
    logger.info("Inspection daemon stopped");
  };

  return {
    httpServer,
    app,
    wsServer,
    bridge,
    bus,
    start,
    close,
  };
}
