import type pino from "pino";
import type { WebSocket } from "ws";

/**
 * Where an inspection session writes replies and pushes. Replies and relayed
 * pushes share one sink, so implementations must keep whole messages intact.
 */
export interface OutboundSink {
  send(text: string): void;
}

// WebSocket.OPEN
const WS_OPEN = 1;

/**
 * Sink over a `ws` socket. `ws` queues each `send` as one frame, so messages
 * never interleave. Messages written after the socket left OPEN are dropped.
 */
export class WebSocketOutboundSink implements OutboundSink {
  private readonly ws: WebSocket;
  private readonly logger: pino.Logger;

  constructor(ws: WebSocket, logger: pino.Logger) {
    this.ws = ws;
    this.logger = logger;
  }

  send(text: string): void {
    if (this.ws.readyState !== WS_OPEN) {
      this.logger.debug(
        { readyState: this.ws.readyState, bytes: text.length },
        "Dropping outbound message for non-open socket"
      );
      return;
    }
    this.ws.send(text, (error) => {
      if (error) {
        this.logger.warn({ err: error }, "Failed to deliver outbound message");
      }
    });
  }
}
