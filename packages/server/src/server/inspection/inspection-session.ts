import type pino from "pino";
import { v4 as uuidv4 } from "uuid";
import type { TrafficEventBus } from "./event-bus.js";
import { EventChannel } from "./event-channel.js";
import {
  decodeControlMessage,
  encodePush,
  encodeReply,
  type ControlMessage,
  type TrafficEvent,
} from "./messages.js";
import type { OutboundSink } from "./outbound-sink.js";
import {
  startRelayWorker,
  type RelayWorkerExit,
  type RelayWorkerHandle,
} from "./relay-worker.js";

/**
 * Lifecycle hooks a transport host calls for one observer connection.
 */
export interface ObserverConnectionHandler {
  onOpen(): void;
  onMessage(raw: string): Promise<void>;
  onClose(): Promise<void>;
}

export type InspectionState = "idle" | "inspecting";

export type InspectionSnapshot = {
  enabled: boolean;
  subscriptionId: string | null;
  hasChannel: boolean;
  hasWorker: boolean;
};

export interface InspectionSessionOptions {
  clientId: string;
  bus: TrafficEventBus;
  sink: OutboundSink;
  logger: pino.Logger;
  /** Process-wide switch; when off, `enable_inspection` is always refused. */
  eventsEnabled: boolean;
  pollIntervalMs?: number;
}

// Subscription, channel and worker only ever exist together.
type ActiveInspection = {
  subscriptionId: string;
  channel: EventChannel<TrafficEvent>;
  worker: RelayWorkerHandle;
};

/**
 * Protocol state for one dashboard connection.
 *
 * Control messages are handled strictly one at a time, in arrival order:
 * disabling inspection waits for the relay worker to exit, and nothing else
 * for this session may run while it does.
 */
export class InspectionSession implements ObserverConnectionHandler {
  private readonly clientId: string;
  private readonly bus: TrafficEventBus;
  private readonly sink: OutboundSink;
  private readonly logger: pino.Logger;
  private readonly eventsEnabled: boolean;
  private readonly pollIntervalMs: number | undefined;

  private active: ActiveInspection | null = null;
  private closed = false;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: InspectionSessionOptions) {
    this.clientId = options.clientId;
    this.bus = options.bus;
    this.sink = options.sink;
    this.logger = options.logger;
    this.eventsEnabled = options.eventsEnabled;
    this.pollIntervalMs = options.pollIntervalMs;
  }

  getState(): InspectionState {
    return this.active ? "inspecting" : "idle";
  }

  isClosed(): boolean {
    return this.closed;
  }

  getSnapshot(): InspectionSnapshot {
    return {
      enabled: this.active !== null,
      subscriptionId: this.active?.subscriptionId ?? null,
      hasChannel: this.active !== null && !this.active.channel.isClosed(),
      hasWorker: this.active?.worker.isRunning() ?? false,
    };
  }

  onOpen(): void {
    this.logger.info(
      { clientId: this.clientId, eventsEnabled: this.eventsEnabled },
      "Inspection session opened"
    );
  }

  onMessage(raw: string): Promise<void> {
    return this.enqueue(() => this.handleMessage(raw));
  }

  /**
   * Force teardown for a closing connection. Safe to call more than once.
   */
  onClose(): Promise<void> {
    return this.enqueue(async () => {
      if (this.closed) {
        return;
      }
      this.closed = true;
      await this.teardown();
      this.logger.info("Inspection session closed");
    });
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.tail.then(task);
    // Failures are reported to the caller through `run`; the queue keeps going.
    this.tail = run.catch((error: unknown) => {
      this.logger.debug({ err: error }, "Control task failed");
    });
    return run;
  }

  private async handleMessage(raw: string): Promise<void> {
    if (this.closed) {
      this.logger.debug("Ignoring message for closed session");
      return;
    }

    const decoded = decodeControlMessage(raw);
    if (!decoded.ok) {
      this.logger.warn(
        {
          reason: decoded.reason,
          error: decoded.error,
          rawPayload: raw.length > 2000 ? `${raw.slice(0, 2000)}... (truncated)` : raw,
        },
        "Dropping undecodable control message"
      );
      return;
    }

    const message = decoded.message;
    this.logger.debug({ id: message.id, method: message.method }, "Received control message");

    switch (message.method) {
      case "ping":
        this.sink.send(encodeReply(message.id, "pong"));
        return;

      case "enable_inspection":
        this.handleEnableInspection(message);
        return;

      case "disable_inspection":
        await this.teardown();
        this.sink.send(encodeReply(message.id, "inspection_disabled"));
        return;

      default:
        this.logger.info({ id: message.id, method: message.method }, "Unsupported method");
        this.sink.send(encodeReply(message.id, "not_implemented"));
    }
  }

  private handleEnableInspection(message: ControlMessage): void {
    if (!this.eventsEnabled) {
      this.logger.info("Inspection requested while events are disabled");
      this.sink.send(encodeReply(message.id, "not enabled"));
      return;
    }

    if (this.active) {
      this.logger.debug(
        { subscriptionId: this.active.subscriptionId },
        "Inspection already enabled"
      );
      this.sink.send(encodeReply(message.id, "inspection_enabled"));
      return;
    }

    const subscriptionId = uuidv4().replace(/-/g, "");
    const channel = new EventChannel<TrafficEvent>();
    this.bus.subscribe(subscriptionId, channel);
    const worker = startRelayWorker({
      channel,
      sink: this.sink,
      logger: this.logger.child({ module: "relay-worker", subscriptionId }),
      pollIntervalMs: this.pollIntervalMs,
    });
    this.active = { subscriptionId, channel, worker };
    void worker.done.then((exit) => this.handleWorkerExit(worker, exit));

    this.logger.info({ subscriptionId }, "Inspection enabled");
    this.sink.send(encodeReply(message.id, "inspection_enabled"));
  }

  /**
   * Stop delivery, let the worker relay what is already queued, then forget
   * the subscription. No event for this session is relayed once this resolves.
   */
  private async teardown(): Promise<RelayWorkerExit | null> {
    const active = this.active;
    if (!active) {
      return null;
    }

    this.bus.unsubscribe(active.subscriptionId);
    active.channel.close();
    // Closed before the abort, so the worker drains and exits `channel_closed`.
    const exit = await active.worker.stop();
    this.active = null;

    this.logger.info(
      { subscriptionId: active.subscriptionId, reason: exit.reason, relayed: exit.relayed },
      "Inspection disabled"
    );
    return exit;
  }

  /**
   * A worker that exits without being asked leaves the session pointing at a
   * dead relay. Drop back to idle and tell the observer.
   */
  private handleWorkerExit(worker: RelayWorkerHandle, exit: RelayWorkerExit): void {
    // An aborted signal means teardown asked for this exit.
    if (exit.reason === "stopped" || worker.signal.aborted) {
      return;
    }

    void this.enqueue(async () => {
      const active = this.active;
      if (!active || active.worker !== worker) {
        return;
      }
      this.logger.warn(
        { err: exit.error, reason: exit.reason, subscriptionId: active.subscriptionId },
        "Relay worker exited unexpectedly"
      );
      await this.teardown();
      if (!this.closed) {
        this.sink.send(encodePush({ reason: exit.reason }, "inspection_stopped"));
      }
    }).catch((error: unknown) => {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error({ err }, "Failed to report relay worker exit");
    });
  }
}
