import type pino from "pino";
import type { EventChannel } from "./event-channel.js";
import { encodePush, type TrafficEvent } from "./messages.js";
import type { OutboundSink } from "./outbound-sink.js";

export const DEFAULT_RELAY_POLL_INTERVAL_MS = 1000;

export type RelayExitReason = "stopped" | "channel_closed" | "sink_error";

export type RelayWorkerExit = {
  reason: RelayExitReason;
  /** Number of events handed to the sink before exit. */
  relayed: number;
  error?: Error;
};

export interface RelayWorkerOptions {
  channel: EventChannel<TrafficEvent>;
  sink: OutboundSink;
  logger: pino.Logger;
  pollIntervalMs?: number;
}

export interface RelayWorkerHandle {
  /** Settles once the loop has exited. Never rejects. */
  readonly done: Promise<RelayWorkerExit>;
  readonly signal: AbortSignal;
  isRunning(): boolean;
  /** Ask the loop to exit once the channel has nothing queued, and wait until it has. */
  stop(): Promise<RelayWorkerExit>;
}

/**
 * Start draining `channel` into `sink`, tagging every event as an
 * `inspect_traffic` push.
 *
 * Each wait on the channel is bounded by `pollIntervalMs`; on timeout the
 * stop signal is re-checked. Stopping also wakes a pending wait directly, so
 * shutdown does not sit out the rest of the poll interval.
 */
export function startRelayWorker(options: RelayWorkerOptions): RelayWorkerHandle {
  const { channel, sink, logger } = options;
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_RELAY_POLL_INTERVAL_MS;
  const controller = new AbortController();
  const { signal } = controller;
  let running = true;

  let relayed = 0;

  // Queued events are always handed out before `closed` or `aborted`, so a
  // stop or close never drops what the bus already delivered.
  const run = async (): Promise<RelayWorkerExit> => {
    for (;;) {
      const result = await channel.take({ timeoutMs: pollIntervalMs, signal });
      if (result.type === "timeout") {
        if (signal.aborted) {
          return { reason: "stopped", relayed };
        }
        continue;
      }
      if (result.type === "aborted") {
        return { reason: "stopped", relayed };
      }
      if (result.type === "closed") {
        return { reason: "channel_closed", relayed };
      }

      try {
        sink.send(encodePush(result.value));
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        return { reason: "sink_error", relayed, error: err };
      }
      relayed++;
    }
  };

  const done = run().then(
    (exit) => {
      running = false;
      logger.debug({ reason: exit.reason, relayed: exit.relayed }, "Relay worker exited");
      return exit;
    },
    (error: unknown): RelayWorkerExit => {
      running = false;
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error({ err, relayed }, "Relay worker crashed");
      return { reason: "sink_error", relayed, error: err };
    }
  );

  logger.debug({ pollIntervalMs }, "Relay worker started");

  return {
    done,
    signal,
    isRunning: () => running,
    stop: () => {
      controller.abort();
      return done;
    },
  };
}
