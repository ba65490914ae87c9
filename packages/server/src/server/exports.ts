// Library exports for @trafficscope/server
export {
  createInspectionDaemon,
  type InspectionDaemonHandles,
} from "./bootstrap.js";
export {
  parseListenAddress,
  resolveDaemonConfig,
  resolveHome,
  type InspectionDaemonConfig,
  type ListenAddress,
} from "./config.js";
export { createRootLogger, resolveLogConfig, type LogLevel, type LogFormat } from "./logger.js";
export {
  loadPersistedConfig,
  savePersistedConfig,
  type PersistedConfig,
} from "./persisted-config.js";
export { WebSocketSessionBridge } from "./websocket-session-bridge.js";

export {
  InProcessTrafficEventBus,
  createTrafficEvent,
  type TrafficEventBus,
} from "./inspection/event-bus.js";
export { EventChannel, type ChannelTakeResult } from "./inspection/event-channel.js";
export {
  InspectionSession,
  type InspectionSnapshot,
  type InspectionState,
  type ObserverConnectionHandler,
} from "./inspection/inspection-session.js";
export {
  decodeControlMessage,
  encodePush,
  encodeReply,
  type ControlMessage,
  type PushMessage,
  type ReplyMessage,
  type TrafficEvent,
} from "./inspection/messages.js";
export { WebSocketOutboundSink, type OutboundSink } from "./inspection/outbound-sink.js";
export {
  startRelayWorker,
  type RelayWorkerExit,
  type RelayWorkerHandle,
} from "./inspection/relay-worker.js";
