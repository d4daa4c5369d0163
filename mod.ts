/**
 * Guider Session - client runtime for a JSON-RPC autoguiding application
 *
 * This module exports the public API:
 * - GuiderClient: session with automatic reconnection, calls and live events
 * - GuiderOperations: typed wrappers for common remote methods
 * - ProcessService: starts, watches and stops the guiding application
 * - Configuration loading and the error types raised throughout
 *
 * @module
 */

// Session
export { GuiderClient, ConnectionState } from "./src/remote/client.ts";
export type { GuiderClientOptions, GuiderCaller, GuiderSession } from "./src/remote/client.ts";
export { GuiderOperations, ProfileRT } from "./src/remote/operations.ts";
export { GuiderService, formatEvent } from "./src/services/guider.service.ts";
export type { GuiderServiceOptions } from "./src/services/guider.service.ts";
export { ServiceRegistry, ServiceStatus } from "./src/services.ts";
export type { ServiceConfig, ServiceCommand } from "./src/services.ts";
export type { Profile, Roi } from "./src/remote/operations.ts";
export { EventBroadcaster, Subscription, DEFAULT_SUBSCRIPTION_CAPACITY } from "./src/remote/broadcaster.ts";
export type { SubscriptionOptions } from "./src/remote/broadcaster.ts";
export { RequestCorrelator } from "./src/remote/correlator.ts";
export { classifyMessage } from "./src/remote/classifier.ts";
export type { Classified } from "./src/remote/classifier.ts";

// Protocol
export {
  AppState,
  AppStateRT,
  GuiderEventType,
  RemoteEventRT,
  RpcResponseRT,
  encodeRequest,
} from "./src/remote/protocol.ts";
export type {
  GuiderEvent,
  LifecycleEvent,
  RemoteEvent,
  UnrecognizedEvent,
  RpcParams,
  RpcRequest,
  RpcResponse,
} from "./src/remote/protocol.ts";

// Transport
export { LineFramer, decodeMessages, LINE_TERMINATOR } from "./src/remote/framing.ts";
export { StreamTransport, TcpConnectionFactory } from "./src/remote/transport.ts";
export type { ConnectionFactory, ConnectOptions, Transport } from "./src/remote/transport.ts";

// Process supervision
export {
  ProcessService,
  ChildProcessSpawner,
  defaultExecutableCandidates,
  findDefaultExecutable,
} from "./src/services/process.service.ts";
export type {
  ProcessHandle,
  ProcessSpawner,
  ProcessServiceOptions,
  ExecutableSearchOptions,
} from "./src/services/process.service.ts";

// Configuration
export { defaultConfig, loadConfig, validateConfig, GuiderConfigRT } from "./src/config.ts";
export type { GuiderConfig, ReconnectPolicy, SettleParams } from "./src/config.ts";

// Errors
export * from "./src/errors.ts";
