export { GatewaySession, type GatewaySessionOptions } from './gateway-session.js';
export { ReorderBuffer, type Sequenced, type ObserveResult } from './reorder-buffer.js';
export { HeartbeatMonitor, type HeartbeatAction, type HeartbeatOptions } from './heartbeat-monitor.js';
export { ReconnectPolicy, type ReconnectOptions } from './reconnect-policy.js';
export {
  type SessionState,
  createSessionState,
  buildConnectUrl,
  redactUrl,
} from './session-state.js';
export { delay } from './delay.js';
export type {
  DeliverySink,
  DirectoryService,
  GatewayEndpoint,
  OpenTransportOptions,
  ReceiveResult,
  SessionStatus,
  Transport,
  TransportFactory,
} from './types.js';
