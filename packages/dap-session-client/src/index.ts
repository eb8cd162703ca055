/**
 * @file Main entry point of the DAP session client
 *
 * Wire codec, protocol client, session state machine and the high-level
 * {@link DebugSession} for talking to a Debug Adapter Protocol server over TCP.
 *
 * @module dap-session-client
 */

import type { DebugProtocol } from '@vscode/debugprotocol';

export type { DebugProtocol };

export {
  DebugSession,
  DEFAULT_DAP_HOST,
  DEFAULT_DAP_PORT,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_COMMAND_TIMEOUT_MS,
} from './debugSession';
export {
  DAPSessionHandler,
  DEFAULT_INITIALIZE_ARGUMENTS,
  DEFAULT_STEP_OUT_TIMEOUT_MS,
  DEFAULT_DISCONNECT_TIMEOUT_MS,
} from './dapSessionHandler';
export { DAPProtocolClient } from './dapProtocolClient';
export { DAPRequestBuilder } from './dapRequestBuilder';
export { SingleFlightGate } from './singleFlightGate';
export { SequenceAllocator } from './sequenceAllocator';
export { SessionEventLog, DEFAULT_MAX_EVENT_RECORDS } from './sessionEventLog';
export {
  MessageDecoder,
  encodeMessage,
  MAX_CONTENT_LENGTH,
} from './wireCodec';
export {
  COMMAND_ALLOWED_STATES,
  canTransition,
  isCommandAllowed,
} from './sessionState';
export {
  DapError,
  FramingError,
  ProtocolError,
  RemoteError,
  TimeoutError,
  ConnectionClosedError,
  StateError,
  UnsupportedCommandError,
  isDapError,
} from './errors';
export {
  CancellationTokenSource,
  CancellationError,
  tokenFromAbortSignal,
} from './common/cancellation';

export type {
  DebugSessionOptions,
  BreakpointPlan,
  SourceBreakpoints,
  HandshakeResult,
} from './debugSession';
export type {
  DAPSessionHandlerEvents,
  DAPSessionHandlerOptions,
  LaunchArguments,
  AttachArguments,
  StoppedPayload,
  PendingHandshake,
} from './dapSessionHandler';
export type { IDAPProtocolClient, SendRequestOptions } from './dapProtocolClient';
export type { DAPRequestContext } from './dapRequestBuilder';
export type { RecordedEvent, WaitForEventOptions } from './sessionEventLog';
export type { DecodedFrame } from './wireCodec';
export type { SessionState, DapCommand } from './sessionState';
export type { DapErrorKind } from './errors';
export type { CancellationToken, Disposable } from './common/cancellation';
export type { LoggerInterface } from './logging';
