import type { DebugProtocol, SessionState } from 'dap-session-client';

export type McpDebugErrorType =
  | 'dap_request_error'
  | 'state_error'
  | 'connection_closed'
  | 'protocol_error'
  | 'unsupported_command'
  | 'request_cancelled'
  | 'tool_internal_error'
  | 'unexpected_session_termination'
  | 'operation_timeout'
  | 'not_connected'
  | 'invalid_project'
  | 'invalid_tool_arguments';

export interface McpDebugErrorData {
  errorType: McpDebugErrorType;
  sessionId?: string;
  originalMessage?: string;
  originalName?: string;
  originalStack?: string;

  // For 'dap_request_error' and 'state_error'
  dapRequestCommand?: string;
  dapResponseErrorBody?: DebugProtocol.ErrorResponse['body'];

  // For 'state_error'
  sessionState?: SessionState;
  allowedStates?: SessionState[];

  // For 'connection_closed'
  closeReason?: string;

  // For 'operation_timeout'
  operation?: string;
  timeoutMs?: number;

  // For 'invalid_tool_arguments'
  argumentName?: string;
  problemDetail?: string;
  receivedPath?: string;
  asyncEvents?: McpAsyncEvent[];
}

export type McpAsyncEventType =
  | 'unexpected_session_termination'
  | 'dap_protocol_error'
  | 'dap_event_output'
  | 'dap_event_stopped'
  | 'dap_event_continued'
  | 'dap_event_thread'
  | 'dap_event_breakpoint'
  | 'dap_event_terminated'
  | 'dap_event_exited';

export interface McpAsyncEvent {
  eventId: string;
  timestamp: string;
  eventType: McpAsyncEventType;
  sessionId: string;
  data: unknown;
}
