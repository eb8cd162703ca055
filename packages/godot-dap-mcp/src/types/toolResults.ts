import type { DebugProtocol, SessionState } from 'dap-session-client';
import {
  FormattedVariable,
  ModelBreakpoint,
  ModelScope,
  ModelSourceBreakpoints,
  ModelStackFrame,
  ModelThread,
  PendingBreakpoints,
} from './index';

export interface HandlePingResult {
  status: 'ok';
  message: string;
  timestamp: string;
}

export interface HandleConnectResult {
  status: 'connected' | 'already_connected';
  message: string;
  state: SessionState;
  session_id: string;
  project?: string;
}

export interface HandleDisconnectResult {
  status: 'disconnected' | 'not_connected';
  message: string;
}

export interface HandleGetSessionStateResult {
  connected: boolean;
  state: SessionState;
  session_id?: string;
  project?: string;
  last_stop_reason?: string;
  capabilities?: DebugProtocol.Capabilities;
  recorded_events?: number;
  planned_breakpoint_count: number;
  pending_breakpoints: PendingBreakpoints[];
}

export interface HandleLaunchResult {
  status: 'launched' | 'attached';
  message: string;
  project?: string;
  scene?: string;
  state: SessionState;
  breakpoints: ModelSourceBreakpoints[];
}

export interface HandleSetBreakpointResult {
  /** `adjusted`: verified, but on another line than requested. */
  status: 'pending' | 'verified' | 'adjusted' | 'unverified';
  message: string;
  file: string;
  resolved_path: string;
  requested_line: number;
  breakpoint?: ModelBreakpoint;
}

export interface HandleClearBreakpointResult {
  status: 'cleared';
  message: string;
  file: string;
  resolved_path: string;
  sent: boolean;
}

export interface HandleExecutionResult {
  status: 'continued' | 'stepped' | 'pause_requested';
  message: string;
  thread_id: number;
  state: SessionState;
}

export interface HandleGetThreadsResult {
  count: number;
  threads: ModelThread[];
}

export interface HandleGetStackTraceResult {
  thread_id: number;
  total_frames?: number;
  frames: ModelStackFrame[];
}

export interface HandleGetScopesResult {
  frame_id: number;
  scopes: ModelScope[];
}

export interface HandleGetVariablesResult {
  variables_reference: number;
  count: number;
  variables: FormattedVariable[];
}

export interface HandleEvaluateResult {
  expression: string;
  result: string;
  type: string;
  formatted?: string;
  expandable?: boolean;
  variables_reference?: number;
}

export type AnyToolResult =
  | HandlePingResult
  | HandleConnectResult
  | HandleDisconnectResult
  | HandleGetSessionStateResult
  | HandleLaunchResult
  | HandleSetBreakpointResult
  | HandleClearBreakpointResult
  | HandleExecutionResult
  | HandleGetThreadsResult
  | HandleGetStackTraceResult
  | HandleGetScopesResult
  | HandleGetVariablesResult
  | HandleEvaluateResult;
