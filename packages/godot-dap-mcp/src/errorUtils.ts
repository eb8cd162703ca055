import { McpError } from '@modelcontextprotocol/sdk/types.js';
import {
  CancellationError,
  ConnectionClosedError,
  FramingError,
  ProtocolError,
  RemoteError,
  StateError,
  TimeoutError,
  UnsupportedCommandError,
} from 'dap-session-client';
import {
  McpDebugErrorData,
  McpDebugErrorType,
} from './types/mcp_protocol_extensions';
import type { SessionProvider } from './tools';

/** JSON-RPC code for a tool that ran and failed. */
export const TOOL_EXECUTION_ERROR = -32000;

interface NormalizedError {
  message: string;
  name?: string;
  stack?: string;
  originalError: unknown;
}

/**
 * Renders a failure the way the tools report it:
 *
 * ```
 * Failed to connect to Godot DAP server (127.0.0.1:6006)
 *
 * Suggestions:
 * 1. Launch the Godot editor
 *
 * Error details: connect ECONNREFUSED 127.0.0.1:6006
 * ```
 */
export function formatProblem(
  problem: string,
  context?: string,
  suggestions: readonly string[] = [],
  cause?: unknown,
): string {
  let text = context ? `${problem} (${context})` : problem;
  if (suggestions.length > 0) {
    text += '\n\nSuggestions:';
    suggestions.forEach((suggestion, i) => {
      text += `\n${i + 1}. ${suggestion}`;
    });
  }
  if (cause !== undefined) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    text += `\n\nError details: ${detail}`;
  }
  return text;
}

export interface ToolProblemOptions {
  context?: string;
  suggestions?: readonly string[];
  cause?: unknown;
  /** Overrides the type derived from `cause`. */
  errorType?: McpDebugErrorType;
}

/**
 * A tool failure that carries remediation text. The error type reported to
 * the caller is derived from `cause` unless given.
 */
export class ToolProblemError extends Error {
  public readonly problem: string;
  public readonly underlying?: unknown;
  public readonly errorType?: McpDebugErrorType;

  constructor(problem: string, options: ToolProblemOptions = {}) {
    super(
      formatProblem(problem, options.context, options.suggestions, options.cause),
    );
    this.name = 'ToolProblemError';
    this.problem = problem;
    this.underlying = options.cause;
    this.errorType = options.errorType;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface ClassifiedError {
  errorType: McpDebugErrorType;
  data: Partial<McpDebugErrorData>;
}

/** Maps a session client failure onto the error type reported to the caller. */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof ToolProblemError) {
    const fromCause =
      error.underlying === undefined
        ? undefined
        : classifyError(error.underlying);
    return {
      errorType: error.errorType ?? fromCause?.errorType ?? 'tool_internal_error',
      data: fromCause?.data ?? {},
    };
  }
  if (error instanceof StateError) {
    return {
      errorType: 'state_error',
      data: {
        dapRequestCommand: error.command,
        sessionState: error.state,
        allowedStates: [...error.allowedStates],
      },
    };
  }
  if (error instanceof RemoteError) {
    return {
      errorType: 'dap_request_error',
      data: {
        dapRequestCommand: error.command,
        dapResponseErrorBody: error.body,
      },
    };
  }
  if (error instanceof TimeoutError) {
    return {
      errorType: 'operation_timeout',
      data: { operation: error.command, timeoutMs: error.timeoutMs },
    };
  }
  if (error instanceof ConnectionClosedError) {
    return {
      errorType: 'connection_closed',
      data: { closeReason: error.reason },
    };
  }
  if (error instanceof UnsupportedCommandError) {
    return {
      errorType: 'unsupported_command',
      data: { dapRequestCommand: error.command },
    };
  }
  if (error instanceof ProtocolError || error instanceof FramingError) {
    return { errorType: 'protocol_error', data: {} };
  }
  if (error instanceof CancellationError) {
    return { errorType: 'request_cancelled', data: {} };
  }
  return { errorType: 'tool_internal_error', data: {} };
}

export class McpErrorBuilder {
  private _error?: unknown;
  private _toolName?: string;
  private _mcpErrorCode?: number;
  private _mcpDebugErrorType?: McpDebugErrorType;
  private _sessionProvider?: SessionProvider;
  private _sessionId?: string;
  private _additionalDebugData?: Partial<McpDebugErrorData>;

  private static normalizeErrorObject(error: unknown): NormalizedError {
    if (error instanceof Error) {
      return {
        message: error.message,
        name: error.name,
        stack: error.stack,
        originalError: error,
      };
    }
    return {
      message: String(error),
      originalError: error,
    };
  }

  private static createMcpErrorFromError(
    error: unknown,
    toolName: string,
    mcpErrorCode: number,
    mcpDebugErrorType: McpDebugErrorType,
    sessionProvider: SessionProvider,
    sessionId?: string,
    additionalDebugData?: Partial<McpDebugErrorData>,
  ): McpError {
    const normalized = McpErrorBuilder.normalizeErrorObject(error);
    const asyncEvents = sessionProvider.drainAsyncEventQueue();

    const debugData: McpDebugErrorData = {
      errorType: mcpDebugErrorType,
      sessionId: sessionId,
      originalMessage: normalized.message,
      originalName: normalized.name,
      originalStack: normalized.stack,
      asyncEvents: asyncEvents,
      ...additionalDebugData,
    };

    let errorMessage = `Error in tool ${toolName}: ${normalized.message}`;
    if (
      mcpDebugErrorType === 'invalid_tool_arguments' &&
      additionalDebugData?.problemDetail
    ) {
      errorMessage = `${additionalDebugData.problemDetail}`;
    } else if (mcpDebugErrorType === 'not_connected') {
      errorMessage = `Not connected to a Godot DAP server. Call godot_connect before ${toolName}.`;
    }

    return new McpError(mcpErrorCode, errorMessage, debugData);
  }

  public error(error: unknown): this {
    this._error = error;
    return this;
  }

  public toolName(toolName: string): this {
    this._toolName = toolName;
    return this;
  }

  public mcpErrorCode(mcpErrorCode: number): this {
    this._mcpErrorCode = mcpErrorCode;
    return this;
  }

  public mcpDebugErrorType(mcpDebugErrorType: McpDebugErrorType): this {
    this._mcpDebugErrorType = mcpDebugErrorType;
    return this;
  }

  public sessionProvider(sessionProvider: SessionProvider): this {
    this._sessionProvider = sessionProvider;
    return this;
  }

  public sessionId(sessionId?: string): this {
    this._sessionId = sessionId;
    return this;
  }

  public additionalDebugData(
    additionalDebugData?: Partial<McpDebugErrorData>,
  ): this {
    this._additionalDebugData = additionalDebugData;
    return this;
  }

  public build(): McpError {
    if (this._error === undefined)
      throw new Error("McpErrorBuilder: 'error' is required.");
    if (!this._toolName)
      throw new Error("McpErrorBuilder: 'toolName' is required.");
    if (this._mcpErrorCode === undefined)
      throw new Error("McpErrorBuilder: 'mcpErrorCode' is required.");
    if (!this._mcpDebugErrorType)
      throw new Error("McpErrorBuilder: 'mcpDebugErrorType' is required.");
    if (!this._sessionProvider)
      throw new Error("McpErrorBuilder: 'sessionProvider' is required.");

    return McpErrorBuilder.createMcpErrorFromError(
      this._error,
      this._toolName,
      this._mcpErrorCode,
      this._mcpDebugErrorType,
      this._sessionProvider,
      this._sessionId,
      this._additionalDebugData,
    );
  }
}
