import type { DebugProtocol } from '@vscode/debugprotocol';
import type { SessionState } from './sessionState';

export type DapErrorKind =
  | 'framing'
  | 'protocol'
  | 'remote'
  | 'timeout'
  | 'connectionClosed'
  | 'state'
  | 'unsupportedCommand';

/**
 * Base class of every failure raised by the session client.
 * `kind` is stable and safe to switch on; `name` mirrors the class name.
 */
export abstract class DapError extends Error {
  public abstract readonly kind: DapErrorKind;

  protected constructor(message: string, name: string) {
    super(message);
    this.name = name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed or missing `Content-Length` header. Fatal for the connection. */
export class FramingError extends DapError {
  public readonly kind = 'framing';

  constructor(
    message: string,
    public readonly header?: string,
  ) {
    super(message, 'FramingError');
  }
}

/**
 * A frame that could not be routed: unparseable body, unknown type, or a
 * response whose seq/command matches no pending call. The connection stays up.
 */
export class ProtocolError extends DapError {
  public readonly kind = 'protocol';

  constructor(
    message: string,
    public readonly frame?: unknown,
  ) {
    super(message, 'ProtocolError');
  }
}

/** The debugger answered with `success: false`. */
export class RemoteError extends DapError {
  public readonly kind = 'remote';
  public readonly body?: DebugProtocol.ErrorResponse['body'];

  constructor(
    message: string,
    public readonly request: DebugProtocol.Request,
    public readonly response: DebugProtocol.Response,
  ) {
    super(message, 'RemoteError');
    if (response.body !== undefined) {
      this.body = response.body;
    }
  }

  get command(): string {
    return this.request.command;
  }
}

export class TimeoutError extends DapError {
  public readonly kind = 'timeout';

  /** `seq` is absent when the wait was for an event rather than a response. */
  constructor(
    public readonly command: string,
    public readonly timeoutMs: number,
    public readonly seq?: number,
  ) {
    super(
      seq === undefined
        ? `Waiting for ${command} timed out after ${timeoutMs}ms.`
        : `Request ${command} (seq: ${seq}) timed out after ${timeoutMs}ms.`,
      'TimeoutError',
    );
  }
}

export class ConnectionClosedError extends DapError {
  public readonly kind = 'connectionClosed';

  constructor(
    message: string,
    public readonly reason?: string,
  ) {
    super(message, 'ConnectionClosedError');
  }
}

/** Command issued in a session state that does not allow it. Nothing was sent. */
export class StateError extends DapError {
  public readonly kind = 'state';

  constructor(
    public readonly command: string,
    public readonly state: SessionState,
    public readonly allowedStates: readonly SessionState[],
  ) {
    super(
      `"${command}" called in invalid state: ${state}. Expected one of: ${allowedStates.join(', ')}.`,
      'StateError',
    );
  }
}

/**
 * The debugger target did not carry out a command it is known to leave
 * unimplemented (`stepOut` on the Godot editor never gets an answer).
 */
export class UnsupportedCommandError extends DapError {
  public readonly kind = 'unsupportedCommand';

  constructor(
    public readonly command: string,
    message: string,
    public readonly cause?: Error,
  ) {
    super(message, 'UnsupportedCommandError');
  }
}

export function isDapError(error: unknown): error is DapError {
  return error instanceof DapError;
}
