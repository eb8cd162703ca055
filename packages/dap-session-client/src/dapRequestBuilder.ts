import type { DebugProtocol } from '@vscode/debugprotocol';
import type { IDAPProtocolClient } from './dapProtocolClient';
import { LoggerInterface } from './logging';
import { CancellationToken, CancellationError } from './common/cancellation';
import { StateError } from './errors';
import { SingleFlightGate } from './singleFlightGate';
import {
  COMMAND_ALLOWED_STATES,
  DEFERRED_RESPONSE_COMMANDS,
  DapCommand,
  SessionState,
} from './sessionState';

/** What a request needs from the session that issues it. */
export interface DAPRequestContext {
  readonly status: SessionState;
  readonly gate: SingleFlightGate;
  readonly protocolClient: IDAPProtocolClient;
  readonly commandTimeoutMs: number;
}

export class DAPRequestBuilder<TResponse extends DebugProtocol.Response> {
  private _args?: unknown;
  private readonly _allowedStates: readonly SessionState[];
  private _timeoutMs?: number;
  private _cancellationToken?: CancellationToken;
  private _onIssued?: () => void;

  constructor(
    private readonly context: DAPRequestContext,
    private readonly logger: LoggerInterface,
    private readonly _command: DapCommand,
  ) {
    this._allowedStates = COMMAND_ALLOWED_STATES[_command];
  }

  public args(args: unknown): this {
    this._args = args;
    return this;
  }

  public timeout(timeoutMs: number): this {
    this._timeoutMs = timeoutMs;
    return this;
  }

  public withCancellationToken(token: CancellationToken | undefined): this {
    this._cancellationToken = token;
    return this;
  }

  /** Runs right after the request is written, before its response arrives. */
  public onIssued(callback: () => void): this {
    this._onIssued = callback;
    return this;
  }

  private assertState(): void {
    const status = this.context.status;
    if (!this._allowedStates.includes(status)) {
      const error = new StateError(this._command, status, this._allowedStates);
      this.logger.warn(error.message);
      throw error;
    }
  }

  /**
   * Checks the session state, waits for the single-flight gate, checks the
   * state again (it may have moved while waiting) and writes the request.
   * Nothing reaches the wire when a state check fails.
   */
  public async send(): Promise<TResponse> {
    const command = this._command;
    if (this._cancellationToken?.isCancellationRequested) {
      throw new CancellationError(`Request "${command}" was cancelled.`);
    }
    this.assertState();

    return this.context.gate.run(
      () => {
        this.assertState();
        this.logger.debug(`Sending "${command}" request`);
        const pending = this.context.protocolClient.sendRequest<TResponse>(
          command,
          this._args,
          {
            timeoutMs: this._timeoutMs ?? this.context.commandTimeoutMs,
            token: this._cancellationToken,
          },
        );
        this._onIssued?.();
        return pending;
      },
      { releaseOnIssue: DEFERRED_RESPONSE_COMMANDS.has(command) },
    );
  }
}
