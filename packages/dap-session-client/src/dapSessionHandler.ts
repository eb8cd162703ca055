import { EventEmitter } from 'events';
import * as stream from 'stream';
import { randomUUID } from 'crypto';
import type { DebugProtocol } from '@vscode/debugprotocol';
import type { IDAPProtocolClient } from './dapProtocolClient';
import { DEFAULT_COMMAND_TIMEOUT_MS } from './dapProtocolClient';
import { DAPRequestBuilder, DAPRequestContext } from './dapRequestBuilder';
import { LoggerInterface, componentLogger } from './logging';
import { CancellationToken } from './common/cancellation';
import { SingleFlightGate } from './singleFlightGate';
import { SessionEventLog, DEFAULT_MAX_EVENT_RECORDS } from './sessionEventLog';
import {
  DapCommand,
  SessionState,
  canTransition,
  isCommandAllowed,
  COMMAND_ALLOWED_STATES,
} from './sessionState';
import {
  ProtocolError,
  RemoteError,
  StateError,
  TimeoutError,
  UnsupportedCommandError,
} from './errors';

export const DEFAULT_STEP_OUT_TIMEOUT_MS = 5000;
export const DEFAULT_DISCONNECT_TIMEOUT_MS = 1000;

export const DEFAULT_INITIALIZE_ARGUMENTS: DebugProtocol.InitializeRequestArguments =
  {
    clientID: 'godot-dap-bridge',
    clientName: 'Godot DAP Bridge',
    adapterID: 'godot',
    locale: 'en-US',
    linesStartAt1: true,
    columnsStartAt1: true,
    pathFormat: 'path',
    supportsVariableType: true,
    supportsVariablePaging: false,
    supportsRunInTerminalRequest: false,
    supportsMemoryReferences: false,
    supportsProgressReporting: false,
    supportsInvalidatedEvent: false,
  };

/** Launch arguments are target specific, so any extra field is passed through. */
export type LaunchArguments = DebugProtocol.LaunchRequestArguments &
  Record<string, unknown>;
export type AttachArguments = DebugProtocol.AttachRequestArguments &
  Record<string, unknown>;

export interface DAPSessionHandlerOptions {
  commandTimeoutMs?: number;
  stepOutTimeoutMs?: number;
  disconnectTimeoutMs?: number;
  maxEventRecords?: number;
}

export interface StoppedPayload {
  sessionId: string;
  /** Open-ended: `breakpoint`, `step`, `pause`, `exception` or anything the target sends. */
  reason: string;
  threadId?: number;
  description?: string;
  text?: string;
  allThreadsStopped?: boolean;
  hitBreakpointIds?: number[];
}

/** A launch or attach whose response is held back until `configurationDone`. */
export interface PendingHandshake<R extends DebugProtocol.Response> {
  /** Resolves once the request is on the wire; rejects if it never got there. */
  issued: Promise<void>;
  response: Promise<R>;
}

export interface DAPSessionHandlerEvents {
  stateChanged: (payload: {
    sessionId: string;
    from: SessionState;
    to: SessionState;
  }) => void;
  dapEvent: (event: DebugProtocol.Event) => void;
  stopped: (payload: StoppedPayload) => void;
  output: (payload: {
    sessionId: string;
    category?: string;
    output: string;
  }) => void;
  protocolError: (error: ProtocolError) => void;
  sessionEnded: (payload: {
    sessionId: string;
    reason: string;
    error?: Error;
  }) => void;
}

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export declare interface DAPSessionHandler {
  on<U extends keyof DAPSessionHandlerEvents>(
    event: U,
    listener: DAPSessionHandlerEvents[U],
  ): this;
  once<U extends keyof DAPSessionHandlerEvents>(
    event: U,
    listener: DAPSessionHandlerEvents[U],
  ): this;
  off<U extends keyof DAPSessionHandlerEvents>(
    event: U,
    listener: DAPSessionHandlerEvents[U],
  ): this;
  emit<U extends keyof DAPSessionHandlerEvents>(
    event: U,
    ...args: Parameters<DAPSessionHandlerEvents[U]>
  ): boolean;
}

const noop = (): void => undefined;

/**
 * Session state machine and typed DAP command surface over one protocol
 * client. Every command is checked against the current state before it is
 * written, and goes through the single-flight gate.
 */
export class DAPSessionHandler
  extends EventEmitter
  implements DAPRequestContext
{
  private _status: SessionState = 'disconnected';
  private _capabilities: DebugProtocol.Capabilities = {};
  private readonly _sessionId: string = randomUUID();
  private readonly _logger: LoggerInterface;
  private readonly _protocolClient: IDAPProtocolClient;
  private readonly _eventLog: SessionEventLog;

  public readonly gate = new SingleFlightGate();
  public readonly commandTimeoutMs: number;
  private readonly stepOutTimeoutMs: number;
  private readonly disconnectTimeoutMs: number;

  // Deferred handshake replies still owed on the current connection.
  private deferredInFlight = 0;
  private connectionGeneration = 0;
  private configurationDoneAcknowledged = false;

  constructor(
    protocolClient: IDAPProtocolClient,
    logger: LoggerInterface,
    options: DAPSessionHandlerOptions = {},
  ) {
    super();
    this._protocolClient = protocolClient;
    this._logger = componentLogger(logger, 'DAPSessionHandler');
    this._eventLog = new SessionEventLog(
      logger,
      options.maxEventRecords ?? DEFAULT_MAX_EVENT_RECORDS,
    );
    this.commandTimeoutMs =
      options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.stepOutTimeoutMs =
      options.stepOutTimeoutMs ?? DEFAULT_STEP_OUT_TIMEOUT_MS;
    this.disconnectTimeoutMs =
      options.disconnectTimeoutMs ?? DEFAULT_DISCONNECT_TIMEOUT_MS;
    this._logger.info(`Created with sessionId: ${this._sessionId}`);
  }

  get sessionId(): string {
    return this._sessionId;
  }

  get status(): SessionState {
    return this._status;
  }

  get protocolClient(): IDAPProtocolClient {
    return this._protocolClient;
  }

  get capabilities(): DebugProtocol.Capabilities {
    return this._capabilities;
  }

  get events(): SessionEventLog {
    return this._eventLog;
  }

  get lastStopReason(): string | undefined {
    return this._eventLog.lastStopReason;
  }

  /** Hands the connected streams to the protocol client. Legal only while disconnected. */
  public attachTransport(
    readable: stream.Readable,
    writable: stream.Writable,
  ): void {
    if (this._status !== 'disconnected') {
      throw new StateError('connect', this._status, ['disconnected']);
    }
    // The protocol client drops its listeners on every disconnect.
    this._protocolClient.on('dapEvent', (event: DebugProtocol.Event) =>
      this.onDapEvent(event),
    );
    this._protocolClient.on('protocolError', (error: ProtocolError) =>
      this.emit('protocolError', error),
    );
    this._protocolClient.on('disconnected', (reason: string, error?: Error) =>
      this.handleSessionTermination(reason, error),
    );
    this._protocolClient.connect(readable, writable);
    this.updateStatus('connected');
  }

  private updateStatus(newStatus: SessionState): void {
    const from = this._status;
    if (from === newStatus) {
      return;
    }
    if (!canTransition(from, newStatus)) {
      this._logger.warn(`Ignoring status change ${from} -> ${newStatus}`);
      return;
    }
    this._logger.info(`Status changed: ${from} -> ${newStatus}`);
    this._status = newStatus;
    this.emit('stateChanged', {
      sessionId: this._sessionId,
      from,
      to: newStatus,
    });
  }

  private onDapEvent(event: DebugProtocol.Event): void {
    this._eventLog.record(event);

    switch (event.event) {
      case 'stopped': {
        const body: DebugProtocol.StoppedEvent['body'] | undefined = event.body;
        const reason =
          typeof body?.reason === 'string' ? body.reason : 'unknown';
        if (this._status === 'configuring' || this._status === 'running') {
          this.updateStatus('paused');
        }
        this.emit('stopped', {
          sessionId: this._sessionId,
          reason,
          threadId: body?.threadId,
          description: body?.description,
          text: body?.text,
          allThreadsStopped: body?.allThreadsStopped,
          hitBreakpointIds: body?.hitBreakpointIds,
        });
        break;
      }
      case 'continued':
        if (this._status === 'paused') {
          this.updateStatus('running');
        }
        break;
      case 'terminated':
      case 'exited':
        this._logger.info(`Debuggee ${event.event}.`);
        if (this._status !== 'disconnected') {
          this.updateStatus('terminated');
        }
        break;
      case 'output': {
        const body: DebugProtocol.OutputEvent['body'] | undefined = event.body;
        if (typeof body?.output === 'string') {
          this.emit('output', {
            sessionId: this._sessionId,
            category: body.category,
            output: body.output,
          });
        }
        break;
      }
      case 'capabilities': {
        const body: DebugProtocol.CapabilitiesEvent['body'] | undefined =
          event.body;
        if (body?.capabilities) {
          this._capabilities = {
            ...this._capabilities,
            ...body.capabilities,
          };
        }
        break;
      }
      default:
        break;
    }
    this.emit('dapEvent', event);
  }

  private handleSessionTermination(reason: string, error?: Error): void {
    if (this._status === 'disconnected') {
      return;
    }
    this._logger.info(
      `Handling session termination. Current status: ${this._status}. Reason: ${reason}`,
    );
    this.updateStatus('terminated');
    this.updateStatus('disconnected');
    this.connectionGeneration++;
    this.deferredInFlight = 0;
    this.configurationDoneAcknowledged = false;
    this.emit('sessionEnded', { sessionId: this._sessionId, reason, error });
  }

  private request<R extends DebugProtocol.Response>(
    command: DapCommand,
  ): DAPRequestBuilder<R> {
    return new DAPRequestBuilder<R>(this, this._logger, command);
  }

  // --- Lifecycle ---

  /** Sends `initialize`, then waits for the target's `initialized` event. */
  public async initialize(
    args: Partial<DebugProtocol.InitializeRequestArguments> = {},
    token?: CancellationToken,
  ): Promise<DebugProtocol.Capabilities> {
    const cursor = this._eventLog.cursor;
    const response = await this.request<DebugProtocol.InitializeResponse>(
      'initialize',
    )
      .args({ ...DEFAULT_INITIALIZE_ARGUMENTS, ...args })
      .withCancellationToken(token)
      .send();
    this._capabilities = response.body ?? {};
    await this._eventLog.waitForEvent('initialized', {
      fromIndex: cursor,
      timeoutMs: this.commandTimeoutMs,
      token,
    });
    this.updateStatus('initialized');
    return this._capabilities;
  }

  private startDeferred<R extends DebugProtocol.Response>(
    command: 'launch' | 'attach',
    args: unknown,
    token?: CancellationToken,
  ): PendingHandshake<R> {
    let markIssued: () => void = noop;
    const issuedSignal = new Promise<void>((resolve) => {
      markIssued = resolve;
    });

    // Replies from a connection that has since ended leave the count alone.
    let issuedOn: number | undefined;
    const settle = (): boolean => {
      if (issuedOn !== this.connectionGeneration) {
        return false;
      }
      issuedOn = undefined;
      this.deferredInFlight--;
      return true;
    };
    this.configurationDoneAcknowledged = false;
    const sent = this.request<R>(command)
      .args(args)
      .withCancellationToken(token)
      .onIssued(() => {
        issuedOn = this.connectionGeneration;
        this.deferredInFlight++;
        this.updateStatus('configuring');
        markIssued();
      })
      .send();

    const response = sent.then(
      (result) => {
        if (settle()) {
          this.enterRunningIfConfigured();
        }
        return result;
      },
      (error: unknown) => {
        settle();
        throw error;
      },
    );
    const issuedOrFailed = Promise.race([issuedSignal, response.then(noop)]);
    // Callers that only want the response never look at `issued`.
    issuedOrFailed.catch(noop);
    return { issued: issuedOrFailed, response };
  }

  /**
   * Issues `launch`. The target answers only after `configurationDone`, so the
   * returned handshake exposes when the request was written.
   */
  public startLaunch(
    args: LaunchArguments,
    token?: CancellationToken,
  ): PendingHandshake<DebugProtocol.LaunchResponse> {
    return this.startDeferred<DebugProtocol.LaunchResponse>(
      'launch',
      args,
      token,
    );
  }

  public startAttach(
    args: AttachArguments,
    token?: CancellationToken,
  ): PendingHandshake<DebugProtocol.AttachResponse> {
    return this.startDeferred<DebugProtocol.AttachResponse>(
      'attach',
      args,
      token,
    );
  }

  public launch(
    args: LaunchArguments,
    token?: CancellationToken,
  ): Promise<DebugProtocol.LaunchResponse> {
    return this.startLaunch(args, token).response;
  }

  public attach(
    args: AttachArguments,
    token?: CancellationToken,
  ): Promise<DebugProtocol.AttachResponse> {
    return this.startAttach(args, token).response;
  }

  public async setBreakpoints(
    path: string,
    lines: number[],
    token?: CancellationToken,
  ): Promise<DebugProtocol.SetBreakpointsResponse['body']> {
    const args: DebugProtocol.SetBreakpointsArguments = {
      source: { path },
      breakpoints: lines.map((line) => ({ line })),
      lines,
      sourceModified: false,
    };
    const response =
      await this.request<DebugProtocol.SetBreakpointsResponse>('setBreakpoints')
        .args(args)
        .withCancellationToken(token)
        .send();
    return response.body ?? { breakpoints: [] };
  }

  public async configurationDone(
    token?: CancellationToken,
  ): Promise<DebugProtocol.ConfigurationDoneResponse> {
    const response =
      await this.request<DebugProtocol.ConfigurationDoneResponse>(
        'configurationDone',
      )
        .withCancellationToken(token)
        .send();
    this.configurationDoneAcknowledged = true;
    this.enterRunningIfConfigured();
    return response;
  }

  private enterRunningIfConfigured(): void {
    if (
      this._status === 'configuring' &&
      this.configurationDoneAcknowledged &&
      this.deferredInFlight === 0
    ) {
      this.updateStatus('running');
    }
  }

  // --- Execution control ---

  /** A `stopped` event may overtake the response; then the session stays paused. */
  private afterResume(cursor: number): void {
    if (
      this._status === 'paused' &&
      !this._eventLog.find('stopped', cursor)
    ) {
      this.updateStatus('running');
    }
  }

  public async continue(
    threadId: number,
    token?: CancellationToken,
  ): Promise<DebugProtocol.ContinueResponse['body']> {
    const cursor = this._eventLog.cursor;
    const response = await this.request<DebugProtocol.ContinueResponse>(
      'continue',
    )
      .args({ threadId })
      .withCancellationToken(token)
      .send();
    this.afterResume(cursor);
    return response.body ?? {};
  }

  public async next(threadId: number, token?: CancellationToken): Promise<void> {
    const cursor = this._eventLog.cursor;
    await this.request<DebugProtocol.NextResponse>('next')
      .args({ threadId })
      .withCancellationToken(token)
      .send();
    this.afterResume(cursor);
  }

  public async stepIn(
    threadId: number,
    token?: CancellationToken,
  ): Promise<void> {
    const cursor = this._eventLog.cursor;
    await this.request<DebugProtocol.StepInResponse>('stepIn')
      .args({ threadId })
      .withCancellationToken(token)
      .send();
    this.afterResume(cursor);
  }

  /**
   * Steps out of the current function.
   *
   * The Godot editor's debug adapter accepts `stepOut` but never answers it.
   * The request therefore runs under its own short deadline, and a timeout or
   * error response is reported as {@link UnsupportedCommandError}; the session
   * stays paused and usable.
   */
  public async stepOut(
    threadId: number,
    token?: CancellationToken,
  ): Promise<void> {
    const cursor = this._eventLog.cursor;
    try {
      await this.request<DebugProtocol.StepOutResponse>('stepOut')
        .args({ threadId })
        .timeout(this.stepOutTimeoutMs)
        .withCancellationToken(token)
        .send();
    } catch (error) {
      if (error instanceof TimeoutError || error instanceof RemoteError) {
        throw new UnsupportedCommandError(
          'stepOut',
          `The debugger target did not carry out "stepOut": ${error.message} ` +
            'Some targets do not implement it. Step with "next" until the function returns, ' +
            'or set a breakpoint in the caller and "continue".',
          error,
        );
      }
      throw error;
    }
    this.afterResume(cursor);
  }

  public async pause(
    threadId: number,
    token?: CancellationToken,
  ): Promise<void> {
    await this.request<DebugProtocol.PauseResponse>('pause')
      .args({ threadId })
      .withCancellationToken(token)
      .send();
    if (this._status === 'running') {
      this.updateStatus('paused');
    }
  }

  // --- Inspection ---

  public async threads(
    token?: CancellationToken,
  ): Promise<DebugProtocol.Thread[]> {
    const response = await this.request<DebugProtocol.ThreadsResponse>(
      'threads',
    )
      .withCancellationToken(token)
      .send();
    return response.body?.threads ?? [];
  }

  public async stackTrace(
    threadId: number,
    startFrame: number = 0,
    levels: number = 20,
    token?: CancellationToken,
  ): Promise<DebugProtocol.StackTraceResponse['body']> {
    const response = await this.request<DebugProtocol.StackTraceResponse>(
      'stackTrace',
    )
      .args({ threadId, startFrame, levels })
      .withCancellationToken(token)
      .send();
    return response.body ?? { stackFrames: [] };
  }

  public async scopes(
    frameId: number,
    token?: CancellationToken,
  ): Promise<DebugProtocol.Scope[]> {
    const response = await this.request<DebugProtocol.ScopesResponse>('scopes')
      .args({ frameId })
      .withCancellationToken(token)
      .send();
    return response.body?.scopes ?? [];
  }

  public async variables(
    variablesReference: number,
    token?: CancellationToken,
  ): Promise<DebugProtocol.Variable[]> {
    const response = await this.request<DebugProtocol.VariablesResponse>(
      'variables',
    )
      .args({ variablesReference })
      .withCancellationToken(token)
      .send();
    return response.body?.variables ?? [];
  }

  public async evaluate(
    expression: string,
    frameId?: number,
    context: string = 'repl',
    token?: CancellationToken,
  ): Promise<DebugProtocol.EvaluateResponse['body']> {
    const args: DebugProtocol.EvaluateArguments = {
      expression,
      frameId,
      context,
    };
    const response = await this.request<DebugProtocol.EvaluateResponse>(
      'evaluate',
    )
      .args(args)
      .withCancellationToken(token)
      .send();
    return response.body;
  }

  // --- Teardown ---

  /**
   * Fails every outstanding call with `ConnectionClosedError` at once, asks
   * the target to disconnect (bounded by a short deadline and bypassing the
   * single-flight gate), then closes the connection.
   */
  public async disconnect(terminateDebuggee: boolean = false): Promise<void> {
    if (!isCommandAllowed('disconnect', this._status)) {
      throw new StateError(
        'disconnect',
        this._status,
        COMMAND_ALLOWED_STATES.disconnect,
      );
    }
    const aborted = this._protocolClient.abortPending('Session disconnecting');
    if (aborted > 0) {
      this._logger.info(`Aborted ${aborted} pending request(s) on disconnect.`);
    }
    this.updateStatus('terminated');

    const args: DebugProtocol.DisconnectArguments = { terminateDebuggee };
    try {
      await this._protocolClient.sendRequest('disconnect', args, {
        timeoutMs: this.disconnectTimeoutMs,
      });
    } catch (error) {
      this._logger.warn(
        `No clean disconnect acknowledgement: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    this._protocolClient.dispose('Session disconnected');
    // A client that was never connected emits nothing on dispose.
    this.handleSessionTermination('Session disconnected');
  }
}
