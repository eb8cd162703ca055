/**
 * @file Debug Session
 *
 * High-level API over one DAP connection: open the TCP socket, run the
 * initialize handshake, and drive launch/attach together with the
 * breakpoint configuration the debugger expects in between.
 *
 * @module dap-session-client/debugSession
 */

import * as net from 'net';
import type { DebugProtocol } from '@vscode/debugprotocol';
import { DAPProtocolClient, DEFAULT_COMMAND_TIMEOUT_MS } from './dapProtocolClient';
import {
  AttachArguments,
  DAPSessionHandler,
  DAPSessionHandlerOptions,
  LaunchArguments,
  PendingHandshake,
} from './dapSessionHandler';
import { LoggerInterface, componentLogger } from './logging';
import { CancellationToken } from './common/cancellation';
import { ConnectionClosedError, StateError, TimeoutError } from './errors';
import type { SessionState } from './sessionState';
import type { SessionEventLog } from './sessionEventLog';

export const DEFAULT_DAP_HOST = '127.0.0.1';
export const DEFAULT_DAP_PORT = 6006;
export const DEFAULT_CONNECT_TIMEOUT_MS = 10000;
export { DEFAULT_COMMAND_TIMEOUT_MS };

export interface DebugSessionOptions extends DAPSessionHandlerOptions {
  connectTimeoutMs?: number;
  /** Project directory that `res://` paths resolve against. */
  projectRoot?: string;
}

/** Breakpoint lines for one source file. Sending it replaces the file's breakpoints. */
export interface BreakpointPlan {
  path: string;
  lines: number[];
}

export interface SourceBreakpoints {
  path: string;
  breakpoints: DebugProtocol.Breakpoint[];
}

export interface HandshakeResult<R extends DebugProtocol.Response> {
  response: R;
  configurationDone: DebugProtocol.ConfigurationDoneResponse;
  breakpoints: SourceBreakpoints[];
}

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

/** Attaches handlers right away so a rejection while we wait elsewhere is not reported as unhandled. */
function settle<T>(promise: Promise<T>): Promise<Settled<T>> {
  return promise.then(
    (value): Settled<T> => ({ ok: true, value }),
    (error: unknown): Settled<T> => ({ ok: false, error }),
  );
}

function openSocket(
  host: string,
  port: number,
  timeoutMs: number,
): Promise<net.Socket> {
  return new Promise<net.Socket>((resolve, reject) => {
    const socket = net.createConnection({ host, port });
    const onError = (error: Error): void => {
      clearTimeout(timer);
      reject(
        new ConnectionClosedError(
          `Failed to connect to ${host}:${port}: ${error.message}`,
          error.message,
        ),
      );
    };
    const timer = setTimeout(() => {
      socket.removeListener('error', onError);
      socket.on('error', () => undefined);
      socket.destroy();
      reject(new TimeoutError(`connect to ${host}:${port}`, timeoutMs));
    }, timeoutMs);
    socket.once('error', onError);
    socket.once('connect', () => {
      clearTimeout(timer);
      socket.removeListener('error', onError);
      socket.setNoDelay(true);
      resolve(socket);
    });
  });
}

/**
 * One debugging session against a DAP server reachable over TCP, typically
 * the Godot editor on port 6006.
 */
export class DebugSession {
  public readonly client: DAPSessionHandler;
  private readonly logger: LoggerInterface;
  private readonly connectTimeoutMs: number;
  private _projectRoot?: string;

  constructor(logger: LoggerInterface, options: DebugSessionOptions = {}) {
    this.logger = componentLogger(logger, 'DebugSession');
    this.connectTimeoutMs =
      options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this._projectRoot = options.projectRoot;
    const protocolClient = new DAPProtocolClient(
      logger,
      options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS,
    );
    this.client = new DAPSessionHandler(protocolClient, logger, options);
  }

  get projectRoot(): string | undefined {
    return this._projectRoot;
  }

  set projectRoot(root: string | undefined) {
    this._projectRoot = root;
  }

  get events(): SessionEventLog {
    return this.client.events;
  }

  public getState(): SessionState {
    return this.client.status;
  }

  public getLastStopReason(): string | undefined {
    return this.client.lastStopReason;
  }

  public getCapabilities(): DebugProtocol.Capabilities {
    return this.client.capabilities;
  }

  /**
   * Opens the TCP connection. Fails with `ConnectionClosedError` when the
   * server refuses and `TimeoutError` when it does not answer in time.
   */
  public async connect(
    host: string = DEFAULT_DAP_HOST,
    port: number = DEFAULT_DAP_PORT,
  ): Promise<void> {
    const state = this.client.status;
    if (state !== 'disconnected') {
      throw new StateError('connect', state, ['disconnected']);
    }
    this.logger.info(`Connecting to DAP server at ${host}:${port}`);
    const socket = await openSocket(host, port, this.connectTimeoutMs);
    this.client.attachTransport(socket, socket);
  }

  public initialize(
    args: Partial<DebugProtocol.InitializeRequestArguments> = {},
    token?: CancellationToken,
  ): Promise<DebugProtocol.Capabilities> {
    return this.client.initialize(args, token);
  }

  /**
   * Launch, then `setBreakpoints` for every planned file, then
   * `configurationDone`. The debugger answers `launch` only after
   * `configurationDone`, so the launch is left outstanding while the rest
   * runs.
   */
  public launchAndConfigure(
    args: LaunchArguments,
    breakpoints: BreakpointPlan[] = [],
    token?: CancellationToken,
  ): Promise<HandshakeResult<DebugProtocol.LaunchResponse>> {
    return this.runHandshake(
      this.client.startLaunch(args, token),
      breakpoints,
      token,
    );
  }

  public attachAndConfigure(
    args: AttachArguments = {},
    breakpoints: BreakpointPlan[] = [],
    token?: CancellationToken,
  ): Promise<HandshakeResult<DebugProtocol.AttachResponse>> {
    return this.runHandshake(
      this.client.startAttach(args, token),
      breakpoints,
      token,
    );
  }

  private async runHandshake<R extends DebugProtocol.Response>(
    pending: PendingHandshake<R>,
    breakpoints: BreakpointPlan[],
    token?: CancellationToken,
  ): Promise<HandshakeResult<R>> {
    const deferred = settle(pending.response);
    await pending.issued;

    const applied: SourceBreakpoints[] = [];
    for (const plan of breakpoints) {
      const body = await this.client.setBreakpoints(
        plan.path,
        plan.lines,
        token,
      );
      applied.push({ path: plan.path, breakpoints: body.breakpoints });
    }

    const [configured, started] = await Promise.all([
      settle(this.client.configurationDone(token)),
      deferred,
    ]);
    if (!configured.ok) {
      throw configured.error;
    }
    if (!started.ok) {
      throw started.error;
    }
    return {
      response: started.value,
      configurationDone: configured.value,
      breakpoints: applied,
    };
  }

  public disconnect(terminateDebuggee: boolean = false): Promise<void> {
    return this.client.disconnect(terminateDebuggee);
  }
}
