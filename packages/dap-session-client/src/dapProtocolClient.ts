import { EventEmitter } from 'events';
import * as stream from 'stream';
import type { DebugProtocol } from '@vscode/debugprotocol';
import { LoggerInterface, componentLogger } from './logging';
import { DecodedFrame, MessageDecoder, encodeMessage } from './wireCodec';
import { SequenceAllocator } from './sequenceAllocator';
import { HANDSHAKE_COMMANDS } from './sessionState';
import {
  ConnectionClosedError,
  FramingError,
  ProtocolError,
  RemoteError,
  TimeoutError,
} from './errors';
import {
  CancellationError,
  CancellationToken,
  Disposable,
} from './common/cancellation';

export const DEFAULT_COMMAND_TIMEOUT_MS = 30000;

/** Event names the client emits itself; DAP events with these names only go out as `dapEvent`. */
const RESERVED_EVENT_NAMES: ReadonlySet<string> = new Set([
  'error',
  'connected',
  'disconnected',
  'dapEvent',
  'protocolError',
  'newListener',
  'removeListener',
]);

interface PendingCall {
  seq: number;
  command: string;
  request: DebugProtocol.Request;
  resolve: (response: DebugProtocol.Response) => void;
  reject: (error: Error) => void;
  timeoutTimer?: NodeJS.Timeout;
  cancellation?: Disposable;
}

export interface SendRequestOptions {
  /** 0 disables the deadline. */
  timeoutMs?: number;
  token?: CancellationToken;
}

export interface IDAPProtocolClient extends EventEmitter {
  sendRequest<R extends DebugProtocol.Response>(
    command: string,
    args?: unknown,
    options?: SendRequestOptions,
  ): Promise<R>;
  connect(readable: stream.Readable, writable: stream.Writable): void;
  abortPending(reason: string): number;
  dispose(reason?: string): void;
  isConnected(): boolean;
  readonly pendingCount: number;
}

function isResponse(
  message: DebugProtocol.ProtocolMessage,
): message is DebugProtocol.Response {
  return (
    message.type === 'response' &&
    'request_seq' in message &&
    typeof message.request_seq === 'number' &&
    'command' in message &&
    typeof message.command === 'string' &&
    'success' in message &&
    typeof message.success === 'boolean'
  );
}

function isEvent(
  message: DebugProtocol.ProtocolMessage,
): message is DebugProtocol.Event {
  return (
    message.type === 'event' &&
    'event' in message &&
    typeof message.event === 'string'
  );
}

/**
 * Owns one DAP connection: writes framed requests, and demultiplexes the
 * incoming frame stream into responses (delivered to the matching pending
 * call) and events (re-emitted in arrival order).
 *
 * Emits `dapEvent` for every event and the event's own name unless it clashes
 * with one of the client's events, `protocolError` for dropped frames,
 * `connected` and `disconnected(reason, error?)`.
 */
export class DAPProtocolClient
  extends EventEmitter
  implements IDAPProtocolClient
{
  private connected = false;
  private readonly sequence = new SequenceAllocator();
  private readonly pendingRequests = new Map<number, PendingCall>();
  private readonly decoder = new MessageDecoder();
  private readableStream: stream.Readable | null = null;
  private writableStream: stream.Writable | null = null;
  private readonly logger: LoggerInterface;

  constructor(
    logger: LoggerInterface,
    private readonly defaultTimeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS,
  ) {
    super();
    this.logger = componentLogger(logger, 'DAPProtocolClient');
  }

  public connect(readable: stream.Readable, writable: stream.Writable): void {
    if (this.connected) {
      this.logger.warn('Already connected. Ignoring connect call.');
      return;
    }

    this.readableStream = readable;
    this.writableStream = writable;

    readable.on('data', (data: Buffer | string) => {
      this.handleData(typeof data === 'string' ? Buffer.from(data) : data);
    });
    readable.on('end', () => this.handleDisconnect('Readable stream ended'));
    readable.on('close', () => this.handleDisconnect('Readable stream closed'));
    readable.on('error', (error: Error) => {
      this.logger.error({ err: error }, 'Readable stream error.');
      this.handleDisconnect(`Readable stream error: ${error.message}`, error);
    });
    writable.on('error', (error: Error) => {
      this.logger.error({ err: error }, 'Writable stream error.');
      this.handleDisconnect(`Writable stream error: ${error.message}`, error);
    });

    this.connected = true;
    this.logger.info('Connected to DAP server.');
    this.emit('connected');
  }

  public isConnected(): boolean {
    return this.connected;
  }

  get pendingCount(): number {
    return this.pendingRequests.size;
  }

  public sendRequest<R extends DebugProtocol.Response>(
    command: string,
    args?: unknown,
    options: SendRequestOptions = {},
  ): Promise<R> {
    const writable = this.writableStream;
    if (!this.connected || !writable || writable.destroyed) {
      return Promise.reject(
        new ConnectionClosedError(
          `Cannot send request "${command}": not connected.`,
        ),
      );
    }
    if (options.token?.isCancellationRequested) {
      return Promise.reject(
        new CancellationError(`Request "${command}" was cancelled.`),
      );
    }

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const seq = this.sequence.next();
    const request: DebugProtocol.Request = {
      seq,
      type: 'request',
      command,
      arguments: args,
    };

    return new Promise<R>((resolve, reject) => {
      const pending: PendingCall = {
        seq,
        command,
        request,
        resolve: resolve as (response: DebugProtocol.Response) => void,
        reject,
      };
      if (timeoutMs > 0) {
        pending.timeoutTimer = setTimeout(
          () => this.expire(seq, timeoutMs),
          timeoutMs,
        );
      }
      if (options.token) {
        pending.cancellation = options.token.onCancellationRequested(() =>
          this.abandon(seq),
        );
      }
      this.pendingRequests.set(seq, pending);

      this.logger.debug({ dapRequest: request, timeoutMs }, 'Sending DAP request');
      try {
        writable.write(encodeMessage(request));
      } catch (e) {
        const error = e instanceof Error ? e : new Error(String(e));
        this.logger.error(
          { err: error, dapRequest: request },
          `Error writing to writable stream: ${error.message}`,
        );
        this.handleDisconnect(`Error writing to stream: ${error.message}`, error);
      }
    });
  }

  private takePending(seq: number): PendingCall | undefined {
    const pending = this.pendingRequests.get(seq);
    if (!pending) {
      return undefined;
    }
    this.pendingRequests.delete(seq);
    if (pending.timeoutTimer) {
      clearTimeout(pending.timeoutTimer);
    }
    pending.cancellation?.dispose();
    return pending;
  }

  private expire(seq: number, timeoutMs: number): void {
    const pending = this.takePending(seq);
    if (!pending) {
      return;
    }
    const error = new TimeoutError(pending.command, timeoutMs, seq);
    this.logger.warn({ command: pending.command, seq, timeoutMs }, error.message);
    pending.reject(error);
  }

  private abandon(seq: number): void {
    const pending = this.takePending(seq);
    if (!pending) {
      return;
    }
    this.logger.info(
      `Request ${pending.command} (seq: ${seq}) cancelled by caller.`,
    );
    pending.reject(
      new CancellationError(`Request "${pending.command}" was cancelled.`),
    );
  }

  private handleData(data: Buffer): void {
    this.logger.trace(`Received data chunk of ${data.length} bytes`);
    let frames: DecodedFrame[];
    try {
      frames = this.decoder.push(data);
    } catch (e) {
      if (e instanceof FramingError) {
        this.logger.error({ header: e.header }, e.message);
        this.handleDisconnect(`Framing error: ${e.message}`, e);
        return;
      }
      throw e;
    }

    for (const frame of frames) {
      if (!this.connected) {
        return;
      }
      if (frame.kind === 'malformed') {
        this.reportProtocolError(frame.error, { rawMessage: frame.raw });
        continue;
      }
      this.handleMessage(frame.message);
    }
  }

  private reportProtocolError(error: ProtocolError, details: object): void {
    this.logger.warn(details, error.message);
    this.emit('protocolError', error);
  }

  private handleMessage(message: DebugProtocol.ProtocolMessage): void {
    this.logger.debug({ dapMessage: message }, 'Received DAP message');

    if (isResponse(message)) {
      this.handleResponse(message);
    } else if (isEvent(message)) {
      if (!RESERVED_EVENT_NAMES.has(message.event)) {
        this.emit(message.event, message);
      }
      this.emit('dapEvent', message);
    } else {
      this.reportProtocolError(
        new ProtocolError(
          `Received unhandled DAP message type: ${message.type}`,
          message,
        ),
        { dapMessage: message },
      );
    }
  }

  private findPendingHandshakeCall(command: string): PendingCall | undefined {
    if (!HANDSHAKE_COMMANDS.has(command)) {
      return undefined;
    }
    for (const pending of this.pendingRequests.values()) {
      if (pending.command === command) {
        return pending;
      }
    }
    return undefined;
  }

  private handleResponse(response: DebugProtocol.Response): void {
    let match = this.pendingRequests.get(response.request_seq);
    if (match && match.command !== response.command) {
      this.reportProtocolError(
        new ProtocolError(
          `Response for request_seq ${response.request_seq} names command "${response.command}" but "${match.command}" was sent.`,
          response,
        ),
        { dapResponse: response },
      );
      return;
    }
    if (!match) {
      match = this.findPendingHandshakeCall(response.command);
    }
    if (!match) {
      this.reportProtocolError(
        new ProtocolError(
          `Received response for unknown request_seq: ${response.request_seq} (${response.command})`,
          response,
        ),
        { dapResponse: response },
      );
      return;
    }

    const pending = this.takePending(match.seq);
    if (!pending) {
      return;
    }
    if (response.success) {
      this.logger.trace(`Resolving request seq: ${pending.seq}`);
      pending.resolve(response);
      return;
    }

    const errorMessage =
      response.message ||
      `Request ${pending.seq} (${pending.command}) failed.`;
    this.logger.warn(
      { dapResponse: response, request: pending.request },
      `Rejecting request seq: ${pending.seq} - ${errorMessage}`,
    );
    pending.reject(new RemoteError(errorMessage, pending.request, response));
  }

  private disposeStream(
    streamInstance: stream.Readable | stream.Writable | null,
  ): void {
    if (!streamInstance) {
      return;
    }
    streamInstance.removeAllListeners('data');
    streamInstance.removeAllListeners('end');
    streamInstance.removeAllListeners('close');
    streamInstance.removeAllListeners('error');
    // Late socket errors after teardown must not crash the process.
    streamInstance.on('error', () => undefined);
    streamInstance.destroy();
  }

  private handleDisconnect(reason: string, error?: Error): void {
    if (!this.connected) {
      return;
    }
    this.connected = false;
    this.logger.info(`Disconnected from DAP server. Reason: ${reason}`);

    const readable = this.readableStream;
    const writable = this.writableStream;
    this.readableStream = null;
    this.writableStream = null;
    this.disposeStream(readable);
    if (writable !== readable) {
      this.disposeStream(writable);
    }

    this.abortPending(`Disconnected: ${reason}`);

    this.emit('disconnected', reason, error);
    this.removeAllListeners();
  }

  /**
   * Fails every outstanding call with {@link ConnectionClosedError} without
   * closing the streams. Returns how many calls were aborted.
   */
  public abortPending(reason: string): number {
    const seqs = Array.from(this.pendingRequests.keys());
    for (const seq of seqs) {
      const pending = this.takePending(seq);
      if (!pending) {
        continue;
      }
      const closed = new ConnectionClosedError(
        `${reason}. Request ${pending.command} (seq: ${seq}) aborted.`,
        reason,
      );
      this.logger.warn({ request: pending.request, seq }, closed.message);
      pending.reject(closed);
    }
    return seqs.length;
  }

  public dispose(reason: string = 'Client disposed'): void {
    this.handleDisconnect(reason);
  }
}
