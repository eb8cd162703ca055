import type { Readable, Writable } from 'stream';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  ErrorCode,
  JSONRPCMessage,
  JSONRPCMessageSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { LoggerInterface } from 'dap-session-client';
import { OutputSink } from './outputSink';

function requestIdOf(value: unknown): string | number | null {
  if (typeof value !== 'object' || value === null) {
    return null;
  }
  const id: unknown = Reflect.get(value, 'id');
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}

/**
 * MCP transport over newline-delimited JSON. Every parsed message is handed
 * to the protocol layer as soon as its line is complete; the layer answers
 * requests on their own tasks, so reading never waits for a handler. Replies
 * go through an {@link OutputSink}.
 */
export class LineTransport implements Transport {
  public onclose?: () => void;
  public onerror?: (error: Error) => void;
  public onmessage?: (message: JSONRPCMessage) => void;

  private buffer: Buffer = Buffer.alloc(0);
  private started = false;
  private closed = false;
  private readonly sink: OutputSink;

  constructor(
    private readonly input: Readable,
    output: Writable,
    private readonly logger: LoggerInterface,
  ) {
    this.sink = new OutputSink(output, logger);
  }

  public async start(): Promise<void> {
    if (this.started) {
      throw new Error('LineTransport already started');
    }
    this.started = true;
    this.input.on('data', this.onData);
    this.input.on('end', this.onEnd);
    this.input.on('error', this.onInputError);
  }

  public send(message: JSONRPCMessage): Promise<void> {
    return this.sink.write(message);
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.input.off('data', this.onData);
    this.input.off('end', this.onEnd);
    this.input.off('error', this.onInputError);
    await this.sink.flush();
    this.onclose?.();
  }

  private readonly onData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    this.buffer = Buffer.concat([this.buffer, bytes]);
    let newline = this.buffer.indexOf(0x0a);
    while (newline !== -1) {
      const line = this.buffer.subarray(0, newline).toString('utf8');
      this.buffer = this.buffer.subarray(newline + 1);
      this.handleLine(line);
      newline = this.buffer.indexOf(0x0a);
    }
  };

  private readonly onEnd = (): void => {
    if (this.buffer.length > 0) {
      const rest = this.buffer.toString('utf8');
      this.buffer = Buffer.alloc(0);
      this.handleLine(rest);
    }
    this.logger.info('Input ended');
    this.close().catch((error: unknown) =>
      this.logger.error({ err: error }, 'Failed to close transport'),
    );
  };

  private readonly onInputError = (error: Error): void => {
    this.logger.error({ err: error }, 'Input stream error');
    this.onerror?.(error);
  };

  private handleLine(raw: string): void {
    const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
    if (line.trim() === '') {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      this.logger.warn(
        `Unparseable input line: ${error instanceof Error ? error.message : String(error)}`,
      );
      this.reply({
        jsonrpc: '2.0',
        id: null,
        error: { code: ErrorCode.ParseError, message: 'Parse error' },
      });
      return;
    }

    const result = JSONRPCMessageSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn(`Not a JSON-RPC message: ${result.error.message}`);
      this.reply({
        jsonrpc: '2.0',
        id: requestIdOf(parsed),
        error: { code: ErrorCode.InvalidRequest, message: 'Invalid Request' },
      });
      return;
    }
    this.onmessage?.(result.data);
  }

  private reply(message: object): void {
    this.sink.write(message).catch((error: unknown) => {
      this.onerror?.(error instanceof Error ? error : new Error(String(error)));
    });
  }
}
