import type { DebugProtocol } from '@vscode/debugprotocol';
import { FramingError, ProtocolError } from './errors';

const TWO_CRLF = '\r\n\r\n';
const CONTENT_LENGTH = 'content-length';

export const MAX_CONTENT_LENGTH = 50 * 1024 * 1024; // 50 MB
const MAX_HEADER_SIZE = 8 * 1024;

export type DecodedFrame =
  | { kind: 'message'; message: DebugProtocol.ProtocolMessage }
  | { kind: 'malformed'; error: ProtocolError; raw: string };

export function encodeMessage(message: object): Buffer {
  const payload = Buffer.from(JSON.stringify(message), 'utf8');
  const header = Buffer.from(
    `Content-Length: ${payload.length}${TWO_CRLF}`,
    'ascii',
  );
  return Buffer.concat([header, payload]);
}

function isProtocolMessage(
  value: unknown,
): value is DebugProtocol.ProtocolMessage {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    'type' in value &&
    typeof value.type === 'string'
  );
}

function parseContentLength(headerBlock: string): number {
  let value: string | undefined;
  for (const line of headerBlock.split('\r\n')) {
    const separator = line.indexOf(':');
    if (separator === -1) {
      continue;
    }
    const name = line.slice(0, separator).trim().toLowerCase();
    if (name === CONTENT_LENGTH) {
      value = line.slice(separator + 1).trim();
    }
  }

  if (value === undefined) {
    throw new FramingError('Missing Content-Length header.', headerBlock);
  }
  if (!/^\d+$/.test(value)) {
    throw new FramingError(`Invalid Content-Length: ${value}`, headerBlock);
  }
  const length = Number(value);
  if (length > MAX_CONTENT_LENGTH) {
    throw new FramingError(
      `Content-Length ${length} exceeds maximum ${MAX_CONTENT_LENGTH}.`,
      headerBlock,
    );
  }
  return length;
}

/**
 * Incremental decoder for `Content-Length` framed JSON.
 *
 * `push` throws {@link FramingError} when a header block cannot be trusted;
 * after that the byte stream is out of sync and the decoder must be dropped.
 * A body that is not a JSON protocol message only yields a `malformed` frame:
 * its length was known, so the next frame is still found.
 */
export class MessageDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  public push(chunk: Buffer): DecodedFrame[] {
    this.buffer =
      this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    const frames: DecodedFrame[] = [];
    for (;;) {
      const headerIndex = this.buffer.indexOf(TWO_CRLF);
      if (headerIndex === -1) {
        if (this.buffer.length > MAX_HEADER_SIZE) {
          throw new FramingError(
            `No header terminator within ${MAX_HEADER_SIZE} bytes.`,
          );
        }
        break;
      }

      const contentLength = parseContentLength(
        this.buffer.toString('ascii', 0, headerIndex),
      );
      const bodyStart = headerIndex + TWO_CRLF.length;
      if (this.buffer.length < bodyStart + contentLength) {
        break;
      }

      const raw = this.buffer.toString(
        'utf8',
        bodyStart,
        bodyStart + contentLength,
      );
      this.buffer = this.buffer.subarray(bodyStart + contentLength);
      frames.push(this.decodeBody(raw));
    }
    return frames;
  }

  public get bufferedBytes(): number {
    return this.buffer.length;
  }

  private decodeBody(raw: string): DecodedFrame {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      return {
        kind: 'malformed',
        error: new ProtocolError(`Error parsing DAP message JSON: ${reason}`),
        raw,
      };
    }
    if (!isProtocolMessage(parsed)) {
      return {
        kind: 'malformed',
        error: new ProtocolError(
          'Received malformed DAP message: missing or invalid type.',
          parsed,
        ),
        raw,
      };
    }
    return { kind: 'message', message: parsed };
  }
}
