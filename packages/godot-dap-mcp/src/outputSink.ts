import type { Writable } from 'stream';
import type { LoggerInterface } from 'dap-session-client';

/**
 * Serializes writes of newline-delimited JSON messages to one stream. A
 * message is written with a single `write` call and the next one starts only
 * after it was accepted (or drained), so concurrent replies never interleave.
 */
export class OutputSink {
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly output: Writable,
    private readonly logger: LoggerInterface,
  ) {}

  public write(message: object): Promise<void> {
    const line = `${JSON.stringify(message)}\n`;
    const written = this.tail.then(() => this.writeLine(line));
    // A failed write rejects its own caller; the next write still runs.
    this.tail = written.catch(() => undefined);
    return written;
  }

  /** Resolves once every queued write has finished. */
  public flush(): Promise<void> {
    return this.tail;
  }

  private writeLine(line: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.output.destroyed || this.output.writableEnded) {
        reject(new Error('Output stream is closed'));
        return;
      }
      const accepted = this.output.write(line, (error) => {
        if (error) {
          this.logger.error({ err: error }, 'Failed to write message');
          reject(error);
        }
      });
      if (accepted) {
        resolve();
      } else {
        this.output.once('drain', () => resolve());
      }
    });
  }
}
