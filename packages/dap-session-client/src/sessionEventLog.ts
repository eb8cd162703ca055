import { EventEmitter } from 'events';
import type { DebugProtocol } from '@vscode/debugprotocol';
import { LoggerInterface, componentLogger } from './logging';
import { TimeoutError } from './errors';
import { CancellationError, CancellationToken } from './common/cancellation';

export const DEFAULT_MAX_EVENT_RECORDS = 1000;

export interface RecordedEvent {
  /** Position in the log; keeps counting after old records are dropped. */
  index: number;
  receivedAt: Date;
  event: DebugProtocol.Event;
}

export interface WaitForEventOptions {
  timeoutMs: number;
  /** Only records at or after this index count. Defaults to "from now on". */
  fromIndex?: number;
  predicate?: (event: DebugProtocol.Event) => boolean;
  token?: CancellationToken;
}

function readStringField(body: unknown, field: string): string | undefined {
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(body, field);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Append-only record of the events a session has received, in wire order,
 * plus the reason of the latest `stopped` event. Stop reasons are kept as
 * plain strings: targets add reasons beyond the ones DAP lists.
 */
export class SessionEventLog extends EventEmitter {
  private readonly records: RecordedEvent[] = [];
  private nextIndex = 0;
  private _lastStopReason?: string;
  private readonly logger: LoggerInterface;

  constructor(
    logger: LoggerInterface,
    private readonly maxRecords: number = DEFAULT_MAX_EVENT_RECORDS,
  ) {
    super();
    this.logger = componentLogger(logger, 'SessionEventLog');
  }

  public record(event: DebugProtocol.Event): RecordedEvent {
    const entry: RecordedEvent = {
      index: this.nextIndex++,
      receivedAt: new Date(),
      event,
    };
    this.records.push(entry);
    if (this.records.length > this.maxRecords) {
      const dropped = this.records.shift();
      this.logger.warn(
        `Event log full. Dropped oldest event #${dropped?.index} (${dropped?.event.event})`,
      );
    }
    if (event.event === 'stopped') {
      this._lastStopReason = readStringField(event.body, 'reason') ?? 'unknown';
    }
    this.emit('recorded', entry);
    return entry;
  }

  get lastStopReason(): string | undefined {
    return this._lastStopReason;
  }

  /** Index the next recorded event will get. */
  get cursor(): number {
    return this.nextIndex;
  }

  get size(): number {
    return this.records.length;
  }

  public find(
    name: string,
    fromIndex: number = 0,
    predicate?: (event: DebugProtocol.Event) => boolean,
  ): RecordedEvent | undefined {
    return this.records.find(
      (entry) =>
        entry.index >= fromIndex &&
        entry.event.event === name &&
        (!predicate || predicate(entry.event)),
    );
  }

  public waitForEvent(
    name: string,
    options: WaitForEventOptions,
  ): Promise<DebugProtocol.Event> {
    const fromIndex = options.fromIndex ?? this.nextIndex;
    const existing = this.find(name, fromIndex, options.predicate);
    if (existing) {
      return Promise.resolve(existing.event);
    }

    return new Promise<DebugProtocol.Event>((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer);
        cancellation?.dispose();
        this.removeListener('recorded', onRecorded);
      };
      const onRecorded = (entry: RecordedEvent): void => {
        if (
          entry.event.event === name &&
          (!options.predicate || options.predicate(entry.event))
        ) {
          cleanup();
          resolve(entry.event);
        }
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new TimeoutError(`event "${name}"`, options.timeoutMs));
      }, options.timeoutMs);
      const cancellation = options.token?.onCancellationRequested(() => {
        cleanup();
        reject(new CancellationError(`Waiting for event "${name}" cancelled.`));
      });
      this.on('recorded', onRecorded);
    });
  }
}
