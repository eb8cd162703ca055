import { EventEmitter } from 'events';

export interface Disposable {
  dispose(): void;
}

export interface Event<T> {
  (listener: (e: T) => void): Disposable;
}

export class Emitter<T> {
  private eventEmitter = new EventEmitter();
  private _event?: Event<T>;

  get event(): Event<T> {
    if (!this._event) {
      this._event = (listener: (e: T) => void) => {
        this.eventEmitter.on('event', listener);
        return {
          dispose: () => this.eventEmitter.removeListener('event', listener),
        };
      };
    }
    return this._event;
  }

  fire(data: T): void {
    this.eventEmitter.emit('event', data);
  }

  dispose(): void {
    this.eventEmitter.removeAllListeners();
  }
}

/**
 * Passed to a pending call so its owner can abandon it without tearing the
 * connection down.
 */
export interface CancellationToken {
  readonly isCancellationRequested: boolean;
  /** Fires once. Listeners added after cancellation run on the next tick. */
  readonly onCancellationRequested: Event<void>;
}

const alreadyCancelledEvent: Event<void> = (listener) => {
  const handle = setTimeout(() => listener(undefined), 0);
  return {
    dispose(): void {
      clearTimeout(handle);
    },
  };
};

class MutableToken implements CancellationToken {
  public isCancellationRequested = false;
  private emitter?: Emitter<void>;

  get onCancellationRequested(): Event<void> {
    if (this.isCancellationRequested) {
      return alreadyCancelledEvent;
    }
    if (!this.emitter) {
      this.emitter = new Emitter<void>();
    }
    return this.emitter.event;
  }

  cancel(): void {
    if (this.isCancellationRequested) {
      return;
    }
    this.isCancellationRequested = true;
    if (this.emitter) {
      this.emitter.fire(undefined);
      this.dispose();
    }
  }

  dispose(): void {
    if (this.emitter) {
      this.emitter.dispose();
      this.emitter = undefined;
    }
  }
}

export class CancellationTokenSource {
  private readonly _token = new MutableToken();

  get token(): CancellationToken {
    return this._token;
  }

  cancel(): void {
    this._token.cancel();
  }

  dispose(): void {
    this._token.dispose();
  }
}

/**
 * Bridges an `AbortSignal` (what the MCP request handlers receive) to a token.
 */
export function tokenFromAbortSignal(signal: AbortSignal): CancellationToken {
  const source = new CancellationTokenSource();
  if (signal.aborted) {
    source.cancel();
  } else {
    signal.addEventListener('abort', () => source.cancel(), { once: true });
  }
  return source.token;
}

export class CancellationError extends Error {
  constructor(message: string = 'Operation Canceled') {
    super(message);
    this.name = 'CancellationError';
    Object.setPrototypeOf(this, CancellationError.prototype);
  }
}
