/**
 * Cancellation Tokens
 *
 * Cooperative cancellation for turns, model calls and tool-server reads,
 * after the .NET CancellationToken pattern.
 *
 * Usage:
 *   const cts = createCancellationTokenSource();
 *   const answer = engine.respond('Who am I?', { token: cts.token });
 *   // Later: cts.cancel('User pressed Ctrl+C');
 */

import { CancellationError } from '../errors/index.js';

// =============================================================================
// TYPES
// =============================================================================

export interface CancellationToken {
  readonly isCancellationRequested: boolean;
  readonly cancellationReason?: string;
  /** Resolves with the reason once cancelled; never rejects */
  readonly onCancellationRequested: Promise<string | undefined>;
  /** Register a callback; runs immediately when already cancelled */
  register(callback: (reason?: string) => void): Disposable;
  throwIfCancellationRequested(): void;
}

export interface Disposable {
  dispose(): void;
}

export interface CancellationTokenSource {
  readonly token: CancellationToken;
  readonly isCancellationRequested: boolean;
  cancel(reason?: string): void;
  /** Cancel after a delay; the timer is cleared on dispose */
  cancelAfter(ms: number, reason?: string): this;
  dispose(): void;
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

class CancellationTokenImpl implements CancellationToken {
  private cancelled = false;
  private reason?: string;
  private callbacks = new Set<(reason?: string) => void>();
  private readonly promise: Promise<string | undefined>;
  private resolvePromise: (reason: string | undefined) => void = () => undefined;

  constructor() {
    this.promise = new Promise((resolve) => {
      this.resolvePromise = resolve;
    });
  }

  get isCancellationRequested(): boolean {
    return this.cancelled;
  }

  get cancellationReason(): string | undefined {
    return this.reason;
  }

  get onCancellationRequested(): Promise<string | undefined> {
    return this.promise;
  }

  register(callback: (reason?: string) => void): Disposable {
    if (this.cancelled) {
      callback(this.reason);
      return { dispose: () => undefined };
    }
    this.callbacks.add(callback);
    return { dispose: () => this.callbacks.delete(callback) };
  }

  throwIfCancellationRequested(): void {
    if (this.cancelled) {
      throw new CancellationError(this.reason);
    }
  }

  /** @internal */
  cancel(reason?: string): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.reason = reason;
    this.resolvePromise(reason);
    const callbacks = [...this.callbacks];
    this.callbacks.clear();
    for (const cb of callbacks) {
      cb(reason);
    }
  }
}

class CancellationTokenSourceImpl implements CancellationTokenSource {
  private readonly tokenImpl = new CancellationTokenImpl();
  private timeoutId?: ReturnType<typeof setTimeout>;
  private disposed = false;

  get token(): CancellationToken {
    return this.tokenImpl;
  }

  get isCancellationRequested(): boolean {
    return this.tokenImpl.isCancellationRequested;
  }

  cancel(reason?: string): void {
    if (this.disposed) return;
    this.tokenImpl.cancel(reason);
  }

  cancelAfter(ms: number, reason = 'Operation timed out'): this {
    if (this.disposed || this.tokenImpl.isCancellationRequested) return this;
    this.timeoutId = setTimeout(() => this.cancel(reason), ms);
    return this;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    if (this.timeoutId) {
      clearTimeout(this.timeoutId);
      this.timeoutId = undefined;
    }
  }
}

// =============================================================================
// FACTORY FUNCTIONS
// =============================================================================

export function createCancellationTokenSource(): CancellationTokenSource {
  return new CancellationTokenSourceImpl();
}

/**
 * Token source that cancels itself after `ms`.
 */
export function createTimeoutToken(ms: number, reason?: string): CancellationTokenSource {
  return createCancellationTokenSource().cancelAfter(ms, reason);
}

/**
 * Source that cancels when any of the given tokens cancels.
 * Disposing it detaches from the parents.
 */
export function createLinkedToken(...tokens: CancellationToken[]): CancellationTokenSource {
  const linked = createCancellationTokenSource();
  const registrations: Disposable[] = [];

  for (const token of tokens) {
    if (token.isCancellationRequested) {
      linked.cancel(token.cancellationReason);
      break;
    }
    registrations.push(token.register((reason) => linked.cancel(reason)));
  }

  const dispose = linked.dispose.bind(linked);
  linked.dispose = () => {
    for (const registration of registrations) registration.dispose();
    dispose();
  };

  return linked;
}

/** A token that is never cancelled */
export const NONE_TOKEN: CancellationToken = {
  isCancellationRequested: false,
  cancellationReason: undefined,
  onCancellationRequested: new Promise<string | undefined>(() => undefined),
  register: () => ({ dispose: () => undefined }),
  throwIfCancellationRequested: () => undefined,
};

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Race a promise against cancellation. The losing registration is removed
 * so long-lived tokens do not accumulate callbacks.
 */
export function race<T>(promise: Promise<T>, token: CancellationToken): Promise<T> {
  if (token.isCancellationRequested) {
    return Promise.reject(new CancellationError(token.cancellationReason));
  }

  return new Promise<T>((resolve, reject) => {
    const registration = token.register((reason) => reject(new CancellationError(reason)));
    promise.then(
      (value) => {
        registration.dispose();
        resolve(value);
      },
      (error: unknown) => {
        registration.dispose();
        reject(error);
      }
    );
  });
}

/**
 * AbortSignal view of a token, for fetch and other AbortSignal APIs.
 * Dispose it once the request settles so long-lived tokens do not
 * collect callbacks.
 */
export interface AbortSignalLink extends Disposable {
  readonly signal: AbortSignal;
}

export function toAbortSignal(token: CancellationToken): AbortSignalLink {
  const controller = new AbortController();

  if (token.isCancellationRequested) {
    controller.abort(new CancellationError(token.cancellationReason));
    return { signal: controller.signal, dispose: () => undefined };
  }

  const registration = token.register((reason) => controller.abort(new CancellationError(reason)));
  return { signal: controller.signal, dispose: () => registration.dispose() };
}

/**
 * Sleep with cancellation support.
 */
export function sleep(ms: number, token: CancellationToken = NONE_TOKEN): Promise<void> {
  return new Promise((resolve, reject) => {
    if (token.isCancellationRequested) {
      reject(new CancellationError(token.cancellationReason));
      return;
    }

    const registration = token.register((reason) => {
      clearTimeout(id);
      reject(new CancellationError(reason));
    });
    const id = setTimeout(() => {
      registration.dispose();
      resolve();
    }, ms);
  });
}
