/**
 * Hierarchical cooperative cancellation.
 *
 * A CancellationToken is a handle onto shared state. Handles made with
 * `clone()` share that state; handles made with `childToken()` get their own
 * state which is cancelled whenever the parent's is, but never the other way
 * round.
 *
 * @module core/cancellation
 */

import { CancelledError } from './errors.js';
import { deferred, type Deferred } from '../utils/async.js';
import { tokenLogger, toError } from '../utils/logger.js';

export type CancellationListener = () => void;

/** @internal shared state behind one or more token handles */
export interface TokenState {
  cancelled: boolean;
  parent: TokenState | null;
  children: Set<TokenState>;
  listeners: Set<CancellationListener>;
  done: Deferred<void>;
  abort: AbortController | null;
}

function createState(parent: TokenState | null): TokenState {
  return {
    cancelled: false,
    parent,
    children: new Set(),
    listeners: new Set(),
    done: deferred<void>(),
    abort: null,
  };
}

function notify(listener: CancellationListener): void {
  try {
    listener();
  } catch (error) {
    tokenLogger.error('Cancellation listener threw', toError(error));
  }
}

function cancelState(state: TokenState): void {
  if (state.cancelled) return;
  state.cancelled = true;
  state.parent?.children.delete(state);

  // Descendants first, so a listener never sees a live child of a cancelled token
  for (const child of [...state.children]) {
    cancelState(child);
  }
  state.children.clear();

  const listeners = [...state.listeners];
  state.listeners.clear();
  for (const listener of listeners) {
    notify(listener);
  }

  state.abort?.abort(new CancelledError());
  state.done.resolve();
}

export class CancellationToken {
  private readonly state: TokenState;

  constructor(state?: TokenState) {
    this.state = state ?? createState(null);
  }

  /**
   * New root token, not cancelled
   */
  static create(): CancellationToken {
    return new CancellationToken();
  }

  get isCancelled(): boolean {
    return this.state.cancelled;
  }

  /**
   * Cancel this token and every token derived from it. Idempotent.
   */
  cancel(): void {
    cancelState(this.state);
  }

  /**
   * Resolves once this token (or an ancestor) is cancelled
   */
  cancelled(): Promise<void> {
    return this.state.done.promise;
  }

  /**
   * Derive a token that is cancelled with this one but can also be
   * cancelled on its own without touching this one.
   */
  childToken(): CancellationToken {
    const child = createState(this.state);
    if (this.state.cancelled) {
      cancelState(child);
    } else {
      this.state.children.add(child);
    }
    return new CancellationToken(child);
  }

  /**
   * Another handle onto the same cancellation state
   */
  clone(): CancellationToken {
    return new CancellationToken(this.state);
  }

  /**
   * Register a listener fired once on cancellation.
   * Fires synchronously if already cancelled. Returns an unsubscribe function.
   */
  onCancel(listener: CancellationListener): () => void {
    if (this.state.cancelled) {
      notify(listener);
      return () => {};
    }
    this.state.listeners.add(listener);
    return () => {
      this.state.listeners.delete(listener);
    };
  }

  /**
   * Detach from the parent so it stops tracking this token.
   * The token keeps its current state and is not cancelled.
   */
  dispose(): void {
    this.state.parent?.children.delete(this.state);
    this.state.parent = null;
  }

  /**
   * AbortSignal mirroring this token, for fetch() and friends
   */
  get signal(): AbortSignal {
    if (!this.state.abort) {
      this.state.abort = new AbortController();
      if (this.state.cancelled) {
        this.state.abort.abort(new CancelledError());
      }
    }
    return this.state.abort.signal;
  }

  throwIfCancelled(): void {
    if (this.state.cancelled) {
      throw new CancelledError();
    }
  }

  /**
   * Whether two handles share the same underlying state
   */
  sameAs(other: CancellationToken): boolean {
    return this.state === other.state;
  }
}
