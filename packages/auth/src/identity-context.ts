/**
 * Request Identity Context
 *
 * Implicit "whose credentials" for the current logical request, carried on
 * AsyncLocalStorage so it follows every await chain started inside a
 * request and never bleeds between concurrent requests.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { IdentityContextError, NotAuthenticatedError } from './errors.js';

/** Value of current() when nothing is bound */
export const UNSET_IDENTITY = '';

interface IdentityFrame {
  readonly userId: string;
}

const ROOT_FRAME: IdentityFrame = { userId: UNSET_IDENTITY };

/**
 * Returned by bind(); hand it back to restore()
 */
export interface RestoreHandle {
  readonly frame: IdentityFrame;
  readonly previous: IdentityFrame;
}

export class RequestIdentityContext {
  private readonly storage = new AsyncLocalStorage<IdentityFrame>();

  /**
   * Bind `userId` for the rest of the current execution context.
   * Prefer run() where the work can be expressed as a callback.
   */
  bind(userId: string): RestoreHandle {
    const previous = this.storage.getStore() ?? ROOT_FRAME;
    const frame: IdentityFrame = { userId };
    this.storage.enterWith(frame);
    return { frame, previous };
  }

  /**
   * Reinstate the binding that was active before the matching bind()
   *
   * @throws IdentityContextError when a newer binding is still active
   */
  restore(handle: RestoreHandle): void {
    const active = this.storage.getStore() ?? ROOT_FRAME;
    if (active !== handle.frame) {
      throw new IdentityContextError('Identity bindings must be restored in reverse order of binding');
    }
    this.storage.enterWith(handle.previous);
  }

  /**
   * The bound identity, or UNSET_IDENTITY
   */
  current(): string {
    return (this.storage.getStore() ?? ROOT_FRAME).userId;
  }

  /**
   * @throws NotAuthenticatedError when no identity is bound
   */
  requireCurrent(): string {
    const userId = this.current();
    if (userId === UNSET_IDENTITY) {
      throw new NotAuthenticatedError('no request identity bound');
    }
    return userId;
  }

  /**
   * Run `fn` with `userId` bound. The binding ends when `fn` returns or
   * throws; async work started inside keeps it.
   */
  run<T>(userId: string, fn: () => T): T {
    return this.storage.run({ userId }, fn);
  }
}
