/**
 * Cancellation scopes: a cancellable interval derived from a parent that ends,
 * once and for good, either on `cancel()` or when the parent ends.
 *
 * Backed by AbortController so a scope's `signal` can be handed to any
 * AbortSignal-aware API. The recorded reason is always a CanceledError whose
 * cause is whatever the parent (or caller) aborted with.
 *
 * @module
 */

import { CanceledError } from "../errors.js";

/** Anything a scope can be derived from. */
export type ParentScope = AbortSignal | CancellationScope;

export class CancellationScope {
  private readonly controller = new AbortController();
  private recorded: CanceledError | undefined;
  private detachParent: (() => void) | undefined;
  private deadline: ReturnType<typeof setTimeout> | undefined;

  private constructor() {}

  /** Derive a child scope. A parent that has already ended yields a scope that is already done. */
  static derive(parent: ParentScope): CancellationScope {
    const scope = new CancellationScope();
    const signal = parent instanceof CancellationScope ? parent.signal : parent;

    if (signal.aborted) {
      scope.cancel(signal.reason);
      return scope;
    }

    const onParentAbort = () => scope.cancel(signal.reason);
    signal.addEventListener("abort", onParentAbort, { once: true });
    scope.detachParent = () => signal.removeEventListener("abort", onParentAbort);
    return scope;
  }

  /** Derive a scope that cancels itself after `ms` with a TimeoutError reason. */
  static withTimeout(parent: ParentScope, ms: number): CancellationScope {
    const scope = CancellationScope.derive(parent);
    if (scope.isCancelled) return scope;

    scope.deadline = setTimeout(() => {
      const reason = new Error(`deadline of ${ms}ms exceeded`);
      reason.name = "TimeoutError";
      scope.cancel(reason);
    }, ms);
    scope.deadline.unref();
    return scope;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isCancelled(): boolean {
    return this.recorded !== undefined;
  }

  /** Why the scope ended, or undefined while it is live. */
  get reason(): CanceledError | undefined {
    return this.recorded;
  }

  /** Idempotent; only the first reason is recorded. */
  cancel(reason?: unknown): void {
    if (this.recorded) return;
    this.recorded = reason instanceof CanceledError ? reason : new CanceledError(reason);
    this.release();
    this.controller.abort(this.recorded);
  }

  throwIfCancelled(): void {
    if (this.recorded) throw this.recorded;
  }

  /**
   * Run `listener` when the scope ends, or right away if it already has.
   * Returns a function that unregisters it.
   */
  onCancel(listener: (reason: CanceledError) => void): () => void {
    if (this.recorded) {
      listener(this.recorded);
      return () => {};
    }
    const handler = () => {
      if (this.recorded) listener(this.recorded);
    };
    this.signal.addEventListener("abort", handler, { once: true });
    return () => this.signal.removeEventListener("abort", handler);
  }

  /** Resolves with the reason once the scope ends. */
  whenCancelled(): Promise<CanceledError> {
    return new Promise((resolve) => {
      this.onCancel(resolve);
    });
  }

  /** Stop following the parent and drop any pending deadline. Does not cancel. */
  dispose(): void {
    this.release();
  }

  private release(): void {
    this.detachParent?.();
    this.detachParent = undefined;
    if (this.deadline !== undefined) {
      clearTimeout(this.deadline);
      this.deadline = undefined;
    }
  }
}
