// src/http/RequestContext.ts
/**
 * Purpose:
 * - Request-scoped key/value chain carried on the Express request (`req.ctx`).
 * - Lets middleware hand data (route params, parsed body, session claims) to
 *   handlers without changing the handler signature.
 *
 * Invariants:
 * - A context is immutable once created. `withValue()` derives a child; the
 *   parent and every other holder of it see no change.
 * - Keys are compared by identity. Two keys with the same description never
 *   collide, so modules keep their keys private and export accessors.
 */

import type { Request } from "express";

/** Typed, identity-unique key. Values are held by the key, per context node. */
export class ContextKey<T> {
  readonly #bound = new WeakMap<RequestContext, T>();

  constructor(public readonly description: string) {}

  /** Called by RequestContext when a node binding this key is created. */
  bind(node: RequestContext, value: T): void {
    this.#bound.set(node, value);
  }

  valueAt(node: RequestContext): T | undefined {
    return this.#bound.get(node);
  }

  toString(): string {
    return `ContextKey(${this.description})`;
  }
}

export class RequestContext {
  /** Root of every chain. Binds nothing. */
  static readonly background = new RequestContext(undefined, undefined);

  private constructor(
    private readonly parent: RequestContext | undefined,
    private readonly key: ContextKey<unknown> | undefined
  ) {}

  withValue<T>(key: ContextKey<T>, value: T): RequestContext {
    const node = new RequestContext(this, key);
    key.bind(node, value);
    return node;
  }

  /** Nearest binding wins; undefined when the key was never bound. */
  value<T>(key: ContextKey<T>): T | undefined {
    for (let c: RequestContext | undefined = this; c; c = c.parent) {
      if (c.key === key) return key.valueAt(c);
    }
    return undefined;
  }

  has(key: ContextKey<unknown>): boolean {
    for (let c: RequestContext | undefined = this; c; c = c.parent) {
      if (c.key === key) return true;
    }
    return false;
  }
}

export function contextOf(req: Request): RequestContext {
  return req.ctx ?? RequestContext.background;
}

/**
 * Swap the request's context for a derived one. The previous context object
 * is left as it was.
 */
export function withContext(req: Request, ctx: RequestContext): Request {
  req.ctx = ctx;
  return req;
}
