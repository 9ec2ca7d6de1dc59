// src/http/RouteParams.ts
/**
 * Ordered path parameters the router extracted for one matched route.
 * Names are assumed unique per route; duplicates are kept and the first wins.
 */

export type RouteParam = {
  readonly key: string;
  readonly value: string;
};

export class RouteParams implements Iterable<RouteParam> {
  readonly #entries: readonly RouteParam[];

  constructor(entries: readonly RouteParam[]) {
    this.#entries = Object.freeze(entries.map((e) => ({ ...e })));
  }

  /** Express hands params over as a plain record; key order is kept. */
  static fromRecord(params: Record<string, string>): RouteParams {
    return new RouteParams(
      Object.entries(params).map(([key, value]) => ({ key, value }))
    );
  }

  get size(): number {
    return this.#entries.length;
  }

  /** First value bound to `name`, or "" when the route has no such param. */
  byName(name: string): string {
    for (const p of this.#entries) {
      if (p.key === name) return p.value;
    }
    return "";
  }

  toRecord(): Record<string, string> {
    const out: Record<string, string> = {};
    for (const p of this.#entries) {
      if (!(p.key in out)) out[p.key] = p.value;
    }
    return out;
  }

  [Symbol.iterator](): Iterator<RouteParam> {
    return this.#entries[Symbol.iterator]();
  }
}
