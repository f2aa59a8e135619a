import type { CachedResponse, ResponseCache } from "./types.js";

export class InMemoryResponseCache implements ResponseCache {
  private readonly store = new Map<string, CachedResponse>();

  get(key: string): CachedResponse | undefined {
    return this.store.get(key);
  }

  set(key: string, value: CachedResponse): void {
    this.store.set(key, value);
  }
}
