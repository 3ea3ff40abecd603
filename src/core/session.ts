import type { UserIdentity } from '../types/index.js';

/**
 * A value loaded at most once. A failed load is forgotten so the next caller
 * tries again.
 */
export class Lazy<T> {
  private pending?: Promise<T>;

  get(load: () => Promise<T>): Promise<T> {
    if (!this.pending) {
      this.pending = load().catch((err: unknown) => {
        this.pending = undefined;
        throw err;
      });
    }
    return this.pending;
  }

  get loaded(): boolean {
    return this.pending !== undefined;
  }

  reset(): void {
    this.pending = undefined;
  }
}

/**
 * Lookups shared by everything that runs within one command invocation.
 */
export class Session {
  readonly currentUser = new Lazy<UserIdentity>();
  readonly epicLinkField = new Lazy<string | undefined>();
  private readonly filters = new Map<string, Lazy<string | undefined>>();

  filterJql(filterId: string): Lazy<string | undefined> {
    let lazy = this.filters.get(filterId);
    if (!lazy) {
      lazy = new Lazy<string | undefined>();
      this.filters.set(filterId, lazy);
    }
    return lazy;
  }

  clear(): void {
    this.currentUser.reset();
    this.epicLinkField.reset();
    this.filters.clear();
  }
}
