type IdempotencyKey = string & { readonly __idempotencyKey: unique symbol };

interface IdempotencyEntry<T> {
  response: T;
  expiresAt: number;
}

/**
 * Remembers the response given for an `Idempotency-Key` so a client retry
 * within the TTL gets the same answer instead of a second side effect.
 * Keys are scoped by the caller (operation and target) before they get here.
 */
export class IdempotencyStore<T> {
  private entries = new Map<IdempotencyKey, IdempotencyEntry<T>>();

  constructor(private readonly ttlSeconds = 60) {}

  private toKey(scope: string, key: string): IdempotencyKey {
    return `${scope}:${key.trim()}` as IdempotencyKey;
  }

  get(scope: string, key: string): T | undefined {
    const k = this.toKey(scope, key);
    const entry = this.entries.get(k);

    if (!entry) return undefined;

    if (Date.now() > entry.expiresAt) {
      this.entries.delete(k);
      return undefined;
    }

    return entry.response;
  }

  set(scope: string, key: string, response: T): void {
    const k = this.toKey(scope, key);
    this.entries.set(k, { response, expiresAt: Date.now() + this.ttlSeconds * 1000 });
  }
}
