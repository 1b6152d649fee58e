/**
 * Registry
 *
 * Keyed store behind each capability kind. Every operation completes
 * synchronously, so on the event loop a `register` never overlaps another
 * `register`, `list` or `lookup`, and `list` hands out an immutable snapshot
 * that later registrations cannot change.
 */
export class Registry<TKey, TEntry> {
  private readonly entries = new Map<TKey, TEntry>();
  private snapshot: readonly TEntry[] = Object.freeze([]);

  get size(): number {
    return this.entries.size;
  }

  /**
   * Inserts an entry. An existing key is replaced in place and keeps its position in `list()`.
   */
  register(key: TKey, entry: TEntry): void {
    this.entries.set(key, entry);
    this.snapshot = Object.freeze(Array.from(this.entries.values()));
  }

  has(key: TKey): boolean {
    return this.entries.has(key);
  }

  lookup(key: TKey): TEntry | undefined {
    return this.entries.get(key);
  }

  /**
   * Entries in registration order, as of the moment of the call.
   */
  list(): readonly TEntry[] {
    return this.snapshot;
  }
}
