export type Listener<T> = (value: T) => void | Promise<void>;

interface Entry<T> {
  readonly listener: Listener<T>;
}

/** Listeners in registration order; the same function may be registered more than once. */
export class ListenerSet<T> {
  private readonly entries = new Set<Entry<T>>();

  add(listener: Listener<T>): () => void {
    const entry: Entry<T> = { listener };
    this.entries.add(entry);
    return () => {
      this.entries.delete(entry);
    };
  }

  get size(): number {
    return this.entries.size;
  }

  /** Calls every listener in turn; a failing listener is reported and the rest still run. */
  async emit(value: T, onFailure: (error: unknown) => void): Promise<void> {
    for (const entry of [...this.entries]) {
      try {
        await entry.listener(value);
      } catch (error) {
        onFailure(error);
      }
    }
  }
}
