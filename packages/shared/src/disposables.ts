export interface DisposableLike {
  dispose(): void;
}

export function toDisposable(fn: () => void): DisposableLike {
  return { dispose: fn };
}

export class DisposableStore implements DisposableLike {
  #items: DisposableLike[] = [];
  #disposed = false;

  get isDisposed(): boolean {
    return this.#disposed;
  }

  add<T extends DisposableLike>(item: T): T {
    if (this.#disposed) {
      item.dispose();
      return item;
    }
    this.#items.push(item);
    return item;
  }

  dispose(): void {
    if (this.#disposed) return;
    this.#disposed = true;
    disposeAll(this.#items.splice(0, this.#items.length));
  }
}

export function combineDisposables(items: DisposableLike[]): DisposableLike {
  return toDisposable(() => disposeAll(items));
}

/**
 * Dispose every item even when some throw; the first error is rethrown after
 * the rest have run.
 */
function disposeAll(items: DisposableLike[]): void {
  let failure: { error: unknown } | undefined;
  for (const item of items) {
    try {
      item.dispose();
    } catch (err) {
      failure ??= { error: err };
    }
  }
  if (failure) throw failure.error;
}
