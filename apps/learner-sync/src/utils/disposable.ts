/**
 * Disposable pattern implementation
 * @module utils/disposable
 */

export interface Disposable {
  dispose(): void;
}

/**
 * Create a disposable from a cleanup function
 */
export function createDisposable(dispose: () => void): Disposable {
  let disposed = false;
  return {
    dispose: () => {
      if (!disposed) {
        disposed = true;
        dispose();
      }
    },
  };
}

/**
 * A container that manages multiple disposables
 */
export class DisposableStore implements Disposable {
  private disposables: Set<Disposable> = new Set();
  private disposed = false;

  /**
   * Add a disposable to the store. Disposed immediately if the store already is.
   */
  add<T extends Disposable>(disposable: T): T {
    if (this.disposed) {
      disposable.dispose();
      return disposable;
    }
    this.disposables.add(disposable);
    return disposable;
  }

  /**
   * Track a plain cleanup callback (e.g. an unsubscribe function)
   */
  addCallback(dispose: () => void): Disposable {
    return this.add(createDisposable(dispose));
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const disposable of this.disposables) {
      try {
        disposable.dispose();
      } catch (error) {
        console.error('[DisposableStore] Error while disposing:', error);
      }
    }
    this.disposables.clear();
  }
}
