/**
 * Scope Registry
 *
 * Owns one context per guild and serializes every task against it. A task
 * starts only after the previous task for the same scope has settled, so
 * nothing can observe or mutate a scope while another task is suspended on
 * a platform call.
 */

interface ScopeEntry<TContext> {
  context: TContext;
  queue: Promise<void>;
}

export class ScopeRegistry<TContext> {
  private readonly scopes = new Map<string, ScopeEntry<TContext>>();

  register(scopeId: string, context: TContext): void {
    const existing = this.scopes.get(scopeId);
    if (existing) {
      existing.context = context;
      return;
    }
    this.scopes.set(scopeId, { context, queue: Promise.resolve() });
  }

  get(scopeId: string): TContext | undefined {
    return this.scopes.get(scopeId)?.context;
  }

  has(scopeId: string): boolean {
    return this.scopes.has(scopeId);
  }

  scopeIds(): string[] {
    return [...this.scopes.keys()];
  }

  /**
   * Queue a task for a scope. The returned promise settles with the task;
   * a failed task does not block the ones behind it.
   */
  run<T>(scopeId: string, task: (context: TContext) => Promise<T>): Promise<T> {
    const entry = this.scopes.get(scopeId);
    if (!entry) {
      return Promise.reject(new Error(`Unknown scope: ${scopeId}`));
    }

    const result = entry.queue.then(() => task(entry.context));
    // The caller receives the rejection through `result`
    entry.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
