/**
 * What a hook reports: an `Error` for a failure, nothing for success.
 */
export type HookResult = Error | void;

export type Hook<TArgs extends unknown[]> = (...args: TArgs) => HookResult;

/**
 * Named hooks looked up at dispatch time.
 *
 * New behaviour is added by registering a handler under a conventional name; the
 * caller never needs a closed switch over the handlers that exist.
 */
export class HookRegistry<TArgs extends unknown[]> {
  private readonly hooks = new Map<string, Hook<TArgs>>();

  register(name: string, hook: Hook<TArgs>): this {
    this.hooks.set(name, hook);
    return this;
  }

  has(name: string): boolean {
    return this.hooks.has(name);
  }

  names(): string[] {
    return [...this.hooks.keys()];
  }

  /**
   * Calls the hook registered under `name`. A missing hook is skipped and counts
   * as success; a returned `Error` is handed back to the caller as is.
   */
  dispatch(name: string, ...args: TArgs): Error | undefined {
    const hook = this.hooks.get(name);
    if (!hook) return undefined;
    const result = hook(...args);
    return result instanceof Error ? result : undefined;
  }
}
