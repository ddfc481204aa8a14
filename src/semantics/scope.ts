/**
 * Binding state of a visible name: `null` while declared but unassigned.
 */
export type Binding = string | null;

/**
 * Stack of lexical scopes, innermost last. The global scope at the bottom is never popped.
 */
export class ScopeStack {
  private readonly scopes: Array<Map<string, Binding>> = [new Map()];

  get depth(): number {
    return this.scopes.length;
  }

  push(): void {
    this.scopes.push(new Map());
  }

  pop(): void {
    if (this.scopes.length > 1) this.scopes.pop();
  }

  /**
   * Declare `name` unassigned in the innermost scope.
   *
   * Returns `false`, leaving the existing binding untouched, when the innermost scope already has it.
   * Outer scopes are not consulted, so shadowing is allowed.
   */
  declare(name: string): boolean {
    const innermost = this.innermost();
    if (innermost.has(name)) return false;
    innermost.set(name, null);
    return true;
  }

  /**
   * Bind `value` in the innermost scope that declares `name`. Returns `false` if none does.
   */
  assign(name: string, value: string): boolean {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const scope = this.scopes[i];
      if (scope?.has(name)) {
        scope.set(name, value);
        return true;
      }
    }
    return false;
  }

  /**
   * Innermost binding of `name`, or `undefined` when no scope declares it.
   */
  lookup(name: string): Binding | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const scope = this.scopes[i];
      if (scope?.has(name)) return scope.get(name) ?? null;
    }
    return undefined;
  }

  private innermost(): Map<string, Binding> {
    const top = this.scopes[this.scopes.length - 1];
    if (!top) throw new Error('scope stack lost its global scope');
    return top;
  }
}
