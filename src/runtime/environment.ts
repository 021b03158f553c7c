import type { PlainValue } from './values';

/**
 * Lexical scope environment for variable bindings.
 * Each scope has a parent, forming a scope chain. Scopes are shared by
 * reference: closures see later changes made through any other handle.
 */
export class Environment {
  private bindings: Map<string, PlainValue> = new Map();
  private readonly parent: Environment | null;

  constructor(parent: Environment | null = null) {
    this.parent = parent;
  }

  get(name: string): PlainValue | undefined {
    const value = this.bindings.get(name);
    if (value !== undefined) {
      return value;
    }
    return this.parent?.get(name);
  }

  /**
   * Bind in this scope only. A binding of the same name in an outer scope is
   * shadowed, not modified.
   */
  set(name: string, value: PlainValue): PlainValue {
    this.bindings.set(name, value);
    return value;
  }

  has(name: string): boolean {
    if (this.bindings.has(name)) return true;
    if (this.parent) return this.parent.has(name);
    return false;
  }

  child(): Environment {
    return new Environment(this);
  }

  /**
   * Get all bindings in this scope (not including parent).
   */
  getOwnBindings(): Map<string, PlainValue> {
    return new Map(this.bindings);
  }
}
