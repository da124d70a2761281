/**
 * Per-request, type-indexed store.
 *
 * Values are keyed by their class: one slot per class, and inserting an
 * instance of a class already present replaces the previous instance.
 *
 * @example
 * ```ts
 * class TraceId {
 *   constructor(readonly value: string) {}
 * }
 *
 * extensions.insert(new TraceId('abc'));
 * extensions.get(TraceId)?.value; // 'abc'
 * ```
 */

export type ExtensionType<T> = abstract new (...args: never[]) => T;

export class Extensions {
  private readonly values = new Map<unknown, object>();

  /**
   * Stores `value` under its own class, replacing any previous value of
   * that class.
   */
  insert(value: object): this {
    this.values.set(value.constructor, value);
    return this;
  }

  /**
   * Returns the stored instance of `type`. The instance is live: changes to
   * it are seen by every later stage of the same request.
   */
  get<T>(type: ExtensionType<T>): T | undefined {
    const value = this.values.get(type);
    return value instanceof type ? value : undefined;
  }

  has(type: ExtensionType<unknown>): boolean {
    return this.get(type) !== undefined;
  }

  getOrInsert<T extends object>(type: ExtensionType<T>, create: () => T): T {
    const existing = this.get(type);
    if (existing !== undefined) {
      return existing;
    }
    const value = create();
    this.insert(value);
    return value;
  }

  remove<T>(type: ExtensionType<T>): T | undefined {
    const value = this.get(type);
    if (value !== undefined) {
      this.values.delete(type);
    }
    return value;
  }

  /** Copies every entry of `other` into this bag, replacing same-class values. */
  extend(other: Extensions): this {
    for (const value of other.values.values()) {
      this.insert(value);
    }
    return this;
  }

  clear(): void {
    this.values.clear();
  }

  get size(): number {
    return this.values.size;
  }
}
