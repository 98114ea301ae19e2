export type HeaderInit =
  | Iterable<readonly [string, string]>
  | Record<string, string>;

/**
 * Insertion-ordered header storage.
 *
 * Keys are stored and looked up exactly as given (no case folding), so
 * callers read with canonical names such as "Content-Type". Setting an
 * existing key replaces its value and keeps its original position.
 * A locked map throws on any mutation; shared responses rely on that.
 */
export class HeaderMap implements Iterable<[string, string]> {
  private readonly values = new Map<string, string>();
  private locked = false;

  constructor(init?: HeaderInit) {
    if (!init) return;
    const entries = isIterable(init) ? init : Object.entries(init);
    for (const [key, value] of entries) {
      this.values.set(key, value);
    }
  }

  get(name: string): string | undefined {
    return this.values.get(name);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  set(name: string, value: string): this {
    this.assertMutable();
    this.values.set(name, value);
    return this;
  }

  get size(): number {
    return this.values.size;
  }

  get isLocked(): boolean {
    return this.locked;
  }

  lock(): this {
    this.locked = true;
    return this;
  }

  /** Unlocked copy with the same entries in the same order. */
  clone(): HeaderMap {
    return new HeaderMap(this.values);
  }

  [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.values.entries();
  }

  private assertMutable(): void {
    if (this.locked) {
      throw new TypeError("HeaderMap is locked");
    }
  }
}

function isIterable(
  init: HeaderInit,
): init is Iterable<readonly [string, string]> {
  return Symbol.iterator in init;
}
