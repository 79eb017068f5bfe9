const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Record headers: string keys mapped to raw byte values.
 * Keys keep insertion order; adding an existing key replaces its value.
 */
export class RecordHeaders implements Iterable<[string, Uint8Array]> {
  private readonly entries = new Map<string, Uint8Array>();

  constructor(entries?: Iterable<[string, Uint8Array]>) {
    if (entries) {
      for (const [key, value] of entries) {
        this.entries.set(key, value);
      }
    }
  }

  add(key: string, value: string | Uint8Array): this {
    this.entries.set(key, typeof value === 'string' ? encoder.encode(value) : value);
    return this;
  }

  get(key: string): Uint8Array | undefined {
    return this.entries.get(key);
  }

  /**
   * Header value decoded as UTF-8
   */
  getString(key: string): string | undefined {
    const bytes = this.entries.get(key);
    return bytes === undefined ? undefined : decoder.decode(bytes);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  get isEmpty(): boolean {
    return this.entries.size === 0;
  }

  [Symbol.iterator](): Iterator<[string, Uint8Array]> {
    return this.entries.entries();
  }
}
