const DEFAULT_MAX_ENTRIES = 32;

export type ResultCacheOptions = {
  enabled: boolean;
  maxEntries?: number;
};

/**
 * Memoizes results by scope and arguments. Keys are a stable serialization,
 * so `{ a: 1, b: 2 }` and `{ b: 2, a: 1 }` share an entry. The oldest entry is
 * evicted once `maxEntries` is reached.
 */
export class ResultCache<T> {
  private readonly cache = new Map<string, T>();
  private readonly enabled: boolean;
  private readonly maxEntries: number;

  constructor(options: ResultCacheOptions) {
    this.enabled = options.enabled;
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_ENTRIES);
  }

  get size(): number {
    return this.cache.size;
  }

  get(scope: string, args: unknown): T | undefined {
    if (!this.enabled) {
      return undefined;
    }
    return this.cache.get(this.key(scope, args));
  }

  set(scope: string, args: unknown, value: T): void {
    if (!this.enabled) {
      return;
    }

    const key = this.key(scope, args);
    this.cache.delete(key);
    this.cache.set(key, value);

    while (this.cache.size > this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) {
        break;
      }
      this.cache.delete(oldest.value);
    }
  }

  async getOrCompute(
    scope: string,
    args: unknown,
    compute: () => Promise<T>
  ): Promise<T> {
    const cached = this.get(scope, args);
    if (cached !== undefined) {
      return cached;
    }
    const value = await compute();
    this.set(scope, args, value);
    return value;
  }

  clear(): void {
    this.cache.clear();
  }

  private key(scope: string, args: unknown): string {
    return `${scope}:${this.stringify(args)}`;
  }

  private stringify(value: unknown): string {
    if (Array.isArray(value)) {
      return `[${value.map((entry) => this.stringify(entry)).join(",")}]`;
    }
    if (this.isPlainObject(value)) {
      const entries = Object.entries(value)
        .filter(([, val]) => val !== undefined)
        .sort(([a], [b]) => a.localeCompare(b));
      return `{${entries
        .map(([key, val]) => `${JSON.stringify(key)}:${this.stringify(val)}`)
        .join(",")}}`;
    }
    if (value === undefined) {
      return "undefined";
    }
    return JSON.stringify(value);
  }

  private isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
  }
}
