/**
 * Generic registry for pluggable implementations.
 *
 * Factories may take construction arguments (e.g. a language code), which
 * `get` forwards unchanged.
 */

export class Registry<T, A extends unknown[] = []> {
  private readonly _map = new Map<string, (...args: A) => T>();
  readonly subsystem: string;

  constructor(subsystem: string) {
    this.subsystem = subsystem;
  }

  register(name: string, factory: (...args: A) => T): void {
    this._map.set(name, factory);
  }

  get(name: string, ...args: A): T {
    const factory = this._map.get(name);
    if (!factory) {
      const avail = [...this._map.keys()].join(", ");
      throw new Error(
        `[${this.subsystem}] Unknown implementation "${name}". Available: ${avail}`
      );
    }
    return factory(...args);
  }

  list(): string[] {
    return [...this._map.keys()];
  }
}
