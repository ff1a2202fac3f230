/**
 * Generic registry for pluggable implementations.
 */
import { ConfigError } from "./errors.js";

export class Registry<T> {
  private readonly _map = new Map<string, T>();
  readonly subsystem: string;

  constructor(subsystem: string) {
    this.subsystem = subsystem;
  }

  register(name: string, entry: T): void {
    this._map.set(name, entry);
  }

  /** Look up an implementation; throws `ConfigError` listing the known names. */
  get(name: string): T {
    const entry = this._map.get(name);
    if (entry === undefined) {
      const avail = [...this._map.keys()].join(", ");
      throw new ConfigError({
        message: `[${this.subsystem}] Unknown implementation "${name}". Available: ${avail}`,
      });
    }
    return entry;
  }

  has(name: string): boolean {
    return this._map.has(name);
  }

  list(): string[] {
    return [...this._map.keys()];
  }
}
