/**
 * Named factories for pluggable implementations (optimizers, tasks).
 */
import { ConfigError } from "./errors.js";

export class Registry<T, A extends readonly unknown[] = []> {
  private readonly _map = new Map<string, (...args: A) => T>();
  readonly subsystem: string;

  constructor(subsystem: string) {
    this.subsystem = subsystem;
  }

  register(name: string, factory: (...args: A) => T): this {
    this._map.set(name, factory);
    return this;
  }

  get(name: string, ...args: A): T {
    const factory = this._map.get(name);
    if (!factory) {
      const avail = [...this._map.keys()].join(", ");
      throw new ConfigError({
        message: `[${this.subsystem}] Unknown implementation "${name}". Available: ${avail}`,
      });
    }
    return factory(...args);
  }

  has(name: string): boolean {
    return this._map.has(name);
  }

  list(): string[] {
    return [...this._map.keys()];
  }
}
