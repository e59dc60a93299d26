/**
 * Named stage factories, so pipelines can be assembled from config or CLI
 * names. Each lookup builds a new instance: a stage object maps to one graph
 * node, so two nodes must never share one.
 */
import { ConfigError } from "./errors.js";

export class Registry<T> {
  private readonly factories = new Map<string, () => T>();
  readonly kind: string;

  constructor(kind: string) {
    this.kind = kind;
  }

  /** Later registrations under the same name replace earlier ones. */
  register(name: string, factory: () => T): this {
    this.factories.set(name, factory);
    return this;
  }

  create(name: string): T {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new ConfigError({
        message: `unknown ${this.kind} "${name}" (registered: ${this.names().join(", ")})`,
      });
    }
    return factory();
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  names(): string[] {
    return [...this.factories.keys()];
  }
}
