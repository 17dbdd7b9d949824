import type { ServiceLocatorContract } from "@hostbridge/types";
import { EntryNotFoundError } from "../errors/errors";
import type { Container } from "./container";

/**
 * `has`/`get` view over a container. A failed lookup is reported as
 * EntryNotFoundError only when the id is unbound once the failure has
 * happened; errors raised while building a bound service pass through.
 */
export class ServiceLocator implements ServiceLocatorContract {
  constructor(private readonly container: Container) {}

  has(id: string): boolean {
    return this.container.bound(id);
  }

  get<T = unknown>(id: string): T {
    try {
      return this.container.resolve<T>(id);
    } catch (error) {
      if (this.has(id)) {
        throw error;
      }
      throw new EntryNotFoundError(id, { cause: error });
    }
  }
}
