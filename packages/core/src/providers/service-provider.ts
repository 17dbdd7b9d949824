import type { ServiceProviderContract } from "@hostbridge/types";
import type { Container } from "../di/container";

/**
 * Base class for subsystem providers.
 *
 * `register` may only declare bindings on `this.container`. Providers that
 * need to wire runtime behaviour define `boot`, which runs once `register`
 * has completed and receives the container to resolve from.
 */
export abstract class ServiceProvider implements ServiceProviderContract<Container> {
  constructor(protected readonly container: Container) {}

  abstract register(): void;

  boot?(container: Container): void;
}
