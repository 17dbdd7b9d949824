import createDebug from "debug";
import type { ServiceProviderContract } from "@hostbridge/types";
import type { Container } from "../di/container";

const debug = createDebug("hostbridge:core:providers");

export type ProviderFactory = (container: Container) => ServiceProviderContract<Container>;

/** Runs both lifecycle phases: `register`, then `boot` when the provider has one. */
export function runProvider(
  provider: ServiceProviderContract<Container>,
  container: Container,
): void {
  const name = provider.constructor.name;
  debug("register %s", name);
  provider.register();

  if (provider.boot) {
    debug("boot %s", name);
    provider.boot(container);
  }
}

/** Builds a provider from `factory` and runs it against the same container. */
export function setupViaCallable(factory: ProviderFactory, container: Container): void {
  runProvider(factory(container), container);
}
