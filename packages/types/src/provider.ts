/**
 * Two-phase contract every pluggable subsystem satisfies.
 *
 * `register` only declares bindings. `boot` runs afterwards and resolves
 * whatever it needs from the container it is handed, so it sees every binding
 * `register` just declared.
 */
export interface ServiceProviderContract<C> {
  register(): void;
  boot?(container: C): void;
}
