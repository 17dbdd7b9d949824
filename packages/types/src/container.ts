import type { ServiceFactory, ServiceKey } from "./common";

/** Minimal container contract shared by providers, facades and the bridge. */
export interface ServiceContainer {
  registerValue<T>(key: ServiceKey, value: T): void;
  registerSingleton<T>(key: ServiceKey, create: ServiceFactory<T, ServiceContainer>): void;
  registerFactory<T>(key: ServiceKey, create: ServiceFactory<T, ServiceContainer>): void;
  resolve<T>(key: ServiceKey): T;
  bound(key: ServiceKey): boolean;
  flush(): void;
  closeAll(): Promise<void>;
}

/** Capability-queryable lookup, the only surface external callers need. */
export interface ServiceLocatorContract {
  has(id: string): boolean;
  get<T = unknown>(id: string): T;
}
