export type {
  Type,
  ServiceKey,
  ServiceFactory,
  InstanceBinding,
  SingletonBinding,
  FactoryBinding,
  Binding,
  DottedAccess,
} from "./common";

export type { ServiceContainer, ServiceLocatorContract } from "./container";

export type { ServiceProviderContract } from "./provider";

export type { EventListener, EventKey, EventDispatcherContract } from "./events";

export type { ConfigValues, ConfigContract } from "./config";

export type { LogLevel, BridgeLogger } from "./logging";
