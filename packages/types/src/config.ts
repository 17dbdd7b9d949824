import type { DottedAccess } from "./common";

export type ConfigValues = Record<string, unknown>;

/** Configuration store consumed by every `setup*` operation. */
export interface ConfigContract extends DottedAccess {
  get<T = unknown>(path: string, defaultValue?: T): T;
  set(path: string, value: unknown): void;
  set(values: ConfigValues): void;
  all(): ConfigValues;
}
