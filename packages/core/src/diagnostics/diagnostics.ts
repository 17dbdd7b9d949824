import type { BridgeLogger } from "@hostbridge/types";
import { DatabasePanel } from "./database-panel";

export type DiagnosticsConfig = {
  enabled?: boolean;
  panels?: {
    database?: boolean;
  };
  /** Upper bound on recorded queries per panel. */
  maxQueries?: number;
  logger?: BridgeLogger;
};

export type PanelMap = {
  database: DatabasePanel;
};

/** Diagnostics bar holding the enabled panels. */
export class Diagnostics {
  private readonly panels: Partial<PanelMap> = {};
  readonly enabled: boolean;

  constructor(config: DiagnosticsConfig = {}) {
    this.enabled = config.enabled ?? true;
    if (config.panels?.database ?? true) {
      this.panels.database = new DatabasePanel(config.maxQueries ?? 100, config.logger ?? null);
    }
  }

  /** The named panel, or undefined when it (or the whole bar) is disabled. */
  getPanel<K extends keyof PanelMap>(name: K): PanelMap[K] | undefined {
    return this.enabled ? this.panels[name] : undefined;
  }
}
