import type { ConfigRepository } from "@hostbridge/config";
import type { BridgeLogger } from "@hostbridge/types";
import type { Dispatcher } from "../events/dispatcher";
import type { Filesystem } from "../filesystem/filesystem";
import type { CapturedRequest } from "../http/request";
import type { TemplateCompiler } from "../view/compiler";
import type { EngineResolver } from "../view/engines";
import type { ViewFactory } from "../view/factory";
import type { FileViewFinder } from "../view/finder";
import type { Connection } from "../database/connection";
import type { ConnectionFactory } from "../database/connection-factory";
import type { DatabaseManager } from "../database/manager";
import type { FileLoader } from "../translation/file-loader";
import type { Translator } from "../translation/translator";
import type { Diagnostics } from "../diagnostics/diagnostics";

/** Types of the well-known container keys. */
export interface BridgeServices {
  config: ConfigRepository;
  request: CapturedRequest;
  events: Dispatcher;
  files: Filesystem;
  log: BridgeLogger;
  runningInConsole: boolean;
  "view.compiler": TemplateCompiler;
  "view.engine.resolver": EngineResolver;
  "view.finder": FileViewFinder;
  view: ViewFactory;
  "db.factory": ConnectionFactory;
  db: DatabaseManager;
  "db.connection": Connection;
  "path.lang": string;
  "translation.loader": FileLoader;
  translator: Translator;
  diagnostics: Diagnostics;
}
