// Container
export { Container } from "./di/container";
export type { Resolver } from "./di/container";
export { ServiceLocator } from "./di/locator";
export type { BridgeServices } from "./di/services";

// Providers
export { ServiceProvider } from "./providers/service-provider";
export { runProvider, setupViaCallable } from "./providers/run-provider";
export type { ProviderFactory } from "./providers/run-provider";

// Bridge
export { Bridge, DEFAULT_ALIASES } from "./bridge/bridge";
export type { BridgeOptions } from "./bridge/bridge";

// Aliases
export { Facade } from "./aliases/facade";
export { View } from "./aliases/view";
export { AliasLoader } from "./aliases/alias-loader";
export type { AliasMap } from "./aliases/alias-loader";

// Baseline services
export { Dispatcher } from "./events/dispatcher";
export { Filesystem } from "./filesystem/filesystem";
export { CapturedRequest } from "./http/request";
export type { RequestHeaders, RequestQuery } from "./http/request";

// View
export { ViewServiceProvider } from "./view/view-service-provider";
export { ViewFactory, View as RenderedView } from "./view/factory";
export { FileViewFinder } from "./view/finder";
export { TemplateCompiler, parseTemplate } from "./view/compiler";
export type { TemplateToken } from "./view/compiler";
export { EngineResolver, CompilerEngine, FileEngine, escapeHtml } from "./view/engines";
export type { Engine, ViewData } from "./view/engines";

// Database
export { DatabaseServiceProvider } from "./database/database-service-provider";
export { DatabaseManager } from "./database/manager";
export { Connection } from "./database/connection";
export type { FetchMode, LoggedQuery } from "./database/connection";
export { ConnectionFactory } from "./database/connection-factory";
export type { ConnectionConfig } from "./database/connection-factory";
export { QueryExecuted } from "./database/events";

// Pagination
export { PaginationServiceProvider } from "./pagination/pagination-service-provider";
export { AbstractPaginator } from "./pagination/abstract-paginator";
export type { PaginatorOptions } from "./pagination/abstract-paginator";
export { Paginator } from "./pagination/paginator";
export { LengthAwarePaginator } from "./pagination/length-aware-paginator";

// Translation
export { TranslationServiceProvider } from "./translation/translation-service-provider";
export { Translator } from "./translation/translator";
export type { Replacements } from "./translation/translator";
export { FileLoader } from "./translation/file-loader";
export type { TranslationLines } from "./translation/file-loader";
export { selectMessage } from "./translation/message-selector";

// Diagnostics
export { Diagnostics } from "./diagnostics/diagnostics";
export type { DiagnosticsConfig } from "./diagnostics/diagnostics";
export { DatabasePanel } from "./diagnostics/database-panel";
export type { QueryEntry } from "./diagnostics/database-panel";

// Errors
export {
  UnboundServiceError,
  EntryNotFoundError,
  UndefinedOperationError,
  CircularDependencyError,
  FileNotFoundError,
  UnsupportedDriverError,
  ConnectionNotConfiguredError,
  ViewNotFoundError,
  QueryError,
} from "./errors/errors";
