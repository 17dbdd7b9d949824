import createDebug from "debug";
import type { EngineResolver, ViewData, Engine } from "./engines";
import type { FileViewFinder } from "./finder";

const debug = createDebug("hostbridge:core:view");

export class View {
  private data: ViewData;

  constructor(
    private readonly factory: ViewFactory,
    private readonly engine: Engine,
    readonly name: string,
    readonly path: string,
    data: ViewData,
  ) {
    this.data = { ...data };
  }

  with(key: string, value: unknown): this {
    this.data[key] = value;
    return this;
  }

  getData(): ViewData {
    return this.data;
  }

  render(): string {
    debug("render %s", this.name);
    return this.engine.get(this.path, { ...this.factory.getShared(), ...this.data });
  }

  toString(): string {
    return this.render();
  }
}

/** Creates views from dotted names, picking the engine by file extension. */
export class ViewFactory {
  private readonly shared: ViewData = {};
  private readonly extensions = new Map<string, string>([
    ["tpl", "compiler"],
    ["html", "file"],
  ]);

  constructor(
    private readonly engines: EngineResolver,
    private readonly finder: FileViewFinder,
  ) {}

  make(name: string, data: ViewData = {}): View {
    const path = this.finder.find(name);
    return new View(this, this.engineFor(path), name, path, data);
  }

  exists(name: string): boolean {
    try {
      this.finder.find(name);
      return true;
    } catch (error) {
      debug("view %s not found: %s", name, error instanceof Error ? error.message : error);
      return false;
    }
  }

  share(key: string, value: unknown): void;
  share(values: ViewData): void;
  share(keyOrValues: string | ViewData, value?: unknown): void {
    if (typeof keyOrValues === "string") {
      this.shared[keyOrValues] = value;
      return;
    }
    Object.assign(this.shared, keyOrValues);
  }

  getShared(): ViewData {
    return this.shared;
  }

  /** Maps an extension to an engine, optionally registering the engine as well. */
  addExtension(extension: string, engine: string, resolver?: () => Engine): void {
    this.finder.addExtension(extension);
    if (resolver) {
      this.engines.register(engine, resolver);
    }
    this.extensions.delete(extension);
    this.extensions.set(extension, engine);
  }

  addLocation(path: string): void {
    this.finder.addLocation(path);
  }

  getFinder(): FileViewFinder {
    return this.finder;
  }

  getEngineResolver(): EngineResolver {
    return this.engines;
  }

  private engineFor(path: string): Engine {
    for (const [extension, engine] of this.extensions) {
      if (path.endsWith(`.${extension}`)) {
        return this.engines.resolve(engine);
      }
    }
    throw new Error(`Unrecognized extension in file: ${path}.`);
  }
}
