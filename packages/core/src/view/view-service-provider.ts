import { ServiceProvider } from "../providers/service-provider";
import type { Container } from "../di/container";
import { TemplateCompiler } from "./compiler";
import { CompilerEngine, EngineResolver, FileEngine } from "./engines";
import { ViewFactory } from "./factory";
import { FileViewFinder } from "./finder";

function readViewPaths(container: Container): string[] {
  const paths = container.resolve("config").get<unknown>("view.paths", []);
  if (!Array.isArray(paths) || !paths.every((path): path is string => typeof path === "string")) {
    throw new Error('Config "view.paths" must be a list of directories.');
  }
  return [...paths];
}

/**
 * Registers view rendering from the staged `view.paths` and `view.compiled`
 * configuration values.
 */
export class ViewServiceProvider extends ServiceProvider {
  register(): void {
    this.container.registerSingleton("view.compiler", (c) => {
      const compiled = c.resolve("config").get<unknown>("view.compiled");
      if (typeof compiled !== "string") {
        throw new Error('Config "view.compiled" must be a directory path.');
      }
      return new TemplateCompiler(c.resolve("files"), compiled);
    });

    this.container.registerSingleton("view.engine.resolver", (c) => {
      const resolver = new EngineResolver();
      resolver.register("file", () => new FileEngine(c.resolve("files")));
      resolver.register("compiler", () => new CompilerEngine(c.resolve("view.compiler")));
      return resolver;
    });

    this.container.registerSingleton(
      "view.finder",
      (c) => new FileViewFinder(c.resolve("files"), readViewPaths(c)),
    );

    this.container.registerSingleton(
      "view",
      (c) => new ViewFactory(c.resolve("view.engine.resolver"), c.resolve("view.finder")),
    );
  }

  boot(container: Container): void {
    if (container.bound("runningInConsole")) {
      container.resolve("view").share("runningInConsole", container.resolve("runningInConsole"));
    }
  }
}
