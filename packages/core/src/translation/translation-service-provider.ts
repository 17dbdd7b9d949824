import { ServiceProvider } from "../providers/service-provider";
import { FileLoader } from "./file-loader";
import { Translator } from "./translator";

export class TranslationServiceProvider extends ServiceProvider {
  register(): void {
    this.container.registerSingleton(
      "translation.loader",
      (c) => new FileLoader(c.resolve("files"), c.resolve("path.lang")),
    );

    this.container.registerSingleton("translator", (c) => {
      const config = c.resolve("config");
      const locale = config.get<unknown>("app.locale", "en");
      const fallback = config.get<unknown>("app.fallback_locale", "en");

      return new Translator(
        c.resolve("translation.loader"),
        typeof locale === "string" ? locale : "en",
        typeof fallback === "string" ? fallback : "en",
      );
    });
  }
}
