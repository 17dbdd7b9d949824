import { ServiceProvider } from "../providers/service-provider";
import type { Container } from "../di/container";
import { ConnectionFactory } from "./connection-factory";
import { DatabaseManager } from "./manager";

export class DatabaseServiceProvider extends ServiceProvider {
  register(): void {
    this.container.registerSingleton("db.factory", () => new ConnectionFactory());

    this.container.registerSingleton(
      "db",
      (c) => new DatabaseManager(c.resolve("config"), c.resolve("db.factory")),
    );

    // Fresh lookup each time so a purged default connection is reopened.
    this.container.registerFactory("db.connection", (c) => c.resolve("db").connection());
  }

  boot(container: Container): void {
    container.resolve("db").setEventDispatcher(container.resolve("events"));
  }
}
