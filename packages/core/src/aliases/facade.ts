import type { Container } from "../di/container";

/**
 * Static accessor base. Subclasses name the container key of the service
 * they front and reach it through `root()`.
 */
export abstract class Facade {
  private static app: Container | null = null;

  protected static accessor = "";

  static setFacadeApplication(app: Container | null): void {
    Facade.app = app;
  }

  static getFacadeApplication(): Container | null {
    return Facade.app;
  }

  protected static root<T>(this: typeof Facade): T {
    if (!Facade.app) {
      throw new Error("A facade root has not been set.");
    }
    if (!this.accessor) {
      throw new Error(`Facade ${this.name} does not name a service.`);
    }
    return Facade.app.resolve<T>(this.accessor);
  }
}
