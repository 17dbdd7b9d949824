import type { View as RenderedView, ViewFactory } from "../view/factory";
import type { ViewData } from "../view/engines";
import { Facade } from "./facade";

/** Facade over the `view` service. */
export class View extends Facade {
  protected static accessor = "view";

  static make(name: string, data: ViewData = {}): RenderedView {
    return this.root<ViewFactory>().make(name, data);
  }

  static exists(name: string): boolean {
    return this.root<ViewFactory>().exists(name);
  }

  static share(key: string, value: unknown): void {
    this.root<ViewFactory>().share(key, value);
  }
}
