import { ServiceProvider } from "../providers/service-provider";
import { AbstractPaginator } from "./abstract-paginator";

/** Points the paginator resolvers at the container's current request. */
export class PaginationServiceProvider extends ServiceProvider {
  register(): void {
    const container = this.container;

    AbstractPaginator.currentPathResolver = () => container.resolve("request").url();

    AbstractPaginator.currentPageResolver = (pageName) => {
      const raw = container.resolve("request").input(pageName);
      const page = raw === undefined ? Number.NaN : Number(raw);
      return Number.isInteger(page) && page >= 1 ? page : 1;
    };
  }
}
