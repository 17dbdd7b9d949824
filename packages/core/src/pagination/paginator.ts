import {
  AbstractPaginator,
  isValidPageNumber,
  type PaginatorOptions,
} from "./abstract-paginator";

/**
 * Simple paginator that does not know the total. Pass one item more than
 * `perPage` to signal that another page exists.
 */
export class Paginator<T> extends AbstractPaginator<T> {
  private readonly hasMore: boolean;

  constructor(items: readonly T[], perPage: number, currentPage?: number, options: PaginatorOptions = {}) {
    const pageName = options.pageName ?? "page";
    const page = currentPage ?? AbstractPaginator.resolveCurrentPage(pageName);
    super(items.slice(0, perPage), perPage, isValidPageNumber(page) ? page : 1, options);
    this.hasMore = items.length > perPage;
  }

  hasMorePages(): boolean {
    return this.hasMore;
  }

  toJSON(): Record<string, unknown> {
    return {
      current_page: this.currentPage,
      data: this.items,
      first_page_url: this.url(1),
      from: this.firstItem(),
      next_page_url: this.nextPageUrl(),
      path: this.path,
      per_page: this.perPage,
      prev_page_url: this.previousPageUrl(),
      to: this.lastItem(),
    };
  }
}
