import {
  AbstractPaginator,
  isValidPageNumber,
  type PaginatorOptions,
} from "./abstract-paginator";

/** Paginator over a known total, able to report the last page. */
export class LengthAwarePaginator<T> extends AbstractPaginator<T> {
  readonly total: number;
  readonly lastPage: number;

  constructor(
    items: readonly T[],
    total: number,
    perPage: number,
    currentPage?: number,
    options: PaginatorOptions = {},
  ) {
    const pageName = options.pageName ?? "page";
    const page = currentPage ?? AbstractPaginator.resolveCurrentPage(pageName);
    super(items, perPage, isValidPageNumber(page) ? page : 1, options);
    this.total = total;
    this.lastPage = Math.max(Math.ceil(total / perPage), 1);
  }

  hasMorePages(): boolean {
    return this.currentPage < this.lastPage;
  }

  lastPageUrl(): string {
    return this.url(this.lastPage);
  }

  toJSON(): Record<string, unknown> {
    return {
      current_page: this.currentPage,
      data: this.items,
      first_page_url: this.url(1),
      from: this.firstItem(),
      last_page: this.lastPage,
      last_page_url: this.lastPageUrl(),
      next_page_url: this.nextPageUrl(),
      path: this.path,
      per_page: this.perPage,
      prev_page_url: this.previousPageUrl(),
      to: this.lastItem(),
      total: this.total,
    };
  }
}
