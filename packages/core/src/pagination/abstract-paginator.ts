export type PaginatorOptions = {
  /** Base path used to build page URLs. Defaults to the current path resolver. */
  path?: string;
  pageName?: string;
  query?: Record<string, string>;
};

export type PathResolver = () => string;
export type PageResolver = (pageName: string) => number;

/** Shared state and URL building for the paginator variants. */
export abstract class AbstractPaginator<T> {
  static currentPathResolver: PathResolver = () => "/";
  static currentPageResolver: PageResolver = () => 1;

  protected readonly path: string;
  protected readonly pageName: string;
  protected readonly query: Record<string, string>;

  protected constructor(
    readonly items: readonly T[],
    readonly perPage: number,
    readonly currentPage: number,
    options: PaginatorOptions,
  ) {
    this.path = options.path ?? AbstractPaginator.currentPathResolver();
    this.pageName = options.pageName ?? "page";
    this.query = { ...options.query };
  }

  /** Restores the request-independent resolvers. */
  static useDefaultResolvers(): void {
    AbstractPaginator.currentPathResolver = () => "/";
    AbstractPaginator.currentPageResolver = () => 1;
  }

  static resolveCurrentPath(): string {
    return AbstractPaginator.currentPathResolver();
  }

  static resolveCurrentPage(pageName = "page"): number {
    return AbstractPaginator.currentPageResolver(pageName);
  }

  abstract hasMorePages(): boolean;

  url(page: number): string {
    const target = Math.max(page, 1);
    const params = new URLSearchParams({ ...this.query, [this.pageName]: String(target) });
    const separator = this.path.includes("?") ? "&" : "?";
    return `${this.path}${separator}${params.toString()}`;
  }

  nextPageUrl(): string | null {
    return this.hasMorePages() ? this.url(this.currentPage + 1) : null;
  }

  previousPageUrl(): string | null {
    return this.currentPage > 1 ? this.url(this.currentPage - 1) : null;
  }

  /** 1-based index of the first item on this page, null when empty. */
  firstItem(): number | null {
    return this.items.length > 0 ? (this.currentPage - 1) * this.perPage + 1 : null;
  }

  lastItem(): number | null {
    const first = this.firstItem();
    return first === null ? null : first + this.items.length - 1;
  }

  count(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  onFirstPage(): boolean {
    return this.currentPage <= 1;
  }

  getPath(): string {
    return this.path;
  }

  getPageName(): string {
    return this.pageName;
  }
}

export function isValidPageNumber(page: number): boolean {
  return Number.isInteger(page) && page >= 1;
}
