import { join } from "node:path";
import type { Filesystem } from "../filesystem/filesystem";
import { ViewNotFoundError } from "../errors/errors";

/** Maps dotted view names ("users.index") to files under the view paths. */
export class FileViewFinder {
  private readonly views = new Map<string, string>();

  constructor(
    private readonly files: Filesystem,
    private paths: string[],
    private extensions: string[] = ["tpl", "html"],
  ) {}

  find(name: string): string {
    const cached = this.views.get(name);
    if (cached) return cached;

    const relative = name.split(".").join("/");
    for (const path of this.paths) {
      for (const extension of this.extensions) {
        const candidate = join(path, `${relative}.${extension}`);
        if (this.files.isFile(candidate)) {
          this.views.set(name, candidate);
          return candidate;
        }
      }
    }

    throw new ViewNotFoundError(name);
  }

  addLocation(path: string): void {
    this.paths.push(path);
  }

  /** Registers an extension ahead of the existing ones. */
  addExtension(extension: string): void {
    this.extensions = [extension, ...this.extensions.filter((e) => e !== extension)];
  }

  getPaths(): readonly string[] {
    return this.paths;
  }

  getExtensions(): readonly string[] {
    return this.extensions;
  }

  flush(): void {
    this.views.clear();
  }
}
