import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  rmSync,
  statSync,
  writeFileSync,
} from "node:fs";
import { dirname, join } from "node:path";
import { FileNotFoundError } from "../errors/errors";

/** Synchronous file helpers bound in the container as `files`. */
export class Filesystem {
  exists(path: string): boolean {
    return existsSync(path);
  }

  isFile(path: string): boolean {
    return this.exists(path) && statSync(path).isFile();
  }

  isDirectory(path: string): boolean {
    return this.exists(path) && statSync(path).isDirectory();
  }

  get(path: string): string {
    if (!this.isFile(path)) {
      throw new FileNotFoundError(path);
    }
    return readFileSync(path, "utf8");
  }

  /** Writes `contents`, creating parent directories as needed. */
  put(path: string, contents: string): void {
    this.makeDirectory(dirname(path));
    writeFileSync(path, contents, "utf8");
  }

  delete(path: string): boolean {
    if (!this.exists(path)) return false;
    rmSync(path, { force: true });
    return true;
  }

  makeDirectory(path: string): void {
    mkdirSync(path, { recursive: true });
  }

  /** Full paths of the regular files directly inside `directory`, sorted. */
  files(directory: string): string[] {
    if (!this.isDirectory(directory)) return [];
    return readdirSync(directory, { withFileTypes: true })
      .filter((entry) => entry.isFile())
      .map((entry) => join(directory, entry.name))
      .sort();
  }

  /** Last modification time in milliseconds since the epoch. */
  lastModified(path: string): number {
    if (!this.exists(path)) {
      throw new FileNotFoundError(path);
    }
    return statSync(path).mtimeMs;
  }
}
