import { join } from "node:path";
import createDebug from "debug";
import type { Filesystem } from "../filesystem/filesystem";

const debug = createDebug("hostbridge:core:translation");

export type TranslationLines = { [key: string]: string | TranslationLines };

function isTranslationLines(value: unknown): value is TranslationLines {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(
    (entry) => typeof entry === "string" || isTranslationLines(entry),
  );
}

/**
 * Reads translation groups from JSON files: `<path>/<locale>/<group>.json`,
 * or `<path>/<locale>.json` for the "*" group of whole-string keys.
 */
export class FileLoader {
  constructor(
    private readonly files: Filesystem,
    private readonly path: string,
  ) {}

  load(locale: string, group: string): TranslationLines {
    const file =
      group === "*"
        ? join(this.path, `${locale}.json`)
        : join(this.path, locale, `${group}.json`);

    if (!this.files.exists(file)) {
      debug("load %s/%s: no file", locale, group);
      return {};
    }

    const parsed: unknown = JSON.parse(this.files.get(file));
    if (!isTranslationLines(parsed)) {
      throw new Error(`Translation file [${file}] must contain an object of strings.`);
    }
    debug("load %s/%s: %d keys", locale, group, Object.keys(parsed).length);
    return parsed;
  }

  getPath(): string {
    return this.path;
  }
}
