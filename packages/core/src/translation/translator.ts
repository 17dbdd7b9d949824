import type { FileLoader, TranslationLines } from "./file-loader";
import { selectMessage } from "./message-selector";

export type Replacements = Record<string, string | number>;

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function lineAt(lines: TranslationLines, path: string[]): string | undefined {
  let node: string | TranslationLines | undefined = lines;
  for (const key of path) {
    if (node === undefined || typeof node === "string") return undefined;
    node = node[key];
  }
  return typeof node === "string" ? node : undefined;
}

/** Looks up "group.key" lines per locale, falling back to the fallback locale. */
export class Translator {
  private readonly loaded = new Map<string, TranslationLines>();

  constructor(
    private readonly loader: FileLoader,
    private locale: string,
    private fallback: string = locale,
  ) {}

  /** Returns the line, or the key itself when no locale defines it. */
  get(key: string, replace: Replacements = {}, locale?: string): string {
    const line = this.find(key, locale);
    return this.makeReplacements(line ?? key, replace);
  }

  has(key: string, locale?: string): boolean {
    return this.find(key, locale) !== undefined;
  }

  choice(key: string, count: number, replace: Replacements = {}, locale?: string): string {
    const line = this.find(key, locale) ?? key;
    return this.makeReplacements(selectMessage(line, count), { count, ...replace });
  }

  getLocale(): string {
    return this.locale;
  }

  setLocale(locale: string): void {
    if (/[/\\]/.test(locale)) {
      throw new Error(`Invalid locale [${locale}].`);
    }
    this.locale = locale;
  }

  getFallback(): string {
    return this.fallback;
  }

  setFallback(fallback: string): void {
    this.fallback = fallback;
  }

  getLoader(): FileLoader {
    return this.loader;
  }

  private find(key: string, locale?: string): string | undefined {
    const locales = [locale ?? this.locale, this.fallback];
    for (const candidate of new Set(locales)) {
      const whole = lineAt(this.group(candidate, "*"), [key]);
      if (whole !== undefined) return whole;

      const [group, ...path] = key.split(".");
      if (group === undefined || path.length === 0) continue;

      const line = lineAt(this.group(candidate, group), path);
      if (line !== undefined) return line;
    }
    return undefined;
  }

  private group(locale: string, group: string): TranslationLines {
    const id = `${locale}::${group}`;
    let lines = this.loaded.get(id);
    if (!lines) {
      lines = this.loader.load(locale, group);
      this.loaded.set(id, lines);
    }
    return lines;
  }

  private makeReplacements(line: string, replace: Replacements): string {
    let result = line;
    // Longest keys first so ":name" does not clobber ":names".
    const keys = Object.keys(replace).sort((a, b) => b.length - a.length);
    for (const key of keys) {
      const value = String(replace[key]);
      result = result
        .replaceAll(`:${capitalize(key)}`, capitalize(value))
        .replaceAll(`:${key.toUpperCase()}`, value.toUpperCase())
        .replaceAll(`:${key}`, value);
    }
    return result;
  }
}
