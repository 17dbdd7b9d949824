import { createHash } from "node:crypto";
import { join } from "node:path";
import createDebug from "debug";
import type { Filesystem } from "../filesystem/filesystem";

const debug = createDebug("hostbridge:core:view");

export type TemplateToken =
  | { type: "text"; value: string }
  | { type: "echo"; path: string; escape: boolean };

// {!! path !!} echoes raw, {{ path }} echoes escaped
const ECHO_PATTERN = /\{!!\s*([\w.]+)\s*!!\}|\{\{\s*([\w.]+)\s*\}\}/g;

function isToken(value: unknown): value is TemplateToken {
  if (typeof value !== "object" || value === null || !("type" in value)) return false;
  if (value.type === "text") {
    return "value" in value && typeof value.value === "string";
  }
  return (
    value.type === "echo" &&
    "path" in value &&
    typeof value.path === "string" &&
    "escape" in value &&
    typeof value.escape === "boolean"
  );
}

export function parseTemplate(template: string): TemplateToken[] {
  const tokens: TemplateToken[] = [];
  let offset = 0;

  for (const match of template.matchAll(ECHO_PATTERN)) {
    const index = match.index ?? 0;
    if (index > offset) {
      tokens.push({ type: "text", value: template.slice(offset, index) });
    }
    const raw = match[1];
    const escaped = match[2];
    if (raw !== undefined) {
      tokens.push({ type: "echo", path: raw, escape: false });
    } else if (escaped !== undefined) {
      tokens.push({ type: "echo", path: escaped, escape: true });
    }
    offset = index + match[0].length;
  }

  if (offset < template.length) {
    tokens.push({ type: "text", value: template.slice(offset) });
  }
  return tokens;
}

/**
 * Compiles templates into token lists cached as JSON under the compiled
 * path. A cached file is reused until its source is modified again.
 */
export class TemplateCompiler {
  constructor(
    private readonly files: Filesystem,
    private readonly cachePath: string,
  ) {
    if (!cachePath) {
      throw new Error("Please provide a valid cache path.");
    }
  }

  getCompiledPath(path: string): string {
    const hash = createHash("sha1").update(path).digest("hex");
    return join(this.cachePath, `${hash}.json`);
  }

  isExpired(path: string): boolean {
    const compiled = this.getCompiledPath(path);
    if (!this.files.exists(compiled)) return true;
    return this.files.lastModified(path) >= this.files.lastModified(compiled);
  }

  compile(path: string): TemplateToken[] {
    debug("compile %s", path);
    const tokens = parseTemplate(this.files.get(path));
    this.files.put(this.getCompiledPath(path), JSON.stringify(tokens));
    return tokens;
  }

  /** Reads the cached token list for `path`, compiling it first when stale. */
  load(path: string): TemplateToken[] {
    if (this.isExpired(path)) {
      return this.compile(path);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(this.files.get(this.getCompiledPath(path)));
    } catch (error) {
      if (!(error instanceof SyntaxError)) throw error;
      debug("compiled file for %s is not valid JSON, recompiling", path);
      return this.compile(path);
    }
    if (!Array.isArray(parsed) || !parsed.every(isToken)) {
      debug("compiled file for %s is malformed, recompiling", path);
      return this.compile(path);
    }
    return parsed;
  }
}
