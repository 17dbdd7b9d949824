import type { Filesystem } from "../filesystem/filesystem";
import type { TemplateCompiler, TemplateToken } from "./compiler";

export type ViewData = Record<string, unknown>;

export interface Engine {
  get(path: string, data: ViewData): string;
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#039;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

function lookup(data: ViewData, path: string): unknown {
  let node: unknown = data;
  for (const key of path.split(".")) {
    if (typeof node !== "object" || node === null || !Object.hasOwn(node, key)) return undefined;
    node = Reflect.get(node, key);
  }
  return node;
}

function stringify(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

export function renderTokens(tokens: readonly TemplateToken[], data: ViewData): string {
  return tokens
    .map((token) => {
      if (token.type === "text") return token.value;
      const value = stringify(lookup(data, token.path));
      return token.escape ? escapeHtml(value) : value;
    })
    .join("");
}

/** Serves files verbatim. */
export class FileEngine implements Engine {
  constructor(private readonly files: Filesystem) {}

  get(path: string): string {
    return this.files.get(path);
  }
}

/** Renders templates through the compiler's cached token lists. */
export class CompilerEngine implements Engine {
  constructor(private readonly compiler: TemplateCompiler) {}

  get(path: string, data: ViewData): string {
    return renderTokens(this.compiler.load(path), data);
  }
}

export class EngineResolver {
  private readonly resolvers = new Map<string, () => Engine>();
  private readonly resolved = new Map<string, Engine>();

  /** Registers (or replaces) the engine built lazily under `name`. */
  register(name: string, resolver: () => Engine): void {
    this.resolved.delete(name);
    this.resolvers.set(name, resolver);
  }

  resolve(name: string): Engine {
    const cached = this.resolved.get(name);
    if (cached) return cached;

    const resolver = this.resolvers.get(name);
    if (!resolver) {
      throw new Error(`Engine [${name}] not found.`);
    }
    const engine = resolver();
    this.resolved.set(name, engine);
    return engine;
  }
}
