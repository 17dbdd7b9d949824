import type { IncomingMessage } from "node:http";

export type RequestHeaders = Readonly<Record<string, string>>;
export type RequestQuery = Readonly<Record<string, string>>;

type RequestInit = {
  method: string;
  scheme: "http" | "https";
  host: string;
  uri: string;
  headers: RequestHeaders;
};

function splitUri(uri: string): { path: string; query: RequestQuery } {
  const parsed = new URL(uri, "http://placeholder");
  return {
    path: parsed.pathname,
    query: Object.fromEntries(parsed.searchParams.entries()),
  };
}

/**
 * Immutable snapshot of the request being served, bound in the container as
 * `request`. Captured from CGI-style variables when no live request exists.
 */
export class CapturedRequest {
  readonly method: string;
  readonly scheme: "http" | "https";
  readonly host: string;
  readonly path: string;
  readonly query: RequestQuery;
  readonly headers: RequestHeaders;

  private constructor(init: RequestInit) {
    const { path, query } = splitUri(init.uri);
    this.method = init.method.toUpperCase();
    this.scheme = init.scheme;
    this.host = init.host;
    this.path = path;
    this.query = query;
    this.headers = init.headers;
  }

  static capture(env: NodeJS.ProcessEnv = process.env): CapturedRequest {
    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
      if (key.startsWith("HTTP_") && value !== undefined) {
        headers[key.slice(5).toLowerCase().replaceAll("_", "-")] = value;
      }
    }

    return new CapturedRequest({
      method: env.REQUEST_METHOD ?? "GET",
      scheme: env.HTTPS && env.HTTPS !== "off" ? "https" : "http",
      host: env.HTTP_HOST ?? env.SERVER_NAME ?? "localhost",
      uri: env.REQUEST_URI ?? "/",
      headers,
    });
  }

  static fromIncoming(message: IncomingMessage): CapturedRequest {
    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(message.headers)) {
      if (value === undefined) continue;
      headers[key] = Array.isArray(value) ? value.join(", ") : value;
    }

    const encrypted = "encrypted" in message.socket && message.socket.encrypted === true;
    const forwardedProto = headers["x-forwarded-proto"];

    return new CapturedRequest({
      method: message.method ?? "GET",
      scheme: encrypted || forwardedProto === "https" ? "https" : "http",
      host: headers.host ?? "localhost",
      uri: message.url ?? "/",
      headers,
    });
  }

  input(key: string): string | undefined;
  input(key: string, defaultValue: string): string;
  input(key: string, defaultValue?: string): string | undefined {
    return this.query[key] ?? defaultValue;
  }

  header(name: string): string | undefined {
    return this.headers[name.toLowerCase()];
  }

  /** Scheme, host and path without the query string. */
  url(): string {
    return `${this.scheme}://${this.host}${this.path}`;
  }

  fullUrl(): string {
    const search = new URLSearchParams(this.query).toString();
    return search ? `${this.url()}?${search}` : this.url();
  }
}
