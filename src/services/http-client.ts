import http from "node:http";
import type { Readable } from "node:stream";

/**
 * Where the Docker Engine API listens: a Unix socket, or a TCP host.
 */
export type DockerEndpoint =
  | { kind: "socket"; socketPath: string }
  | { kind: "tcp"; hostname: string; port: number };

export type RequestOptions = {
  signal?: AbortSignal;
  query?: Record<string, string | number | boolean | undefined>;
};

export class HttpError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly data: unknown,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export class AbortedError extends Error {
  constructor(message = "Request aborted") {
    super(message);
    this.name = "AbortedError";
  }
}

export interface HttpClient {
  get(path: string, options?: RequestOptions): Promise<unknown>;
  post(path: string, body?: unknown, options?: RequestOptions): Promise<unknown>;
  delete(path: string, options?: RequestOptions): Promise<unknown>;
  stream(path: string, options?: RequestOptions & { method?: "GET" | "POST"; body?: unknown }): Promise<Readable>;
  destroy(): void;
}

export function parseDockerHost(host: string): DockerEndpoint {
  if (host.startsWith("unix://")) {
    return { kind: "socket", socketPath: host.slice("unix://".length) };
  }
  if (host.startsWith("/")) {
    return { kind: "socket", socketPath: host };
  }
  const url = new URL(host.replace(/^tcp:\/\//, "http://"));
  return { kind: "tcp", hostname: url.hostname, port: Number(url.port || 2375) };
}

export function endpointKey(endpoint: DockerEndpoint): string {
  return endpoint.kind === "socket"
    ? `unix://${endpoint.socketPath}`
    : `tcp://${endpoint.hostname}:${endpoint.port}`;
}

function withQuery(path: string, query?: RequestOptions["query"]): string {
  if (!query) return path;
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) params.set(key, String(value));
  }
  const qs = params.toString();
  return qs ? `${path}?${qs}` : path;
}

function parseBody(raw: string, contentType: string | undefined): unknown {
  if (!raw) return null;
  if (contentType?.includes("json")) {
    try {
      return JSON.parse(raw);
    } catch {
      return raw;
    }
  }
  return raw;
}

function errorFromResponse(method: string, path: string, res: http.IncomingMessage, raw: string): HttpError {
  const data = parseBody(raw, res.headers["content-type"]);
  // The daemon reports failures as {"message": "..."}
  const detail =
    data && typeof data === "object" && "message" in data && typeof data.message === "string"
      ? `: ${data.message}`
      : "";
  return new HttpError(
    `${method} ${path} → ${res.statusCode} ${res.statusMessage ?? ""}${detail}`.trim(),
    res.statusCode ?? 0,
    data,
  );
}

class DockerHttpClient implements HttpClient {
  private agent: http.Agent;

  constructor(private readonly endpoint: DockerEndpoint) {
    this.agent = new http.Agent({ keepAlive: true });
  }

  private baseOptions(method: string, path: string, headers: http.OutgoingHttpHeaders): http.RequestOptions {
    const common = { method, path, headers, agent: this.agent };
    return this.endpoint.kind === "socket"
      ? { ...common, socketPath: this.endpoint.socketPath }
      : { ...common, hostname: this.endpoint.hostname, port: this.endpoint.port };
  }

  private request(
    method: string,
    rawPath: string,
    body?: unknown,
    options?: RequestOptions,
  ): Promise<unknown> {
    const path = withQuery(rawPath, options?.query);
    return new Promise((resolve, reject) => {
      if (options?.signal?.aborted) {
        reject(new AbortedError());
        return;
      }
      const payload = body === undefined ? undefined : JSON.stringify(body);
      const headers: http.OutgoingHttpHeaders = {
        "Content-Type": "application/json",
        ...(payload !== undefined && { "Content-Length": Buffer.byteLength(payload) }),
      };

      const req = http.request(this.baseOptions(method, path, headers), (res) => {
        let data = "";
        res.setEncoding("utf8");
        res.on("data", (chunk: string) => {
          data += chunk;
        });
        res.on("end", () => {
          if (res.statusCode && res.statusCode >= 400) {
            reject(errorFromResponse(method, path, res, data));
            return;
          }
          resolve(parseBody(data, res.headers["content-type"]));
        });
        res.on("error", reject);
      });

      req.on("error", reject);

      if (options?.signal) {
        const onAbort = () => {
          req.destroy();
          reject(new AbortedError());
        };
        options.signal.addEventListener("abort", onAbort, { once: true });
        req.on("close", () => options.signal?.removeEventListener("abort", onAbort));
      }

      if (payload !== undefined) {
        req.write(payload);
      }

      req.end();
    });
  }

  get(path: string, options?: RequestOptions): Promise<unknown> {
    return this.request("GET", path, undefined, options);
  }

  post(path: string, body?: unknown, options?: RequestOptions): Promise<unknown> {
    return this.request("POST", path, body, options);
  }

  delete(path: string, options?: RequestOptions): Promise<unknown> {
    return this.request("DELETE", path, undefined, options);
  }

  stream(
    rawPath: string,
    options?: RequestOptions & { method?: "GET" | "POST"; body?: unknown },
  ): Promise<Readable> {
    const method = options?.method ?? "GET";
    const path = withQuery(rawPath, options?.query);
    return new Promise((resolve, reject) => {
      if (options?.signal?.aborted) {
        reject(new AbortedError());
        return;
      }
      const payload = options?.body === undefined ? undefined : JSON.stringify(options.body);
      const headers: http.OutgoingHttpHeaders = payload !== undefined
        ? { "Content-Type": "application/json", "Content-Length": Buffer.byteLength(payload) }
        : {};

      const req = http.request(this.baseOptions(method, path, headers), (res) => {
        if (res.statusCode && res.statusCode >= 400) {
          // For streams, collect the error body and reject with a structured error
          let errorData = "";
          res.setEncoding("utf8");
          res.on("data", (chunk: string) => {
            errorData += chunk;
          });
          res.on("end", () => reject(errorFromResponse(method, path, res, errorData)));
          return;
        }

        resolve(res);
      });

      req.on("error", reject);

      if (options?.signal) {
        const onAbort = () => {
          req.destroy(new AbortedError());
          reject(new AbortedError());
        };
        options.signal.addEventListener("abort", onAbort, { once: true });
        req.on("close", () => options.signal?.removeEventListener("abort", onAbort));
      }

      if (payload !== undefined) {
        req.write(payload);
      }

      req.end();
    });
  }

  destroy(): void {
    this.agent.destroy();
  }
}

// Multiton pattern - one client instance per daemon endpoint
class HttpClientManager {
  private static instance: HttpClientManager;
  private clients: Map<string, HttpClient> = new Map();

  static getInstance(): HttpClientManager {
    if (!HttpClientManager.instance) {
      HttpClientManager.instance = new HttpClientManager();
    }
    return HttpClientManager.instance;
  }

  getClient(endpoint: DockerEndpoint): HttpClient {
    const key = endpointKey(endpoint);
    const existing = this.clients.get(key);
    if (existing) return existing;

    const client = new DockerHttpClient(endpoint);
    this.clients.set(key, client);
    return client;
  }

  // Drop and close all clients (used on shutdown)
  clearClients(): void {
    for (const client of this.clients.values()) client.destroy();
    this.clients.clear();
  }
}

// Export singleton instance
export const httpClientManager = HttpClientManager.getInstance();

// Convenience function to get a client
export function getHttpClient(endpoint: DockerEndpoint): HttpClient {
  return httpClientManager.getClient(endpoint);
}
