import type { Logger } from "pino";
import { v4 as uuidv4 } from "uuid";
import { TransportError } from "@stowage/shared";

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export interface HttpTransportOptions {
  baseUrl: string;
  identity: string;
  timeoutMs?: number;
  fetch?: FetchLike;
  logger: Logger;
}

export interface TransportRequest {
  method: "GET" | "POST" | "DELETE";
  /** Raw path segments; each is percent-encoded when the URL is built. */
  segments: readonly string[];
  body?: Uint8Array;
}

/**
 * Issues one HTTP request per call against the service, attaching the identity header.
 * Nothing is pooled or shared between calls beyond the configuration.
 */
export class HttpTransport {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpTransportOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  urlFor(segments: readonly string[]): string {
    return `${this.options.baseUrl}/${segments.map((segment) => encodeURIComponent(segment)).join("/")}`;
  }

  async send(request: TransportRequest): Promise<Response> {
    const url = this.urlFor(request.segments);
    const headers: Record<string, string> = { User: this.options.identity };
    if (request.body) {
      headers["content-type"] = "application/octet-stream";
    }

    const log = this.options.logger.child({ requestId: uuidv4(), method: request.method, url });
    log.debug({ headers, bytes: request.body?.byteLength ?? 0 }, "sending request");

    const startedAt = Date.now();
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: request.method,
        headers,
        body: request.body,
        signal:
          this.options.timeoutMs === undefined ? undefined : AbortSignal.timeout(this.options.timeoutMs)
      });
    } catch (error) {
      log.error({ err: error }, "request failed");
      throw new TransportError(`HTTP ${request.method} ${url} failed: ${describeError(error)}`, {
        details: { method: request.method, url, timeoutMs: this.options.timeoutMs },
        cause: error
      });
    }

    log.debug({ status: response.status, durationMs: Date.now() - startedAt }, "request completed");
    return response;
  }

  async readBytes(response: Response): Promise<Uint8Array> {
    try {
      return new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      throw new TransportError(`failed to read response body: ${describeError(error)}`, {
        details: { status: response.status },
        cause: error
      });
    }
  }

  async readText(response: Response): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      throw new TransportError(`failed to read response body: ${describeError(error)}`, {
        details: { status: response.status },
        cause: error
      });
    }
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
