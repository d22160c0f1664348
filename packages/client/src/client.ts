import { basename } from "node:path";
import type { Logger } from "pino";
import {
  InputError,
  ResponseError,
  decodeBlobList,
  encodeBlobList,
  type BlobList
} from "@stowage/shared";
import { validateConfig, type ClientConfig, type ClientConfigInput } from "./config.js";
import { readUploadFile } from "./files.js";
import { createLogger } from "./logger.js";
import { HttpTransport, type FetchLike } from "./transport/httpTransport.js";

export interface StowageClientDeps {
  fetch?: FetchLike;
  logger?: Logger;
}

type BlobRoute = "put" | "update" | "append";

/**
 * Client for the blob storage service. Every operation issues exactly one HTTP request;
 * write payloads travel as an encoded blob list and `get` decodes one.
 */
export class StowageClient {
  readonly config: ClientConfig;
  private readonly logger: Logger;
  private readonly transport: HttpTransport;

  /** @throws ConfigError when the identity or base URL is missing. */
  constructor(config: ClientConfigInput, deps: StowageClientDeps = {}) {
    this.config = validateConfig(config);
    this.logger =
      deps.logger ?? createLogger({ level: this.config.logLevel, pretty: this.config.prettyLogs });
    this.transport = new HttpTransport({
      baseUrl: this.config.baseUrl,
      identity: this.config.identity,
      timeoutMs: this.config.timeoutMs,
      fetch: deps.fetch,
      logger: this.logger
    });
  }

  /**
   * Uploads a local file as a single-blob list. The key defaults to the file's base name.
   */
  async put(filePath: string, key?: string): Promise<Response> {
    const data = await readUploadFile(filePath);
    return this.sendBlobs("put", key || basename(filePath), [data]);
  }

  async putBinary(key: string, blobs: readonly Uint8Array[]): Promise<Response> {
    return this.sendBlobs("put", key, blobs);
  }

  /** Renames a key and returns the service's response text. */
  async updateKey(oldKey: string, newKey: string): Promise<string> {
    requireArgument(oldKey, "old key");
    requireArgument(newKey, "new key");
    const response = await this.transport.send({
      method: "POST",
      segments: ["update_key", oldKey, newKey]
    });
    return this.transport.readText(response);
  }

  async update(key: string, blobs: readonly Uint8Array[]): Promise<Response> {
    return this.sendBlobs("update", key, blobs);
  }

  async append(key: string, blobs: readonly Uint8Array[]): Promise<Response> {
    return this.sendBlobs("append", key, blobs);
  }

  async delete(key: string): Promise<Response> {
    requireArgument(key, "key");
    return this.transport.send({ method: "DELETE", segments: ["delete", key] });
  }

  /**
   * Fetches and decodes the blobs stored under `key`. Empty blobs are not returned.
   * @throws ResponseError on a non-2xx status, ParseError on a malformed body.
   */
  async get(key: string): Promise<BlobList> {
    requireArgument(key, "key");
    const response = await this.transport.send({ method: "GET", segments: ["get", key] });
    const body = await this.transport.readBytes(response);
    if (!response.ok) {
      throw new ResponseError(response.status, new TextDecoder().decode(body), { key });
    }

    const blobs = decodeBlobList(body);
    this.logger.debug({ key, blobs: blobs.length, bytes: body.byteLength }, "decoded blob list");
    return blobs;
  }

  private async sendBlobs(route: BlobRoute, key: string, blobs: readonly Uint8Array[]): Promise<Response> {
    requireArgument(key, "key");
    const body = encodeBlobList(blobs);
    this.logger.debug({ key, blobs: blobs.length, bytes: body.byteLength }, "encoded blob list");
    return this.transport.send({ method: "POST", segments: [route, key], body });
  }
}

function requireArgument(value: string, name: string): void {
  if (value === "") {
    throw new InputError(`${name} must not be empty`);
  }
}
