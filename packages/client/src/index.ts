export { StowageClient, type StowageClientDeps } from "./client.js";
export {
  ClientConfigSchema,
  LogLevelSchema,
  readConfig,
  validateConfig,
  type ClientConfig,
  type ClientConfigInput
} from "./config.js";
export { createLogger, type LoggerSettings } from "./logger.js";
export { readUploadFile } from "./files.js";
export {
  HttpTransport,
  type FetchLike,
  type HttpTransportOptions,
  type TransportRequest
} from "./transport/httpTransport.js";
export * from "@stowage/shared";
