// This is the public entrypoint re-exporting the client, its building blocks and the error taxonomy.

export { JsonRpcClient, type CallOptions, type JsonRpcClientOptions } from './client/client.js';
export { createMethodProxy, type DynamicMethods, type MethodProxy, type RemoteMethods } from './client/proxy.js';
export { createHttpClient, type HttpClientOptions } from './client/runtime.js';
export type { Transport } from './client/transport.js';
export {
  DEFAULT_HTTP_TIMEOUT_MS,
  createClientConfig,
  loadClientConfig,
  type ClientConfig,
  type EnvironmentConfig
} from './config/client-config.js';
export { HttpTransport, type HttpTransportOptions } from './http/transport.js';
export {
  CounterIdGenerator,
  defaultIdGenerator,
  hexIdGenerator,
  randomIdGenerator,
  resetRequestIds,
  uuidIdGenerator,
  type IdGenerator
} from './jsonrpc/ids.js';
export {
  buildNotification,
  buildRequest,
  isNotification,
  type BuildRequestOptions,
  type ParamsInput
} from './jsonrpc/request.js';
export { processResponse } from './jsonrpc/response.js';
export { errorObjectSchema, jsonSchemaDocuments, requestSchema, responseSchema } from './jsonrpc/schemas.js';
export { validate, validateBatch } from './jsonrpc/validator.js';
export type * from './types/jsonrpc.js';
export {
  InvalidCallOptionsError,
  InvalidParamsUsageError,
  JSON_RPC_ERROR_CODES,
  JsonRpcClientError,
  ParseResponseError,
  ReceivedErrorResponse,
  ReceivedNon2xxResponseError,
  TransportError,
  ValidationError,
  errorCodeName,
  type ErrorContext,
  type SchemaKind,
  type ValidationIssue
} from './utils/errors.js';
export { buildLoggerOptions, createLogger, errorForLog, sanitizeForLog } from './utils/logger.js';
export { CLIENT_NAME, CLIENT_VERSION, JSONRPC_VERSION } from './version.js';
