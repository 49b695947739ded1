export { connect, type ConnectOptions } from './connect.js';
export { loadConfig, type Config } from './config.js';

export {
  ANONYMOUS,
  parseCredentials,
  type AnonymousCredentials,
  type Credentials,
  type KeyedCredentials,
} from './auth/credentials.js';
export {
  PlainTextOAuthSigner,
  anonymousSigner,
  createSigner,
  type RequestSigner,
  type SignerOptions,
} from './auth/signer.js';

export { ApiClient, decodeJson, safeDecodeJson, type SendOptions } from './client/ApiClient.js';
export { BoundClient } from './client/BoundClient.js';
export { Dispatcher, RequestCounter, unwrapOutcome, type DispatcherOptions } from './client/Dispatcher.js';
export * from './client/errors.js';
export { prepareRequest, type RequestBody, type RequestInit } from './client/request.js';
export { DEFAULT_MAX_RETRIES, DEFAULT_MAX_RETRY_AFTER_MS, parseRetryAfter } from './client/retry.js';
export { VersionInfoSchema, type VersionInfo } from './client/schemas/index.js';
export { createGotTransport, type GotTransportOptions } from './client/transport.js';
export type {
  DispatchOutcome,
  HttpMethod,
  PreparedRequest,
  RequestParams,
  Transport,
  TransportResponse,
} from './client/types.js';
export {
  addAPIVersionToURL,
  ensureTrailingSlash,
  joinURLs,
  splitVersionedURL,
  type SplitURL,
} from './client/urls.js';

export {
  VersionNegotiator,
  type NegotiationResult,
  type NegotiationState,
  type NegotiatorOptions,
} from './negotiation/VersionNegotiator.js';
export {
  SUPPORTED_API_VERSIONS,
  formatApiVersion,
  looksLikeLoginRedirect,
  parseApiVersion,
  type ApiVersion,
} from './negotiation/versions.js';

export { createConsoleLogger, silentLogger, type LogLevel, type Logger } from './logger.js';
