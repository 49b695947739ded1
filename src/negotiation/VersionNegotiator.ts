import { ANONYMOUS, type Credentials } from '../auth/credentials.js';
import { createSigner, type SignerOptions } from '../auth/signer.js';
import { ApiClient, safeDecodeJson } from '../client/ApiClient.js';
import { BoundClient } from '../client/BoundClient.js';
import { Dispatcher, type DispatcherOptions } from '../client/Dispatcher.js';
import {
  DeserializationError,
  PermissionError,
  ServerError,
  TransportError,
  UnexpectedError,
  UnsupportedVersionError,
  type MaasError,
} from '../client/errors.js';
import { VersionInfoSchema } from '../client/schemas/index.js';
import { addAPIVersionToURL, splitVersionedURL } from '../client/urls.js';
import { silentLogger, type Logger } from '../logger.js';
import { SUPPORTED_API_VERSIONS, looksLikeLoginRedirect, parseApiVersion } from './versions.js';

export interface NegotiatorOptions extends Omit<DispatcherOptions, 'signer'> {
  // Server URL, optionally already ending in /api/X.Y/
  baseURL: string;
  credentials?: Credentials;
  // Pins one version instead of negotiating; takes precedence over a version in baseURL
  apiVersion?: string;
  candidateVersions?: readonly string[];
  signerOptions?: SignerOptions;
}

export type NegotiationState =
  | { status: 'trying'; index: number }
  | { status: 'success'; version: string; capabilities: ReadonlySet<string>; client: BoundClient }
  | { status: 'exhausted'; error: UnsupportedVersionError }
  | { status: 'fatal'; error: MaasError };

export type NegotiationResult = Exclude<NegotiationState, { status: 'trying' }>;

type VersionProbe =
  | { kind: 'offered'; capabilities: string[] }
  | { kind: 'not-offered'; reason: ServerError | DeserializationError }
  | { kind: 'fatal'; error: TransportError | ServerError | DeserializationError };

// Only these answers to the version probe mean "this version is not served here"
const NOT_OFFERED_STATUSES: ReadonlySet<number> = new Set([404, 410]);

const DENIED_STATUSES: ReadonlySet<number> = new Set([401, 403]);

/**
 * Finds an API version the server offers and verifies
 * the credentials against it.
 *
 * Candidates are tried in order. For each one the negotiator fetches
 * `api/X.Y/version/`; a 404 or 410 (or the legacy HTML login redirect)
 * moves on to the next candidate, while any other failure stops the
 * negotiation and is reported as is. Once a version answers, a `whoami`
 * probe checks the credentials and the BoundClient is built.
 *
 * Negotiation changes nothing on the server and always restarts from the
 * first candidate, so `run()` may be called again after a failure.
 */
export class VersionNegotiator {
  readonly baseURL: string;
  readonly candidates: readonly string[];
  private readonly pinnedVersion: string | undefined;
  private readonly dispatcher: Dispatcher;
  private readonly logger: Logger;

  constructor(options: NegotiatorOptions) {
    const { baseURL, credentials, apiVersion, candidateVersions, signerOptions, ...dispatcherOptions } = options;
    this.candidates = Object.freeze([...(candidateVersions ?? SUPPORTED_API_VERSIONS)]);
    // Throws InvalidVersionError on a malformed entry
    this.candidates.forEach(parseApiVersion);

    const split = splitVersionedURL(baseURL);
    this.baseURL = split.base;
    this.pinnedVersion = apiVersion ?? (split.includesVersion ? split.version : undefined);
    if (this.pinnedVersion !== undefined) parseApiVersion(this.pinnedVersion);

    this.logger = dispatcherOptions.logger ?? silentLogger;
    this.dispatcher = new Dispatcher({
      ...dispatcherOptions,
      signer: createSigner(credentials ?? ANONYMOUS, signerOptions),
    });
  }

  /**
   * Drives the state machine to a terminal state.
   *
   * Never throws for server or network trouble; that ends up in a `fatal`
   * state. A pinned version missing from the candidate list ends in
   * `fatal` before any request is made.
   */
  async run(): Promise<NegotiationResult> {
    const pinned = this.pinnedVersion;
    if (pinned !== undefined && !this.candidates.includes(pinned)) {
      return { status: 'fatal', error: new UnsupportedVersionError(`version ${pinned}`) };
    }
    const order = pinned === undefined ? this.candidates : [pinned];

    let state: NegotiationState = { status: 'trying', index: 0 };
    while (state.status === 'trying') {
      state = await this.step(order, state.index);
      this.logger.debug(`negotiation: ${describeState(state, order)}`);
    }
    return state;
  }

  // Resolves with the BoundClient or throws the typed error of the terminal state
  async negotiate(): Promise<BoundClient> {
    const result = await this.run();
    if (result.status === 'success') return result.client;
    throw result.error;
  }

  private async step(order: readonly string[], index: number): Promise<NegotiationState> {
    if (index >= order.length) {
      return { status: 'exhausted', error: this.exhaustedError(order) };
    }
    const version = order[index];
    const client = new ApiClient(addAPIVersionToURL(this.baseURL, version), this.dispatcher);
    this.logger.debug(`negotiation: probing ${client.apiURL}version/`);

    const probe = await this.probeVersion(client);
    if (probe.kind === 'not-offered') {
      this.logger.debug(`negotiation: version ${version} not offered`, { reason: probe.reason.message });
      return { status: 'trying', index: index + 1 };
    }
    if (probe.kind === 'fatal') {
      return { status: 'fatal', error: probe.error };
    }

    const credentialsError = await this.checkCredentials(client);
    if (credentialsError) {
      return { status: 'fatal', error: credentialsError };
    }

    const bound = new BoundClient({
      client,
      version,
      apiVersion: parseApiVersion(version),
      capabilities: probe.capabilities,
    });
    return { status: 'success', version, capabilities: bound.capabilities, client: bound };
  }

  private async probeVersion(client: ApiClient): Promise<VersionProbe> {
    const outcome = await client.send('GET', 'version');
    switch (outcome.kind) {
      case 'transport':
        return { kind: 'fatal', error: outcome.error };
      case 'server':
        return NOT_OFFERED_STATUSES.has(outcome.error.statusCode)
          ? { kind: 'not-offered', reason: outcome.error }
          : { kind: 'fatal', error: outcome.error };
      case 'success': {
        const decoded = safeDecodeJson(outcome.body, VersionInfoSchema, 'version response');
        if (decoded.success) {
          return { kind: 'offered', capabilities: decoded.data.capabilities };
        }
        return looksLikeLoginRedirect(outcome.body)
          ? { kind: 'not-offered', reason: decoded.error }
          : { kind: 'fatal', error: decoded.error };
      }
    }
  }

  // Bad credentials do not depend on the version, so any failure here is final
  private async checkCredentials(client: ApiClient): Promise<MaasError | undefined> {
    const outcome = await client.send('GET', 'users', { op: 'whoami' });
    if (outcome.kind === 'success') return undefined;
    if (outcome.kind === 'server' && DENIED_STATUSES.has(outcome.error.statusCode)) {
      return new PermissionError(outcome.error);
    }
    return new UnexpectedError(outcome.error);
  }

  private exhaustedError(order: readonly string[]): UnsupportedVersionError {
    if (order.length === 1 && this.pinnedVersion !== undefined) {
      return new UnsupportedVersionError(`version ${this.pinnedVersion} is not offered by ${this.baseURL}`);
    }
    return new UnsupportedVersionError(
      `controller at ${this.baseURL} does not support any of ${order.join(', ')}`,
    );
  }
}

function describeState(state: NegotiationState, order: readonly string[]): string {
  switch (state.status) {
    case 'trying':
      return `next candidate ${order[state.index] ?? '(none left)'}`;
    case 'success':
      return `settled on ${state.version}`;
    case 'exhausted':
      return 'no candidate version offered';
    case 'fatal':
      return `stopped: ${state.error.message}`;
  }
}
