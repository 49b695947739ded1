import type { z } from 'zod';
import type { ApiClient } from './ApiClient.js';
import { BadRequestError, PermissionError, ServerError } from './errors.js';
import type { RequestParams } from './types.js';
import type { ApiVersion } from '../negotiation/versions.js';

export interface BoundClientInit {
  client: ApiClient;
  version: string;
  apiVersion: ApiVersion;
  capabilities: Iterable<string>;
}

// Resource calls get 401/403 and 400 translated; everything else passes through
function translateResourceError(error: unknown): never {
  if (error instanceof ServerError) {
    if (error.statusCode === 401 || error.statusCode === 403) {
      throw new PermissionError(error);
    }
    if (error.statusCode === 400) {
      throw new BadRequestError(error);
    }
  }
  throw error;
}

/**
 * A client fixed to one negotiated API version and capability set.
 *
 * Built only by the VersionNegotiator, after the version probe and the
 * credential check have both succeeded. The instance is frozen: its version
 * and capabilities never change, and a new negotiation yields a new object.
 * Resource code shares one BoundClient read-only.
 */
export class BoundClient {
  readonly apiURL: string;
  readonly version: string;
  readonly apiVersion: ApiVersion;
  private readonly client: ApiClient;
  private readonly capabilitySet: ReadonlySet<string>;

  constructor(init: BoundClientInit) {
    this.client = init.client;
    this.apiURL = init.client.apiURL;
    this.version = init.version;
    this.apiVersion = Object.freeze({ ...init.apiVersion });
    this.capabilitySet = new Set(init.capabilities);
    Object.freeze(this);
  }

  // A fresh copy on every read; the set held by the client never changes
  get capabilities(): ReadonlySet<string> {
    return new Set(this.capabilitySet);
  }

  hasCapability(name: string): boolean {
    return this.capabilitySet.has(name);
  }

  async get(path: string, op?: string, params?: RequestParams): Promise<Buffer> {
    try {
      return await this.client.get(path, op, params);
    } catch (error) {
      translateResourceError(error);
    }
  }

  async getJson<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    op?: string,
    params?: RequestParams,
  ): Promise<T> {
    try {
      return await this.client.getJson(path, schema, op, params);
    } catch (error) {
      translateResourceError(error);
    }
  }

  async post(path: string, op?: string, params?: RequestParams): Promise<Buffer> {
    try {
      return await this.client.post(path, op, params);
    } catch (error) {
      translateResourceError(error);
    }
  }

  async put(path: string, params?: RequestParams): Promise<Buffer> {
    try {
      return await this.client.put(path, params);
    } catch (error) {
      translateResourceError(error);
    }
  }

  async delete(path: string): Promise<void> {
    try {
      await this.client.delete(path);
    } catch (error) {
      translateResourceError(error);
    }
  }
}
