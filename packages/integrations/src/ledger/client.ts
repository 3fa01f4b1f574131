/**
 * Ledger API Client
 * Session handling, record finds, movement records and the recalculation script
 */

import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import type PQueue from 'p-queue';
import type { Logger } from 'pino';
import {
  AuthenticationError,
  LedgerAPIError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from '../errors.js';
import { createApiRateLimiter } from '../utils/rate-limiter.js';
import { DEFAULT_TRANSPORT_RETRY_POLICY, withRetry, type RetryPolicy } from '../utils/retry.js';
import type {
  ConnectionCheck,
  LedgerOperations,
  LedgerProduct,
  MovementUnits,
  StockRecord,
} from '../types.js';
import {
  describeMessages,
  messageCode,
  parseEnvelope,
  parseFindRecords,
  parseProduct,
  parseScriptError,
  parseStockRecord,
  toForeignKey,
} from './parsers.js';
import type { SessionTokenCache } from './session.js';
import {
  DEFAULT_LEDGER_LAYOUT,
  HTTP_SESSION_EXPIRED,
  LEDGER_CODE_NO_RECORDS,
  LEDGER_CODE_OK,
  sessionResponseSchema,
  type LedgerClientConfig,
  type LedgerEnvelope,
  type LedgerLayout,
  type LedgerMethod,
  type LedgerRecord,
  type LedgerRequestOptions,
} from './types.js';

/**
 * Prefix a scheme-less host with https and drop trailing slashes
 */
export function normalizeHost(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

export class LedgerApiClient implements LedgerOperations {
  private readonly httpClient: AxiosInstance;
  private readonly rateLimiter: PQueue;
  private readonly retryPolicy: RetryPolicy;
  private readonly layout: LedgerLayout;
  private readonly sessionCache: SessionTokenCache;
  private readonly logger: Logger;
  private readonly credentials: { username: string; password: string };
  private token: string | null = null;
  private pendingLogin: Promise<string> | null = null;

  constructor(config: LedgerClientConfig) {
    this.layout = { ...DEFAULT_LEDGER_LAYOUT, ...config.layout };
    this.retryPolicy = config.retryPolicy ?? DEFAULT_TRANSPORT_RETRY_POLICY;
    this.sessionCache = config.sessionCache;
    this.logger = config.logger.child({ component: 'ledger-client' });
    this.credentials = { username: config.username, password: config.password };

    this.httpClient = axios.create({
      baseURL: `${normalizeHost(config.host)}/fmi/data/v1/databases/${encodeURIComponent(config.database)}`,
      timeout: config.timeout ?? 30000,
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      // Callers read message codes from error bodies too
      validateStatus: () => true,
      adapter: config.adapter,
    });

    this.rateLimiter = createApiRateLimiter('ledger');
  }

  // ============================================================================
  // Session Management
  // ============================================================================

  /**
   * Return a live token, logging in when the shared cache has none.
   * Concurrent callers share a login already in flight.
   */
  async authenticate(forceRefresh = false): Promise<string> {
    if (!forceRefresh) {
      const cached = this.sessionCache.get();
      if (cached) {
        this.token = cached;
        return cached;
      }
    }

    if (!this.pendingLogin) {
      this.pendingLogin = this.login().finally(() => {
        this.pendingLogin = null;
      });
    }
    return this.pendingLogin;
  }

  private async login(): Promise<string> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.send({
        method: 'POST',
        url: '/sessions',
        data: {},
        auth: this.credentials,
      });
    } catch (error) {
      throw new AuthenticationError(`Ledger login failed: ${errorMessage(error)}`);
    }

    if (!isSuccessStatus(response.status)) {
      throw new AuthenticationError(`Ledger login failed with HTTP ${response.status}`, {
        status: response.status,
        body: response.data,
      });
    }

    const envelope = this.readEnvelope(response);
    const parsed = sessionResponseSchema.safeParse(envelope.response);
    if (!parsed.success) {
      throw new AuthenticationError('Ledger login response carried no token', {
        status: response.status,
        messages: describeMessages(envelope),
      });
    }

    this.token = parsed.data.token;
    this.sessionCache.set(parsed.data.token);
    this.logger.info('Ledger session established');
    return parsed.data.token;
  }

  /**
   * Close the remote session. Local state is cleared even when the delete fails.
   */
  async logout(): Promise<void> {
    const token = this.token;
    try {
      if (token) {
        const response = await this.send({
          method: 'DELETE',
          url: `/sessions/${encodeURIComponent(token)}`,
        });
        if (!isSuccessStatus(response.status)) {
          this.logger.warn({ status: response.status }, 'Ledger logout was rejected');
        }
      }
    } catch (error) {
      this.logger.warn({ err: error }, 'Ledger logout failed');
    } finally {
      this.token = null;
      this.sessionCache.invalidate();
    }
  }

  /**
   * Issue a request with the session token, re-authenticating and retrying
   * exactly once when the ledger reports the session as expired. A second
   * expiry is an AuthenticationError.
   */
  async authenticatedRequest(
    method: LedgerMethod,
    path: string,
    options: LedgerRequestOptions = {}
  ): Promise<AxiosResponse<unknown>> {
    const token = await this.authenticate();
    const response = await this.send(this.buildRequest(method, path, options, token));

    if (response.status !== HTTP_SESSION_EXPIRED) {
      return response;
    }

    this.logger.warn({ method, path }, 'Ledger session expired, re-authenticating');
    this.sessionCache.invalidate();
    this.token = null;

    const freshToken = await this.authenticate(true);
    const retried = await this.send(this.buildRequest(method, path, options, freshToken));
    if (retried.status === HTTP_SESSION_EXPIRED) {
      this.sessionCache.invalidate();
      this.token = null;
      throw new AuthenticationError(`Ledger rejected a fresh session for ${method} ${path}`, {
        status: retried.status,
      });
    }
    return retried;
  }

  private buildRequest(
    method: LedgerMethod,
    path: string,
    options: LedgerRequestOptions,
    token: string
  ): AxiosRequestConfig {
    return {
      method,
      url: path,
      params: options.params,
      data: options.data,
      headers: { Authorization: `Bearer ${token}` },
    };
  }

  // ============================================================================
  // Product Operations
  // ============================================================================

  /**
   * All products carrying the eligible classification, paged until a short page
   */
  async listEligibleProducts(): Promise<LedgerProduct[]> {
    const products: LedgerProduct[] = [];
    const { pageSize } = this.layout;
    let offset = 1;

    for (;;) {
      const records = await this.findRecords(
        { [this.layout.classificationField]: this.layout.eligibleClassification },
        { limit: pageSize, offset },
        'list eligible products'
      );

      if (records === null) {
        break;
      }

      products.push(...records.map((record) => parseProduct(record, this.layout)));

      if (records.length < pageSize) {
        break;
      }
      offset += pageSize;
    }

    this.logger.debug({ count: products.length }, 'Listed eligible products');
    return products;
  }

  async getStockRecord(identifier: string): Promise<StockRecord | null> {
    const records = await this.findRecords(
      { [this.layout.identifierField]: `==${identifier}` },
      { limit: 1, offset: 1 },
      `read stock for ${identifier}`
    );

    const record = records?.[0];
    return record ? parseStockRecord(record, this.layout) : null;
  }

  /**
   * Current computed quantity; NotFoundError when the identifier is unknown
   */
  async getQuantity(identifier: string): Promise<number> {
    const record = await this.getStockRecord(identifier);
    if (!record) {
      throw new NotFoundError(`Product ${identifier} not found in ledger`, { identifier });
    }
    return record.computedQuantity;
  }

  // ============================================================================
  // Movement Operations
  // ============================================================================

  async appendMovement(identifier: string, unitsOut: number): Promise<void> {
    await this.recordMovement(identifier, { unitsOut, unitsIn: 0 });
  }

  async recordMovement(identifier: string, movement: MovementUnits): Promise<void> {
    const { unitsOut, unitsIn } = movement;
    const valid =
      Number.isInteger(unitsOut) &&
      Number.isInteger(unitsIn) &&
      unitsOut >= 0 &&
      unitsIn >= 0 &&
      (unitsOut > 0) !== (unitsIn > 0);

    if (!valid) {
      throw new ValidationError('Movement needs exactly one positive integer side', {
        identifier,
        unitsOut,
        unitsIn,
      });
    }

    const response = await this.authenticatedRequest(
      'POST',
      `/layouts/${encodeURIComponent(this.layout.movementLayout)}/records`,
      {
        data: {
          fieldData: {
            [this.layout.movementProductField]: toForeignKey(identifier),
            [this.layout.unitsOutField]: unitsOut,
            [this.layout.unitsInField]: unitsIn,
          },
        },
      }
    );

    this.assertSuccess(response, `record movement for ${identifier}`);
    this.logger.info({ identifier, unitsOut, unitsIn }, 'Movement recorded');
  }

  // ============================================================================
  // Scripts
  // ============================================================================

  /**
   * Run a ledger script on a layout. A missing or non-zero scriptError is a failure.
   */
  async runScript(layout: string, script: string, param?: string): Promise<void> {
    const response = await this.authenticatedRequest(
      'GET',
      `/layouts/${encodeURIComponent(layout)}/script/${encodeURIComponent(script)}`,
      { params: param === undefined ? undefined : { 'script.param': param } }
    );

    const envelope = this.assertSuccess(response, `run script ${script}`);
    const scriptError = parseScriptError(envelope);
    if (scriptError === null) {
      throw new LedgerAPIError(`Script ${script} returned no scriptError`, { script, param });
    }
    if (scriptError !== '0') {
      throw new LedgerAPIError(`Script ${script} failed with scriptError ${scriptError}`, {
        script,
        param,
        scriptError,
      });
    }
  }

  async recalculate(identifier: string): Promise<void> {
    await this.runScript(this.layout.movementLayout, this.layout.recalculationScript, identifier);
    this.logger.debug({ identifier }, 'Stock recalculated');
  }

  // ============================================================================
  // Health
  // ============================================================================

  async healthCheck(): Promise<ConnectionCheck> {
    try {
      await this.authenticate(true);
      return { success: true };
    } catch (error) {
      this.logger.error({ err: error }, 'Ledger health check failed');
      return { success: false, error: errorMessage(error) };
    }
  }

  // ============================================================================
  // Helper Methods
  // ============================================================================

  /**
   * Run a find query. Null when no records match.
   */
  private async findRecords(
    query: Record<string, string>,
    page: { limit: number; offset: number },
    action: string
  ): Promise<LedgerRecord[] | null> {
    const response = await this.authenticatedRequest(
      'POST',
      `/layouts/${encodeURIComponent(this.layout.stockLayout)}/_find`,
      {
        data: {
          query: [query],
          limit: String(page.limit),
          offset: String(page.offset),
        },
      }
    );

    const envelope = this.readEnvelope(response);
    if (messageCode(envelope) === LEDGER_CODE_NO_RECORDS) {
      return null;
    }
    this.assertEnvelopeSuccess(response, envelope, action);
    return parseFindRecords(envelope);
  }

  private readEnvelope(response: AxiosResponse<unknown>): LedgerEnvelope {
    const { status, data } = response;
    if (!isSuccessStatus(status) && (typeof data !== 'object' || data === null)) {
      throw new LedgerAPIError(`Ledger responded with HTTP ${status}`, { status });
    }
    return parseEnvelope(data);
  }

  private assertSuccess(response: AxiosResponse<unknown>, action: string): LedgerEnvelope {
    const envelope = this.readEnvelope(response);
    this.assertEnvelopeSuccess(response, envelope, action);
    return envelope;
  }

  private assertEnvelopeSuccess(
    response: AxiosResponse<unknown>,
    envelope: LedgerEnvelope,
    action: string
  ): void {
    const code = messageCode(envelope);
    if (isSuccessStatus(response.status) && (code === null || code === LEDGER_CODE_OK)) {
      return;
    }
    throw new LedgerAPIError(`Failed to ${action}: HTTP ${response.status} (${describeMessages(envelope)})`, {
      status: response.status,
      code,
    });
  }

  private async send(request: AxiosRequestConfig): Promise<AxiosResponse<unknown>> {
    return this.rateLimiter.add(
      () =>
        withRetry(() => this.httpClient.request<unknown>(request), {
          ...this.retryPolicy,
          onRetry: (error, attempt) => {
            this.logger.warn(
              { attempt, method: request.method, url: request.url, err: error },
              'Ledger request failed, retrying'
            );
          },
        }),
      { throwOnTimeout: true }
    );
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createLedgerClient(config: LedgerClientConfig): LedgerApiClient {
  return new LedgerApiClient(config);
}
