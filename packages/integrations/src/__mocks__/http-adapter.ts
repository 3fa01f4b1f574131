/**
 * In-process HTTP stand-in
 * An axios adapter that routes requests to a handler instead of the network
 */

import { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';

export interface MockRequest {
  method: string;
  url: string;
  params: Record<string, unknown>;
  body: unknown;
  headers: Record<string, string>;
  auth?: { username: string; password: string };
}

export interface MockReply {
  status?: number;
  data?: unknown;
  headers?: Record<string, string>;
}

export type MockHandler = (request: MockRequest) => MockReply | Promise<MockReply>;

export interface MockAdapter {
  adapter: AxiosAdapter;
  requests: MockRequest[];
}

function parseBody(data: unknown): unknown {
  if (typeof data !== 'string') {
    return data;
  }
  try {
    return JSON.parse(data);
  } catch {
    return data;
  }
}

function readHeaders(config: InternalAxiosRequestConfig): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(config.headers.toJSON())) {
    if (value !== undefined && value !== null && value !== false) {
      headers[name.toLowerCase()] = String(value);
    }
  }
  return headers;
}

function lowerCaseKeys(headers: Record<string, string> = {}): Record<string, string> {
  return Object.fromEntries(Object.entries(headers).map(([name, value]) => [name.toLowerCase(), value]));
}

export function createMockAdapter(handler: MockHandler): MockAdapter {
  const requests: MockRequest[] = [];

  const adapter: AxiosAdapter = async (config) => {
    const request: MockRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      params: config.params ?? {},
      body: parseBody(config.data),
      headers: readHeaders(config),
      auth: config.auth,
    };
    requests.push(request);

    const reply = await handler(request);
    const status = reply.status ?? 200;

    return {
      data: reply.data ?? {},
      status,
      statusText: String(status),
      headers: lowerCaseKeys(reply.headers),
      config,
      request: {},
    };
  };

  return { adapter, requests };
}

/**
 * A top-level field of a JSON request body
 */
export function bodyField(request: MockRequest, name: string): unknown {
  const { body } = request;
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  return Object.entries(body).find(([key]) => key === name)?.[1];
}

/** The error axios raises when a request times out */
export function timeoutError(): AxiosError {
  return new AxiosError('timeout of 30000ms exceeded', AxiosError.ECONNABORTED);
}

// ============================================================================
// Ledger Fixtures
// ============================================================================

export function ledgerOk(response: Record<string, unknown> = {}): MockReply {
  return { status: 200, data: { response, messages: [{ code: '0', message: 'OK' }] } };
}

export function ledgerNoRecords(): MockReply {
  return {
    status: 500,
    data: { response: {}, messages: [{ code: '401', message: 'No records match the request' }] },
  };
}

export function ledgerSessionExpired(): MockReply {
  return {
    status: 401,
    data: { response: {}, messages: [{ code: '952', message: 'Invalid token' }] },
  };
}

export function ledgerRecords(fieldData: Array<Record<string, unknown>>): MockReply {
  return ledgerOk({
    data: fieldData.map((fields, index) => ({ fieldData: fields, recordId: String(index + 1) })),
  });
}

// ============================================================================
// Storefront Fixtures
// ============================================================================

export function graphqlData(data: unknown, headers: Record<string, string> = {}): MockReply {
  return { status: 200, data: { data }, headers };
}

export function variantEdge(sku: string, variantId: string, inventoryItemId: string) {
  return {
    node: {
      id: `gid://shopify/ProductVariant/${variantId}`,
      sku,
      inventoryItem: { id: `gid://shopify/InventoryItem/${inventoryItemId}` },
    },
  };
}
