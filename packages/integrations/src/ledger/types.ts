/**
 * Ledger Data API Types
 * Wire envelopes are validated with zod before anything reads them.
 */

import { z } from 'zod';
import type { AxiosAdapter } from 'axios';
import type { Logger } from 'pino';
import type { RetryPolicy } from '../utils/retry.js';
import type { SessionTokenCache } from './session.js';

// ============================================================================
// Message Codes
// ============================================================================

export const LEDGER_CODE_OK = '0';
/** "No records match the request" */
export const LEDGER_CODE_NO_RECORDS = '401';

export const HTTP_SESSION_EXPIRED = 401;

// ============================================================================
// Layout & Field Names
// ============================================================================

export interface LedgerLayout {
  /** Layout exposing stock per product */
  stockLayout: string;
  /** Layout receiving movement records and hosting the recalculation script */
  movementLayout: string;
  recalculationScript: string;
  identifierField: string;
  nameField: string;
  classificationField: string;
  quantityField: string;
  /** Classification value that marks a product for storefront sync */
  eligibleClassification: string;
  movementProductField: string;
  unitsOutField: string;
  unitsInField: string;
  pageSize: number;
}

export const DEFAULT_LEDGER_LAYOUT: LedgerLayout = {
  stockLayout: 'StockInventario_dapi',
  movementLayout: 'MovimientoStock_dapi',
  recalculationScript: 'ActualizarStock_dapi',
  identifierField: 'Conceptos Cobro_pk',
  nameField: 'Nombre',
  classificationField: 'Clasificación',
  quantityField: 'Inventario',
  eligibleClassification: '8',
  movementProductField: 'Concepto Cobro_fk',
  unitsOutField: 'Inv_Cant_Salida',
  unitsInField: 'Inv_Cant_Entrada',
  pageSize: 100,
};

// ============================================================================
// Client Configuration
// ============================================================================

export interface LedgerClientConfig {
  host: string;
  database: string;
  username: string;
  password: string;
  sessionCache: SessionTokenCache;
  logger: Logger;
  /** Request timeout in milliseconds */
  timeout?: number;
  retryPolicy?: RetryPolicy;
  layout?: Partial<LedgerLayout>;
  /** Transport override, used by tests */
  adapter?: AxiosAdapter;
}

export type LedgerMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export interface LedgerRequestOptions {
  params?: Record<string, string>;
  data?: unknown;
}

// ============================================================================
// Wire Schemas
// ============================================================================

const codeSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

export const ledgerMessageSchema = z.object({
  code: codeSchema,
  message: z.string().optional(),
});

export const ledgerEnvelopeSchema = z.object({
  response: z.record(z.unknown()).optional().default({}),
  messages: z.array(ledgerMessageSchema).optional().default([]),
});

export const sessionResponseSchema = z.object({
  token: z.string().min(1),
});

export const ledgerRecordSchema = z.object({
  fieldData: z.record(z.unknown()),
  recordId: codeSchema.optional(),
});

export const findResponseSchema = z.object({
  data: z.array(ledgerRecordSchema).default([]),
});

export const scriptResponseSchema = z.object({
  scriptError: codeSchema.optional(),
  scriptResult: z.string().optional(),
});

export type LedgerMessage = z.infer<typeof ledgerMessageSchema>;
export type LedgerEnvelope = z.infer<typeof ledgerEnvelopeSchema>;
export type LedgerRecord = z.infer<typeof ledgerRecordSchema>;
