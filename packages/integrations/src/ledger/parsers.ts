/**
 * Ledger Response Parsers
 * Turn raw Data API bodies into typed entities, failing with LedgerAPIError on bad shapes.
 */

import { LedgerAPIError } from '../errors.js';
import type { LedgerProduct, StockRecord } from '../types.js';
import {
  findResponseSchema,
  ledgerEnvelopeSchema,
  scriptResponseSchema,
  type LedgerEnvelope,
  type LedgerLayout,
  type LedgerRecord,
} from './types.js';

/**
 * Normalize a ledger quantity to a non-negative integer.
 * Absent, empty and non-numeric values read as 0; fractions truncate toward zero.
 */
export function normalizeQuantity(raw: unknown): number {
  let value: number;

  if (typeof raw === 'number') {
    value = raw;
  } else if (typeof raw === 'string') {
    const trimmed = raw.trim();
    value = trimmed === '' ? 0 : parseFloat(trimmed);
  } else {
    return 0;
  }

  if (!Number.isFinite(value)) {
    return 0;
  }

  return Math.max(0, Math.trunc(value));
}

export function parseEnvelope(body: unknown): LedgerEnvelope {
  const result = ledgerEnvelopeSchema.safeParse(body);
  if (!result.success) {
    throw new LedgerAPIError('Malformed ledger response', {
      issues: result.error.issues.map((issue) => issue.message),
    });
  }
  return result.data;
}

/** First message code of the envelope, null when the server sent none */
export function messageCode(envelope: LedgerEnvelope): string | null {
  return envelope.messages[0]?.code ?? null;
}

export function describeMessages(envelope: LedgerEnvelope): string {
  if (envelope.messages.length === 0) {
    return 'no message';
  }
  return envelope.messages
    .map((message) => `${message.code}: ${message.message ?? ''}`.trim())
    .join('; ');
}

export function parseFindRecords(envelope: LedgerEnvelope): LedgerRecord[] {
  const result = findResponseSchema.safeParse(envelope.response);
  if (!result.success) {
    throw new LedgerAPIError('Malformed find response', {
      issues: result.error.issues.map((issue) => issue.message),
    });
  }
  return result.data.data;
}

/** scriptError from a script run; null when the field is absent */
export function parseScriptError(envelope: LedgerEnvelope): string | null {
  const result = scriptResponseSchema.safeParse(envelope.response);
  if (!result.success) {
    throw new LedgerAPIError('Malformed script response');
  }
  return result.data.scriptError ?? null;
}

function fieldText(value: unknown): string {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return '';
}

function requireIdentifier(record: LedgerRecord, layout: LedgerLayout): string {
  const identifier = fieldText(record.fieldData[layout.identifierField]);
  if (!identifier) {
    throw new LedgerAPIError(`Ledger record is missing ${layout.identifierField}`, {
      recordId: record.recordId,
    });
  }
  return identifier;
}

export function parseProduct(record: LedgerRecord, layout: LedgerLayout): LedgerProduct {
  return {
    identifier: requireIdentifier(record, layout),
    displayName: fieldText(record.fieldData[layout.nameField]),
  };
}

export function parseStockRecord(record: LedgerRecord, layout: LedgerLayout): StockRecord {
  return {
    identifier: requireIdentifier(record, layout),
    computedQuantity: normalizeQuantity(record.fieldData[layout.quantityField]),
    displayName: fieldText(record.fieldData[layout.nameField]),
    classificationTag: fieldText(record.fieldData[layout.classificationField]),
  };
}

/**
 * Product keys are numeric in the ledger; send them as numbers when they are
 */
export function toForeignKey(identifier: string): string | number {
  if (/^\d+$/.test(identifier)) {
    const numeric = Number(identifier);
    if (Number.isSafeInteger(numeric)) {
      return numeric;
    }
  }
  return identifier;
}
