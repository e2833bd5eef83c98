// Helpers compartidos por las rutas: parseo de parámetros y mapeo de errores a HTTP
import type { Response } from 'express';
import { Address, Hex, getAddress, isAddress, isHex } from 'viem';
import { LedgerError, StoryRegistryError } from '../services/storyErrors';

export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseBody(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) {
    throw new InvalidRequestError('El body debe ser un objeto JSON');
  }
  return body;
}

export function parseTokenId(value: unknown): bigint {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    throw new InvalidRequestError('tokenId debe ser un entero sin signo');
  }
  return BigInt(value);
}

// Acepta negativos para que el registro los rechace con su propio código
export function parseAmount(value: unknown, field: string): bigint {
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return BigInt(value);
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value)) {
    return BigInt(value);
  }
  throw new InvalidRequestError(`${field} debe ser un entero`);
}

export function parseAddress(value: unknown, field: string): Address {
  if (typeof value !== 'string' || !isAddress(value, { strict: false })) {
    throw new InvalidRequestError(`${field} debe ser una dirección válida (0x...)`);
  }
  return getAddress(value);
}

export function parseString(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw new InvalidRequestError(`${field} debe ser texto`);
  }
  return value;
}

export function parseHex(value: unknown, field: string): Hex {
  if (typeof value !== 'string' || !isHex(value, { strict: true })) {
    throw new InvalidRequestError(`${field} debe ser hex (0x...)`);
  }
  return value;
}

/**
 * Traduce cualquier error a la respuesta JSON correspondiente
 */
export function sendError(res: Response, error: unknown, fallbackMessage: string): void {
  if (error instanceof InvalidRequestError || error instanceof StoryRegistryError || error instanceof LedgerError) {
    console.warn(`⚠️  ${fallbackMessage}: ${error.message}`);
  }
  if (error instanceof InvalidRequestError) {
    res.status(400).json({ success: false, error: 'INVALID_REQUEST', message: error.message });
    return;
  }
  if (error instanceof StoryRegistryError) {
    res.status(error.code).json({ success: false, error: error.errorName, code: error.code, message: error.message });
    return;
  }
  if (error instanceof LedgerError) {
    res.status(409).json({ success: false, error: error.code, message: error.message });
    return;
  }

  console.error(`❌ ${fallbackMessage}:`, error);
  res.status(500).json({
    success: false,
    error: error instanceof Error && error.message ? error.message : fallbackMessage,
  });
}
