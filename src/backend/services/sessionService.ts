// Sesiones firmadas con la wallet: el cliente firma un mensaje y recibe un JWT
import jwt from 'jsonwebtoken';
import { Address, Hex, getAddress, isAddress, verifyMessage } from 'viem';

export const LOGIN_WINDOW_MS = 5 * 60 * 1000; // 5 minutos
export const SESSION_TTL = '12h';

export interface LoginRequest {
  address: Address;
  issuedAt: string; // ISO 8601
  signature: Hex;
}

export type LoginResult = { ok: true } | { ok: false; reason: 'stale' | 'bad-signature' };

/**
 * Mensaje que la wallet debe firmar (personal_sign)
 */
export function buildLoginMessage(address: Address, issuedAt: string): string {
  return `Story Registry login\nAddress: ${getAddress(address)}\nIssued At: ${issuedAt}`;
}

/**
 * Verifica la firma del login y que issuedAt esté dentro de la ventana permitida
 */
export async function verifyLogin(request: LoginRequest, now: number = Date.now()): Promise<LoginResult> {
  const issuedAt = Date.parse(request.issuedAt);
  if (Number.isNaN(issuedAt) || Math.abs(now - issuedAt) > LOGIN_WINDOW_MS) {
    return { ok: false, reason: 'stale' };
  }

  try {
    const valid = await verifyMessage({
      address: request.address,
      message: buildLoginMessage(request.address, request.issuedAt),
      signature: request.signature,
    });
    return valid ? { ok: true } : { ok: false, reason: 'bad-signature' };
  } catch (error) {
    console.warn('⚠️  Firma de login ilegible:', error);
    return { ok: false, reason: 'bad-signature' };
  }
}

export function issueSessionToken(address: Address, secret: string): string {
  return jwt.sign({}, secret, {
    algorithm: 'HS256',
    subject: getAddress(address),
    expiresIn: SESSION_TTL,
  });
}

/**
 * Devuelve la dirección del token de sesión, o null si no es válido o expiró
 */
export function readSessionToken(token: string, secret: string): Address | null {
  try {
    const payload = jwt.verify(token, secret, { algorithms: ['HS256'] });
    if (typeof payload === 'string' || typeof payload.sub !== 'string' || !isAddress(payload.sub, { strict: false })) {
      return null;
    }
    return getAddress(payload.sub);
  } catch (error) {
    console.warn('⚠️  Token de sesión rechazado:', error instanceof Error ? error.message : error);
    return null;
  }
}
