import type { RequestHandler, Response } from 'express';
import { Address, isAddress } from 'viem';
import { readSessionToken } from '../services/sessionService';

/**
 * Exige un header Authorization: Bearer <jwt> y guarda la dirección en res.locals.caller
 */
export function requireSession(secret: string): RequestHandler {
  return (req, res, next) => {
    const header = req.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) {
      res.status(401).json({
        success: false,
        error: 'UNAUTHENTICATED',
        message: 'Falta el token de sesión (Authorization: Bearer ...)',
      });
      return;
    }

    const caller = readSessionToken(header.slice('Bearer '.length), secret);
    if (!caller) {
      res.status(401).json({
        success: false,
        error: 'UNAUTHENTICATED',
        message: 'Token de sesión inválido o expirado',
      });
      return;
    }

    res.locals.caller = caller;
    next();
  };
}

export function getCaller(res: Response): Address {
  const caller: unknown = res.locals.caller;
  if (typeof caller !== 'string' || !isAddress(caller, { strict: false })) {
    throw new Error('No hay sesión en la respuesta: falta requireSession en la ruta');
  }
  return caller;
}
