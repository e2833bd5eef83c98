import { Router } from 'express';
import { buildLoginMessage, issueSessionToken, verifyLogin } from '../services/sessionService';
import { InvalidRequestError, parseAddress, parseBody, parseHex, parseString, sendError } from './errors';

export function createWalletRouter(sessionSecret: string): Router {
  const router = Router();

  /**
   * Mensaje que la wallet debe firmar para iniciar sesión
   * GET /api/wallet/login-message/:address?issuedAt=...
   */
  router.get('/login-message/:address', (req, res) => {
    try {
      const address = parseAddress(req.params.address, 'address');
      const issuedAt = typeof req.query.issuedAt === 'string' ? req.query.issuedAt : new Date().toISOString();

      res.json({
        success: true,
        address,
        issuedAt,
        message: buildLoginMessage(address, issuedAt),
      });
    } catch (error) {
      sendError(res, error, 'Error generando mensaje de login');
    }
  });

  /**
   * Iniciar sesión con una firma de la wallet
   * POST /api/wallet/session
   */
  router.post('/session', async (req, res) => {
    try {
      const body = parseBody(req.body);
      const address = parseAddress(body.address, 'address');
      const issuedAt = parseString(body.issuedAt, 'issuedAt');
      const signature = parseHex(body.signature, 'signature');
      if (Number.isNaN(Date.parse(issuedAt))) {
        throw new InvalidRequestError('issuedAt debe ser una fecha ISO 8601');
      }

      const result = await verifyLogin({ address, issuedAt, signature });
      if (!result.ok) {
        res.status(401).json({
          success: false,
          error: result.reason === 'stale' ? 'LOGIN_EXPIRED' : 'INVALID_SIGNATURE',
        });
        return;
      }

      console.log(`🔐 Sesión iniciada para ${address}`);
      res.json({
        success: true,
        address,
        token: issueSessionToken(address, sessionSecret),
      });
    } catch (error) {
      sendError(res, error, 'Error iniciando sesión');
    }
  });

  return router;
}
