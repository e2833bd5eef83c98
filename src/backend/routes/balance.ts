import { Router } from 'express';
import type { InMemoryFundsLedger } from '../services/balanceService';
import type { StoryRegistry } from '../services/storyRegistry';
import { parseAddress, parseAmount, parseBody, sendError } from './errors';

export interface BalanceRouterOptions {
  registry: StoryRegistry;
  funds: InMemoryFundsLedger;
  faucetEnabled: boolean;
}

export function createBalanceRouter({ registry, funds, faucetEnabled }: BalanceRouterOptions): Router {
  const router = Router();

  /**
   * Acreditar fondos de prueba (solo si ENABLE_FAUCET=true)
   * POST /api/balance/faucet
   */
  router.post('/faucet', async (req, res) => {
    if (!faucetEnabled) {
      res.status(404).json({
        success: false,
        error: 'Faucet deshabilitado',
      });
      return;
    }

    try {
      const body = parseBody(req.body);
      const address = parseAddress(body.address, 'address');
      const amount = parseAmount(body.amount, 'amount');

      const balance = await registry.runExclusive(() => funds.credit(address, amount));
      console.log(`🚰 Faucet: ${amount} acreditados a ${address}`);

      res.json({
        success: true,
        address,
        balance: balance.toString(),
      });
    } catch (error) {
      sendError(res, error, 'Error acreditando fondos');
    }
  });

  /**
   * Obtener balance de una dirección
   * GET /api/balance/:address
   */
  router.get('/:address', async (req, res) => {
    try {
      const address = parseAddress(req.params.address, 'address');
      const balance = await registry.getBalance(address);

      res.json({
        success: true,
        address,
        balance: balance.toString(),
      });
    } catch (error) {
      sendError(res, error, 'Error obteniendo balance');
    }
  });

  return router;
}
