import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import type { AppConfig } from './config';
import { createBalanceRouter } from './routes/balance';
import { InvalidRequestError, sendError } from './routes/errors';
import { createStoryRouter } from './routes/story';
import { createWalletRouter } from './routes/wallet';
import type { InMemoryFundsLedger } from './services/balanceService';
import type { StoryRegistry } from './services/storyRegistry';

export interface AppDependencies {
  config: AppConfig;
  registry: StoryRegistry;
  funds: InMemoryFundsLedger;
}

export function createApp({ config, registry, funds }: AppDependencies): Express {
  const app = express();

  app.use(cors({
    origin: config.corsOrigins,
    credentials: true,
  }));
  app.use(express.json());

  // Middleware de logging
  app.use((req, res, next) => {
    console.log(`${new Date().toISOString()} - ${req.method} ${req.path}`);
    next();
  });

  // Rutas
  app.use('/api/stories', createStoryRouter(registry, config.sessionSecret));
  app.use('/api/wallet', createWalletRouter(config.sessionSecret));
  app.use('/api/balance', createBalanceRouter({ registry, funds, faucetEnabled: config.faucetEnabled }));

  // Health check
  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Body JSON mal formado (lo lanza express.json antes de llegar a las rutas)
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (err instanceof SyntaxError) {
      sendError(res, new InvalidRequestError('El body no es JSON válido'), 'Error leyendo el body');
      return;
    }
    next(err);
  });

  return app;
}
