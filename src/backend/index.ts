import { createApp } from './app';
import { openStoryRegistry } from './bootstrap';
import { loadConfig } from './config';

async function main(): Promise<void> {
  const config = loadConfig();
  const { registry, funds } = await openStoryRegistry(config);
  const app = createApp({ config, registry, funds });

  console.log(`📡 Backend configurado para puerto: ${config.port}`);
  if (config.faucetEnabled) {
    console.warn('🚰 Faucet habilitado: cualquiera puede acreditarse fondos de prueba');
  }

  const server = app.listen(config.port, () => {
    console.log(`🚀 Story Registry iniciado en puerto ${config.port}`);
  });

  server.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      console.error(`❌ Puerto ${config.port} ya está en uso.`);
      console.error(`💡 Solución: Cambia el puerto en .env o detén el proceso que usa el puerto ${config.port}`);
      process.exit(1);
    }
    throw err;
  });
}

main().catch((error: unknown) => {
  console.error('❌ No se pudo iniciar el backend:', error);
  process.exit(1);
});
