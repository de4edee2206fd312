// apps/http/src/main.ts
import { loadConfig, rootLogger, setLogLevel } from '@frostbridge/core';
import { buildApp } from './app';

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const app = await buildApp(config, { logger: rootLogger() });

  const onShutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting-down');
    try {
      await app.close();
    } finally {
      process.exit(0);
    }
  };
  process.on('SIGINT', () => void onShutdown('SIGINT'));
  process.on('SIGTERM', () => void onShutdown('SIGTERM'));

  await app.listen({ port: config.http.port, host: config.http.host });
}

main().catch((err) => {
  rootLogger().fatal({ err }, 'boot-failed');
  process.exit(1);
});
