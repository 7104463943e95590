import { buildServer } from './server.js';
import { loadConfig } from '../config/index.js';
import { createMonitorContext } from '../services/context.js';
import { getLogger } from '../utils/logging.js';

export async function serve() {
  const cfg = loadConfig();
  const ctx = await createMonitorContext(cfg);
  const server = await buildServer(ctx);
  await server.listen({ port: cfg.server.port, host: '0.0.0.0' });
  getLogger().info({ port: cfg.server.port, handler: cfg.handler.baseUrl }, 'Server started');
  if (cfg.monitor.enabled) ctx.scheduler.start();

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    getLogger().info({ signal }, 'Shutting down');
    try {
      await server.close();
      await ctx.close();
      process.exit(0);
    } catch (err) {
      getLogger().error({ err }, 'Shutdown failed');
      process.exit(1);
    }
  };
  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
}
