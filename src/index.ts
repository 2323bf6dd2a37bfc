import dotenv from 'dotenv';
import { loadConfig } from './config';
import { buildServices } from './services/container';
import { createApp } from './app';
import { ConfigurationError } from './types/errors';

// Load environment variables
dotenv.config();

async function startServer(): Promise<void> {
  try {
    console.log('🔧 Initializing services...');
    const config = loadConfig();
    const services = buildServices(config);

    await services.index.initialize();
    const app = createApp(services, config.mail.query);

    const server = app.listen(config.port, () => {
      console.log(`🚀 Server running on port ${config.port}`);
      console.log(`🏥 Health check: http://localhost:${config.port}/health`);
    });

    services.scheduler?.start();

    const shutdown = async (signal: string): Promise<void> => {
      console.log(`🛑 ${signal} received, shutting down...`);
      services.scheduler?.stop();
      services.orchestrator.cancel();

      const settled = await services.orchestrator.waitForIdle(config.sync.shutdownGraceMs);
      if (!settled) {
        console.warn(`⚠️ [SYNC] Sync did not stop within ${config.sync.shutdownGraceMs}ms`);
      }

      server.close(() => process.exit(0));
    };

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.once(signal, () => {
        shutdown(signal).catch(error => {
          console.error('❌ Shutdown failed:', error);
          process.exit(1);
        });
      });
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`❌ ${error.message}:`, error.details.join('; '));
    } else {
      console.error('❌ Failed to start server:', error);
    }
    process.exit(1);
  }
}

// Start the server
startServer().catch(error => {
  console.error('❌ Unexpected startup failure:', error);
  process.exit(1);
});
