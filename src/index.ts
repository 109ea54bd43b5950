// ============================================
// MELIAPP - Main Entry Point
// ============================================

// Load environment variables from .env file
import 'dotenv/config';

import { startApp } from './app.js';
import { closeDatabaseConnection } from './db/drizzle.js';

async function main() {
  const app = await startApp();

  // Graceful shutdown
  const shutdown = async () => {
    app.log.info('Shutting down Meliapp...');
    try {
      await app.close();
      await closeDatabaseConnection();
      app.log.info('Server closed gracefully');
      process.exit(0);
    } catch (err) {
      app.log.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

main().catch((err: unknown) => {
  console.error('Failed to start Meliapp:', err);
  process.exit(1);
});
