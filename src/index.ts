/**
 * mindstream - supervised cognitive runtime
 *
 * Entry point for the application.
 */

import 'dotenv/config';

import { createContainerAsync, type Container } from './core/container.js';

let container: Container | undefined;
let isShuttingDown = false;

async function main(): Promise<void> {
  // Loads config, opens storage and registers every unit with the supervisor
  container = await createContainerAsync();

  const { logger, config } = container;
  logger.info(
    {
      durability: config.memory.durability,
      model: config.llm.model,
      local: config.llm.baseUrl !== null,
    },
    'mindstream starting...'
  );

  container.start();
}

// Handle shutdown gracefully
async function shutdown(code = 0): Promise<void> {
  if (isShuttingDown) {
    return; // Already shutting down, ignore duplicate signals
  }
  isShuttingDown = true;

  if (container) {
    await container.shutdown();
  }
  process.exit(code);
}

process.on('SIGINT', () => {
  void shutdown();
});

process.on('SIGTERM', () => {
  void shutdown();
});

// Handle uncaught errors
process.on('uncaughtException', (error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Uncaught exception:', error);
  void shutdown(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Unhandled rejection:', reason);
  void shutdown(1);
});

// Start the application
main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Failed to start:', error);
  process.exit(1);
});
