#!/usr/bin/env node

/**
 * MCP server entry point
 */

import { Fat32InspectorServer } from './Fat32InspectorServer';

async function main(): Promise<void> {
  const server = new Fat32InspectorServer();

  const shutdown = async (signal: string): Promise<void> => {
    console.error(`Received ${signal}, shutting down gracefully...`);
    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      console.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await server.start();
}

// Only run if this file is executed directly
if (require.main === module) {
  main().catch((error) => {
    console.error('Fatal error starting FAT32 inspector MCP server:', error);
    process.exit(1);
  });
}
