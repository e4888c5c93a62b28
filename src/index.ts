#!/usr/bin/env node

/**
 * talus-master - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { MasterServer } from './presentation/MasterServer.js';

async function main() {
  let masterServer: MasterServer | null = null;
  let shuttingDown = false;

  const shutdown = async (signal: string, exitCode = 0) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.error(`\n📛 Received ${signal}, shutting down gracefully...`);

    try {
      if (masterServer) {
        await masterServer.shutdown();
      }
    } catch (error) {
      console.error('💥 Error during shutdown:', error);
      exitCode = 1;
    }

    console.error('👋 Goodbye!\n');
    process.exit(exitCode);
  };

  try {
    const config = getConfig();
    printConfigInfo(config);

    masterServer = new MasterServer(config);
    await masterServer.start();
    masterServer.printStats();

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    process.on('uncaughtException', (error) => {
      console.error('💥 Uncaught Exception:', error);
      void shutdown('UNCAUGHT_EXCEPTION', 1);
    });

    process.on('unhandledRejection', (reason) => {
      console.error('💥 Unhandled Rejection:', reason);
      void shutdown('UNHANDLED_REJECTION', 1);
    });
  } catch (error) {
    console.error('💥 Fatal error in main():', error);
    await shutdown('FATAL', 1);
  }
}

void main();
