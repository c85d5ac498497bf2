#!/usr/bin/env node

import { FilteredStdioServerTransport } from './custom-stdio.js';
import { server, flushDeferredMessages } from './server.js';
import { configManager } from './config-manager.js';
import { logToStderr } from './utils/logger.js';

function errorMessageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function runServer() {
  try {
    const config = configManager.loadConfig(process.argv.slice(2));
    logToStderr('info', `Base directory: ${config.basePath}`);

    const transport = new FilteredStdioServerTransport();
    global.mcpTransport = transport;

    process.on('uncaughtException', (error) => {
      logToStderr('critical', `Uncaught exception: ${errorMessageOf(error)}`);
      process.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      logToStderr('critical', `Unhandled rejection: ${errorMessageOf(reason)}`);
      process.exit(1);
    });

    server.oninitialized = () => {
      transport.enableNotifications();
      flushDeferredMessages();
    };

    server.onclose = () => {
      transport.cleanup();
      logToStderr('info', 'Server connection closed');
    };

    logToStderr('info', 'Connecting server...');
    await server.connect(transport);
    logToStderr('info', 'Server connected successfully');
  } catch (error) {
    const errorMessage = errorMessageOf(error);
    logToStderr('emergency', `Failed to start server: ${errorMessage}`);
    if (error instanceof Error && error.stack) {
      logToStderr('debug', error.stack);
    }
    process.exit(1);
  }
}

runServer().catch((error: unknown) => {
  logToStderr('emergency', `Fatal error running server: ${errorMessageOf(error)}`);
  process.exit(1);
});
