#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import BookingBlotter from './booking-blotter.js';
import { Config, describeConfig, getConfig } from './config.js';
import { ConfigError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import { createServer } from './server.js';

// Redirect console output to stderr to keep stdout clean for MCP communication
console.log = (...args: unknown[]) => {
    logger.info(args.map(String).join(' '));
};
console.error = (...args: unknown[]) => {
    logger.error(args.map(String).join(' '));
};

let config: Config;
try {
    config = getConfig();
} catch (error) {
    if (error instanceof ConfigError) {
        logger.error(error.message, 'config');
        process.exit(1);
    }
    throw error;
}

logger.configure(config.logging);
logger.info(describeConfig(config), 'config');
if (!config.credentials) {
    logger.warn('No portal credentials configured; search_bookings will fail until they are set', 'config');
}

const blotter = new BookingBlotter(config);
const server = createServer(blotter, config);

// Handle shutdown
process.on('SIGINT', () => {
    blotter.shutdown()
        .then(() => server.close())
        .catch(error => logger.error(`Shutdown failed: ${errorMessage(error)}`))
        .finally(() => process.exit(0));
});

// Start the server
const transport = new StdioServerTransport();
server.connect(transport).catch(error => {
    logger.error(`Failed to start server: ${errorMessage(error)}`);
    process.exit(1);
});
