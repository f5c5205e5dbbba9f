#!/usr/bin/env node
import process from 'node:process';

import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { createHttpApp } from './http/app.js';
import { buildDispatcher } from './mcp/dispatcher.js';
import { OpenShockClient } from './openshock/client.js';
import { SafetyClamp } from './safety/safetyClamp.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  const clamp = new SafetyClamp(config.maxShockIntensity);
  const client = new OpenShockClient({
    baseUrl: config.openshockBaseUrl,
    apiToken: config.openshockApiToken,
    timeoutMs: config.requestTimeoutMs,
    userAgent: `${config.serverName}/${config.serverVersion}`,
    logger
  });
  const dispatcher = buildDispatcher({ config, logger, client, clamp });
  const app = createHttpApp({ config, logger, dispatcher, clamp });

  logger.info(
    {
      baseUrl: config.openshockBaseUrl,
      openshockTokenConfigured: Boolean(config.openshockApiToken),
      mcpAuthTokenConfigured: Boolean(config.mcpAuthToken),
      maxShockIntensity: clamp.limited ? clamp.effectiveCeiling() : 'unlimited'
    },
    `Starting ${config.serverName} v${config.serverVersion}`
  );

  const httpServer = app.listen(config.mcpHttpPort, config.mcpHttpHost, (error?: Error) => {
    if (error) {
      logger.fatal({ error: error.message }, 'HTTP server failed to start');
      process.exit(1);
    }
    logger.info(
      {
        host: config.mcpHttpHost,
        port: config.mcpHttpPort,
        allowedHosts: config.mcpHttpAllowedHosts ?? null,
        allowJsonOnly: config.mcpHttpAllowJsonOnly
      },
      `${config.serverName} listening on HTTP`
    );
  });

  const shutdown = () => {
    logger.info('Shutting down HTTP server');
    httpServer.close(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  const text = error instanceof Error ? error.stack ?? error.message : String(error);
  console.error(text);
  process.exit(1);
});
