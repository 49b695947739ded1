#!/usr/bin/env node
/**
 * cli.ts — `maas-probe`: negotiates with a MAAS server and reports the result.
 *
 * Configuration comes from the environment (or a .env file), see config.ts:
 *   MAAS_API_URL=http://maas.example:5240/MAAS MAAS_API_KEY=<key> npx tsx src/cli.ts
 *
 * On success prints the bound API URL, version and capability list as JSON
 * on stdout. On failure prints a classified error on stderr and exits 1.
 */

import 'dotenv/config';
import { loadConfig } from './config.js';
import { connect } from './connect.js';
import { classifyError } from './client/errors.js';
import { createGotTransport } from './client/transport.js';
import { createConsoleLogger } from './logger.js';

async function main() {
  const config = loadConfig();
  const logger = createConsoleLogger(config.logLevel);

  const client = await connect({
    baseURL: config.apiURL,
    apiKey: config.apiKey,
    apiVersion: config.apiVersion,
    maxRetries: config.maxRetries,
    transport: createGotTransport({ timeoutMs: config.timeoutMs }),
    logger,
  });

  logger.info(`connected to ${client.apiURL}`);
  console.log(
    JSON.stringify(
      {
        apiURL: client.apiURL,
        version: client.version,
        capabilities: [...client.capabilities].sort(),
      },
      null,
      2,
    ),
  );
}

main().catch((error: unknown) => {
  console.error(JSON.stringify(classifyError(error)));
  process.exit(1);
});
