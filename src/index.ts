#!/usr/bin/env node

/**
 * Adventurer Search Gateway
 * Main entry point
 */

import { parseArgs } from 'node:util';
import { getConfigExamples } from './config/index.js';

async function main(): Promise<void> {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
    },
  });

  if (values.help) {
    const examples = getConfigExamples();
    console.log(`
Adventurer Search Gateway - batch profile search with cache and task admission

Usage:
  adventurer-search-gateway [options]

Options:
  -h, --help     Show this help message
  -v, --version  Show version

Configuration is read from SEARCH_GATEWAY_* environment variables.

Development example:
${Object.entries(examples.development ?? {}).map(([key, value]) => `  ${key}=${value}`).join('\n')}
`);
    return;
  }

  if (values.version) {
    console.log(`Adventurer Search Gateway v${process.env.npm_package_version ?? 'unknown'}`);
    return;
  }

  const { runHttpServer } = await import('./http.js');
  await runHttpServer();
}

main().catch((error: unknown) => {
  console.error('Error:', error);
  process.exit(1);
});
