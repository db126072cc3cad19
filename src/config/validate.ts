#!/usr/bin/env node

/**
 * Check the configuration without starting the server
 */

import { getConfig } from './index.js';

try {
  const config = getConfig();
  console.log('Configuration is valid');
  console.log(JSON.stringify(config, null, 2));
  process.exit(0);
} catch (error) {
  console.error('Configuration validation failed:');
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
}
