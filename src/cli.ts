#!/usr/bin/env node
import { main } from './commands.js';
import { loadConfigFromEnvironment } from './lib/config.js';

main(process.argv.slice(2), { config: loadConfigFromEnvironment() })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
