#!/usr/bin/env node

// CLI entry point: `imsg-relay setup` runs the wizard, anything else starts the relay
const arg = process.argv[2];

if (arg === 'setup') {
  await import('./setup.js');
} else {
  await import('./index.js');
}
