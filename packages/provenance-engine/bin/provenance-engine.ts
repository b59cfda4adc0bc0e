#!/usr/bin/env tsx
/**
 * Provenance Engine CLI Entry Point
 *
 * @module provenance-engine-cli
 */

import { readFileSync } from 'node:fs';
import { createProgram, EXIT_CODES } from '../src/cli/program.js';

function getVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch (error) {
    console.error(`Could not read package version: ${error instanceof Error ? error.message : String(error)}`);
  }
  return '0.0.0';
}

async function main(): Promise<void> {
  const controller = new AbortController();
  // First interrupt cancels the running analysis; a second one exits
  process.once('SIGINT', () => {
    controller.abort();
    process.once('SIGINT', () => process.exit(EXIT_CODES.USER_CANCELLED));
  });

  const program = createProgram({ version: getVersion(), signal: controller.signal });

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
