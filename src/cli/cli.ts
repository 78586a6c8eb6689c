#!/usr/bin/env -S node --no-node-snapshot
import { main } from '../index.js';

function isMainModule(): boolean {
  // Matches direct execution as well as the npm bin shim
  const mainFile = process.argv[1];
  return Boolean(
    mainFile &&
      (mainFile.endsWith('cli.js') ||
        mainFile.endsWith('cli.ts') ||
        mainFile.includes('sandbox-exec-mcp')),
  );
}

if (isMainModule()) {
  main().catch((error) => {
    console.error('Unhandled error:', error);
    process.exit(1);
  });
}
