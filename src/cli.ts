#!/usr/bin/env node

import { runCli } from './run.js';

const MIN_NODE_MAJOR = 20;

function checkNodeVersion(): void {
  const [major = '0'] = process.versions.node.split('.');

  if (parseInt(major, 10) < MIN_NODE_MAJOR) {
    console.error(`ERR: pkg-create needs Node.js ${MIN_NODE_MAJOR} or newer (found ${process.version})`);
    process.exit(1);
  }
}

// Interrupts are not rolled back; point the user at what may be left over.
function setupSignalHandlers(target: string | undefined): void {
  let interrupted = false;

  const onSignal = (signal: NodeJS.Signals) => {
    if (interrupted) return;
    interrupted = true;

    console.error(`\nERR: Interrupted by ${signal}`);
    if (target) {
      console.error(`Check ${target} for a partially created package`);
    }
    process.exit(1);
  };

  for (const signal of ['SIGINT', 'SIGTERM', 'SIGHUP'] as const) {
    process.on(signal, () => onSignal(signal));
  }
}

async function main(): Promise<void> {
  checkNodeVersion();
  const args = process.argv.slice(2);
  setupSignalHandlers(args.length === 1 ? args[0] : undefined);

  const exitCode = await runCli(args);
  process.exit(exitCode);
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Unexpected error: ${message}`);
  process.exit(1);
});
