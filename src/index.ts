#!/usr/bin/env node
import { run } from './cli/run.js';
import { SessionLogger } from './logging/index.js';
import { SshClientSession } from './transport/ssh-transport.js';

const logger = new SessionLogger();

run(process.argv.slice(2), {
  cwd: process.cwd(),
  env: process.env,
  stdout: process.stdout,
  stderr: process.stderr,
  signals: process,
  logger,
  createSession: (config) => new SshClientSession(config, logger),
})
  .then((exitCode) => {
    // A reader stuck past the grace period must not keep the process alive.
    process.stdout.write('', () => process.exit(exitCode));
  })
  .catch((error: unknown) => {
    console.error('cec-ssh failed unexpectedly:', error);
    process.exit(1);
  });
