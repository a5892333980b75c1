#!/usr/bin/env node
/**
 * Detonate CLI — command router entry point.
 *
 * Usage:
 *   detonate analyze sample.bin --level high   # Run a file in the sandbox
 *   detonate config                            # Show effective config
 *   detonate signatures                        # List loaded signatures
 *   detonate help                              # Show commands
 */

import { createRouter } from './cli/router.js';
import { analyzeCommand } from './cli/commands/analyze.js';
import { configCommand } from './cli/commands/config.js';
import { signaturesCommand } from './cli/commands/signatures.js';

const router = createRouter('help');

router.register(analyzeCommand);
router.register(configCommand);
router.register(signaturesCommand);

router.register({
  name: 'help',
  description: 'Show available commands',
  usage: 'detonate help',
  async run() {
    router.printHelp(process.stdout);
    return 0;
  },
});

const { command, rest } = router.resolve(process.argv);

command
  .run({ argv: rest, stdout: process.stdout, stderr: process.stderr })
  .then((code) => {
    if (code !== 0) process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
