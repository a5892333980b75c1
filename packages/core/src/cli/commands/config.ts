/**
 * Config Command — show the effective configuration.
 *
 * Prints a summary with the limits each security level resolves to, or the
 * whole validated configuration with --json.
 */

import { SecurityLevel } from '@detonate/shared';
import type { Command, CommandContext } from '../router.js';
import { extractFlag, extractBoolFlag, formatBytes, formatTable } from '../utils.js';
import { loadConfig } from '../../config/loader.js';
import { resolveLimits } from '../../config/profiles.js';
import { DEFAULT_SIGNATURES_PATH } from '../../detection/signatures.js';
import { toErrorMessage } from '../../utils/errors.js';

const USAGE = `
Usage: detonate config [options]

Options:
  -c, --config <path>    Config file path (YAML)
      --json             Print the full effective configuration as JSON
  -h, --help             Show this help
`;

export const configCommand: Command = {
  name: 'config',
  aliases: ['cfg'],
  description: 'Validate and show the effective configuration',
  usage: 'detonate config [--config PATH] [--json]',

  async run(ctx: CommandContext): Promise<number> {
    let argv = ctx.argv;

    const helpResult = extractBoolFlag(argv, 'help', 'h');
    if (helpResult.value) {
      ctx.stdout.write(USAGE + '\n');
      return 0;
    }
    argv = helpResult.rest;

    const configPathResult = extractFlag(argv, 'config', 'c');
    argv = configPathResult.rest;
    const jsonResult = extractBoolFlag(argv, 'json');

    try {
      const config = loadConfig({ configPath: configPathResult.value });

      if (jsonResult.value) {
        ctx.stdout.write(JSON.stringify(config, null, 2) + '\n');
        return 0;
      }

      ctx.stdout.write(`Configuration valid.\n\n`);
      ctx.stdout.write(`  Security level:  ${config.default_security_level}\n`);
      ctx.stdout.write(`  Isolation:       ${config.isolation_method}\n`);
      ctx.stdout.write(
        `  Image:           ${config.container.image} (fallback ${config.container.allow_fallback ? 'enabled' : 'disabled'})\n`
      );
      ctx.stdout.write(
        `  Thresholds:      suspicious ${String(config.suspicious_threshold)}, malicious ${String(config.malicious_threshold)}\n`
      );
      ctx.stdout.write(`  Blacklist:       ${config.blacklisted_applications.join(', ') || '(empty)'}\n`);
      ctx.stdout.write(`  Signatures:      ${config.signatures_path ?? DEFAULT_SIGNATURES_PATH}\n`);
      ctx.stdout.write(`  Log level:       ${config.logging.level}\n\n`);

      const rows = Object.values(SecurityLevel).map((level) => {
        const limits = resolveLimits(config, level);
        return {
          level,
          memory: formatBytes(limits.memoryBytes),
          cpu: `${String(limits.cpuPercent)}%`,
          timeout: `${String(limits.executionTimeoutSeconds)}s`,
          network: limits.networkAccessAllowed ? 'allowed' : 'denied',
          restricted: limits.restrictedDomains.join(', ') || '-',
        };
      });
      ctx.stdout.write(formatTable(rows) + '\n');
      return 0;
    } catch (err) {
      ctx.stderr.write(`Configuration error:\n${toErrorMessage(err)}\n`);
      return 1;
    }
  },
};
