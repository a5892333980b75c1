/**
 * Signatures Command — list the behavioural signatures a run would use.
 */

import type { Command, CommandContext } from '../router.js';
import { extractFlag, extractBoolFlag, formatTable } from '../utils.js';
import { loadConfig } from '../../config/loader.js';
import { DEFAULT_SIGNATURES_PATH, loadSignatures } from '../../detection/signatures.js';
import { toErrorMessage } from '../../utils/errors.js';

const PLATFORMS: readonly string[] = ['aix', 'android', 'darwin', 'freebsd', 'linux', 'openbsd', 'sunos', 'win32'];

function isPlatform(value: string): value is NodeJS.Platform {
  return PLATFORMS.includes(value);
}

const USAGE = `
Usage: detonate signatures [options]

Options:
  -c, --config <path>      Config file path (YAML)
  -f, --file <path>        Signature file to list (default from config)
  -p, --platform <name>    Show signatures for another platform (linux, darwin, win32)
      --json               Print signatures as JSON
  -h, --help               Show this help
`;

export const signaturesCommand: Command = {
  name: 'signatures',
  aliases: ['sigs'],
  description: 'List the loaded behavioural signatures',
  usage: 'detonate signatures [--file PATH] [--platform NAME] [--json]',

  async run(ctx: CommandContext): Promise<number> {
    let argv = ctx.argv;

    const helpResult = extractBoolFlag(argv, 'help', 'h');
    if (helpResult.value) {
      ctx.stdout.write(USAGE + '\n');
      return 0;
    }
    argv = helpResult.rest;

    const configResult = extractFlag(argv, 'config', 'c');
    argv = configResult.rest;
    const fileResult = extractFlag(argv, 'file', 'f');
    argv = fileResult.rest;
    const platformResult = extractFlag(argv, 'platform', 'p');
    argv = platformResult.rest;
    const jsonResult = extractBoolFlag(argv, 'json');

    const platform = platformResult.value ?? process.platform;
    if (!isPlatform(platform)) {
      ctx.stderr.write(`Unknown platform: ${platform}\n`);
      return 1;
    }

    try {
      const path =
        fileResult.value ??
        loadConfig({ configPath: configResult.value }).signatures_path ??
        DEFAULT_SIGNATURES_PATH;
      const signatures = loadSignatures(path, platform).map((s) => s.signature);

      if (jsonResult.value) {
        ctx.stdout.write(JSON.stringify(signatures, null, 2) + '\n');
        return 0;
      }

      const rows = signatures.map((s) => ({
        id: s.id,
        name: s.name,
        category: s.pattern.category ?? 'any',
        weight: String(s.severityWeight),
        conclusive: s.conclusive ? 'yes' : 'no',
      }));
      ctx.stdout.write(`${path} (${platform})\n\n${formatTable(rows)}\n`);
      return 0;
    } catch (err) {
      ctx.stderr.write(`${toErrorMessage(err)}\n`);
      return 1;
    }
  },
};
