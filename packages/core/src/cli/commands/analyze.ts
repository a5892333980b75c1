/**
 * Analyze Command — run a file in the sandbox and report its verdict.
 *
 * Exit codes: 0 when the run completed with at most a low threat, 2 when the
 * target was blocked, timed out or scored medium or above, 1 when the sandbox
 * failed or the invocation was invalid.
 */

import {
  IsolationMethodSchema,
  SecurityLevelSchema,
  type ExecutionReport,
  type ResourceLimits,
} from '@detonate/shared';
import type { Command, CommandContext, SignalSource } from '../router.js';
import {
  colorContext,
  extractBoolFlag,
  extractFlag,
  formatBytes,
  formatDuration,
  Spinner,
  threatColor,
  type Colors,
} from '../utils.js';
import { loadConfig } from '../../config/loader.js';
import { initializeLogger } from '../../logging/logger.js';
import { analyze } from '../../orchestrator/analyze.js';
import { toErrorMessage } from '../../utils/errors.js';

const USAGE = `
Usage: detonate analyze <file> [options]

Options:
  -l, --level <level>      Security level: low, medium, high (default from config)
  -m, --method <method>    Isolation method: container, process (default from config)
  -c, --config <path>      Config file path (YAML)
  -t, --timeout <seconds>  Override the execution timeout
      --json               Print the full report as JSON
  -h, --help               Show this help
`;

export const EXIT_CLEAN = 0;
export const EXIT_FAILED = 1;
export const EXIT_THREAT = 2;

export function exitCodeFor(report: ExecutionReport): number {
  if (report.finalState === 'failed') return EXIT_FAILED;
  if (report.finalState !== 'completed') return EXIT_THREAT;
  return report.threatLevel === 'none' || report.threatLevel === 'low' ? EXIT_CLEAN : EXIT_THREAT;
}

/** Human-readable summary of a report. */
export function formatReport(report: ExecutionReport, c: Colors): string {
  const { session, score } = report;
  const level = threatColor(c, report.threatLevel);
  const verdict = report.cause
    ? `${report.finalState} (${report.cause.code}: ${report.cause.message})`
    : report.finalState;
  const backend = session.backend
    ? `${session.backend}${session.fallbackFrom ? ` (fallback from ${session.fallbackFrom})` : ''}`
    : 'none';
  const exit =
    session.exitSignal !== null
      ? `signal ${session.exitSignal}`
      : session.exitCode !== null
        ? `code ${String(session.exitCode)}`
        : 'n/a';

  const lines = [
    c.bold(`Analysis of ${report.request.targetFilePath}`),
    `  Verdict:       ${report.finalState === 'completed' ? verdict : c.red(verdict)}`,
    `  Threat level:  ${level(report.threatLevel)} (score ${score.aggregateValue.toFixed(2)})`,
    `  Signatures:    ${score.matchedSignatures.join(', ') || c.dim('none')}`,
    `  Behaviours:    ${score.behaviorFlags.join(', ') || c.dim('none')}`,
    `  Security:      ${report.request.securityLevel}`,
    `  Backend:       ${backend}`,
    `  Duration:      ${formatDuration(session.durationMs)}`,
    `  Exit:          ${exit}`,
    `  Peak memory:   ${formatBytes(session.peakMemoryBytes)}`,
    `  Peak CPU:      ${session.peakCpuPercent.toFixed(1)}%`,
    `  Events:        ${String(session.eventCount)}`,
  ];
  return lines.join('\n') + '\n';
}

export const analyzeCommand: Command = {
  name: 'analyze',
  aliases: ['run'],
  description: 'Run a file in the sandbox and score its behaviour',
  usage: 'detonate analyze <file> [--level LEVEL] [--method METHOD] [--json]',

  async run(ctx: CommandContext): Promise<number> {
    let argv = ctx.argv;

    const helpResult = extractBoolFlag(argv, 'help', 'h');
    if (helpResult.value) {
      ctx.stdout.write(USAGE + '\n');
      return 0;
    }
    argv = helpResult.rest;

    const levelResult = extractFlag(argv, 'level', 'l');
    argv = levelResult.rest;
    const methodResult = extractFlag(argv, 'method', 'm');
    argv = methodResult.rest;
    const configResult = extractFlag(argv, 'config', 'c');
    argv = configResult.rest;
    const timeoutResult = extractFlag(argv, 'timeout', 't');
    argv = timeoutResult.rest;
    const jsonResult = extractBoolFlag(argv, 'json');
    argv = jsonResult.rest;

    const file = argv[0];
    if (!file || argv.length > 1) {
      ctx.stderr.write(`Expected exactly one file to analyze.\n${USAGE}\n`);
      return EXIT_FAILED;
    }

    const level = SecurityLevelSchema.optional().safeParse(levelResult.value);
    if (!level.success) {
      ctx.stderr.write(`Unknown security level: ${String(levelResult.value)}\n`);
      return EXIT_FAILED;
    }
    const method = IsolationMethodSchema.optional().safeParse(methodResult.value);
    if (!method.success) {
      ctx.stderr.write(`Unknown isolation method: ${String(methodResult.value)}\n`);
      return EXIT_FAILED;
    }

    const limits: Partial<ResourceLimits> = {};
    if (timeoutResult.value !== undefined) {
      const seconds = Number(timeoutResult.value);
      if (!Number.isInteger(seconds) || seconds <= 0) {
        ctx.stderr.write(`Invalid timeout: ${timeoutResult.value}\n`);
        return EXIT_FAILED;
      }
      limits.executionTimeoutSeconds = seconds;
    }

    const colors = colorContext(ctx.stdout);
    const spinner = new Spinner(ctx.stderr);

    // Ctrl-C cancels the session; the orchestrator still kills and tears down
    const signals: SignalSource = ctx.signals ?? process;
    const controller = new AbortController();
    const interrupt = (): void => {
      controller.abort(new Error('Interrupted by user'));
    };
    signals.once('SIGINT', interrupt);
    signals.once('SIGTERM', interrupt);

    try {
      const config = loadConfig({ configPath: configResult.value });
      // JSON output owns stdout
      const logger = jsonResult.value ? undefined : initializeLogger(config.logging);

      if (!jsonResult.value) spinner.start(`Analyzing ${file}`);
      const report = await analyze(file, level.data, method.data, {
        config,
        limits,
        logger,
        signal: controller.signal,
        onState: (state) => spinner.update(`Analyzing ${file}: ${state}`),
      });
      const code = exitCodeFor(report);

      if (jsonResult.value) {
        ctx.stdout.write(JSON.stringify(report, null, 2) + '\n');
      } else {
        spinner.stop(`Analysis ${report.finalState}`, code !== EXIT_FAILED);
        ctx.stdout.write(formatReport(report, colors));
      }
      return code;
    } catch (err) {
      if (!jsonResult.value) spinner.stop('Analysis aborted', false);
      ctx.stderr.write(`Analysis error: ${toErrorMessage(err)}\n`);
      return EXIT_FAILED;
    } finally {
      signals.off('SIGINT', interrupt);
      signals.off('SIGTERM', interrupt);
    }
  },
};
