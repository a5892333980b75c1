/**
 * CLI Router — maps the first positional argument to a registered command.
 */

/** Where a command listens for termination signals. */
export interface SignalSource {
  once(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
}

export interface CommandContext {
  argv: string[];
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  /** Defaults to the process. */
  signals?: SignalSource;
}

export interface Command {
  name: string;
  aliases?: string[];
  description: string;
  usage: string;
  run(ctx: CommandContext): Promise<number>;
}

export interface Router {
  register(command: Command): void;
  /** Pick the command for process.argv; unknown or missing names go to the default. */
  resolve(argv: string[]): { command: Command; rest: string[] };
  getCommands(): Command[];
  printHelp(stream: NodeJS.WritableStream): void;
}

export function createRouter(defaultCommand = 'help'): Router {
  const commands: Command[] = [];
  const byName = new Map<string, Command>();

  const fallback = (): Command => {
    const command = byName.get(defaultCommand);
    if (!command) {
      throw new Error(`Default command "${defaultCommand}" not registered`);
    }
    return command;
  };

  return {
    register(command) {
      commands.push(command);
      byName.set(command.name, command);
      for (const alias of command.aliases ?? []) {
        byName.set(alias, command);
      }
    },

    resolve(argv) {
      const args = argv.slice(2);
      const first = args[0];
      if (first === undefined || first.startsWith('-')) {
        return { command: fallback(), rest: args };
      }
      const command = byName.get(first);
      return command ? { command, rest: args.slice(1) } : { command: fallback(), rest: args };
    },

    getCommands() {
      return [...commands];
    },

    printHelp(stream) {
      const width = Math.max(0, ...commands.map((c) => c.name.length));
      stream.write('\nUsage: detonate <command> [options]\n\nCommands:\n');
      for (const command of commands) {
        const aliases = command.aliases?.length ? ` (${command.aliases.join(', ')})` : '';
        stream.write(`  ${command.name.padEnd(width)}  ${command.description}${aliases}\n`);
      }
      stream.write('\nRun `detonate <command> --help` for command options.\n\n');
    },
  };
}
