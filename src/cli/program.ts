import { Command, InvalidArgumentError, type OutputConfiguration } from 'commander';

import { NoteCommand } from '../types/index.js';

export interface ServeOptions {
  port?: number;
  host?: string;
}

/**
 * What the user asked for on the command line.
 * A `note` invocation with `command: null` displays every note.
 */
export type Invocation =
  | { mode: 'note'; command: NoteCommand | null }
  | { mode: 'serve'; options: ServeOptions };

export interface ProgramOptions {
  /** Throw a CommanderError instead of exiting the process. */
  exitOverride?: boolean;
  output?: OutputConfiguration;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

export function createProgram(
  onInvocation: (invocation: Invocation) => void,
  options: ProgramOptions = {}
): Command {
  const program = new Command();
  const select = (command: NoteCommand | null) => onInvocation({ mode: 'note', command });

  // Settings are inherited by subcommands added afterwards.
  if (options.exitOverride) {
    program.exitOverride();
  }
  if (options.output) {
    program.configureOutput(options.output);
  }

  program
    .name('notebook')
    .description('Keep short named notes in a SQLite notebook')
    .version('0.1.0')
    .allowExcessArguments(false)
    .action(() => select(null));

  program
    .command('add-note')
    .description('prompt for a note and add it under <notename>')
    .argument('<notename>')
    .action((noteName: string) => select({ kind: 'add', noteName }));

  program
    .command('del-note')
    .description('delete the note named <notename>')
    .argument('<notename>')
    .action((noteName: string) => select({ kind: 'delete', noteName }));

  program
    .command('del-all')
    .description('delete every note in the notebook')
    .action(() => select({ kind: 'delete-all' }));

  program
    .command('clear-note')
    .description('clear the content of <notename>')
    .argument('<notename>')
    .action((noteName: string) => select({ kind: 'clear', noteName }));

  program
    .command('upd-notename')
    .description('rename <notename> to <new_notename>')
    .argument('<notename>')
    .argument('<new_notename>')
    .action((noteName: string, newNoteName: string) =>
      select({ kind: 'rename', noteName, newNoteName })
    );

  program
    .command('upd-note')
    .description('prompt for a note that replaces the content of <notename>')
    .argument('<notename>')
    .action((noteName: string) => select({ kind: 'update-note', noteName }));

  program
    .command('display-note')
    .description('display id, name and content of <notename>')
    .argument('<notename>')
    .action((noteName: string) => select({ kind: 'display', noteName }));

  program
    .command('serve')
    .description('serve the notebook over HTTP')
    .option('-p, --port <port>', 'port to listen on', parsePort)
    .option('-H, --host <host>', 'host to bind')
    .action((serveOptions: ServeOptions) => onInvocation({ mode: 'serve', options: serveOptions }));

  return program;
}

/**
 * Parse user arguments (without the node and script entries) into an Invocation.
 */
export function parseInvocation(argv: string[], options: ProgramOptions = {}): Invocation {
  const result: { invocation?: Invocation } = {};
  createProgram((selected) => {
    result.invocation = selected;
  }, options).parse(argv, { from: 'user' });

  if (!result.invocation) {
    // commander only returns without running an action when it exits on its own
    throw new Error('No command was selected');
  }
  return result.invocation;
}
