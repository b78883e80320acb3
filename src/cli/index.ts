import { readFileSync } from 'node:fs';
import { Cause, Exit, Option } from 'effect';
import { buildShellCommand } from '../core/popup';
import { runProgramExit } from '../effect/runtime';
import { formatHelp } from './help';
import { runInteractive } from './interactive';
import { parseCliArgs, type CliCommand } from './parse';
import { launchSearch } from './run';
import { formatSearchHits, searchText } from './search';
import { getCliVersion } from './version';

export const EXIT_SUCCESS = 0;
export const EXIT_USAGE = 2;
export const EXIT_INTERNAL = 6;

function printError(message: string): void {
  console.error(message);
}

function exitCodeFor<A, E extends { readonly message: string }>(exit: Exit.Exit<A, E>): number {
  if (Exit.isSuccess(exit)) return EXIT_SUCCESS;

  const failure = Cause.failureOption(exit.cause);
  if (Option.isSome(failure)) {
    printError(`paneflash: ${failure.value.message}`);
  } else if (!Cause.isInterruptedOnly(exit.cause)) {
    printError(Cause.pretty(exit.cause));
  }
  return EXIT_INTERNAL;
}

/** Re-runs this program inside the popup, under the same runtime flags */
export function popupCommand(paneId: string): string {
  return buildShellCommand([
    process.execPath,
    ...process.execArgv,
    process.argv[1],
    'interactive',
    '--pane',
    paneId,
  ]);
}

async function readInput(file?: string): Promise<string> {
  if (file) {
    return readFileSync(file, 'utf8');
  }
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

async function runSearchCommand(command: Extract<CliCommand, { kind: 'search' }>): Promise<number> {
  let text: string;
  try {
    text = await readInput(command.file);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    printError(`paneflash: cannot read ${command.file ?? 'stdin'}: ${reason}`);
    return EXIT_INTERNAL;
  }

  const hits = searchText(text, command);
  console.log(formatSearchHits(hits));
  return EXIT_SUCCESS;
}

export async function runCli(args: string[]): Promise<number> {
  const parsed = parseCliArgs(args);
  if (!parsed.ok) {
    printError(parsed.error);
    return EXIT_USAGE;
  }

  const command = parsed.command;

  switch (command.kind) {
    case 'help':
      console.log(formatHelp(command.topic, getCliVersion()));
      return EXIT_SUCCESS;
    case 'version':
      console.log(getCliVersion());
      return EXIT_SUCCESS;
    case 'run':
      return exitCodeFor(
        await runProgramExit(launchSearch({ paneId: command.pane, popupCommand }))
      );
    case 'interactive':
      return exitCodeFor(await runProgramExit(runInteractive(command.pane)));
    case 'search':
      return runSearchCommand(command);
    default:
      printError('Unknown command.');
      return EXIT_USAGE;
  }
}

export type { CliCommand };
