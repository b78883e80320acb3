/**
 * Label-based copying from tmux panes
 */
import { runCli } from './cli';

async function main() {
  const exitCode = await runCli(process.argv.slice(2));
  process.exitCode = exitCode;
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 6;
});
