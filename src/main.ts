import { ask } from './client/prompt';
import { findProgram, formatMenu, listPrograms } from './programs/registry';
import type { ProgramContext } from './programs/types';
import { loadConfig } from './shared/config';

async function main(argv: string[]): Promise<void> {
  const context: ProgramContext = {
    config: loadConfig(process.env),
    input: process.stdin,
    output: process.stdout,
    catalog: listPrograms(),
  };
  const { input, output } = context;

  const [selection] = argv;
  if (selection) {
    const program = findProgram(selection);
    if (!program) {
      console.error(`[MENU] Unknown program "${selection}". Available: ${listPrograms().map((p) => p.id).join(', ')}`);
      process.exitCode = 1;
      return;
    }
    await program.create(context).run();
    return;
  }

  for (;;) {
    output.write(`\n${formatMenu()}\n\n`);
    const choice = (await ask(input, output, 'Enter option: ')).trim();

    if (choice === '0') {
      output.write('Goodbye!\n');
      break;
    }

    const program = findProgram(choice);
    if (!program) {
      output.write('Invalid selection.\n');
      continue;
    }

    await program.create(context).run();
    output.write('\n--- Finished ---\n');
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error('[MENU] Fatal error:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
