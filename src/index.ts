// ============================================================================
// RUTA: src/index.ts
// ============================================================================

import { createCommandRegistry } from '@/bootstrap/container';
import type { CliOutput } from '@/presentation/cli/types';
import { env } from '@/shared/config/env';
import { logger } from '@/shared/logger/pino';

const output: CliOutput = {
  print: (line) => {
    process.stdout.write(`${line}\n`);
  },
  error: (line) => {
    process.stderr.write(`${line}\n`);
  },
};

async function main(): Promise<void> {
  const [commandName = 'show', ...args] = process.argv.slice(2);
  const registry = createCommandRegistry(env);
  const command = registry.resolve(commandName);

  if (!command) {
    output.error(`Comando desconocido: ${commandName}`);
    await registry.resolve('help')?.execute([], output);
    process.exitCode = 2;
    return;
  }

  process.exitCode = await command.execute(args, output);
}

main().catch((error) => {
  logger.fatal({ err: error }, 'El proceso terminó con un error inesperado.');
  process.exitCode = 1;
});
