// ============================================================================
// RUTA: src/presentation/cli/commands/help.ts
// ============================================================================

import type { CommandRegistry } from '@/presentation/cli/command-registry';
import type { CliCommand } from '@/presentation/cli/types';

export const createHelpCommand = (registry: CommandRegistry): CliCommand => ({
  name: 'help',
  description: 'Lista los comandos disponibles.',
  usage: 'help',
  async execute(_args, output) {
    output.print('Comandos disponibles:');
    for (const command of registry.list()) {
      output.print(`  ${command.usage.padEnd(32)} ${command.description}`);
    }

    return 0;
  },
});
