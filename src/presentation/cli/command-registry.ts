// ============================================================================
// RUTA: src/presentation/cli/command-registry.ts
// ============================================================================

import { Collection } from 'discord.js';

import type { CliCommand } from '@/presentation/cli/types';

export class CommandRegistry {
  private readonly commands = new Collection<string, CliCommand>();

  private readonly ordered: CliCommand[] = [];

  public register(commands: ReadonlyArray<CliCommand>): this {
    for (const command of commands) {
      const names = [command.name, ...(command.aliases ?? [])].map((value) => value.toLowerCase());

      for (const name of names) {
        if (this.commands.has(name)) {
          throw new Error(`El comando ${name} ya fue registrado.`);
        }

        this.commands.set(name, command);
      }

      this.ordered.push(command);
    }

    return this;
  }

  public resolve(name: string): CliCommand | undefined {
    return this.commands.get(name.toLowerCase());
  }

  public list(): ReadonlyArray<CliCommand> {
    return [...this.ordered];
  }
}
