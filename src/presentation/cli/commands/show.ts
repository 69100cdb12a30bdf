// ============================================================================
// RUTA: src/presentation/cli/commands/show.ts
// ============================================================================

import type { Logger } from 'pino';

import type { LoadRosterViewUseCase } from '@/application/usecases/roster/LoadRosterViewUseCase';
import { reportCommandError } from '@/presentation/cli/errors';
import type { CliCommand } from '@/presentation/cli/types';
import { renderRosterView } from '@/presentation/roster/RosterCardFormatter';

export const createShowCommand = (useCase: LoadRosterViewUseCase, logger: Logger): CliCommand => ({
  name: 'show',
  aliases: ['list'],
  description: 'Muestra el roster guardado, opcionalmente filtrado por nombre.',
  usage: 'show [búsqueda]',
  async execute(args, output) {
    try {
      const query = args.join(' ');
      const view = await useCase.execute({ query });
      renderRosterView(view).forEach((line) => output.print(line));
      return view.status === 'corrupt' ? 1 : 0;
    } catch (error) {
      return reportCommandError(error, output, logger);
    }
  },
});
