// ============================================================================
// RUTA: src/application/dto/roster.dto.ts
// ============================================================================

import { z } from 'zod';

export const RosterSearchSchema = z.object({
  query: z
    .string()
    .trim()
    .max(100, 'La búsqueda no puede exceder 100 caracteres.')
    .optional()
    .transform((value) => (value && value.length > 0 ? value : null)),
});

export type RosterSearchDTO = z.input<typeof RosterSearchSchema>;

export type RosterSearchPayload = z.output<typeof RosterSearchSchema>;

export const RefreshRosterSchema = z.object({
  password: z.string().optional(),
  requestedBy: z.string().trim().min(1).max(100).default('cli'),
});

export type RefreshRosterDTO = z.input<typeof RefreshRosterSchema>;

export type RefreshRosterPayload = z.output<typeof RefreshRosterSchema>;
