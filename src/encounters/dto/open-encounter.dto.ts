import { z } from 'zod';

export const OpenEncounterBodySchema = z.object({
  enemyId: z.string().min(1).max(50),
  mercenary: z.boolean().optional().default(false),
});

export type OpenEncounterBody = z.infer<typeof OpenEncounterBodySchema>;
