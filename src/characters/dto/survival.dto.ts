import { z } from 'zod';
import { SURVIVAL_OPTION } from '../../engine/character/survival.service.js';

export const SurvivalBodySchema = z.object({
  option: z.enum(SURVIVAL_OPTION),
});

export type SurvivalBody = z.infer<typeof SurvivalBodySchema>;
