import { z } from 'zod';
import { ORIGIN } from '../../db/types/index.js';

export const CreateCharacterBodySchema = z.object({
  name: z.string().trim().min(1).max(30),
  origin: z.enum(ORIGIN),
});

export type CreateCharacterBody = z.infer<typeof CreateCharacterBodySchema>;
