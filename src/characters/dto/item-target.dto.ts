import { z } from 'zod';
import { EQUIP_SLOT } from '../../db/types/index.js';

export const ItemTargetBodySchema = z.object({
  instanceId: z.string().min(1).max(64),
});

export type ItemTargetBody = z.infer<typeof ItemTargetBodySchema>;

export const UnequipBodySchema = z.object({
  slot: z.enum(EQUIP_SLOT),
});

export type UnequipBody = z.infer<typeof UnequipBodySchema>;
