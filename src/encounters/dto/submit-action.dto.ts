import { z } from 'zod';

const PlayerActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ATTACK') }),
  z.object({ type: z.literal('DODGE') }),
  z.object({ type: z.literal('DEFEND') }),
  z.object({ type: z.literal('AMBUSH') }),
  z.object({ type: z.literal('SKILL'), skillId: z.string().min(1).max(50) }),
  z.object({ type: z.literal('ITEM'), instanceId: z.string().min(1).max(64) }),
]);

export const SubmitActionBodySchema = z.object({
  action: PlayerActionSchema,
  // turnCount of the encounter the client last saw
  expectedTurn: z.number().int().min(0),
});

export type SubmitActionBody = z.infer<typeof SubmitActionBodySchema>;
