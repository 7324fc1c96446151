import { z } from 'zod';

export const LearnSkillBodySchema = z.object({
  skillId: z.string().min(1).max(50),
});

export type LearnSkillBody = z.infer<typeof LearnSkillBodySchema>;
