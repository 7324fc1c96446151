export interface SkillDefinition {
  skillId: string;
  name: string;
  damageMultiplier: number; // >= 1.0
  staminaCost: number;
  focusCost: number;
  description: string;
  minLevel?: number;
  price?: number;
}
