// 콘텐츠 시드 데이터 스키마 (ashfall_v1 JSON 대응)

import { z } from 'zod';

export const PlayerDefaultsSchema = z.object({
  health: z.number().int().positive(),
  damage: z.number().int().nonnegative(),
  maxInventorySize: z.number().int().positive(),
});

export const WeaponDefinitionSchema = z.object({
  weaponId: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  damage: z.number().int().nonnegative(),
});

export const RoleDefinitionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('NONE') }),
  z.object({ kind: z.literal('SPECIAL'), ability: z.string().nullable() }),
  z.object({ kind: z.literal('SUPPORT'), ability: z.string().nullable() }),
  z.object({ kind: z.literal('EVIL'), deed: z.string().nullable() }),
]);

export const EnemyDefinitionSchema = z.object({
  enemyId: z.string().min(1),
  name: z.string().min(1),
  health: z.number().int().positive(),
  damage: z.number().int().nonnegative(),
  weaponRef: z.string().min(1).optional(),
  role: RoleDefinitionSchema.default({ kind: 'NONE' }),
});

export const StageDefinitionSchema = z.object({
  stageId: z.string().min(1),
  title: z.string().min(1),
  enemyRef: z.string().min(1),
  intro: z.string(),
});

export const MessageTemplatesSchema = z.object({
  welcome: z.string(),
  intro: z.string(),
  victory: z.string(),
  defeat: z.string(),
  stalemate: z.string(),
  gameWin: z.string(),
  gameOver: z.string(),
});

export type PlayerDefaults = z.infer<typeof PlayerDefaultsSchema>;
export type WeaponDefinition = z.infer<typeof WeaponDefinitionSchema>;
export type EnemyDefinition = z.infer<typeof EnemyDefinitionSchema>;
export type StageDefinition = z.infer<typeof StageDefinitionSchema>;
export type MessageTemplates = z.infer<typeof MessageTemplatesSchema>;
