// 게임 설정 서비스 — 환경변수 + 기본값, zod 검증

import { Injectable, Logger } from '@nestjs/common';
import { join } from 'path';
import { z } from 'zod';
import { InvalidInputError, formatIssues } from '../common/errors/game-errors.js';

const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

export const GameEnvSchema = z.object({
  GAME_CONTENT_DIR: z.string().min(1).optional(),
  GAME_LOG_TO_CONSOLE: BooleanFlagSchema.optional().default('true'),
  GAME_PLAYER_NAME: z.string().trim().min(1).max(40).optional().default('Hero'),
  GAME_PLAYER_WEAPON: z.string().min(1).optional().default('scissors'),
  GAME_MAX_ROUNDS: z.coerce.number().int().positive().optional().default(50),
});

export interface GameConfig {
  contentDir: string;
  logToConsole: boolean;
  playerName: string;
  playerWeapon: string;
  maxRounds: number;
}

/** 환경변수 → GameConfig. 검증 실패 시 InvalidInputError */
export function loadGameConfig(
  env: Record<string, string | undefined>,
  cwd: string = process.cwd(),
): GameConfig {
  const result = GameEnvSchema.safeParse(env);
  if (!result.success) {
    throw new InvalidInputError('Invalid game configuration', {
      issues: formatIssues(result.error.issues),
    });
  }
  const parsed = result.data;
  return {
    contentDir: parsed.GAME_CONTENT_DIR ?? join(cwd, 'content', 'ashfall_v1'),
    logToConsole: parsed.GAME_LOG_TO_CONSOLE,
    playerName: parsed.GAME_PLAYER_NAME,
    playerWeapon: parsed.GAME_PLAYER_WEAPON,
    maxRounds: parsed.GAME_MAX_ROUNDS,
  };
}

@Injectable()
export class GameConfigService {
  private readonly logger = new Logger(GameConfigService.name);
  private readonly config: GameConfig;

  constructor() {
    this.config = loadGameConfig(process.env);
    this.logger.log(`Content directory: ${this.config.contentDir}`);
  }

  get(): GameConfig {
    return this.config;
  }
}
