// ashfall_v1 JSON 로드 + 메모리 캐시

import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { GameConfigService } from '../config/game-config.service.js';
import {
  ContentLoadError,
  InvalidInputError,
  NotFoundError,
  formatIssues,
} from '../common/errors/game-errors.js';
import {
  EnemyDefinitionSchema,
  MessageTemplatesSchema,
  PlayerDefaultsSchema,
  StageDefinitionSchema,
  WeaponDefinitionSchema,
  type EnemyDefinition,
  type MessageTemplates,
  type PlayerDefaults,
  type StageDefinition,
  type WeaponDefinition,
} from './content.types.js';

@Injectable()
export class ContentLoaderService implements OnModuleInit {
  private readonly logger = new Logger(ContentLoaderService.name);
  private weapons = new Map<string, WeaponDefinition>();
  private enemies = new Map<string, EnemyDefinition>();
  private stages: StageDefinition[] = [];
  private playerDefaults!: PlayerDefaults;
  private messages!: MessageTemplates;

  constructor(private readonly configService: GameConfigService) {}

  async onModuleInit() {
    await this.load();
  }

  /** 콘텐츠 디렉터리 전체 로드 (기본: 설정의 contentDir) */
  async load(dir: string = this.configService.get().contentDir): Promise<void> {
    const [defaults, weapons, enemies, stages, messages] = await Promise.all([
      this.readJson(dir, 'player_defaults.json', PlayerDefaultsSchema),
      this.readJson(dir, 'weapons.json', z.array(WeaponDefinitionSchema)),
      this.readJson(dir, 'enemies.json', z.array(EnemyDefinitionSchema)),
      this.readJson(dir, 'stages.json', z.array(StageDefinitionSchema)),
      this.readJson(dir, 'messages.json', MessageTemplatesSchema),
    ]);

    const weaponMap = new Map<string, WeaponDefinition>(weapons.map((w) => [w.weaponId, w]));
    const enemyMap = new Map<string, EnemyDefinition>(enemies.map((e) => [e.enemyId, e]));

    // 스테이지의 enemyRef는 교체 전에 검증 — 실패 시 기존 콘텐츠 유지
    for (const stage of stages) {
      if (!enemyMap.has(stage.enemyRef)) {
        throw new NotFoundError(`Unknown enemy in stage ${stage.stageId}`, {
          enemyRef: stage.enemyRef,
        });
      }
    }

    this.playerDefaults = defaults;
    this.weapons = weaponMap;
    this.enemies = enemyMap;
    this.stages = stages;
    this.messages = messages;

    this.logger.log(
      `Content loaded: ${this.weapons.size} weapons, ${this.enemies.size} enemies, ${this.stages.length} stages`,
    );
  }

  getPlayerDefaults(): PlayerDefaults {
    return this.playerDefaults;
  }

  getMessages(): MessageTemplates {
    return this.messages;
  }

  getStages(): StageDefinition[] {
    return this.stages;
  }

  getWeapon(weaponId: string): WeaponDefinition | undefined {
    return this.weapons.get(weaponId);
  }

  getAllWeapons(): WeaponDefinition[] {
    return [...this.weapons.values()];
  }

  getEnemy(enemyId: string): EnemyDefinition | undefined {
    return this.enemies.get(enemyId);
  }

  private async readJson<T extends z.ZodTypeAny>(
    dir: string,
    file: string,
    schema: T,
  ): Promise<z.output<T>> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(join(dir, file), 'utf-8'));
    } catch (err) {
      throw new ContentLoadError(`Failed to read ${file}`, {
        dir,
        reason: err instanceof Error ? err.message : String(err),
      });
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new InvalidInputError(`Invalid content in ${file}`, {
        issues: formatIssues(result.error.issues),
      });
    }
    return result.data;
  }
}
