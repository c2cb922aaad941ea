// 어드벤처 진행 — 콘텐츠 스테이지 순서대로 조우, 첫 패배/교착에서 종료

import { Injectable } from '@nestjs/common';
import { GameConfigService } from '../../config/game-config.service.js';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import { NotFoundError } from '../../common/errors/game-errors.js';
import { renderTemplate } from '../../common/text-utils.js';
import { CharacterService } from '../character/character.service.js';
import { InventoryService } from '../inventory/inventory.service.js';
import type { Character } from '../character/character.js';
import { EncounterService, type EncounterResult } from '../combat/encounter.service.js';
import { emitTo, type GameEventSink } from '../logging/game-event-sink.js';

export interface AdventureOptions {
  playerName?: string;
  weaponId?: string;
  maxRounds?: number;
  logger?: GameEventSink | null;
}

export interface StageResult {
  stageId: string;
  title: string;
  enemyName: string;
  encounter: EncounterResult;
}

export interface AdventureResult {
  outcome: 'WIN' | 'GAME_OVER';
  player: Character;
  stages: StageResult[];
}

@Injectable()
export class AdventureService {
  constructor(
    private readonly configService: GameConfigService,
    private readonly contentLoader: ContentLoaderService,
    private readonly characterService: CharacterService,
    private readonly inventoryService: InventoryService,
    private readonly encounterService: EncounterService,
  ) {}

  play(options: AdventureOptions = {}): AdventureResult {
    const config = this.configService.get();
    const playerName = options.playerName ?? config.playerName;
    const maxRounds = options.maxRounds ?? config.maxRounds;
    const logger = options.logger ?? null;
    const messages = this.contentLoader.getMessages();

    const player = this.createPlayer(playerName, options.weaponId ?? config.playerWeapon);

    emitTo(logger, (l) => {
      l.log(messages.welcome);
      l.log(renderTemplate(messages.intro, { player_name: playerName }));
    });

    const stages: StageResult[] = [];
    for (const stage of this.contentLoader.getStages()) {
      const enemy = this.createEnemy(stage.enemyRef);
      const vars = { player_name: playerName, enemy_name: enemy.name };

      emitTo(logger, (l) => {
        l.log(`== ${stage.title} ==`);
        l.log(renderTemplate(stage.intro, vars));
        const action = enemy.useRoleAbility();
        if (action) l.log(action);
      });

      const encounter = this.encounterService.resolve(player, enemy, { maxRounds, logger });
      stages.push({ stageId: stage.stageId, title: stage.title, enemyName: enemy.name, encounter });

      if (encounter.outcome !== 'VICTORY') {
        emitTo(logger, (l) => {
          const template = encounter.outcome === 'DEFEAT' ? messages.defeat : messages.stalemate;
          l.log(renderTemplate(template, vars));
          l.log(renderTemplate(messages.gameOver, vars));
        });
        return { outcome: 'GAME_OVER', player, stages };
      }

      emitTo(logger, (l) => l.log(renderTemplate(messages.victory, vars)));
    }

    emitTo(logger, (l) => l.log(renderTemplate(messages.gameWin, { player_name: playerName })));
    return { outcome: 'WIN', player, stages };
  }

  /**
   * 기본 스탯 + 선택 무기로 플레이어 생성.
   * 무기는 인벤토리에도 넣고 장착해 둔다 (전투 피해는 character.weapon 기준).
   */
  createPlayer(name: string, weaponId: string): Character {
    const weapon = this.contentLoader.getWeapon(weaponId);
    if (!weapon) {
      throw new NotFoundError('Unknown weapon', { weaponId });
    }
    const defaults = this.contentLoader.getPlayerDefaults();
    const player = this.characterService.create({
      name,
      health: defaults.health,
      damage: defaults.damage,
      weaponName: weapon.name,
      weaponDamage: weapon.damage,
      maxInventorySize: defaults.maxInventorySize,
    });
    if (player.weapon) {
      const { added } = this.inventoryService.addItems(player.inventory, [player.weapon]);
      if (added.includes(player.weapon)) {
        player.inventory.equipWeapon(player.weapon);
      }
    }
    return player;
  }

  createEnemy(enemyId: string): Character {
    const def = this.contentLoader.getEnemy(enemyId);
    if (!def) {
      throw new NotFoundError('Unknown enemy', { enemyId });
    }
    const weapon = def.weaponRef ? this.contentLoader.getWeapon(def.weaponRef) : undefined;
    if (def.weaponRef && !weapon) {
      throw new NotFoundError('Unknown weapon', { weaponId: def.weaponRef });
    }
    return this.characterService.create({
      name: def.name,
      health: def.health,
      damage: def.damage,
      weaponName: weapon?.name,
      weaponDamage: weapon?.damage,
      role: def.role,
    });
  }
}
