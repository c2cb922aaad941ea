// 1:1 조우 진행 — 플레이어 선공, 양측 교대 공격

import { Injectable } from '@nestjs/common';
import type { Character } from '../character/character.js';
import type { GameEventSink } from '../logging/game-event-sink.js';

export type EncounterOutcome = 'VICTORY' | 'DEFEAT' | 'STALEMATE';

export interface EncounterOptions {
  maxRounds: number;
  logger?: GameEventSink | null;
}

export interface EncounterResult {
  outcome: EncounterOutcome;
  rounds: number;
  damageDealt: number;
  damageTaken: number;
  leveledUp: boolean;
}

@Injectable()
export class EncounterService {
  /**
   * 한쪽이 쓰러지거나 maxRounds에 도달할 때까지 진행.
   * 적은 매 라운드 단순 반격만 한다 (행동 선택 없음).
   */
  resolve(player: Character, enemy: Character, options: EncounterOptions): EncounterResult {
    const startLevel = player.level;
    let rounds = 0;
    let damageDealt = 0;
    let damageTaken = 0;
    let outcome: EncounterOutcome = 'STALEMATE';

    while (rounds < options.maxRounds) {
      rounds++;

      const strike = player.attack(enemy, options.logger);
      damageDealt += strike.damage;
      if (strike.defeated) {
        outcome = 'VICTORY';
        break;
      }

      const counter = enemy.attack(player, options.logger);
      damageTaken += counter.damage;
      if (counter.defeated) {
        outcome = 'DEFEAT';
        break;
      }
    }

    return {
      outcome,
      rounds,
      damageDealt,
      damageTaken,
      leveledUp: player.level > startLevel,
    };
  }
}
