import { Injectable } from '@nestjs/common';
import { Character, type CharacterInit } from './character.js';

/** 역할 필드를 제외한 공통 생성 인자 */
export type BaseCharacterInit = Omit<CharacterInit, 'role'>;

@Injectable()
export class CharacterService {
  create(init: CharacterInit): Character {
    return new Character(init);
  }

  createBoss(init: BaseCharacterInit & { specialAbility?: string | null }): Character {
    const { specialAbility, ...rest } = init;
    return new Character({ ...rest, role: { kind: 'SPECIAL', ability: specialAbility ?? null } });
  }

  createSidekick(init: BaseCharacterInit & { supportAbility?: string | null }): Character {
    const { supportAbility, ...rest } = init;
    return new Character({ ...rest, role: { kind: 'SUPPORT', ability: supportAbility ?? null } });
  }

  createVillain(init: BaseCharacterInit & { evilDeed?: string | null }): Character {
    const { evilDeed, ...rest } = init;
    return new Character({ ...rest, role: { kind: 'EVIL', deed: evilDeed ?? null } });
  }
}
