// 캐릭터 — 체력 clamp, 공격, 경험치/레벨업 상태 전이

import { Inventory, DEFAULT_INVENTORY_SIZE } from '../inventory/inventory.js';
import { emitTo, type GameEventSink } from '../logging/game-event-sink.js';
import { createWeapon, formatRoleAction, NO_ROLE } from '../types/index.js';
import type { RoleData, Weapon } from '../types/index.js';
import { LEVEL_UP_EXP, growStat } from './progression.js';

export interface CharacterInit {
  name: string;
  health: number;
  damage: number;
  weaponName?: string | null;
  weaponDamage?: number;
  level?: number;
  experience?: number;
  maxInventorySize?: number;
  role?: RoleData;
}

export interface AttackResult {
  damage: number;
  defeated: boolean;
}

export class Character {
  readonly name: string;
  damage: number;
  /** 전투 피해에 쓰이는 단일 무기 슬롯 (inventory.equippedWeapon과 별개) */
  weapon: Weapon | null;
  readonly inventory: Inventory;
  level: number;
  experience: number;
  readonly role: RoleData;
  private health: number;

  constructor(init: CharacterInit) {
    this.name = init.name;
    this.health = init.health;
    this.damage = init.damage;
    this.weapon = init.weaponName
      ? createWeapon(init.weaponName, `A ${init.weaponName} weapon`, init.weaponDamage ?? 0)
      : null;
    this.inventory = new Inventory(init.maxInventorySize ?? DEFAULT_INVENTORY_SIZE);
    this.level = init.level ?? 1;
    this.experience = init.experience ?? 0;
    this.role = init.role ?? NO_ROLE;
  }

  getHealth(): number {
    return this.health;
  }

  /** 체력 변경의 유일한 경로 — 음수는 0으로 clamp */
  setHealth(newHealth: number): void {
    this.health = Math.max(newHealth, 0);
  }

  /** 기본 피해 + 무기 보너스 */
  getAttackDamage(): number {
    return this.damage + (this.weapon ? this.weapon.damage : 0);
  }

  /**
   * defender 공격. 체력이 0이 되면 처치로 보고 LEVEL_UP_EXP 경험치 획득.
   * 피해 값 검증 없음 — 음수 피해는 defender를 회복시킨다.
   */
  attack(defender: Character, logger?: GameEventSink | null): AttackResult {
    const totalDamage = this.getAttackDamage();
    defender.setHealth(defender.getHealth() - totalDamage);
    const defeated = defender.getHealth() <= 0;

    emitTo(logger, (l) => l.logCombat(this, defender, totalDamage));

    if (defeated) {
      const expBefore = this.experience;
      this.gainExperience(LEVEL_UP_EXP, logger);
      emitTo(logger, (l) => {
        l.log(`${this.name} defeated ${defender.name} and gained ${LEVEL_UP_EXP} experience points!`);
        l.log(`Total experience: ${expBefore + LEVEL_UP_EXP}`);
      });
    }

    return { damage: totalDamage, defeated };
  }

  /**
   * 경험치 획득. LEVEL_UP_EXP 이상이면 남은 양이 기준 미만이 될 때까지 반복 레벨업.
   * 음수는 무시하고 false.
   * @returns 이번 호출에서 1회 이상 레벨업했는지
   */
  gainExperience(amount: number, logger?: GameEventSink | null): boolean {
    if (amount < 0) {
      emitTo(logger, (l) => l.log(`${this.name} attempted to gain negative experience. Ignoring.`));
      return false;
    }
    // Infinity / 2^53 초과 값은 차감이 반영되지 않아 루프가 끝나지 않는다
    if (!Number.isSafeInteger(amount)) {
      emitTo(logger, (l) => l.log(`${this.name} attempted to gain invalid experience (${amount}). Ignoring.`));
      return false;
    }

    this.experience += amount;
    let leveledUp = false;

    while (this.experience >= LEVEL_UP_EXP) {
      this.experience -= LEVEL_UP_EXP;
      this.level += 1;
      this.health = growStat(this.health);
      this.damage = growStat(this.damage);
      leveledUp = true;

      emitTo(logger, (l) => {
        l.logLevelUp(this);
        l.log(`New stats: Health=${this.health}, Damage=${this.damage}`);
        l.log(`Remaining experience: ${this.experience}`);
      });
    }

    emitTo(logger, (l) =>
      l.log(`${this.name} gained ${amount} experience points. Total: ${this.experience}`),
    );

    return leveledUp;
  }

  /** 역할 능력 문구 (역할 없으면 null) */
  useRoleAbility(): string | null {
    return formatRoleAction(this.name, this.role);
  }

  /** 캐릭터 정보 시트 */
  describe(): string {
    const weaponName = this.weapon ? this.weapon.name : 'No Weapon';
    const weaponDamage = this.weapon ? this.weapon.damage : 0;
    return [
      `Name: ${this.name}`,
      `Health: ${this.health}`,
      `Damage: ${this.damage}`,
      `Weapon: ${weaponName} (+${weaponDamage} Damage)`,
    ].join('\n');
  }
}
