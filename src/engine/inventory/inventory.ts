// 캐릭터 소유 인벤토리 — 보관/장착 슬롯 장부 관리만 담당

import { InvalidInputError } from '../../common/errors/game-errors.js';
import type { Armor, Consumable, Item, Weapon } from '../types/index.js';

export const DEFAULT_INVENTORY_SIZE = 10;

export class Inventory {
  readonly maxSize: number;
  private readonly held: Item[] = [];
  private _equippedWeapon: Weapon | null = null;
  private _equippedArmor: Armor | null = null;

  constructor(maxSize: number = DEFAULT_INVENTORY_SIZE) {
    if (!Number.isInteger(maxSize) || maxSize <= 0) {
      throw new InvalidInputError('Inventory size must be a positive integer', { maxSize });
    }
    this.maxSize = maxSize;
  }

  get items(): readonly Item[] {
    return this.held;
  }

  get size(): number {
    return this.held.length;
  }

  get equippedWeapon(): Weapon | null {
    return this._equippedWeapon;
  }

  get equippedArmor(): Armor | null {
    return this._equippedArmor;
  }

  /** 슬롯이 가득 차면 false (변경 없음) */
  addItem(item: Item): boolean {
    if (this.held.length >= this.maxSize) {
      return false;
    }
    this.held.push(item);
    return true;
  }

  /**
   * 참조가 같은 첫 아이템 제거.
   * 장착 중인 아이템이어도 장착 슬롯은 그대로 둔다.
   */
  removeItem(item: Item): boolean {
    const idx = this.held.indexOf(item);
    if (idx === -1) return false;
    this.held.splice(idx, 1);
    return true;
  }

  equipWeapon(weapon: Weapon): boolean {
    if (!this.holds(weapon)) return false;
    this._equippedWeapon = weapon;
    return true;
  }

  equipArmor(armor: Armor): boolean {
    if (!this.holds(armor)) return false;
    this._equippedArmor = armor;
    return true;
  }

  /** 보관 중이면 제거만 한다. 효과 적용은 호출 측 게임 로직 몫 */
  useConsumable(consumable: Consumable): boolean {
    return this.removeItem(consumable);
  }

  holds(item: Item): boolean {
    return this.held.includes(item);
  }
}
