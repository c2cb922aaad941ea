// 아이템/장비 데이터 — 생성 후 불변, 동일성은 객체 참조 기준

export const ITEM_KINDS = ['MISC', 'WEAPON', 'ARMOR', 'CONSUMABLE'] as const;
export type ItemKind = (typeof ITEM_KINDS)[number];

interface ItemBase {
  readonly name: string;
  readonly description: string;
}

export interface MiscItem extends ItemBase {
  readonly kind: 'MISC';
}

export interface Weapon extends ItemBase {
  readonly kind: 'WEAPON';
  readonly damage: number; // 장착 시 피해 보너스
}

export interface Armor extends ItemBase {
  readonly kind: 'ARMOR';
  readonly defense: number; // 현재 전투 공식에서는 미사용
}

export interface Consumable extends ItemBase {
  readonly kind: 'CONSUMABLE';
  readonly effect: string; // 'heal' 등 효과 태그
  readonly value: number;
}

export type Item = MiscItem | Weapon | Armor | Consumable;

export function createItem(name: string, description: string): MiscItem {
  return Object.freeze({ kind: 'MISC', name, description });
}

export function createWeapon(name: string, description: string, damage: number): Weapon {
  return Object.freeze({ kind: 'WEAPON', name, description, damage });
}

export function createArmor(name: string, description: string, defense: number): Armor {
  return Object.freeze({ kind: 'ARMOR', name, description, defense });
}

export function createConsumable(
  name: string,
  description: string,
  effect: string,
  value: number,
): Consumable {
  return Object.freeze({ kind: 'CONSUMABLE', name, description, effect, value });
}
