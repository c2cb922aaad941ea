import { Injectable } from '@nestjs/common';
import type { Inventory } from './inventory.js';
import type { Item } from '../types/index.js';

@Injectable()
export class InventoryService {
  /**
   * 아이템 일괄 추가 — 용량 초과분은 rejected로 반환.
   */
  addItems(inventory: Inventory, items: Item[]): { added: Item[]; rejected: Item[] } {
    const added: Item[] = [];
    const rejected: Item[] = [];
    for (const item of items) {
      if (inventory.addItem(item)) {
        added.push(item);
      } else {
        rejected.push(item);
      }
    }
    return { added, rejected };
  }
}
