import { Module } from '@nestjs/common';
import { InventoryService } from './inventory/inventory.service.js';
import { CharacterService } from './character/character.service.js';
import { GameLoggerService } from './logging/game-logger.service.js';
import { EncounterService } from './combat/encounter.service.js';
import { AdventureService } from './adventure/adventure.service.js';

const providers = [
  // Layer 1 — 장부/엔티티
  InventoryService,
  CharacterService,
  // Layer 2 — 서술 로그
  GameLoggerService,
  // Layer 3 — 진행
  EncounterService,
  AdventureService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
