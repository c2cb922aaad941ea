import { Logger } from '@nestjs/common';
import type { GameEventSink, LevelRef, NamedRef } from './game-event-sink.js';

export interface GameLoggerOptions {
  logToConsole?: boolean;
  clock?: () => Date;
}

/** HH:MM:SS (로컬 시간) */
export function formatClock(date: Date): string {
  return [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map((n) => String(n).padStart(2, '0'))
    .join(':');
}

/**
 * 기본 GameEventSink 구현.
 * 모든 메시지를 순서대로 보관하고, logToConsole이면 Nest Logger로도 출력.
 */
export class GameLogger implements GameEventSink {
  private readonly logger = new Logger(GameLogger.name);
  private readonly logs: string[] = [];
  private readonly logToConsole: boolean;
  private readonly clock: () => Date;

  constructor(options: GameLoggerOptions = {}) {
    this.logToConsole = options.logToConsole ?? true;
    this.clock = options.clock ?? (() => new Date());
  }

  log(message: string): void {
    this.logs.push(message);
    if (this.logToConsole) {
      this.logger.log(message);
    }
  }

  logCombat(attacker: NamedRef, defender: NamedRef, damage: number): void {
    this.log(
      `[${formatClock(this.clock())}] COMBAT LOG: ${attacker.name} attacked ${defender.name} for ${damage} damage`,
    );
  }

  logLevelUp(character: LevelRef): void {
    this.log(
      `[${formatClock(this.clock())}] LEVEL UP: ${character.name} reached level ${character.level}!`,
    );
  }

  getLogs(): string[] {
    return [...this.logs];
  }

  clear(): void {
    this.logs.length = 0;
  }
}
