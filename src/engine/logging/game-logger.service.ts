import { Injectable } from '@nestjs/common';
import { GameConfigService } from '../../config/game-config.service.js';
import { GameLogger, type GameLoggerOptions } from './game-logger.js';

@Injectable()
export class GameLoggerService {
  constructor(private readonly configService: GameConfigService) {}

  /** 설정의 콘솔 출력 여부를 기본값으로 GameLogger 생성 */
  create(options: GameLoggerOptions = {}): GameLogger {
    return new GameLogger({
      logToConsole: this.configService.get().logToConsole,
      ...options,
    });
  }
}
