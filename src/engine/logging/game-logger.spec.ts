import { Logger } from '@nestjs/common';
import { GameLogger, formatClock } from './game-logger.js';
import { GameLoggerService } from './game-logger.service.js';
import { GameConfigService } from '../../config/game-config.service.js';

const FIXED_CLOCK = () => new Date(2026, 0, 1, 21, 4, 9);

describe('GameLogger', () => {
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it('formatClock — 두 자리 패딩', () => {
    expect(formatClock(new Date(2026, 0, 1, 9, 5, 7))).toBe('09:05:07');
    expect(formatClock(new Date(2026, 0, 1, 23, 59, 0))).toBe('23:59:00');
  });

  it('log — 순서대로 보관, 콘솔 출력', () => {
    const logger = new GameLogger({ clock: FIXED_CLOCK });
    logger.log('first');
    logger.log('second');
    expect(logger.getLogs()).toEqual(['first', 'second']);
    expect(logSpy).toHaveBeenCalledTimes(2);
    expect(logSpy).toHaveBeenLastCalledWith('second');
  });

  it('logToConsole=false면 보관만', () => {
    const logger = new GameLogger({ logToConsole: false });
    logger.log('quiet');
    expect(logger.getLogs()).toEqual(['quiet']);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('logCombat / logLevelUp 포맷', () => {
    const logger = new GameLogger({ logToConsole: false, clock: FIXED_CLOCK });
    logger.logCombat({ name: 'Aria' }, { name: 'Goblin' }, 14);
    logger.logLevelUp({ name: 'Aria', level: 3 });
    expect(logger.getLogs()).toEqual([
      '[21:04:09] COMBAT LOG: Aria attacked Goblin for 14 damage',
      '[21:04:09] LEVEL UP: Aria reached level 3!',
    ]);
  });

  it('getLogs는 사본 반환, clear로 비움', () => {
    const logger = new GameLogger({ logToConsole: false });
    logger.log('a');
    const snapshot = logger.getLogs();
    snapshot.push('tampered');
    expect(logger.getLogs()).toEqual(['a']);
    logger.clear();
    expect(logger.getLogs()).toEqual([]);
  });
});

describe('GameLoggerService', () => {
  const savedEnv = { ...process.env };
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    process.env = { ...savedEnv };
    logSpy.mockRestore();
  });

  it('설정의 GAME_LOG_TO_CONSOLE를 기본값으로 사용', () => {
    process.env.GAME_LOG_TO_CONSOLE = 'false';
    const service = new GameLoggerService(new GameConfigService());
    logSpy.mockClear();

    const logger = service.create();
    logger.log('hidden');
    expect(logger.getLogs()).toEqual(['hidden']);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('옵션으로 덮어쓰기', () => {
    process.env.GAME_LOG_TO_CONSOLE = 'false';
    const service = new GameLoggerService(new GameConfigService());
    logSpy.mockClear();

    const logger = service.create({ logToConsole: true });
    logger.log('shown');
    expect(logSpy).toHaveBeenCalledWith('shown');
  });
});
