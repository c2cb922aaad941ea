import { loadGameConfig } from './game-config.service.js';
import { InvalidInputError } from '../common/errors/game-errors.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return null;
}

describe('loadGameConfig', () => {
  it('환경변수 없으면 기본값', () => {
    expect(loadGameConfig({}, '/srv/game')).toEqual({
      contentDir: '/srv/game/content/ashfall_v1',
      logToConsole: true,
      playerName: 'Hero',
      playerWeapon: 'scissors',
      maxRounds: 50,
    });
  });

  it('환경변수 반영', () => {
    const config = loadGameConfig(
      {
        GAME_CONTENT_DIR: '/data/content',
        GAME_LOG_TO_CONSOLE: '0',
        GAME_PLAYER_NAME: '  Aria ',
        GAME_PLAYER_WEAPON: 'rock',
        GAME_MAX_ROUNDS: '12',
      },
      '/srv/game',
    );
    expect(config).toEqual({
      contentDir: '/data/content',
      logToConsole: false,
      playerName: 'Aria',
      playerWeapon: 'rock',
      maxRounds: 12,
    });
  });

  it('숫자가 아닌 라운드 수 → InvalidInputError', () => {
    const error = captureError(() => loadGameConfig({ GAME_MAX_ROUNDS: 'abc' }));
    expect(error).toBeInstanceOf(InvalidInputError);
    if (error instanceof InvalidInputError) {
      expect(error.code).toBe('INVALID_INPUT');
      expect(error.details?.issues).toEqual([expect.stringMatching(/^GAME_MAX_ROUNDS: /)]);
    }
  });

  it('잘못된 boolean 플래그 → InvalidInputError', () => {
    expect(() => loadGameConfig({ GAME_LOG_TO_CONSOLE: 'yes' })).toThrow(InvalidInputError);
  });

  it('빈 플레이어 이름 → InvalidInputError', () => {
    expect(() => loadGameConfig({ GAME_PLAYER_NAME: '   ' })).toThrow(InvalidInputError);
  });
});
