// 게임 이벤트 수신자 — 사람이 읽는 서술 로그 전용 (상태에 영향 없음)

import { Logger } from '@nestjs/common';

export interface NamedRef {
  readonly name: string;
}

export interface LevelRef extends NamedRef {
  readonly level: number;
}

export interface GameEventSink {
  log(message: string): void;
  logCombat(attacker: NamedRef, defender: NamedRef, damage: number): void;
  logLevelUp(character: LevelRef): void;
}

const sinkLogger = new Logger('GameEventSink');

/**
 * sink가 있으면 이벤트 전달. sink 예외는 warn으로 남기고 흐름은 계속한다
 * (전투/레벨업 결과는 sink 유무와 무관해야 함).
 */
export function emitTo(
  sink: GameEventSink | null | undefined,
  emit: (target: GameEventSink) => void,
): void {
  if (!sink) return;
  try {
    emit(sink);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    sinkLogger.warn(`Event sink failed: ${reason}`);
  }
}
