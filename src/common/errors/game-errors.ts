// 게임 에러 계층 — 규칙 엔진 바깥(설정/콘텐츠/부팅)에서만 사용

export class GameError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'GameError';
  }
}

export class NotFoundError extends GameError {
  constructor(message = 'Not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', message, details);
  }
}

export class InvalidInputError extends GameError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, details);
  }
}

export class ContentLoadError extends GameError {
  constructor(message = 'Content load failed', details?: Record<string, unknown>) {
    super('CONTENT_LOAD_FAILED', message, details);
  }
}

/** zod issue 목록 → "path: message" 문자열 배열 */
export function formatIssues(
  issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>,
): string[] {
  return issues.map((i) => `${i.path.join('.')}: ${i.message}`);
}
