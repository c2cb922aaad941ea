// 경험치/레벨업 상수

/** 레벨업 1회에 소모되는 경험치 (처치 보상도 동일) */
export const LEVEL_UP_EXP = 100;

/** 레벨업 시 체력/피해에 곱하는 성장 계수 (floor) */
export const EXP_MULTIPLIER = 1.2;

/** floor(value * EXP_MULTIPLIER) */
export function growStat(value: number): number {
  return Math.floor(value * EXP_MULTIPLIER);
}
