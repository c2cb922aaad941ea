// 역할 부가 데이터 — Boss / Sidekick / Villain 구분

export type RoleData =
  | { readonly kind: 'NONE' }
  | { readonly kind: 'SPECIAL'; readonly ability: string | null }
  | { readonly kind: 'SUPPORT'; readonly ability: string | null }
  | { readonly kind: 'EVIL'; readonly deed: string | null };

export type RoleKind = RoleData['kind'];

export const NO_ROLE: RoleData = Object.freeze({ kind: 'NONE' });

/**
 * 역할 행동 문구. 능력이 비어 있으면(null 또는 '') "has no ..." 문구,
 * 역할이 없으면 null.
 */
export function formatRoleAction(name: string, role: RoleData): string | null {
  switch (role.kind) {
    case 'NONE':
      return null;
    case 'SPECIAL':
      return role.ability ? `${name} uses ${role.ability}!` : `${name} has no special ability.`;
    case 'SUPPORT':
      return role.ability ? `${name} uses ${role.ability}!` : `${name} has no support ability.`;
    case 'EVIL':
      return role.deed ? `${name} commits ${role.deed}!` : `${name} has no evil deed.`;
  }
}
