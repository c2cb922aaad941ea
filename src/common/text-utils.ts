/**
 * 메시지 템플릿 치환. {key} 자리에 vars[key]를 넣고,
 * 값이 없는 placeholder는 그대로 둔다.
 */
export function renderTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => vars[key] ?? match);
}
