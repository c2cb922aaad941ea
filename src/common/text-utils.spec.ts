import { renderTemplate } from './text-utils.js';

describe('renderTemplate', () => {
  it('placeholder 치환', () => {
    expect(renderTemplate('{enemy_name} falls, {player_name}.', { player_name: 'Aria', enemy_name: 'Rat' })).toBe(
      'Rat falls, Aria.',
    );
  });

  it('값이 없는 placeholder는 유지', () => {
    expect(renderTemplate('Hello {who}', {})).toBe('Hello {who}');
  });

  it('같은 키 반복', () => {
    expect(renderTemplate('{a}-{a}', { a: 'x' })).toBe('x-x');
  });
});
