import { describe, it, expect } from 'vitest';
import { parseSchedule } from '../../src/parsers/scheduleParser.js';

const ID_A = '11111111-1111-4111-8111-111111111111';
const ID_B = '22222222-2222-4222-8222-222222222222';

describe('parseSchedule', () => {
  it('should list distinct lower-cased ids in order of appearance', () => {
    const html = [
      '<main>',
      `<a href="/schedule-item/${ID_B}?tab=media">b</a>`,
      `<a href="/schedule-item/${ID_A}">a</a>`,
      `<a href="/schedule-item/${ID_B.toUpperCase()}">b again</a>`,
      '</main>'
    ].join('\n');

    const { gameIds, debug } = parseSchedule(html);

    expect(gameIds).toEqual([ID_B, ID_A]);
    expect(debug).toEqual({
      parse_mode: 'href',
      links_found: 3,
      matches_found: 2,
      has_item_path: true,
      has_uuid: true,
      html_head: html.slice(0, 160).replace(/\n/g, ' ')
    });
  });

  it('should report an empty page', () => {
    const { gameIds, debug } = parseSchedule('<p>\nno games</p>');

    expect(gameIds).toEqual([]);
    expect(debug.links_found).toBe(0);
    expect(debug.has_item_path).toBe(false);
    expect(debug.has_uuid).toBe(false);
    expect(debug.html_head).toBe('<p> no games</p>');
  });

  it('should ignore item paths without a valid id', () => {
    const { gameIds, debug } = parseSchedule('<a href="/schedule-item/not-an-id">x</a>');

    expect(gameIds).toEqual([]);
    expect(debug.has_item_path).toBe(true);
  });
});
