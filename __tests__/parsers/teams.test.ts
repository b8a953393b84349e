import { describe, it, expect } from 'vitest';
import { collectLogos, collectTeamNames, parseTeams } from '../../src/parsers/teams.js';

const HTML_CARD = [
  '<img src="/logos/home.png" alt="Kaunas Lions">',
  '<p class="tabular-nums">88</p>',
  '<img alt="Riga Foxes" src="/logos/away.png">'
].join('');

const ESCAPED_CARD = String.raw`[\"$\",\"img\",null,{\"src\":\"/logos/a.png\",\"alt\":\"Alpha BC\"}],[\"$\",\"img\",null,{\"src\":\"/logos/b.png\",\"alt\":\"Beta BC\"}]`;

describe('teams', () => {
  describe('parseTeams', () => {
    it('should read home and away from plain HTML', () => {
      expect(parseTeams(HTML_CARD, 'Club team')).toEqual({
        home: 'Kaunas Lions',
        away: 'Riga Foxes',
        home_logo: '/logos/home.png',
        away_logo: '/logos/away.png'
      });
    });

    it('should read home and away from escaped JSON', () => {
      expect(parseTeams(ESCAPED_CARD, 'Club team')).toEqual({
        home: 'Alpha BC',
        away: 'Beta BC',
        home_logo: '/logos/a.png',
        away_logo: '/logos/b.png'
      });
    });

    it('should skip the club badge regardless of case', () => {
      const window = '<img src="/badge.png" alt="CLUB TEAM">' + HTML_CARD;
      const teams = parseTeams(window, 'Club team');
      expect(teams.home).toBe('Kaunas Lions');
      expect(teams.away).toBe('Riga Foxes');
    });

    it('should use the next different name as away', () => {
      const window = '<img src="/a.png" alt="Kaunas Lions"><img src="/a.png" alt="Kaunas Lions"><img src="/b.png" alt="Riga Foxes">';
      expect(parseTeams(window, 'Club team').away).toBe('Riga Foxes');
    });

    it('should decode entities in names', () => {
      const window = '<img src="/a.png" alt="Lions &amp; Co"><img src="/b.png" alt="Foxes">';
      const teams = parseTeams(window, 'Club team');
      expect(teams.home).toBe('Lions & Co');
      expect(teams.home_logo).toBe('/a.png');
    });

    it('should return nulls when no images are present', () => {
      expect(parseTeams('<p>TBD</p>', 'Club team')).toEqual({ home: null, away: null, home_logo: null, away_logo: null });
    });

    it('should leave away null with a single team', () => {
      const teams = parseTeams('<img src="/a.png" alt="Kaunas Lions">', 'Club team');
      expect(teams.home).toBe('Kaunas Lions');
      expect(teams.away).toBeNull();
      expect(teams.away_logo).toBeNull();
    });
  });

  describe('collectTeamNames', () => {
    it('should ignore escaped names once plain HTML yielded two', () => {
      expect(collectTeamNames(HTML_CARD + ESCAPED_CARD, 'Club team')).toEqual(['Kaunas Lions', 'Riga Foxes']);
    });

    it('should cap the list at four names', () => {
      const window = ['One', 'Two', 'Three', 'Four', 'Five'].map(n => `alt="${n}"`).join(' ');
      expect(collectTeamNames(window, 'Club team')).toEqual(['One', 'Two', 'Three', 'Four']);
    });
  });

  describe('collectLogos', () => {
    it('should keep the first logo seen for a name', () => {
      const window = '<img src="/first.png" alt="Kaunas Lions"><img src="/second.png" alt="Kaunas Lions">';
      expect(collectLogos(window).get('Kaunas Lions')).toBe('/first.png');
    });
  });
});
