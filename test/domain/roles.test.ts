import { describe, it, expect } from 'vitest';
import { buildRoleTable, contestantCode } from '../../src/domain/roles.js';
import { testSettings } from '../utils/fakes.js';

describe('buildRoleTable', () => {
  const roles = buildRoleTable(testSettings());

  it('should create one contestant role per team place', () => {
    expect(roles.contestantRoles().map((role) => role.name)).toEqual([
      'Contestant 1',
      'Contestant 2',
      'Contestant 3',
      'Contestant 4',
    ]);
  });

  it('should restrict contestants to the contestant room types', () => {
    expect(roles.get('Contestant 2')?.roomTypes).toEqual(['Shared room']);
    expect(roles.get('Contestant 2')?.defaultRoomType).toBe('Shared room');
    expect(roles.get('Leader')?.roomTypes).toEqual(['Shared room', 'Single room']);
    expect(roles.get('Leader')?.defaultRoomType).toBe('Single room');
  });

  it('should mark observers and guides', () => {
    expect(roles.get('Observer with Leader')?.isObserver).toBe(true);
    expect(roles.get('Leader')?.isObserver).toBe(false);
    expect(roles.get('Guide')?.canGuide).toBe(true);
    expect(roles.get('Guide')?.staffOnly).toBe(true);
    expect(roles.get('Coordinator')?.canGuide).toBe(false);
  });

  it('should allow configured staff roles as secondary roles of participants', () => {
    expect(roles.get('Translator')?.secondaryOk).toBe(true);
    expect(roles.get('Translator')?.staffOnly).toBe(true);
    expect(roles.get('Coordinator')?.secondaryOk).toBe(false);
  });

  it('should restrict contestant genders only when configured', () => {
    expect(roles.get('Contestant 1')?.allowedGenders).toBeNull();
    const restricted = buildRoleTable(testSettings({ contestantGenders: ['Female'] }));
    expect(restricted.get('Contestant 1')?.allowedGenders).toEqual(['Female']);
    expect(restricted.get('Leader')?.allowedGenders).toBeNull();
  });

  it('should take badge colours from the settings where given', () => {
    const palette = { background: '112233', outline: '445566', text: 'ffffff' };
    const custom = buildRoleTable(testSettings({ badgeColors: { Leader: palette } }));
    expect(custom.get('Leader')?.badge).toEqual(palette);
    expect(custom.get('Deputy Leader')?.badge).toEqual(roles.get('Deputy Leader')?.badge);
  });

  it('should not know unlisted roles', () => {
    expect(roles.isKnown('Captain')).toBe(false);
    expect(roles.get('Captain')).toBeNull();
  });
});

describe('contestantCode', () => {
  it('should append the team place to the country code', () => {
    expect(contestantCode('ABC', 'Contestant 3')).toBe('ABC3');
  });

  it('should return null for other roles', () => {
    expect(contestantCode('ABC', 'Leader')).toBeNull();
  });
});
