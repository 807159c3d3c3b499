import { EventSettings } from '../config/event.js';

export interface BadgePalette {
  background: string;
  outline: string;
  text: string;
}

/**
 * What a role may do. Auditors consult this instead of branching on role names.
 */
export interface RoleCapabilities {
  name: string;
  staffOnly: boolean;
  isContestant: boolean;
  isObserver: boolean;
  canGuide: boolean;
  // staff role a non-staff person may hold as a secondary role
  secondaryOk: boolean;
  // null means any gender
  allowedGenders: readonly string[] | null;
  roomTypes: readonly string[];
  defaultRoomType: string | null;
  badge: BadgePalette;
}

const BADGES = {
  contestant: { background: '7ab558', outline: '3f6e28', text: '000000' },
  leader: { background: 'd9534f', outline: '8f2623', text: 'ffffff' },
  observer: { background: '5b9bd5', outline: '2e6199', text: '000000' },
  guide: { background: 'f0ad4e', outline: 'a8721f', text: '000000' },
  staff: { background: '9e9e9e', outline: '5c5c5c', text: '000000' },
} satisfies Record<string, BadgePalette>;

const OBSERVER_ROLES = [
  'Observer with Contestants',
  'Observer with Leader',
  'Observer with Deputy',
];

const STAFF_ROLES = [
  'Staff',
  'Jury Chair',
  'Chief Coordinator',
  'Coordinator',
  'Chief Guide',
  'Deputy Chief Guide',
  'Guide',
  'Treasurer',
  'IT',
  'Transport',
  'Entertainment',
  'Logistics',
  'Problem Selection Chair',
  'Problem Selection',
  'Chief Invigilator',
  'Invigilator',
];

export class RoleTable {
  private readonly roles: Map<string, RoleCapabilities>;

  constructor(roles: Iterable<RoleCapabilities>) {
    this.roles = new Map();
    for (const role of roles) {
      this.roles.set(role.name, role);
    }
  }

  get(name: string): RoleCapabilities | null {
    return this.roles.get(name) ?? null;
  }

  isKnown(name: string): boolean {
    return this.roles.has(name);
  }

  names(): string[] {
    return [...this.roles.keys()];
  }

  contestantRoles(): RoleCapabilities[] {
    return [...this.roles.values()].filter((role) => role.isContestant);
  }
}

function permittedRooms(settings: EventSettings, contestant: boolean): readonly string[] {
  const restricted = contestant ? settings.roomTypesContestant : settings.roomTypesNonContestant;
  return restricted.length > 0 ? restricted : settings.roomTypes;
}

export function buildRoleTable(settings: EventSettings): RoleTable {
  const roles: RoleCapabilities[] = [];
  const participant = (
    name: string,
    kind: 'contestant' | 'leader' | 'observer'
  ): RoleCapabilities => {
    const contestant = kind === 'contestant';
    return {
      name,
      staffOnly: false,
      isContestant: contestant,
      isObserver: kind === 'observer',
      canGuide: false,
      secondaryOk: false,
      allowedGenders:
        contestant && settings.contestantGenders.length > 0 ? settings.contestantGenders : null,
      roomTypes: permittedRooms(settings, contestant),
      defaultRoomType: contestant
        ? settings.defaultRoomTypeContestant
        : settings.defaultRoomTypeNonContestant,
      badge: settings.badgeColors[name] ?? BADGES[kind],
    };
  };

  for (let i = 1; i <= settings.numContestantsPerTeam; i++) {
    roles.push(participant(`Contestant ${i}`, 'contestant'));
  }
  roles.push(participant('Leader', 'leader'));
  roles.push(participant('Deputy Leader', 'leader'));
  for (const name of OBSERVER_ROLES) {
    roles.push(participant(name, 'observer'));
  }

  const secondaryOk = new Set(settings.extraAdminRolesSecondaryOk);
  for (const name of [...STAFF_ROLES, ...settings.extraAdminRolesSecondaryOk]) {
    roles.push({
      name,
      staffOnly: true,
      isContestant: false,
      isObserver: false,
      canGuide: name === 'Guide',
      secondaryOk: secondaryOk.has(name),
      allowedGenders: null,
      roomTypes: permittedRooms(settings, false),
      defaultRoomType: settings.defaultRoomTypeNonContestant,
      badge: settings.badgeColors[name] ?? (name === 'Guide' ? BADGES.guide : BADGES.staff),
    });
  }

  return new RoleTable(roles);
}

/**
 * Contestant code such as ABC3, used in score entry and exports.
 */
export function contestantCode(countryCode: string, roleName: string): string | null {
  const match = /^Contestant ([0-9]+)$/.exec(roleName);
  return match ? `${countryCode}${match[1]}` : null;
}
