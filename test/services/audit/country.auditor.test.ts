import { describe, it, expect } from 'vitest';
import {
  auditCountry,
  auditPreregistration,
  defaultExpectedNumbers,
} from '../../../src/services/audit/country.auditor.js';
import { RegistrySnapshot } from '../../../src/services/audit/registryView.js';
import {
  ADMIN,
  OPEN_EVENT,
  auditContextFor,
  delegateOf,
  makeCountry,
  testRoster,
  testSettings,
} from '../../utils/fakes.js';
import { thrownBy } from '../../utils/errors.js';
import { upload } from '../../utils/uploads.js';

describe('auditCountry', () => {
  const aberland = makeCountry({ id: 'country-abc', code: 'ABC', name: 'Aberland' });
  const retired = makeCountry({ id: 'country-old', code: 'OLD', name: 'Oldland', retired: true });
  const staff = makeCountry({
    id: 'country-staff',
    code: 'ZZA',
    name: 'Staff',
    isStaff: true,
    expected: defaultExpectedNumbers(testSettings(), true),
  });
  const view = () => new RegistrySnapshot([aberland, retired, staff], []);
  const adminCtx = () => auditContextFor(ADMIN, view());

  describe('create', () => {
    it('should fill defaults for a normal country', () => {
      const { draft, flag } = auditCountry({ code: 'DEF', name: 'Defland' }, null, adminCtx());

      expect(flag).toBeNull();
      expect(draft).toEqual({
        code: 'DEF',
        name: 'Defland',
        isStaff: false,
        participantsOk: true,
        contactEmail: null,
        contactExtra: [],
        expected: {
          leaders: 1,
          deputies: 1,
          contestants: 4,
          observersA: 0,
          observersB: 0,
          observersC: 0,
          singleRooms: 0,
        },
        numbersConfirmed: false,
        genericUrl: null,
        leaderEmail: null,
        physicalAddress: null,
      });
    });

    it('should only allow administrators', () => {
      const ctx = auditContextFor(delegateOf('country-abc'), view());
      expect(thrownBy(() => auditCountry({ code: 'DEF', name: 'Defland' }, null, ctx))).toMatchObject({
        kind: 'PermissionDenied',
        message: 'You do not have permission to edit countries',
      });
    });

    it('should distinguish a missing code from a blank one', () => {
      expect(thrownBy(() => auditCountry({ name: 'Defland' }, null, adminCtx()))).toMatchObject({
        kind: 'RequiredFieldMissing',
        message: 'Required country property code not supplied',
        field: 'code',
      });
      expect(
        thrownBy(() => auditCountry({ code: '  ', name: 'Defland' }, null, adminCtx()))
      ).toMatchObject({
        kind: 'RequiredFieldMissing',
        message: 'No country code specified',
      });
    });

    it('should require capital-letter codes', () => {
      expect(
        thrownBy(() => auditCountry({ code: 'De1', name: 'Defland' }, null, adminCtx()))
      ).toMatchObject({
        kind: 'FormatInvalid',
        message: 'Country codes must be all capital letters',
      });
    });

    it('should reject a code or name used by a current country', () => {
      expect(
        thrownBy(() => auditCountry({ code: 'ABC', name: 'Other' }, null, adminCtx()))
      ).toMatchObject({
        kind: 'UniquenessViolation',
        message: 'A country with code ABC already exists',
      });
      expect(
        thrownBy(() => auditCountry({ code: 'XYZ', name: 'Aberland' }, null, adminCtx()))
      ).toMatchObject({
        kind: 'UniquenessViolation',
        message: 'A country with name Aberland already exists',
      });
    });

    it('should allow reusing the code of a retired country', () => {
      const { draft } = auditCountry({ code: 'OLD', name: 'Oldland' }, null, adminCtx());
      expect(draft.code).toBe('OLD');
    });

    it('should bound expected contestants by the team size', () => {
      expect(
        thrownBy(() =>
          auditCountry(
            { code: 'DEF', name: 'Defland', expected: { contestants: '5' } },
            null,
            adminCtx()
          )
        )
      ).toMatchObject({
        kind: 'FormatInvalid',
        message: 'Invalid expected number of Contestants',
      });
    });

    it('should reject expected numbers for staff countries', () => {
      expect(
        thrownBy(() =>
          auditCountry(
            { code: 'ZZB', name: 'More staff', isStaff: true, expected: { leaders: '1' } },
            null,
            adminCtx()
          )
        )
      ).toMatchObject({
        kind: 'FormatInvalid',
        message: 'Staff countries cannot have expected numbers of participants',
      });
    });

    it('should validate every contact email', () => {
      const { draft } = auditCountry(
        {
          code: 'DEF',
          name: 'Defland',
          contactEmail: 'main@example.org',
          contactExtra: 'one@example.org\ntwo@example.org',
        },
        null,
        adminCtx()
      );
      expect(draft.contactEmail).toBe('main@example.org');
      expect(draft.contactExtra).toEqual(['one@example.org', 'two@example.org']);

      expect(
        thrownBy(() =>
          auditCountry(
            { code: 'DEF', name: 'Defland', contactExtra: 'one@example.org, broken' },
            null,
            adminCtx()
          )
        )
      ).toMatchObject({
        kind: 'FormatInvalid',
        message: 'Email address syntax invalid',
        field: 'contactExtra',
      });
    });

    it('should require a main contact email alongside additional ones', () => {
      expect(
        thrownBy(() =>
          auditCountry(
            { code: 'DEF', name: 'Defland', contactEmail: '', contactExtra: 'coach@example.org' },
            null,
            adminCtx()
          )
        )
      ).toMatchObject({
        kind: 'RequiredFieldMissing',
        message: 'Additional contact email addresses need a main contact email address',
        field: 'contactEmail',
      });
    });

    it('should check previous participation URLs against the base and roster', () => {
      const ctx = auditContextFor(ADMIN, view(), { roster: testRoster() });
      const ok = auditCountry(
        {
          code: 'DEF',
          name: 'Defland',
          genericUrl: 'https://archive.example.org/countries/country2/',
        },
        null,
        ctx
      );
      expect(ok.draft.genericUrl).toBe('https://archive.example.org/countries/country2/');

      expect(
        thrownBy(() =>
          auditCountry(
            { code: 'DEF', name: 'Defland', genericUrl: 'https://archive.example.org/c/2' },
            null,
            ctx
          )
        )
      ).toMatchObject({
        kind: 'FormatInvalid',
        message:
          'URLs for previous participation must be in the form https://archive.example.org/countries/countryN/',
      });
      expect(
        thrownBy(() =>
          auditCountry(
            {
              code: 'DEF',
              name: 'Defland',
              genericUrl: 'https://archive.example.org/countries/country3/',
            },
            null,
            ctx
          )
        )
      ).toMatchObject({
        kind: 'ReferenceInvalid',
        message: 'URL for previous participation not valid',
      });
    });

    it('should accept PNG flags whose extension matches', () => {
      const { flag } = auditCountry(
        { code: 'DEF', name: 'Defland', flag: upload('defland.PNG', 'png') },
        null,
        adminCtx()
      );
      expect(flag).toMatchObject({ kind: 'flag', format: 'png', filename: 'defland.PNG' });
    });

    it('should reject flags in other formats or with a mismatched extension', () => {
      expect(
        thrownBy(() =>
          auditCountry(
            { code: 'DEF', name: 'Defland', flag: upload('defland.jpg', 'jpeg') },
            null,
            adminCtx()
          )
        )
      ).toMatchObject({ message: 'Flags must be in PNG format' });
      expect(
        thrownBy(() =>
          auditCountry(
            { code: 'DEF', name: 'Defland', flag: upload('defland.jpg', 'png') },
            null,
            adminCtx()
          )
        )
      ).toMatchObject({ message: 'Filename extension for flag must match contents (png)' });
    });

    it('should only collect leader contact details for virtual events', () => {
      expect(
        thrownBy(() =>
          auditCountry(
            { code: 'DEF', name: 'Defland', leaderEmail: 'leader@example.org' },
            null,
            adminCtx()
          )
        )
      ).toMatchObject({
        message: 'Leader email and physical address are only collected for virtual events',
      });

      const ctx = auditContextFor(ADMIN, view(), {
        settings: testSettings({ eventType: 'virtual' }),
      });
      const { draft } = auditCountry(
        {
          code: 'DEF',
          name: 'Defland',
          leaderEmail: 'leader@example.org',
          physicalAddress: '1 Example Road',
        },
        null,
        ctx
      );
      expect(draft.leaderEmail).toBe('leader@example.org');
      expect(draft.physicalAddress).toBe('1 Example Road');
    });
  });

  describe('edit', () => {
    it('should keep stored values for properties not supplied', () => {
      const { draft } = auditCountry({ contactEmail: 'new@example.org' }, aberland, adminCtx());
      expect(draft.code).toBe('ABC');
      expect(draft.name).toBe('Aberland');
      expect(draft.contactEmail).toBe('new@example.org');
    });

    it('should restore a required value submitted blank', () => {
      const { draft } = auditCountry({ name: '' }, aberland, adminCtx());
      expect(draft.name).toBe('Aberland');
    });

    it('should reset a blank expected number to its default', () => {
      const edited = { ...aberland, expected: { ...aberland.expected, observersA: 2 } };
      const { draft } = auditCountry({ expected: { observersA: '' } }, edited, adminCtx());
      expect(draft.expected.observersA).toBe(0);
    });

    it('should refuse to change the kind of country', () => {
      expect(thrownBy(() => auditCountry({ isStaff: true }, aberland, adminCtx()))).toMatchObject({
        kind: 'StateConflict',
        message: 'Cannot change whether a country is normal',
      });
      expect(
        thrownBy(() => auditCountry({ participantsOk: false }, aberland, adminCtx()))
      ).toMatchObject({
        kind: 'StateConflict',
        message: 'Cannot change whether a country can have participants',
      });
    });

    it('should not count the edited country as a duplicate of itself', () => {
      const { draft } = auditCountry({ code: 'ABC', name: 'Aberland' }, aberland, adminCtx());
      expect(draft.code).toBe('ABC');
    });
  });
});

describe('auditPreregistration', () => {
  const aberland = makeCountry({ id: 'country-abc', code: 'ABC', name: 'Aberland' });
  const ctxFor = (actor = delegateOf('country-abc'), preregistrationEnabled = true) =>
    auditContextFor(actor, new RegistrySnapshot([aberland], []), {
      event: { ...OPEN_EVENT, preregistrationEnabled },
    });

  it('should record expected numbers confirmed by the country', () => {
    const result = auditPreregistration({ expected: { observersA: '2' } }, aberland, ctxFor());
    expect(result.changed).toBe(true);
    expect(result.draft.expected.observersA).toBe(2);
    expect(result.draft.numbersConfirmed).toBe(true);
  });

  it('should accept a resubmission of stored values after preregistration closes', () => {
    const result = auditPreregistration(
      { expected: { leaders: '1', contestants: '4' } },
      aberland,
      ctxFor(delegateOf('country-abc'), false)
    );
    expect(result.changed).toBe(false);
  });

  it('should refuse changes from the country after preregistration closes', () => {
    expect(
      thrownBy(() =>
        auditPreregistration(
          { expected: { observersA: '2' } },
          aberland,
          ctxFor(delegateOf('country-abc'), false)
        )
      )
    ).toMatchObject({
      kind: 'StateConflict',
      message:
        'Preregistration is now disabled, please contact the event organisers to change expected numbers of participants',
    });
  });

  it('should let administrators change numbers without confirming them', () => {
    const result = auditPreregistration(
      { expected: { observersA: '1' } },
      aberland,
      ctxFor(ADMIN, false)
    );
    expect(result.changed).toBe(true);
    expect(result.draft.numbersConfirmed).toBe(false);
  });

  it('should refuse other country fields', () => {
    expect(
      thrownBy(() => auditPreregistration({ name: 'Renamed' }, aberland, ctxFor()))
    ).toMatchObject({
      kind: 'PermissionDenied',
      message: 'You do not have permission to change name',
      field: 'name',
    });
  });

  it('should refuse delegates of other countries', () => {
    expect(
      thrownBy(() =>
        auditPreregistration({ expected: { observersA: '1' } }, aberland, ctxFor(delegateOf('country-xyz')))
      )
    ).toMatchObject({ kind: 'PermissionDenied' });
  });
});
