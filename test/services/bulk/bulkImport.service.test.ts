import AdmZip from 'adm-zip';
import { describe, it, expect, beforeEach } from 'vitest';
import {
  BulkImportRequest,
  BulkImportService,
} from '../../../src/services/bulk/bulkImport.service.js';
import type { PersonDraft } from '../../../src/services/audit/person.auditor.js';
import { ExportService } from '../../../src/services/export/export.service.js';
import { RaceConditionError } from '../../../src/utils/errors.js';
import {
  ADMIN,
  TestEngine,
  createTestEngine,
  delegateOf,
  makeCountry,
  makePerson,
  testSettings,
} from '../../utils/fakes.js';
import { pngBytes } from '../../utils/uploads.js';

function countries(csv: string, overrides: Partial<BulkImportRequest> = {}): BulkImportRequest {
  return {
    kind: 'country',
    csv: Buffer.from(csv, 'utf8'),
    zip: null,
    delimiter: ',',
    dryRun: false,
    ...overrides,
  };
}

const PEOPLE_HEADER = 'Country Code,Given Name,Family Name,Gender,Primary Role,Language 1,T-Shirt Size,Photo\n';

function people(rows: string, zip: Buffer | null = null): BulkImportRequest {
  return {
    kind: 'person',
    csv: Buffer.from(PEOPLE_HEADER + rows, 'utf8'),
    zip,
    delimiter: ',',
    dryRun: false,
  };
}

describe('BulkImportService', () => {
  let engine: TestEngine;
  let service: BulkImportService;

  beforeEach(() => {
    engine = createTestEngine();
    service = new BulkImportService(engine.deps);
  });

  it('should only accept uploads from administrators', async () => {
    await expect(
      service.import(delegateOf('country-abc'), countries('Code,Name\nABC,Aberland\n'))
    ).rejects.toMatchObject({
      kind: 'PermissionDenied',
      message: 'You do not have permission to upload bulk registration data',
    });
  });

  it('should require a CSV file', async () => {
    await expect(service.import(ADMIN, countries('', { csv: null }))).rejects.toMatchObject({
      kind: 'RequiredFieldMissing',
      message: 'no CSV file uploaded',
    });
  });

  it('should validate without writing on a dry run', async () => {
    const result = await service.import(
      ADMIN,
      countries('Code,Name,Expected Contestants\nABC,Aberland,3\nDEF,Defland,\n', { dryRun: true })
    );

    expect(result.dryRun).toBe(true);
    expect(result.createdIds).toEqual([]);
    expect(result.records.map((record) => [record.row, record.kind])).toEqual([
      [1, 'country'],
      [2, 'country'],
    ]);
    expect(result.records[0].draft).toMatchObject({ code: 'ABC', expected: { contestants: 3 } });
    expect(engine.store.transactions).toBe(0);
    expect(engine.store.countries()).toEqual([]);
  });

  it('should commit each row and queue a notification per record', async () => {
    const result = await service.import(ADMIN, countries('Code,Name\nABC,Aberland\nDEF,Defland\n'));

    expect(result.createdIds).toEqual(['country-1', 'country-2']);
    expect(engine.store.countries().map((country) => country.code)).toEqual(['ABC', 'DEF']);
    expect(engine.notifications.jobs.map((job) => [job.id, job.action])).toEqual([
      ['country-1', 'bulk-created'],
      ['country-2', 'bulk-created'],
    ]);
  });

  it('should reject the whole batch when any row fails', async () => {
    engine.store.seedCountry(makeCountry({ id: 'country-def', code: 'DEF' }));

    await expect(
      service.import(ADMIN, countries('Code,Name\nABC,Aberland\nDEF,Defland\n'))
    ).rejects.toMatchObject({
      kind: 'UniquenessViolation',
      message: 'row 2: A country with code DEF already exists',
    });
    expect(engine.store.countries().map((country) => country.code)).toEqual(['DEF']);
    expect(engine.store.transactions).toBe(0);
  });

  it('should check each row against the rows before it', async () => {
    engine.store.seedCountry(makeCountry({ id: 'country-abc', code: 'ABC' }));

    await expect(
      service.import(
        ADMIN,
        people('ABC,Ada,Example,Female,Contestant 1,English,M,\nABC,Ben,Sample,Female,Contestant 1,English,M,\n')
      )
    ).rejects.toMatchObject({
      kind: 'UniquenessViolation',
      message: 'row 2: A person with this role already exists',
    });
    expect(engine.store.people()).toEqual([]);
  });

  it('should keep committed rows when a later row meets a conflicting change', async () => {
    engine.store.beforeTransaction = async (count, store) => {
      if (count === 2) {
        store.seedCountry(makeCountry({ id: 'country-late', code: 'DEF' }));
      }
    };

    const error = await service
      .import(ADMIN, countries('Code,Name\nABC,Aberland\nDEF,Defland\n'))
      .then(
        () => null,
        (reason: unknown) => reason
      );

    expect(error).toBeInstanceOf(RaceConditionError);
    expect(error).toMatchObject({
      kind: 'RaceCondition',
      message: 'row 2: A country with code DEF already exists',
      committedIds: ['country-1'],
    });
    expect(engine.store.countries().map((country) => country.id)).toEqual([
      'country-1',
      'country-late',
    ]);
  });

  it('should resolve country codes and attach files from the ZIP', async () => {
    engine.store.seedCountry(makeCountry({ id: 'country-abc', code: 'ABC' }));
    const zip = new AdmZip();
    zip.addFile('ada.png', pngBytes());

    const result = await service.import(
      ADMIN,
      people('ABC,Ada,Example,Female,Contestant 1,English,M,ada.png\n', zip.toBuffer())
    );

    const [person] = engine.store.people();
    expect(result.createdIds).toEqual([person.id]);
    expect(person).toMatchObject({ countryId: 'country-abc', givenName: 'Ada', languages: ['English'] });
    expect(engine.store.files()).toEqual([
      expect.objectContaining({ id: person.photoId, kind: 'photo', filename: 'ada.png' }),
    ]);
  });

  it('should report files missing from the ZIP', async () => {
    engine.store.seedCountry(makeCountry({ id: 'country-abc', code: 'ABC' }));
    const zip = new AdmZip();
    zip.addFile('other.png', pngBytes());

    await expect(
      service.import(
        ADMIN,
        people('ABC,Ada,Example,Female,Contestant 1,English,M,missing.png\n', zip.toBuffer())
      )
    ).rejects.toMatchObject({
      kind: 'ReferenceInvalid',
      message: 'row 1: missing.png not found in ZIP file',
    });
  });

  it('should report unknown country codes', async () => {
    await expect(
      service.import(ADMIN, people('XYZ,Ada,Example,Female,Contestant 1,English,M,\n'))
    ).rejects.toMatchObject({ message: 'row 1: Invalid country' });
  });

  it('should read back an exported countries file unchanged', async () => {
    const source = createTestEngine();
    const original = source.store.seedCountry(
      makeCountry({
        id: 'country-abc',
        code: 'ABC',
        name: 'Aberland',
        contactEmail: 'team@example.org',
        contactExtra: ['coach@example.org'],
        genericUrl: 'https://archive.example.org/countries/country7/',
        expected: {
          leaders: 1,
          deputies: 0,
          contestants: 3,
          observersA: 2,
          observersB: 0,
          observersC: 1,
          singleRooms: 4,
        },
      })
    );
    const exported = await new ExportService(source.deps).countriesCsv(ADMIN);

    const result = await service.import(ADMIN, countries('', { csv: exported, dryRun: true }));

    expect(result.records[0].draft).toMatchObject({
      code: original.code,
      name: original.name,
      contactEmail: original.contactEmail,
      contactExtra: original.contactExtra,
      genericUrl: original.genericUrl,
      expected: original.expected,
    });
  });

  it('should read back an exported people file unchanged', async () => {
    const settings = testSettings({ consentUi: true });
    const contestant: PersonDraft = {
      countryId: 'country-abc',
      primaryRole: 'Contestant 1',
      otherRoles: ['Translator'],
      guideFor: [],
      givenName: 'Ada',
      familyName: 'Example',
      passportGivenName: 'Ada Maria',
      passportFamilyName: 'Example',
      gender: 'Female',
      dateOfBirth: '2008-03-14',
      languages: ['French', 'English'],
      diet: 'Vegetarian',
      tshirt: 'S',
      arrival: { place: 'Airport', date: '2026-07-02', hour: '09', minute: '30', flight: 'TM1' },
      departure: {
        place: 'Central Station',
        date: '2026-07-08',
        hour: '17',
        minute: '05',
        flight: null,
      },
      roomType: 'Shared room',
      roomShareWith: 'ABC2',
      roomNumber: '101',
      phoneNumber: null,
      passportNumber: 'X1234567',
      nationality: 'Aberlandish',
      incomplete: false,
      eventPhotosConsent: true,
      photoConsent: 'badge_only',
      dietConsent: true,
      genericUrl: 'https://archive.example.org/people/person10/',
    };
    const guide: PersonDraft = {
      ...contestant,
      countryId: 'country-zza',
      primaryRole: 'Guide',
      otherRoles: [],
      guideFor: ['country-abc'],
      givenName: 'Ben',
      familyName: 'Sample',
      passportGivenName: null,
      passportFamilyName: null,
      gender: 'Male',
      dateOfBirth: null,
      languages: ['German'],
      diet: null,
      tshirt: 'XL',
      arrival: { place: 'Central Station', date: '2026-07-01', hour: null, minute: null, flight: null },
      departure: { place: null, date: null, hour: null, minute: null, flight: null },
      roomType: 'Single room',
      roomShareWith: null,
      roomNumber: null,
      phoneNumber: '+99 555 0100',
      passportNumber: null,
      nationality: null,
      eventPhotosConsent: false,
      photoConsent: null,
      genericUrl: null,
    };
    const countryList = [
      makeCountry({ id: 'country-abc', code: 'ABC', name: 'Aberland' }),
      makeCountry({ id: 'country-zza', code: 'ZZA', name: 'Staff', isStaff: true }),
    ];

    const source = createTestEngine({ settings });
    countryList.forEach((country) => source.store.seedCountry(country));
    source.store.seedPerson(makePerson({ ...contestant, id: 'person-ada' }));
    source.store.seedPerson(makePerson({ ...guide, id: 'person-ben' }));
    const exported = await new ExportService(source.deps).peopleCsv(ADMIN);

    const target = createTestEngine({ settings });
    countryList.forEach((country) => target.store.seedCountry(country));
    const result = await new BulkImportService(target.deps).import(ADMIN, {
      kind: 'person',
      csv: exported,
      zip: null,
      delimiter: ',',
      dryRun: true,
    });

    expect(result.records.map((record) => record.draft)).toEqual([contestant, guide]);
  });
});
