import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import { Express } from 'express';
import { createServerDependencies } from '../../src/api/dependencies.js';
import { createServer } from '../../src/api/server.js';
import { AccountsService } from '../../src/services/auth/accounts.service.js';
import {
  PlainPasswordHasher,
  TestEngine,
  createTestEngine,
  makeCountry,
  makePerson,
} from '../utils/fakes.js';
import { pngBytes } from '../utils/uploads.js';

function csvLines(text: string): string[] {
  return text.replace(/^\uFEFF/, '').split('\r\n');
}

describe('Registration API Integration', () => {
  let engine: TestEngine;
  let app: Express;

  beforeEach(() => {
    engine = createTestEngine();
    const accounts = new AccountsService(engine.store, new PlainPasswordHasher(), {
      admin: 'test-admin-password',
      scoring: 'test-scoring-password',
    });
    app = createServer(createServerDependencies(engine.deps, accounts));
  });

  it('should report health without credentials', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('healthy');
  });

  it('should challenge credentials that do not verify', async () => {
    const res = await request(app).get('/api/countries').auth('admin', 'wrong');

    expect(res.status).toBe(401);
    expect(res.body).toEqual({
      error: { kind: 'PermissionDenied', message: 'Invalid username or password' },
    });
  });

  it('should return unknown routes as NotFound', async () => {
    const res = await request(app).get('/api/nothing-here');

    expect(res.status).toBe(404);
    expect(res.body.error.kind).toBe('NotFound');
  });

  describe('countries', () => {
    it('should create a country with a flag and serve the flag publicly', async () => {
      const createRes = await request(app)
        .post('/api/countries')
        .auth('admin', 'test-admin-password')
        .field('code', 'ABC')
        .field('name', 'Aberland')
        .attach('flag', pngBytes(), 'aberland.png');

      expect(createRes.status).toBe(201);
      expect(createRes.body).toMatchObject({ code: 'ABC', name: 'Aberland', retired: false });
      expect(createRes.body.flagUrl).toMatch(/^\/api\/files\/file-[0-9]+$/);

      const flagRes = await request(app).get(createRes.body.flagUrl);

      expect(flagRes.status).toBe(200);
      expect(flagRes.headers['content-type']).toBe('image/png');
    });

    it('should refuse anonymous registration', async () => {
      const res = await request(app).post('/api/countries').send({ code: 'ABC', name: 'Aberland' });

      expect(res.status).toBe(403);
      expect(res.body.error.kind).toBe('PermissionDenied');
    });

    it('should report validation failures with the field', async () => {
      const res = await request(app)
        .post('/api/countries')
        .auth('admin', 'test-admin-password')
        .send({ code: 'ABC', name: 'Aberland', isStaff: 'maybe' });

      expect(res.status).toBe(400);
      expect(res.body.error).toMatchObject({ kind: 'FormatInvalid', field: 'isStaff' });
    });

    it('should show contact details only to the country and administrators', async () => {
      engine.store.seedCountry(
        makeCountry({ id: 'country-abc', code: 'ABC', contactEmail: 'team@example.org' })
      );
      engine.store.seedAccount({
        username: 'abc',
        passwordHash: 'hashed:test-password',
        countryId: 'country-abc',
        personId: null,
        retired: false,
      });

      const own = await request(app).get('/api/countries/country-abc').auth('abc', 'test-password');
      const other = await request(app).get('/api/countries/country-abc');

      expect(own.body.contactEmail).toBe('team@example.org');
      expect(other.body).toEqual({
        id: 'country-abc',
        code: 'ABC',
        name: 'Country ABC',
        isStaff: false,
        genericUrl: null,
        flagUrl: null,
      });
    });

    it('should export countries as CSV', async () => {
      engine.store.seedCountry(makeCountry({ id: 'country-abc', code: 'ABC', name: 'Aberland' }));

      const res = await request(app).get('/api/countries.csv?delimiter=;');

      expect(res.status).toBe(200);
      expect(res.headers['content-disposition']).toBe('attachment; filename="countries.csv"');
      expect(csvLines(res.text).slice(0, 2)).toEqual([
        'Country Number;Code;Name;Flag URL',
        ';ABC;Aberland;',
      ]);
    });
  });

  describe('accounts', () => {
    it('should let administrators create a delegate account that can sign in', async () => {
      engine.store.seedCountry(
        makeCountry({ id: 'country-abc', code: 'ABC', contactEmail: 'team@example.org' })
      );

      const created = await request(app)
        .post('/api/accounts')
        .auth('admin', 'test-admin-password')
        .send({ username: 'ABC_reg', password: 'test-password', countryId: 'country-abc' });
      const own = await request(app)
        .get('/api/countries/country-abc')
        .auth('ABC_reg', 'test-password');

      expect(created.status).toBe(201);
      expect(created.body).toEqual({ username: 'ABC_reg', countryId: 'country-abc', personId: null });
      expect(own.body.contactEmail).toBe('team@example.org');
    });

    it('should refuse account creation to anyone else', async () => {
      engine.store.seedCountry(makeCountry({ id: 'country-abc', code: 'ABC' }));

      const res = await request(app)
        .post('/api/accounts')
        .send({ username: 'ABC_reg', password: 'test-password', countryId: 'country-abc' });

      expect(res.status).toBe(403);
      expect(res.body.error.kind).toBe('PermissionDenied');
    });
  });

  describe('bulk import', () => {
    it('should validate a people file on a dry run', async () => {
      engine.store.seedCountry(makeCountry({ id: 'country-abc', code: 'ABC' }));
      const csv = 'Country Code,Given Name,Family Name,Gender,Primary Role,Language 1,T-Shirt Size\n' +
        'ABC,Ada,Example,Female,Contestant 1,English,M\n';

      const res = await request(app)
        .post('/api/people/bulk')
        .auth('admin', 'test-admin-password')
        .field('dryRun', 'true')
        .attach('csv', Buffer.from(csv, 'utf8'), 'people.csv');

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ kind: 'person', dryRun: true, createdIds: [] });
      expect(res.body.records).toHaveLength(1);
      expect(engine.store.people()).toEqual([]);
    });

    it('should report the failing row', async () => {
      const res = await request(app)
        .post('/api/countries/bulk')
        .auth('admin', 'test-admin-password')
        .attach('csv', Buffer.from('Code,Name\nABC,Aberland\nabc,Other\n', 'utf8'), 'countries.csv');

      expect(res.status).toBe(400);
      expect(res.body.error.message).toMatch(/^row 2: /);
      expect(engine.store.countries()).toEqual([]);
    });
  });

  describe('scoring', () => {
    beforeEach(() => {
      engine.store.seedCountry(makeCountry({ id: 'country-abc', code: 'ABC' }));
      engine.store.seedPerson(
        makePerson({ id: 'person-1', countryId: 'country-abc', primaryRole: 'Contestant 1' })
      );
    });

    it('should close registration, take a score and keep scores private', async () => {
      const closeRes = await request(app)
        .patch('/api/event')
        .auth('admin', 'test-admin-password')
        .send({ registrationEnabled: false });
      expect(closeRes.body.registrationEnabled).toBe(false);

      const scoreRes = await request(app)
        .put('/api/scores/cell')
        .auth('scoring', 'test-scoring-password')
        .send({ personId: 'person-1', problem: 2, score: 6 });
      expect(scoreRes.body).toEqual({ personId: 'person-1', problem: 2, score: 6, changed: true });

      const publicRes = await request(app).get('/api/scores.csv');
      expect(publicRes.status).toBe(403);
      expect(publicRes.body.error.message).toBe('Scores are not yet public');

      const scoringRes = await request(app)
        .get('/api/scores.csv')
        .auth('scoring', 'test-scoring-password');
      expect(csvLines(scoringRes.text)[1]).toBe('ABC,ABC1,Given,Family,,6,,6,1,');
    });

    it('should refuse scores while registration is open', async () => {
      const res = await request(app)
        .put('/api/scores/country-abc/1')
        .auth('admin', 'test-admin-password')
        .send({ scores: { ABC1: '3' } });

      expect(res.status).toBe(409);
      expect(res.body.error.kind).toBe('StateConflict');
    });
  });
});
