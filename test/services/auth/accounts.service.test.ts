import { describe, it, expect, beforeEach } from 'vitest';
import { AccountsService } from '../../../src/services/auth/accounts.service.js';
import {
  ADMIN,
  InMemoryRegistrationStore,
  PlainPasswordHasher,
  delegateOf,
  makeCountry,
  makePerson,
} from '../../utils/fakes.js';

describe('AccountsService', () => {
  let store: InMemoryRegistrationStore;
  let service: AccountsService;

  beforeEach(() => {
    store = new InMemoryRegistrationStore();
    store.seedAccount({
      username: 'abc',
      passwordHash: 'hashed:test-password',
      countryId: 'country-abc',
      personId: null,
      retired: false,
    });
    store.seedAccount({
      username: 'ada',
      passwordHash: 'hashed:test-password',
      countryId: 'country-abc',
      personId: 'person-1',
      retired: false,
    });
    store.seedAccount({
      username: 'old',
      passwordHash: 'hashed:test-password',
      countryId: 'country-old',
      personId: null,
      retired: true,
    });
    service = new AccountsService(store, new PlainPasswordHasher(), {
      admin: 'test-admin-password',
      scoring: 'test-scoring-password',
    });
  });

  it('should authenticate the built-in accounts against configured passwords', async () => {
    expect(await service.authenticate('admin', 'test-admin-password')).toEqual({
      kind: 'admin',
      username: 'admin',
    });
    expect(await service.authenticate('scoring', 'test-scoring-password')).toEqual({
      kind: 'scoring',
      username: 'scoring',
    });
    expect(await service.authenticate('admin', 'test-scoring-password')).toBeNull();
  });

  it('should map stored accounts to delegates and self-registration', async () => {
    expect(await service.authenticate('abc', 'test-password')).toEqual({
      kind: 'delegate',
      username: 'abc',
      countryId: 'country-abc',
    });
    expect(await service.authenticate('ada', 'test-password')).toEqual({
      kind: 'self',
      username: 'ada',
      countryId: 'country-abc',
      personId: 'person-1',
    });
  });

  it('should refuse wrong passwords, unknown users and retired accounts', async () => {
    expect(await service.authenticate('abc', 'wrong')).toBeNull();
    expect(await service.authenticate('nobody', 'test-password')).toBeNull();
    expect(await service.authenticate('old', 'test-password')).toBeNull();
  });

  describe('create', () => {
    beforeEach(() => {
      store.seedCountry(makeCountry({ id: 'country-abc', code: 'ABC' }));
      store.seedCountry(makeCountry({ id: 'country-def', code: 'DEF' }));
      store.seedPerson(
        makePerson({ id: 'person-d1', countryId: 'country-def', primaryRole: 'Contestant 1' })
      );
    });

    it('should store a hashed delegate account that can sign in', async () => {
      const account = await service.create(ADMIN, {
        username: 'DEF_reg',
        password: 'test-password',
        countryId: 'country-def',
        personId: null,
      });

      expect(account).toEqual({ username: 'DEF_reg', countryId: 'country-def', personId: null });
      expect(await store.findAccount('DEF_reg')).toEqual({
        username: 'DEF_reg',
        passwordHash: 'hashed:test-password',
        countryId: 'country-def',
        personId: null,
        retired: false,
      });
      expect(await service.authenticate('DEF_reg', 'test-password')).toEqual({
        kind: 'delegate',
        username: 'DEF_reg',
        countryId: 'country-def',
      });
    });

    it('should create self-registration accounts for people of the country', async () => {
      await service.create(ADMIN, {
        username: 'def-contestant',
        password: 'test-password',
        countryId: 'country-def',
        personId: 'person-d1',
      });

      expect(await service.authenticate('def-contestant', 'test-password')).toMatchObject({
        kind: 'self',
        personId: 'person-d1',
      });
      await expect(
        service.create(ADMIN, {
          username: 'other',
          password: 'test-password',
          countryId: 'country-abc',
          personId: 'person-d1',
        })
      ).rejects.toMatchObject({ kind: 'ReferenceInvalid', field: 'personId' });
    });

    it('should only let administrators create accounts', async () => {
      await expect(
        service.create(delegateOf('country-def'), {
          username: 'DEF_extra',
          password: 'test-password',
          countryId: 'country-def',
          personId: null,
        })
      ).rejects.toMatchObject({
        kind: 'PermissionDenied',
        message: 'You do not have permission to create accounts',
      });
    });

    it('should reject taken usernames, short passwords and unknown countries', async () => {
      const base = { password: 'test-password', countryId: 'country-def', personId: null };

      await expect(service.create(ADMIN, { ...base, username: 'abc' })).rejects.toMatchObject({
        kind: 'UniquenessViolation',
        message: 'An account with this username already exists',
      });
      await expect(service.create(ADMIN, { ...base, username: 'scoring' })).rejects.toMatchObject({
        kind: 'UniquenessViolation',
      });
      await expect(
        service.create(ADMIN, { ...base, username: 'has space' })
      ).rejects.toMatchObject({ kind: 'FormatInvalid', message: 'Invalid username' });
      await expect(
        service.create(ADMIN, { ...base, username: 'DEF_reg', password: 'short' })
      ).rejects.toMatchObject({
        kind: 'FormatInvalid',
        message: 'Passwords must be at least 8 characters',
      });
      await expect(
        service.create(ADMIN, { ...base, username: 'DEF_reg', countryId: 'country-404' })
      ).rejects.toMatchObject({ kind: 'ReferenceInvalid', message: 'Invalid country' });
      expect(await store.findAccount('DEF_reg')).toBeNull();
    });
  });
});
