/**
 * Integration Tests: field blacklist
 */

import { getChangedFields, isChangeSetLogEntry } from '@entity-audit/core';
import { createRecordEntity } from '@entity-audit/unit-of-work';
import { describe, expect, it } from 'vitest';
import { createCaptureTestContext, USER_BLACKLIST } from './helpers/setup.js';

const userFields = {
  name: 'alice',
  email: 'alice@example.com',
  password: 'test-secret',
  need_pw_change: false,
  googleAuthenticatorSecret: 'test-otp-secret',
  backupCodes: ['test-code-1'],
  trustedDeviceCookieVersion: 1,
  pw_reset_token: null,
  backupCodesGenerationDate: null,
};

describe('Field blacklist integration', () => {
  it('should keep only the old name when a user changes name and password', async () => {
    const { em, logEntries } = createCaptureTestContext({ saveChangedData: true });
    const user = createRecordEntity('User', userFields, 1);
    em.manage(user);

    user.set('name', 'alice.smith').set('password', 'test-secret-2');
    await em.flush();

    expect(logEntries()[0]?.payload).toEqual({ d: { name: 'alice' } });
  });

  it('should log an empty change set when only a blacklisted field changed', async () => {
    const { em, logEntries } = createCaptureTestContext({ saveChangedData: true });
    const user = createRecordEntity('User', userFields, 1);
    em.manage(user);

    user.set('pw_reset_token', 'test-token');
    await em.flush();

    expect(logEntries()).toHaveLength(1);
    expect(logEntries()[0]?.payload).toEqual({ d: {} });
  });

  it('should apply the user blacklist to admin users', async () => {
    const { em, logEntries } = createCaptureTestContext({ saveChangedData: true });
    const admin = createRecordEntity('AdminUser', userFields, 1);
    em.manage(admin);

    admin.set('email', 'root@example.com').set('googleAuthenticatorSecret', 'test-otp-secret-2');
    await em.flush();

    expect(logEntries()[0]?.payload).toEqual({ d: { email: 'alice@example.com' } });
  });

  it('should leave blacklisted names out of the changed field list', async () => {
    const { em, logEntries } = createCaptureTestContext({ saveChangedFields: true });
    const user = createRecordEntity('User', userFields, 1);
    em.manage(user);

    user.set('name', 'alice.smith').set('password', 'test-secret-2').set('need_pw_change', true);
    await em.flush();

    expect(logEntries()[0]?.payload).toEqual({ f: ['name'] });
  });

  it('should keep blacklisted fields out of a deleted user snapshot', async () => {
    const { em, logEntries } = createCaptureTestContext({ saveRemovedData: true });
    const user = createRecordEntity('User', userFields, 1);
    em.manage(user);

    em.remove(user);
    await em.flush();

    expect(logEntries()[0]?.payload).toEqual({
      n: 'alice',
      d: { name: 'alice', email: 'alice@example.com' },
    });
  });

  it('should never emit a blacklisted field in any entry', async () => {
    const { em, logEntries } = createCaptureTestContext({ saveChangedData: true, saveChangedFields: true });
    const edited = createRecordEntity('User', userFields, 1);
    const deleted = createRecordEntity('AdminUser', userFields, 2);
    em.manage(edited);
    em.manage(deleted);

    for (const fieldName of USER_BLACKLIST) {
      edited.set(fieldName, 'test-changed');
    }
    edited.set('name', 'bob');
    em.remove(deleted);
    em.persist(createRecordEntity('User', userFields));
    await em.flush();

    const entries = logEntries();
    expect(entries.map((entry) => entry.kind)).toEqual(['element_edited', 'element_deleted', 'element_created']);
    for (const entry of entries) {
      const keys = isChangeSetLogEntry(entry) ? Object.keys(entry.payload.d ?? {}) : [];
      const changed = entry.kind === 'element_edited' ? getChangedFields(entry) : [];
      for (const fieldName of USER_BLACKLIST) {
        expect(keys).not.toContain(fieldName);
        expect(changed).not.toContain(fieldName);
      }
    }
  });

  it('should record the old value of a single changed field', async () => {
    const { em, logEntries } = createCaptureTestContext({ saveChangedData: true });
    const part = createRecordEntity('Part', { name: 'R1', description: 'old' }, 1);
    em.manage(part);

    part.set('description', 'new');
    await em.flush();

    expect(logEntries()[0]?.payload).toEqual({ d: { description: 'old' } });
  });
});
