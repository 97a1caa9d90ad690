/**
 * School SQL Guard - Directory Identity Resolver Tests
 */

import { describe, it, expect } from '@jest/globals';

import { DirectoryIdentityResolver } from '../../src/identity/resolver.js';
import { DatabaseError, IdentityNotFoundError } from '../../src/utils/types.js';
import { FakeDatabase } from '../fixtures/school.js';

describe('DirectoryIdentityResolver', () => {
  it('should resolve a student with their StudentID', async () => {
    const db = new FakeDatabase();
    db.directory.set('u-1', { role: 'student', recordId: 1001 });

    await expect(new DirectoryIdentityResolver(db).resolve('u-1')).resolves.toEqual({
      userId: 'u-1',
      role: 'student',
      roleId: '1001',
    });
    expect(db.statements).toHaveLength(1);
  });

  it('should fall through to the Teachers table', async () => {
    const db = new FakeDatabase();
    db.directory.set('u-2', { role: 'teacher', recordId: 'T-9' });

    await expect(new DirectoryIdentityResolver(db).resolve('u-2')).resolves.toEqual({
      userId: 'u-2',
      role: 'teacher',
      roleId: 'T-9',
    });
  });

  it('should reject a user who is neither', async () => {
    await expect(new DirectoryIdentityResolver(new FakeDatabase()).resolve('u-3')).rejects.toThrow(
      new IdentityNotFoundError('u-3')
    );
  });

  it('should reject a malformed directory row', async () => {
    const db = new FakeDatabase();
    db.directory.set('u-4', { role: 'student', recordId: '' });

    await expect(new DirectoryIdentityResolver(db).resolve('u-4')).rejects.toThrow(DatabaseError);
  });
});
