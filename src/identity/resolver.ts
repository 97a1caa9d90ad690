/**
 * School SQL Guard - Directory Identity Resolver
 *
 * Maps a login user id to a student or teacher by looking the user up in
 * the Students and Teachers tables.
 */

import { z } from 'zod';

import type { DatabaseClient } from '../storage/postgres.js';
import logger from '../utils/logger.js';
import { DatabaseError, IdentityNotFoundError } from '../utils/types.js';

import { createIdentity, type Identity, type IdentityResolver, type Role } from './types.js';

const DirectoryRowSchema = z.object({
  recordId: z.union([z.string().min(1), z.number().int()]),
});

/** Lookup per role, tried in this order */
const DIRECTORY_QUERIES: Record<Role, string> = {
  student: 'SELECT StudentID AS "recordId" FROM Students WHERE UserID = $1',
  teacher: 'SELECT TeacherID AS "recordId" FROM Teachers WHERE UserID = $1',
};

const LOOKUP_ORDER: readonly Role[] = ['student', 'teacher'];

export class DirectoryIdentityResolver implements IdentityResolver {
  private readonly db: DatabaseClient;

  constructor(db: DatabaseClient) {
    this.db = db;
  }

  public async resolve(userId: string): Promise<Identity> {
    for (const role of LOOKUP_ORDER) {
      const row = await this.db.queryOne(DIRECTORY_QUERIES[role], [userId]);
      if (row === null) {
        continue;
      }

      const parsed = DirectoryRowSchema.safeParse(row);
      if (!parsed.success) {
        throw new DatabaseError(`Unexpected ${role} directory row for user '${userId}'`);
      }
      logger.debug('Identity resolved', { userId, role });
      return createIdentity(userId, role, String(parsed.data.recordId));
    }

    throw new IdentityNotFoundError(userId);
  }
}
