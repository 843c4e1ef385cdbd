import { and, eq, gt } from 'drizzle-orm';
import type { Database } from '../../db/index.js';
import { schema } from '../../db/index.js';
import type { Clock } from '../../lib/clock.js';
import { systemClock } from '../../lib/clock.js';

export interface SessionUser {
  id: string;
  email: string;
  isAdmin: boolean;
}

/** Read-only view of the auth layer's sessions. */
export class SessionService {
  constructor(
    private readonly db: Database,
    private readonly clock: Clock = systemClock,
  ) {}

  /** The user behind a live session token, or null when it is unknown or expired. */
  async resolve(token: string): Promise<SessionUser | null> {
    const [row] = await this.db
      .select({ id: schema.users.id, email: schema.users.email, isAdmin: schema.users.isAdmin })
      .from(schema.sessions)
      .innerJoin(schema.users, eq(schema.users.id, schema.sessions.userId))
      .where(and(eq(schema.sessions.token, token), gt(schema.sessions.expiresAt, this.clock())))
      .limit(1);
    return row ?? null;
  }
}
