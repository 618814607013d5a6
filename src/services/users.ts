// =============================================================================
// BASTION — User Store
//
// Login lookups and the admin user listing. Roles are stored as raw
// strings and parsed at the boundary (parseRole).
// =============================================================================

import { Pool } from 'pg';
import { UserRecord } from '../types/banking';

export interface UserRepository {
  findByEmail(email: string): Promise<UserRecord | null>;
  list(): Promise<UserRecord[]>;
}

interface UserRow {
  id: string;
  email: string;
  display_name: string;
  role: string;
  password_hash: string;
  is_active: boolean;
}

function toUser(row: UserRow): UserRecord {
  return {
    id: row.id,
    email: row.email,
    displayName: row.display_name,
    role: row.role,
    passwordHash: row.password_hash,
    isActive: row.is_active,
  };
}

export class PgUserRepository implements UserRepository {
  constructor(private readonly pool: Pool) {}

  async findByEmail(email: string): Promise<UserRecord | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT id, email, display_name, role, password_hash, is_active
       FROM users WHERE lower(email) = lower($1)`,
      [email]
    );
    return result.rows.length > 0 ? toUser(result.rows[0]) : null;
  }

  async list(): Promise<UserRecord[]> {
    const result = await this.pool.query<UserRow>(
      `SELECT id, email, display_name, role, password_hash, is_active
       FROM users ORDER BY id`
    );
    return result.rows.map(toUser);
  }
}
