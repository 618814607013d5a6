// =============================================================================
// BASTION — Demo Seed
//
// Loads db/seed.json: demo users (passwords hashed here with bcryptjs),
// their accounts and some transaction history. Development only.
// =============================================================================

import { readFileSync } from 'fs';
import path from 'path';
import bcrypt from 'bcryptjs';
import { z } from 'zod';
import { loadConfig } from '../config';
import { createPool } from './pool';

const SEED_PATH = path.resolve(process.cwd(), 'db', 'seed.json');
const BCRYPT_ROUNDS = 12;

const seedSchema = z.object({
  users: z.array(z.object({
    id: z.string(),
    email: z.string(),
    displayName: z.string(),
    role: z.string(),
    password: z.string(),
  })),
  accounts: z.array(z.object({
    id: z.string(),
    userId: z.string(),
    accountType: z.enum(['checking', 'savings', 'credit']),
    balance: z.number(),
    currency: z.string().default('USD'),
  })),
  transactions: z.array(z.object({
    accountId: z.string(),
    transactionType: z.enum(['deposit', 'withdrawal', 'transfer', 'payment']),
    amount: z.number(),
    description: z.string(),
    daysAgo: z.number().int().min(0),
  })),
});

async function seed(): Promise<void> {
  const config = loadConfig();
  if (config.nodeEnv === 'production') {
    throw new Error('Refusing to load demo seed with NODE_ENV=production');
  }

  const data = seedSchema.parse(JSON.parse(readFileSync(SEED_PATH, 'utf8')));
  const pool = createPool(config.db);

  try {
    for (const user of data.users) {
      const hash = await bcrypt.hash(user.password, BCRYPT_ROUNDS);
      await pool.query(
        `INSERT INTO users (id, email, display_name, role, password_hash)
         VALUES ($1, $2, $3, $4, $5)
         ON CONFLICT (id) DO UPDATE
           SET email = EXCLUDED.email, display_name = EXCLUDED.display_name,
               role = EXCLUDED.role, password_hash = EXCLUDED.password_hash`,
        [user.id, user.email, user.displayName, user.role, hash]
      );
    }

    for (const account of data.accounts) {
      await pool.query(
        `INSERT INTO accounts (id, user_id, account_type, balance, currency)
         VALUES ($1, $2, $3, $4, $5)
         ON CONFLICT (id) DO NOTHING`,
        [account.id, account.userId, account.accountType, account.balance, account.currency]
      );
    }

    for (const [index, tx] of data.transactions.entries()) {
      await pool.query(
        `INSERT INTO transactions (id, account_id, transaction_type, amount, description, created_at)
         VALUES ($1, $2, $3, $4, $5, now() - make_interval(days => $6))
         ON CONFLICT (id) DO NOTHING`,
        [`seed-${index + 1}`, tx.accountId, tx.transactionType, tx.amount, tx.description, tx.daysAgo]
      );
    }

    console.log(
      `[DB] Seeded ${data.users.length} users, ${data.accounts.length} accounts, ` +
      `${data.transactions.length} transactions`
    );
  } finally {
    await pool.end();
  }
}

seed().catch((err: unknown) => {
  console.error('[DB] Seed failed:', err);
  process.exit(1);
});
