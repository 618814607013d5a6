// =============================================================================
// BASTION — Banking Store
//
// Backend ledger operations behind the tool gate. The gate only needs
// typed success/failure; this module decides how money is stored.
// =============================================================================

import { Pool } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { describeError } from '../../errors';
import {
  Account,
  AccountType,
  Transaction,
  TransactionType,
  TransferRequest,
  TransferResult,
} from '../../types/banking';
import { Logger } from '../../types/logger';

export interface BankingRepository {
  getAccount(accountId: string): Promise<Account | null>;
  listAccounts(userId: string): Promise<Account[]>;
  /** Newest first, since the given instant */
  listTransactions(accountId: string, since: Date): Promise<Transaction[]>;
  /**
   * Move funds between two accounts. Both balance changes and both
   * transaction records commit together or not at all.
   */
  transfer(request: TransferRequest): Promise<TransferResult>;
}

interface AccountRow {
  id: string;
  user_id: string;
  account_type: AccountType;
  balance: string | number;
  currency: string;
  status: string;
}

interface TransactionRow {
  id: string;
  account_id: string;
  transaction_type: TransactionType;
  amount: string | number;
  currency: string;
  description: string | null;
  created_at: Date;
  from_account_id: string | null;
  to_account_id: string | null;
}

function toAccount(row: AccountRow): Account {
  return {
    id: row.id,
    userId: row.user_id,
    accountType: row.account_type,
    balance: Number(row.balance),
    currency: row.currency,
    status: row.status,
  };
}

function toTransaction(row: TransactionRow): Transaction {
  return {
    id: row.id,
    accountId: row.account_id,
    transactionType: row.transaction_type,
    amount: Number(row.amount),
    currency: row.currency,
    description: row.description,
    timestamp: new Date(row.created_at),
    fromAccountId: row.from_account_id,
    toAccountId: row.to_account_id,
  };
}

/** The part of a pg client a rollback needs */
export interface RollbackClient {
  query(text: string): Promise<unknown>;
}

/**
 * Roll back after `cause`. Resolves false if the rollback itself fails;
 * that failure is logged and `cause` stays the error the caller rethrows.
 */
export async function rollbackAfter(client: RollbackClient, cause: unknown, logger: Logger): Promise<boolean> {
  try {
    await client.query('ROLLBACK');
    return true;
  } catch (err: unknown) {
    logger.error(`[Banking] ROLLBACK failed after "${describeError(cause)}": ${describeError(err)}`);
    return false;
  }
}

export class PgBankingRepository implements BankingRepository {
  constructor(
    private readonly pool: Pool,
    private readonly logger: Logger = console,
  ) {}

  async getAccount(accountId: string): Promise<Account | null> {
    const result = await this.pool.query<AccountRow>(
      `SELECT id, user_id, account_type, balance, currency, status
       FROM accounts WHERE id = $1`,
      [accountId]
    );
    return result.rows.length > 0 ? toAccount(result.rows[0]) : null;
  }

  async listAccounts(userId: string): Promise<Account[]> {
    const result = await this.pool.query<AccountRow>(
      `SELECT id, user_id, account_type, balance, currency, status
       FROM accounts WHERE user_id = $1 ORDER BY id`,
      [userId]
    );
    return result.rows.map(toAccount);
  }

  async listTransactions(accountId: string, since: Date): Promise<Transaction[]> {
    const result = await this.pool.query<TransactionRow>(
      `SELECT id, account_id, transaction_type, amount, currency, description,
              created_at, from_account_id, to_account_id
       FROM transactions
       WHERE account_id = $1 AND created_at >= $2
       ORDER BY created_at DESC`,
      [accountId, since]
    );
    return result.rows.map(toTransaction);
  }

  async transfer(request: TransferRequest): Promise<TransferResult> {
    const client = await this.pool.connect();
    let discard = false;
    try {
      await client.query('BEGIN');

      // Guarded debit: the balance check and the write are one statement.
      const debit = await client.query<AccountRow>(
        `UPDATE accounts SET balance = balance - $2
         WHERE id = $1 AND balance >= $2
         RETURNING id, user_id, account_type, balance, currency, status`,
        [request.fromAccountId, request.amount]
      );
      if (debit.rows.length === 0) {
        await client.query('ROLLBACK');
        const exists = await this.getAccount(request.fromAccountId);
        return { ok: false, reason: exists ? 'insufficient_funds' : 'account_missing' };
      }

      const credit = await client.query<AccountRow>(
        `UPDATE accounts SET balance = balance + $2
         WHERE id = $1
         RETURNING id, user_id, account_type, balance, currency, status`,
        [request.toAccountId, request.amount]
      );
      if (credit.rows.length === 0) {
        await client.query('ROLLBACK');
        return { ok: false, reason: 'account_missing' };
      }

      const from = toAccount(debit.rows[0]);
      const to = toAccount(credit.rows[0]);
      const transactionId = uuidv4();

      await client.query(
        `INSERT INTO transactions
           (id, account_id, transaction_type, amount, currency, description, from_account_id, to_account_id)
         VALUES ($1, $2, 'transfer', $3, $4, $5, $6, $7),
                ($8, $9, 'transfer', $10, $11, $12, $6, $7)`,
        [
          `${transactionId}_from`, from.id, -request.amount, from.currency,
          `Transfer to ${to.id}: ${request.description}`,
          from.id, to.id,
          `${transactionId}_to`, to.id, request.amount, to.currency,
          `Transfer from ${from.id}: ${request.description}`,
        ]
      );

      await client.query('COMMIT');
      return { ok: true, transactionId, fromBalance: from.balance, toBalance: to.balance };
    } catch (err) {
      discard = !(await rollbackAfter(client, err, this.logger));
      throw err;
    } finally {
      // A connection that could not roll back is closed, not pooled.
      client.release(discard);
    }
  }
}
