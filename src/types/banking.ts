// =============================================================================
// BASTION — Banking Resources
//
// The accounts and transactions the tool gate protects. How money is stored
// is the banking store's business; the gate only needs these shapes.
// =============================================================================

export type AccountType = 'checking' | 'savings' | 'credit';

export type TransactionType = 'deposit' | 'withdrawal' | 'transfer' | 'payment';

export interface Account {
  id: string;
  userId: string;
  accountType: AccountType;
  balance: number;
  currency: string;
  status: string;
}

export interface Transaction {
  id: string;
  accountId: string;
  transactionType: TransactionType;
  amount: number;
  currency: string;
  description: string | null;
  timestamp: Date;
  fromAccountId: string | null;
  toAccountId: string | null;
}

export interface TransferRequest {
  fromAccountId: string;
  toAccountId: string;
  amount: number;
  description: string;
}

export type TransferResult =
  | {
      ok: true;
      transactionId: string;
      fromBalance: number;
      toBalance: number;
    }
  | { ok: false; reason: 'insufficient_funds' | 'account_missing' };

export interface UserRecord {
  id: string;
  email: string;
  displayName: string;
  /** Raw role string as stored; parsed with parseRole */
  role: string;
  passwordHash: string;
  isActive: boolean;
}
