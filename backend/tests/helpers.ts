import Decimal from 'decimal.js';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { ExpenseRecord } from '../src/types.js';

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'ledgerline-test-'));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function makeExpense(overrides: Partial<Omit<ExpenseRecord, 'amount'>> & { amount?: string } = {}): ExpenseRecord {
  const { amount = '100.00', ...rest } = overrides;
  return {
    date: '2024-01-15',
    category: 'Food',
    currencySymbol: '₹',
    note: '',
    ...rest,
    amount: new Decimal(amount),
  };
}
