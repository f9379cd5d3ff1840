import { join } from 'node:path';
import type Decimal from 'decimal.js';
import { DEFAULT_CURRENCY_SYMBOL, MAX_CURRENCY_SYMBOL_LENGTH, UNCATEGORIZED } from '../constants/currencies.js';
import logger from '../logger.js';
import { NotFoundError, StorageError, ValidationError } from '../middleware/errorHandler.js';
import { CsvSyntaxError, parseCsv, stringifyCsv } from '../storage/csv.js';
import { readTextIfExists, writeFileAtomic } from '../storage/files.js';
import type { ExpenseInput, ExpenseRecord, MonthKey, RecordId, StoreSnapshot } from '../types.js';
import { compareMonths, isValidIsoDate, isValidMonthKey, monthOf } from './dates.js';
import { parseAmount, splitAmountCell, toMoney } from './money.js';

export const EXPENSES_FILE = 'expenses.csv';
export const INCOME_FILE = 'income.csv';

export const EXPENSE_HEADER = ['date', 'category', 'amount', 'currency_symbol', 'note'] as const;
export const INCOME_HEADER = ['month', 'amount'] as const;

export interface RecordStoreOptions {
  dataDir: string;
  /** Symbol assigned to legacy rows that carry none */
  defaultCurrencySymbol?: string;
}

// ── Validation ────────────────────────────────────────────────────────

export function assertMonthKey(month: string): MonthKey {
  if (typeof month !== 'string' || !isValidMonthKey(month.trim())) {
    throw new ValidationError(`Invalid month "${month}", expected YYYY-MM`, { month: String(month) });
  }
  return month.trim();
}

/**
 * Turn caller input into a stored record. Amounts are rounded to 2 dp;
 * a missing currency symbol falls back to `fallbackSymbol`.
 */
export function validateExpense(input: ExpenseInput, fallbackSymbol: string = DEFAULT_CURRENCY_SYMBOL): ExpenseRecord {
  if (!input || typeof input !== 'object') {
    throw new ValidationError('Expense must be an object');
  }

  const date = typeof input.date === 'string' ? input.date.trim() : '';
  if (!isValidIsoDate(date)) {
    throw new ValidationError(`Invalid date "${String(input.date)}", expected YYYY-MM-DD`, { field: 'date' });
  }

  const category = typeof input.category === 'string' ? input.category.trim() : '';
  if (!category) {
    throw new ValidationError('Category is required', { field: 'category' });
  }

  const amount =
    typeof input.amount === 'number' || typeof input.amount === 'string' ? parseAmount(input.amount) : null;
  if (amount === null) {
    throw new ValidationError(`Invalid amount "${String(input.amount)}"`, { field: 'amount' });
  }
  if (amount.isNegative() && !amount.isZero()) {
    throw new ValidationError('Amount must not be negative', { field: 'amount' });
  }

  const symbol = typeof input.currencySymbol === 'string' ? input.currencySymbol.trim() : '';
  if (symbol.length > MAX_CURRENCY_SYMBOL_LENGTH) {
    throw new ValidationError(`Currency symbol must be at most ${MAX_CURRENCY_SYMBOL_LENGTH} characters`, {
      field: 'currencySymbol',
    });
  }

  return {
    date,
    category,
    amount: toMoney(amount.abs()),
    currencySymbol: symbol || fallbackSymbol,
    note: typeof input.note === 'string' ? input.note.trim() : '',
  };
}

function assertIncomeAmount(raw: number | string): Decimal {
  const amount = typeof raw === 'number' || typeof raw === 'string' ? parseAmount(raw) : null;
  if (amount === null) {
    throw new ValidationError(`Invalid income amount "${String(raw)}"`, { field: 'amount' });
  }
  if (amount.isNegative() && !amount.isZero()) {
    throw new ValidationError('Income must not be negative', { field: 'amount' });
  }
  return toMoney(amount.abs());
}

// ── File codecs ───────────────────────────────────────────────────────

function columnIndex(header: string[], ...names: string[]): number {
  return header.findIndex((col) => names.includes(col));
}

function readRows(text: string, path: string): string[][] {
  try {
    return parseCsv(text);
  } catch (err) {
    if (err instanceof CsvSyntaxError) {
      throw new StorageError(`Corrupt CSV in ${path}: ${err.message}`, path, err);
    }
    throw err;
  }
}

export function decodeExpenses(text: string, path: string, defaultSymbol: string): ExpenseRecord[] {
  const rows = readRows(text, path);
  if (rows.length === 0) return [];

  const header = rows[0].map((col) => col.trim().toLowerCase());
  const dateCol = columnIndex(header, 'date');
  const categoryCol = columnIndex(header, 'category');
  const amountCol = columnIndex(header, 'amount');
  const symbolCol = columnIndex(header, 'currency_symbol', 'currency');
  const noteCol = columnIndex(header, 'note');

  if (dateCol < 0 || categoryCol < 0 || amountCol < 0) {
    throw new StorageError(`${path} is missing a date, category or amount column`, path);
  }

  return rows.slice(1).map((row, index) => {
    const rowNumber = index + 2;
    const cell = (col: number) => (col >= 0 ? (row[col] ?? '').trim() : '');

    const date = cell(dateCol);
    if (!isValidIsoDate(date)) {
      throw new StorageError(`Invalid date "${date}" on line ${rowNumber} of ${path}`, path);
    }

    // Files written before the currency column existed glue the symbol to the amount ("₹500.00")
    const split = splitAmountCell(cell(amountCol));
    const amount = symbolCol >= 0 ? parseAmount(cell(amountCol)) : split.amount;
    if (amount === null || (amount.isNegative() && !amount.isZero())) {
      throw new StorageError(`Invalid amount "${cell(amountCol)}" on line ${rowNumber} of ${path}`, path);
    }

    return {
      date,
      category: cell(categoryCol) || UNCATEGORIZED,
      amount: toMoney(amount.abs()),
      currencySymbol: (symbolCol >= 0 ? cell(symbolCol) : split.symbol) || defaultSymbol,
      note: cell(noteCol),
    };
  });
}

export function encodeExpenses(expenses: readonly ExpenseRecord[]): string {
  return stringifyCsv(
    EXPENSE_HEADER,
    expenses.map((e) => [e.date, e.category, e.amount.toFixed(2), e.currencySymbol, e.note])
  );
}

export function decodeIncome(text: string, path: string): Map<MonthKey, Decimal> {
  const rows = readRows(text, path);
  const income = new Map<MonthKey, Decimal>();
  if (rows.length === 0) return income;

  const header = rows[0].map((col) => col.trim().toLowerCase());
  const monthCol = columnIndex(header, 'month');
  const amountCol = columnIndex(header, 'amount', 'income');
  if (monthCol < 0 || amountCol < 0) {
    throw new StorageError(`${path} is missing a month or amount column`, path);
  }

  rows.slice(1).forEach((row, index) => {
    const rowNumber = index + 2;
    const month = (row[monthCol] ?? '').trim();
    const raw = (row[amountCol] ?? '').trim();
    if (!isValidMonthKey(month)) {
      throw new StorageError(`Invalid month "${month}" on line ${rowNumber} of ${path}`, path);
    }
    const amount = parseAmount(raw);
    if (amount === null || (amount.isNegative() && !amount.isZero())) {
      throw new StorageError(`Invalid income "${raw}" on line ${rowNumber} of ${path}`, path);
    }
    income.set(month, toMoney(amount.abs()));
  });

  return sortIncome(income);
}

export function encodeIncome(income: Map<MonthKey, Decimal>): string {
  return stringifyCsv(
    INCOME_HEADER,
    [...sortIncome(income)].map(([month, amount]) => [month, amount.toFixed(2)])
  );
}

function sortIncome(income: Map<MonthKey, Decimal>): Map<MonthKey, Decimal> {
  return new Map([...income].sort(([a], [b]) => compareMonths(a, b)));
}

// ── Store ─────────────────────────────────────────────────────────────

/**
 * Expense and income records backed by two CSV files.
 *
 * The whole data set lives in memory once loaded. Each mutation rewrites the
 * affected file atomically; the in-memory state only changes after the write
 * succeeded, so a failed write leaves both file and memory untouched.
 */
export class RecordStore {
  readonly expensesPath: string;
  readonly incomePath: string;
  private readonly defaultCurrencySymbol: string;

  private expenses: ExpenseRecord[] = [];
  private income = new Map<MonthKey, Decimal>();
  private loaded = false;
  private pending: Promise<unknown> = Promise.resolve();

  constructor(options: RecordStoreOptions) {
    this.expensesPath = join(options.dataDir, EXPENSES_FILE);
    this.incomePath = join(options.dataDir, INCOME_FILE);
    this.defaultCurrencySymbol = options.defaultCurrencySymbol || DEFAULT_CURRENCY_SYMBOL;
  }

  static async open(options: RecordStoreOptions): Promise<RecordStore> {
    const store = new RecordStore(options);
    await store.load();
    return store;
  }

  /**
   * Load both files. Missing files mean a first run and yield an empty store;
   * unreadable or corrupt files raise StorageError.
   */
  async load(): Promise<void> {
    const expensesText = await this.readFile(this.expensesPath);
    const incomeText = await this.readFile(this.incomePath);

    // Both files decode before either replaces the in-memory state
    const expenses =
      expensesText === null ? [] : decodeExpenses(expensesText, this.expensesPath, this.defaultCurrencySymbol);
    const income = incomeText === null ? new Map<MonthKey, Decimal>() : decodeIncome(incomeText, this.incomePath);

    this.expenses = expenses;
    this.income = income;
    this.loaded = true;

    logger.debug(
      { expenses: this.expenses.length, incomeMonths: this.income.size, firstRun: expensesText === null },
      'Record store loaded'
    );
  }

  // ── Expenses ──

  async addExpense(input: ExpenseInput, fallbackSymbol?: string): Promise<RecordId> {
    const record = validateExpense(input, fallbackSymbol || this.defaultCurrencySymbol);
    return this.serialize(async () => {
      const next = [...this.requireLoaded().expenses, record];
      await this.writeExpenses(next);
      logger.debug({ id: next.length - 1, date: record.date }, 'Expense added');
      return next.length - 1;
    });
  }

  async updateExpense(id: RecordId, input: ExpenseInput, fallbackSymbol?: string): Promise<ExpenseRecord> {
    const record = validateExpense(input, fallbackSymbol || this.defaultCurrencySymbol);
    return this.serialize(async () => {
      this.assertExists(id);
      const next = [...this.expenses];
      next[id] = record;
      await this.writeExpenses(next);
      logger.debug({ id }, 'Expense updated');
      return record;
    });
  }

  async deleteExpense(id: RecordId): Promise<void> {
    await this.serialize(async () => {
      this.assertExists(id);
      const next = this.expenses.filter((_, index) => index !== id);
      await this.writeExpenses(next);
      logger.debug({ id }, 'Expense deleted');
    });
  }

  getExpense(id: RecordId): ExpenseRecord {
    this.assertExists(id);
    return { ...this.expenses[id] };
  }

  /** All expenses in storage order, optionally restricted to one month */
  listExpenses(month?: MonthKey): ExpenseRecord[] {
    const { expenses } = this.requireLoaded();
    if (month === undefined) {
      return expenses.map((e) => ({ ...e }));
    }
    const key = assertMonthKey(month);
    return expenses.filter((e) => monthOf(e.date) === key).map((e) => ({ ...e }));
  }

  /** Expenses with their ids, so filtered listings still address the right rows */
  listExpenseEntries(month?: MonthKey): Array<{ id: RecordId; expense: ExpenseRecord }> {
    const key = month === undefined ? undefined : assertMonthKey(month);
    return this.requireLoaded()
      .expenses.map((expense, id) => ({ id, expense: { ...expense } }))
      .filter(({ expense }) => key === undefined || monthOf(expense.date) === key);
  }

  exportExpensesCsv(): string {
    return encodeExpenses(this.requireLoaded().expenses);
  }

  // ── Income ──

  async setIncome(month: MonthKey, amount: number | string): Promise<void> {
    const key = assertMonthKey(month);
    const value = assertIncomeAmount(amount);
    await this.serialize(async () => {
      const next = new Map(this.requireLoaded().income);
      next.set(key, value);
      const sorted = sortIncome(next);
      await this.persist(this.incomePath, encodeIncome(sorted));
      this.income = sorted;
      logger.debug({ month: key }, 'Income set');
    });
  }

  /** Income per month, ascending by month */
  listIncome(): Map<MonthKey, Decimal> {
    return new Map(this.requireLoaded().income);
  }

  getIncome(month: MonthKey): Decimal | undefined {
    return this.requireLoaded().income.get(assertMonthKey(month));
  }

  /** Read-only copy for background readers */
  snapshot(): StoreSnapshot {
    return { expenses: this.listExpenses(), income: this.listIncome() };
  }

  // ── Internals ──

  private requireLoaded(): this {
    if (!this.loaded) {
      throw new StorageError('Record store used before load()', this.expensesPath);
    }
    return this;
  }

  private assertExists(id: RecordId): void {
    const { expenses } = this.requireLoaded();
    if (!Number.isInteger(id) || id < 0 || id >= expenses.length) {
      throw new NotFoundError(`Expense ${id} not found`, { id: Number.isFinite(id) ? id : String(id) });
    }
  }

  private async writeExpenses(next: ExpenseRecord[]): Promise<void> {
    await this.persist(this.expensesPath, encodeExpenses(next));
    this.expenses = next;
  }

  private async persist(path: string, content: string): Promise<void> {
    try {
      await writeFileAtomic(path, content);
    } catch (err) {
      throw new StorageError(`Failed to write ${path}`, path, err);
    }
  }

  private async readFile(path: string): Promise<string | null> {
    try {
      return await readTextIfExists(path);
    } catch (err) {
      throw new StorageError(`Failed to read ${path}`, path, err);
    }
  }

  // Mutations run one at a time so each starts from the previous one's result
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.pending.then(task, task);
    this.pending = run.catch(() => undefined);
    return run;
  }
}
