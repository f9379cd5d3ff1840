import { join } from 'node:path';
import { DEFAULT_CURRENCY_SYMBOL, MAX_CURRENCY_SYMBOL_LENGTH } from '../constants/currencies.js';
import logger from '../logger.js';
import { StorageError, ValidationError } from '../middleware/errorHandler.js';
import { readTextIfExists, writeFileAtomic } from '../storage/files.js';
import type { Preferences, PreferencesInput } from '../types.js';
import { parseAmount, toMoney, ZERO } from './money.js';

export const PREFERENCES_FILE = 'preferences.json';

// On-disk shape; key names are shared with files written by earlier versions
interface PreferencesDocument {
  currency_symbol: string;
  default_monthly_budget: number;
}

export function defaultPreferences(): Preferences {
  return { currencySymbol: DEFAULT_CURRENCY_SYMBOL, defaultMonthlyBudget: ZERO };
}

export function validatePreferences(input: PreferencesInput, current: Preferences = defaultPreferences()): Preferences {
  if (!input || typeof input !== 'object') {
    throw new ValidationError('Preferences must be an object');
  }

  let currencySymbol = current.currencySymbol;
  if (input.currencySymbol !== undefined) {
    if (typeof input.currencySymbol !== 'string') {
      throw new ValidationError('Currency symbol must be a string', { field: 'currencySymbol' });
    }
    // A blank symbol resets to the default rather than failing
    currencySymbol = input.currencySymbol.trim() || DEFAULT_CURRENCY_SYMBOL;
    if (currencySymbol.length > MAX_CURRENCY_SYMBOL_LENGTH) {
      throw new ValidationError(`Currency symbol must be at most ${MAX_CURRENCY_SYMBOL_LENGTH} characters`, {
        field: 'currencySymbol',
      });
    }
  }

  let defaultMonthlyBudget = current.defaultMonthlyBudget;
  if (input.defaultMonthlyBudget !== undefined) {
    const raw = input.defaultMonthlyBudget;
    const parsed = typeof raw === 'number' || typeof raw === 'string' ? parseAmount(raw) : null;
    if (parsed === null) {
      throw new ValidationError('Default monthly budget must be numeric', { field: 'defaultMonthlyBudget' });
    }
    if (parsed.isNegative() && !parsed.isZero()) {
      throw new ValidationError('Default monthly budget must not be negative', { field: 'defaultMonthlyBudget' });
    }
    defaultMonthlyBudget = toMoney(parsed.abs());
  }

  return { currencySymbol, defaultMonthlyBudget };
}

function decodePreferences(text: string, path: string): Preferences {
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (err) {
    throw new StorageError(`Corrupt preferences file ${path}`, path, err);
  }
  if (!doc || typeof doc !== 'object' || Array.isArray(doc)) {
    throw new StorageError(`Preferences file ${path} must hold a JSON object`, path);
  }

  const symbol = 'currency_symbol' in doc ? doc.currency_symbol : undefined;
  const budget = 'default_monthly_budget' in doc ? doc.default_monthly_budget : undefined;
  try {
    return validatePreferences({
      currencySymbol: typeof symbol === 'string' ? symbol : undefined,
      defaultMonthlyBudget: typeof budget === 'number' || typeof budget === 'string' ? budget : undefined,
    });
  } catch (err) {
    throw new StorageError(`Invalid preferences in ${path}`, path, err);
  }
}

function encodePreferences(prefs: Preferences): string {
  const doc: PreferencesDocument = {
    currency_symbol: prefs.currencySymbol,
    default_monthly_budget: prefs.defaultMonthlyBudget.toNumber(),
  };
  return JSON.stringify(doc, null, 2) + '\n';
}

/**
 * Currency symbol and default budget, persisted as a small JSON document.
 * Defaults are written on first access when no file exists.
 */
export class PreferencesStore {
  readonly path: string;
  private cached: Preferences | null = null;

  constructor(dataDir: string) {
    this.path = join(dataDir, PREFERENCES_FILE);
  }

  async get(): Promise<Preferences> {
    if (this.cached) return { ...this.cached };

    let text: string | null;
    try {
      text = await readTextIfExists(this.path);
    } catch (err) {
      throw new StorageError(`Failed to read ${this.path}`, this.path, err);
    }

    if (text === null) {
      const defaults = defaultPreferences();
      await this.persist(defaults);
      logger.info({ path: this.path }, 'Created default preferences');
      return { ...defaults };
    }

    this.cached = decodePreferences(text, this.path);
    return { ...this.cached };
  }

  async set(input: PreferencesInput): Promise<Preferences> {
    const next = validatePreferences(input, await this.get());
    await this.persist(next);
    logger.debug({ currencySymbol: next.currencySymbol }, 'Preferences saved');
    return { ...next };
  }

  private async persist(prefs: Preferences): Promise<void> {
    try {
      await writeFileAtomic(this.path, encodePreferences(prefs));
    } catch (err) {
      throw new StorageError(`Failed to write ${this.path}`, this.path, err);
    }
    this.cached = prefs;
  }
}
