import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { StorageError, ValidationError } from '../src/middleware/errorHandler.js';
import { PreferencesStore, validatePreferences } from '../src/services/preferences.js';
import { makeTempDir, removeDir } from './helpers.js';

describe('validatePreferences', () => {
  test('a blank symbol resets to the default', () => {
    expect(validatePreferences({ currencySymbol: '   ' }).currencySymbol).toBe('₹');
  });

  test('keeps fields that were not supplied', () => {
    const current = validatePreferences({ currencySymbol: '$', defaultMonthlyBudget: 500 });
    const next = validatePreferences({ defaultMonthlyBudget: '750' }, current);
    expect(next.currencySymbol).toBe('$');
    expect(next.defaultMonthlyBudget.toFixed(2)).toBe('750.00');
  });

  test('rejects a negative or non-numeric budget', () => {
    expect(() => validatePreferences({ defaultMonthlyBudget: -1 })).toThrow(
      'Default monthly budget must not be negative'
    );
    expect(() => validatePreferences({ defaultMonthlyBudget: 'lots' })).toThrow(ValidationError);
  });

  test('rejects an overlong symbol', () => {
    expect(() => validatePreferences({ currencySymbol: 'DOLLARS-US' })).toThrow(ValidationError);
  });
});

describe('PreferencesStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  test('creates the defaults file on first access', async () => {
    const store = new PreferencesStore(join(dir, 'nested'));
    const prefs = await store.get();

    expect(prefs.currencySymbol).toBe('₹');
    expect(prefs.defaultMonthlyBudget.isZero()).toBe(true);
    const text = await readFile(join(dir, 'nested', 'preferences.json'), 'utf8');
    expect(text).toBe('{\n  "currency_symbol": "₹",\n  "default_monthly_budget": 0\n}\n');
  });

  test('persists updates across instances', async () => {
    const store = new PreferencesStore(dir);
    await store.set({ currencySymbol: '$', defaultMonthlyBudget: '1500.5' });

    const text = await readFile(join(dir, 'preferences.json'), 'utf8');
    expect(text).toBe('{\n  "currency_symbol": "$",\n  "default_monthly_budget": 1500.5\n}\n');

    const reloaded = await new PreferencesStore(dir).get();
    expect(reloaded.currencySymbol).toBe('$');
    expect(reloaded.defaultMonthlyBudget.toFixed(2)).toBe('1500.50');
  });

  test('a rejected update leaves the stored value alone', async () => {
    const store = new PreferencesStore(dir);
    await store.set({ currencySymbol: '€' });
    await expect(store.set({ defaultMonthlyBudget: -5 })).rejects.toThrow(ValidationError);
    expect((await store.get()).currencySymbol).toBe('€');
  });

  test('corrupt JSON raises StorageError', async () => {
    await writeFile(join(dir, 'preferences.json'), '{ not json', 'utf8');
    await expect(new PreferencesStore(dir).get()).rejects.toThrow(StorageError);
  });

  test('invalid stored values raise StorageError', async () => {
    await writeFile(join(dir, 'preferences.json'), '{"currency_symbol":"$","default_monthly_budget":-3}', 'utf8');
    await expect(new PreferencesStore(dir).get()).rejects.toThrow(`Invalid preferences in ${join(dir, 'preferences.json')}`);
  });
});
