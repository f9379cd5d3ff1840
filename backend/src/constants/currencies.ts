// Currency symbols offered to clients. Symbols are display labels only; no conversion happens.
export const CURRENCY_OPTIONS = ['₹', '$', '€', '£', '¥', 'AED', 'AUD', 'CAD', 'SGD'] as const;

export type CurrencyOption = (typeof CURRENCY_OPTIONS)[number];

export const DEFAULT_CURRENCY_SYMBOL: CurrencyOption = '₹';

export const MAX_CURRENCY_SYMBOL_LENGTH = 8;

// Label used when a record carries no category
export const UNCATEGORIZED = 'Uncategorized';
