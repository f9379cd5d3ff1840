import Decimal from 'decimal.js';
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { DependencyUnavailableError } from '../src/middleware/errorHandler.js';
import { aggregate } from '../src/services/aggregation.js';
import { buildReport, type ReportPayload } from '../src/services/report.js';
import {
  PdfReportRenderer,
  renderWithFallback,
  TabularReportRenderer,
  toWinAnsi,
  type ReportRenderer,
} from '../src/services/reportRenderers.js';
import { makeExpense, makeTempDir, removeDir } from './helpers.js';

const rows = [
  makeExpense({ date: '2024-01-05', category: 'Food', amount: '500', note: 'Lunch, team' }),
  makeExpense({ date: '2024-01-15', category: 'Transport', amount: '200' }),
];

function samplePayload(): ReportPayload {
  return buildReport(
    aggregate(rows, new Decimal(2000), '2024-01'),
    { currencySymbol: '₹', defaultMonthlyBudget: new Decimal(0) },
    rows,
    new Date('2024-02-01T00:00:00.000Z')
  );
}

const missingPdfKit = new PdfReportRenderer({ load: () => Promise.reject(new Error('Cannot find module')) });

describe('toWinAnsi', () => {
  test('writes symbols the standard fonts lack as currency codes', () => {
    expect(toWinAnsi('Income: ₹1,000.00')).toBe('Income: INR 1,000.00');
    expect(toWinAnsi('Balance: -₹500.00')).toBe('Balance: -INR 500.00');
  });

  test('keeps characters the standard fonts can draw', () => {
    expect(toWinAnsi('€5 £3 ¥9 $1 Café – ok')).toBe('€5 £3 ¥9 $1 Café – ok');
  });

  test('replaces anything else', () => {
    expect(toWinAnsi('食費: $4.00')).toBe('??: $4.00');
  });
});

describe('report renderers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  test('writes a PDF document', async () => {
    const base = join(dir, 'expense-report-2024-01');
    const files = await new PdfReportRenderer().render(samplePayload(), base);

    expect(files).toEqual([`${base}.pdf`]);
    const bytes = await readFile(`${base}.pdf`);
    expect(bytes.subarray(0, 4).toString('latin1')).toBe('%PDF');
    expect(await readdir(dir)).toEqual(['expense-report-2024-01.pdf']);
  });

  test('reports a missing pdf library as unavailable', async () => {
    await expect(missingPdfKit.render(samplePayload(), join(dir, 'r'))).rejects.toThrow(DependencyUnavailableError);
  });

  test('tabular output holds the rows and the payload', async () => {
    const base = join(dir, 'expense-report-2024-01');
    await new TabularReportRenderer().render(samplePayload(), base);

    expect(await readFile(`${base}.csv`, 'utf8')).toBe(
      'date,category,amount,currency_symbol,note\n' +
        '2024-01-05,Food,500.00,₹,"Lunch, team"\n' +
        '2024-01-15,Transport,200.00,₹,\n'
    );
    const json: unknown = JSON.parse(await readFile(`${base}.json`, 'utf8'));
    expect(json).toMatchObject({ month: '2024-01', totals: { income: 2000, expense: 700, balance: 1300 } });
  });
});

describe('renderWithFallback', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  test('falls back when the PDF library is unavailable', async () => {
    const base = join(dir, 'expense-report-2024-01');
    const outcome = await renderWithFallback(samplePayload(), base, [missingPdfKit, new TabularReportRenderer()]);

    expect(outcome).toEqual({ renderer: 'tabular', files: [`${base}.csv`, `${base}.json`] });
    expect((await readdir(dir)).sort()).toEqual(['expense-report-2024-01.csv', 'expense-report-2024-01.json']);
  });

  test('other failures propagate without trying the next renderer', async () => {
    const broken: ReportRenderer = {
      name: 'broken',
      render: () => Promise.reject(new Error('disk full')),
    };
    await expect(
      renderWithFallback(samplePayload(), join(dir, 'r'), [broken, new TabularReportRenderer()])
    ).rejects.toThrow('disk full');
    expect(await readdir(dir)).toEqual([]);
  });

  test('fails when no renderer is available', async () => {
    await expect(renderWithFallback(samplePayload(), join(dir, 'r'), [missingPdfKit])).rejects.toThrow(
      'Optional dependency "pdfkit" is not available'
    );
  });
});
