import { createWriteStream } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { finished } from 'node:stream/promises';
import logger from '../logger.js';
import { DependencyUnavailableError } from '../middleware/errorHandler.js';
import { stringifyCsv } from '../storage/csv.js';
import { publishAllAtomically, publishAtomically } from '../storage/files.js';
import { EXPENSE_HEADER } from './records.js';
import { REPORT_TOP_CATEGORIES, type ReportPayload } from './report.js';

export interface ReportRenderer {
  readonly name: string;
  /** Render the payload next to `targetBase` (a path without extension); returns the published files */
  render(payload: ReportPayload, targetBase: string): Promise<string[]>;
}

export interface RenderOutcome {
  renderer: string;
  files: string[];
}

// Characters Helvetica's WinAnsi encoding holds beyond Latin-1
const WIN_ANSI_EXTRAS = new Set('€‚ƒ„…†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ');

// Written out as codes since the standard PDF fonts have no glyph for them
const SYMBOL_CODES = new Map([
  ['₹', 'INR '],
  ['₩', 'KRW '],
  ['₱', 'PHP '],
  ['₺', 'TRY '],
  ['₽', 'RUB '],
  ['₪', 'ILS '],
  ['₫', 'VND '],
]);

/** Text the built-in PDF fonts can draw; other characters become "?" */
export function toWinAnsi(text: string): string {
  let out = '';
  for (const char of text) {
    const code = SYMBOL_CODES.get(char);
    if (code !== undefined) {
      out += code;
    } else {
      const point = char.codePointAt(0) ?? 0;
      out += (point >= 0x20 && point <= 0x7e) || (point >= 0xa0 && point <= 0xff) || WIN_ANSI_EXTRAS.has(char) ? char : '?';
    }
  }
  return out;
}

const importPdfKit = () => import('pdfkit').then((mod) => mod.default);

export type PdfKitConstructor = Awaited<ReturnType<typeof importPdfKit>>;

export interface PdfReportRendererOptions {
  /** Override how pdfkit is loaded */
  load?: () => Promise<PdfKitConstructor>;
}

/**
 * One-page A4 summary: title, totals and the largest categories.
 * pdfkit is loaded on first use; when it cannot be loaded the renderer reports
 * DependencyUnavailableError so callers can fall back.
 */
export class PdfReportRenderer implements ReportRenderer {
  readonly name = 'pdf';
  private readonly load: () => Promise<PdfKitConstructor>;

  constructor(options: PdfReportRendererOptions = {}) {
    this.load = options.load ?? importPdfKit;
  }

  async render(payload: ReportPayload, targetBase: string): Promise<string[]> {
    let PDFDocument: PdfKitConstructor;
    try {
      PDFDocument = await this.load();
    } catch (err) {
      throw new DependencyUnavailableError('pdfkit', err);
    }

    const path = `${targetBase}.pdf`;
    await publishAtomically(path, async (tempPath) => {
      const doc = new PDFDocument({ size: 'A4', margin: 40 });
      const out = createWriteStream(tempPath);
      const done = finished(out);
      doc.pipe(out);

      doc.font('Helvetica-Bold').fontSize(14).text(`Monthly Expense Report - ${payload.month}`);
      doc.moveDown();
      doc.font('Helvetica').fontSize(10);
      doc.text(toWinAnsi(`Income: ${payload.formatted.income}`));
      doc.text(toWinAnsi(`Expenditure: ${payload.formatted.expense}`));
      doc.text(toWinAnsi(`Balance: ${payload.formatted.balance}`));
      doc.moveDown();

      if (payload.noData) {
        doc.text('No expenses recorded for this month.');
      } else {
        doc.text('Top expenses:');
        payload.categories.slice(0, REPORT_TOP_CATEGORIES).forEach((c, index) => {
          doc.text(toWinAnsi(`${index + 1}. ${c.category}: ${c.formatted} (${(c.share * 100).toFixed(1)}%)`), {
            indent: 10,
          });
        });
      }

      doc.end();
      await done;
    });

    return [path];
  }
}

/** Fallback output: the month's rows as CSV plus the numeric payload as JSON, published together */
export class TabularReportRenderer implements ReportRenderer {
  readonly name = 'tabular';

  async render(payload: ReportPayload, targetBase: string): Promise<string[]> {
    const csvPath = `${targetBase}.csv`;
    const jsonPath = `${targetBase}.json`;

    const csv = stringifyCsv(
      EXPENSE_HEADER,
      payload.rows.map((r) => [r.date, r.category, r.amount.toFixed(2), r.currencySymbol, r.note])
    );
    const json = JSON.stringify(payload, null, 2) + '\n';
    await publishAllAtomically([
      { path: csvPath, produce: (tempPath) => writeFile(tempPath, csv, 'utf8') },
      { path: jsonPath, produce: (tempPath) => writeFile(tempPath, json, 'utf8') },
    ]);

    return [csvPath, jsonPath];
  }
}

export function defaultRenderers(): ReportRenderer[] {
  return [new PdfReportRenderer(), new TabularReportRenderer()];
}

/**
 * Try renderers in order. Only DependencyUnavailableError moves on to the next
 * one; any other failure is the caller's to handle.
 */
export async function renderWithFallback(
  payload: ReportPayload,
  targetBase: string,
  renderers: readonly ReportRenderer[]
): Promise<RenderOutcome> {
  let unavailable: DependencyUnavailableError | undefined;

  for (const renderer of renderers) {
    try {
      const files = await renderer.render(payload, targetBase);
      return { renderer: renderer.name, files };
    } catch (err) {
      if (!(err instanceof DependencyUnavailableError)) throw err;
      logger.warn({ renderer: renderer.name, dependency: err.params?.dependency }, 'Renderer unavailable, falling back');
      unavailable = err;
    }
  }

  throw unavailable ?? new DependencyUnavailableError('report renderer');
}
