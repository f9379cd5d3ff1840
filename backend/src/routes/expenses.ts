import { Router, type Router as RouterType } from 'express';
import type { AppServices } from '../app.js';
import { asyncHandler, ValidationError } from '../middleware/errorHandler.js';
import type { ExpenseInput } from '../types.js';
import { bodyFields, optionalString, requireNumeric } from './requests.js';
import { serializeExpense } from './serializers.js';

export function parseRecordId(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new ValidationError('Invalid expense ID', { id: raw });
  }
  return Number(raw);
}

function readExpenseBody(body: unknown): ExpenseInput {
  const fields = bodyFields(body);
  return {
    date: optionalString(fields.get('date')) ?? '',
    category: optionalString(fields.get('category')) ?? '',
    amount: requireNumeric(fields, 'amount'),
    currencySymbol: optionalString(fields.get('currencySymbol')),
    note: optionalString(fields.get('note')),
  };
}

export default function expensesRoutes({ records, preferences }: AppServices): RouterType {
  const router: RouterType = Router();

  // GET /api/expenses?month=YYYY-MM - List expenses in storage order
  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const month = typeof req.query.month === 'string' ? req.query.month : undefined;
      const entries = records.listExpenseEntries(month);
      res.json(entries.map(({ id, expense }) => serializeExpense(expense, id)));
    })
  );

  // GET /api/expenses/export - Download the expense file as CSV
  router.get(
    '/export',
    asyncHandler(async (_req, res) => {
      res
        .type('text/csv')
        .attachment('expenses.csv')
        .send(records.exportExpensesCsv());
    })
  );

  // GET /api/expenses/:id - Get a single expense
  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const id = parseRecordId(req.params.id);
      res.json(serializeExpense(records.getExpense(id), id));
    })
  );

  // POST /api/expenses - Add an expense
  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const input = readExpenseBody(req.body);
      const { currencySymbol } = await preferences.get();
      const id = await records.addExpense(input, currencySymbol);
      res.status(201).json({ id, expense: serializeExpense(records.getExpense(id), id) });
    })
  );

  // PUT /api/expenses/:id - Replace an expense
  router.put(
    '/:id',
    asyncHandler(async (req, res) => {
      const id = parseRecordId(req.params.id);
      const input = readExpenseBody(req.body);
      const { currencySymbol } = await preferences.get();
      const updated = await records.updateExpense(id, input, currencySymbol);
      res.json({ id, expense: serializeExpense(updated, id) });
    })
  );

  // DELETE /api/expenses/:id - Delete an expense; later ids shift down by one
  router.delete(
    '/:id',
    asyncHandler(async (req, res) => {
      await records.deleteExpense(parseRecordId(req.params.id));
      res.status(204).send();
    })
  );

  return router;
}
