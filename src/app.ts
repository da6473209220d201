import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { formatDateOnly, formatLocalTimestamp } from './dates';
import { ExpenseNotFoundError, StorageFormatError, ValidationError } from './errors';
import { ExpenseTracker } from './tracker';
import { validateCategoryName, validateExpenseInput, validateViewQuery } from './validation';
import { ApiError, Expense, ExpenseResponse, ExpenseSummary, PeriodFilter, ViewState } from './types';

// Helper: Convert an in-memory expense to its JSON shape
export function toExpenseResponse(expense: Expense): ExpenseResponse {
  return {
    id: expense.id,
    amount: expense.amount,
    category: expense.category,
    date: formatLocalTimestamp(expense.date),
    notes: expense.notes ?? null
  };
}

export function toPeriodResponse(period: PeriodFilter): Record<string, string> {
  if (period.kind !== 'custom') return { kind: period.kind };

  const response: Record<string, string> = { kind: period.kind };
  if (period.start) response.start = formatDateOnly(period.start);
  if (period.end) response.end = formatDateOnly(period.end);
  return response;
}

function toViewResponse(view: ViewState) {
  return { sort: view.sort, period: toPeriodResponse(view.period) };
}

function toSummaryResponse(summary: ExpenseSummary) {
  return {
    range: {
      start: formatLocalTimestamp(summary.range.start),
      end: formatLocalTimestamp(summary.range.end)
    },
    total: summary.total,
    count: summary.count,
    average: summary.average,
    categoryTotals: summary.categoryTotals
  };
}

function sendError(res: Response, error: unknown, fallback: string) {
  if (error instanceof ValidationError) {
    const body: ApiError = { error: 'Validation failed', details: error.details };
    return res.status(400).json(body);
  }
  if (error instanceof ExpenseNotFoundError) {
    const body: ApiError = { error: 'Expense not found' };
    return res.status(404).json(body);
  }

  console.error(`${fallback}:`, error);
  const body: ApiError = { error: fallback };
  if (error instanceof StorageFormatError) body.details = [error.message];
  return res.status(500).json(body);
}

// Status of a client-side failure raised before a route runs (body parser)
function clientErrorStatus(err: unknown): number | null {
  if (!err || typeof err !== 'object') return null;
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

function validationFailed(res: Response, errors: string[]) {
  const body: ApiError = { error: 'Validation failed', details: errors };
  return res.status(400).json(body);
}

export function createApp(tracker: ExpenseTracker): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Request logging middleware
  app.use((req: Request, _res: Response, next: NextFunction) => {
    console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
    next();
  });

  // POST /expenses - Record a new expense
  app.post('/expenses', async (req: Request, res: Response) => {
    const validation = validateExpenseInput(req.body);
    if (!validation.valid) return validationFailed(res, validation.errors);

    try {
      const expense = await tracker.addExpense(validation.value);
      console.log(`Created expense: ${expense.id}`);
      return res.status(201).json(toExpenseResponse(expense));
    } catch (error) {
      return sendError(res, error, 'Failed to create expense');
    }
  });

  // GET /expenses - Sorted list narrowed to a period (query: period, start, end, sort)
  app.get('/expenses', (req: Request, res: Response) => {
    const query = validateViewQuery(req.query);
    if (!query.valid) return validationFailed(res, query.errors);

    const data = tracker.listExpenses(query.value).map(toExpenseResponse);
    const view = tracker.getViewState();
    return res.json({
      data,
      count: data.length,
      view: toViewResponse({
        sort: query.value.sort ?? view.sort,
        period: query.value.period ?? view.period
      })
    });
  });

  // GET /expenses/:id - Single expense
  app.get('/expenses/:id', (req: Request, res: Response) => {
    const expense = tracker.getExpense(req.params.id);
    if (!expense) return res.status(404).json({ error: 'Expense not found' });
    return res.json(toExpenseResponse(expense));
  });

  // PUT /expenses/:id - Edit an expense
  app.put('/expenses/:id', async (req: Request, res: Response) => {
    const validation = validateExpenseInput(req.body);
    if (!validation.valid) return validationFailed(res, validation.errors);

    try {
      const updated = await tracker.updateExpense(req.params.id, validation.value);
      console.log(`Updated expense: ${updated.id}`);
      return res.json(toExpenseResponse(updated));
    } catch (error) {
      return sendError(res, error, 'Failed to update expense');
    }
  });

  // DELETE /expenses/:id - Delete an expense
  app.delete('/expenses/:id', async (req: Request, res: Response) => {
    try {
      await tracker.deleteExpense(req.params.id);
      console.log(`Deleted expense: ${req.params.id}`);
      return res.status(204).send();
    } catch (error) {
      return sendError(res, error, 'Failed to delete expense');
    }
  });

  // GET /summary - Totals for a period (query: period, start, end)
  app.get('/summary', (req: Request, res: Response) => {
    const query = validateViewQuery(req.query);
    if (!query.valid) return validationFailed(res, query.errors);

    return res.json(toSummaryResponse(tracker.getSummary({ period: query.value.period })));
  });

  // GET /categories - Known categories in insertion order
  app.get('/categories', (_req: Request, res: Response) => {
    return res.json(tracker.getCategories());
  });

  // POST /categories - Append a category
  app.post('/categories', async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const name = body && typeof body === 'object' && 'name' in body ? body.name : undefined;
    const validation = validateCategoryName(name);
    if (!validation.valid) return validationFailed(res, validation.errors);

    try {
      const added = await tracker.addCategory(validation.value);
      if (added) console.log(`Added category: ${validation.value}`);
      return res.status(added ? 201 : 200).json(tracker.getCategories());
    } catch (error) {
      return sendError(res, error, 'Failed to add category');
    }
  });

  // GET /view - Current sort key and period filter
  app.get('/view', (_req: Request, res: Response) => {
    return res.json(toViewResponse(tracker.getViewState()));
  });

  // PUT /view - Change sort key and/or period filter
  app.put('/view', (req: Request, res: Response) => {
    const query = validateViewQuery(req.body);
    if (!query.valid) return validationFailed(res, query.errors);

    if (query.value.sort) tracker.setSortKey(query.value.sort);
    if (query.value.period) tracker.setPeriodFilter(query.value.period);
    return res.json(toViewResponse(tracker.getViewState()));
  });

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    return res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // 404 handler
  app.use((_req: Request, res: Response) => {
    return res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = clientErrorStatus(err);
    if (status !== null) {
      const parseFailed = typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
      const detail = parseFailed
        ? 'Request body must be valid JSON'
        : err instanceof Error ? err.message : 'Request rejected';
      const body: ApiError = { error: 'Validation failed', details: [detail] };
      return res.status(status).json(body);
    }

    console.error('Unhandled error:', err);
    return res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
