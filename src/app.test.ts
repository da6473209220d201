import { Server } from 'http';
import { createApp } from './app';
import { MemoryRecordStore } from './recordStore';
import { ExpenseRepository } from './repository';
import { ExpenseTracker } from './tracker';

class FlakyRecordStore extends MemoryRecordStore {
  failWrites = false;

  async setString(key: string, value: string): Promise<void> {
    if (this.failWrites) throw new Error('disk full');
    await super.setString(key, value);
  }
}

interface HttpResult {
  status: number;
  body: unknown;
}

const DEFAULTS = ['Food', 'Transport', 'Shopping', 'Bills', 'Other'];

describe('Expense Ledger API', () => {
  let store: FlakyRecordStore;
  let tracker: ExpenseTracker;
  let server: Server;
  let baseUrl: string;

  async function send(
    method: string,
    path: string,
    options: { json?: unknown; raw?: string } = {}
  ): Promise<HttpResult> {
    const payload = options.raw ?? (options.json === undefined ? undefined : JSON.stringify(options.json));
    const response = await fetch(`${baseUrl}${path}`, {
      method,
      headers: payload === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: payload
    });
    const text = await response.text();
    return { status: response.status, body: text.length > 0 ? JSON.parse(text) : null };
  }

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    store = new FlakyRecordStore();
    let nextId = 0;
    tracker = new ExpenseTracker(new ExpenseRepository(store), () => `gen-${++nextId}`);
    await tracker.load();

    await tracker.addExpense({ amount: 10, category: 'Food', date: new Date(2024, 0, 1) });
    await tracker.addExpense({ amount: 20, category: 'Food', date: new Date(2024, 0, 2) });
    await tracker.addExpense({ amount: 5, category: 'Bills', date: new Date(2024, 0, 3, 8) });

    const app = createApp(tracker);
    await new Promise<void>(resolve => {
      server = app.listen(0, '127.0.0.1', () => resolve());
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('Server is not listening on a port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
    jest.restoreAllMocks();
  });

  describe('POST /expenses', () => {
    it('should create an expense and return 201', async () => {
      const result = await send('POST', '/expenses', {
        json: { amount: 12.5, category: 'Food', date: '2024-01-04T09:15:00', notes: ' lunch ' }
      });

      expect(result).toEqual({
        status: 201,
        body: { id: 'gen-4', amount: 12.5, category: 'Food', date: '2024-01-04T09:15:00.000', notes: 'lunch' }
      });
      expect(tracker.getExpense('gen-4')?.amount).toBe(12.5);
    });

    it('should reject an invalid amount with 400', async () => {
      const result = await send('POST', '/expenses', { json: { amount: 'ten' } });
      expect(result).toEqual({
        status: 400,
        body: { error: 'Validation failed', details: ['Amount must be a valid non-negative number'] }
      });
    });

    it('should reject a date the all period would never list', async () => {
      const result = await send('POST', '/expenses', { json: { amount: 5, date: '2150-06-01' } });
      expect(result).toEqual({
        status: 400,
        body: { error: 'Validation failed', details: ['Date must be between 1970-01-01 and 2100-01-01'] }
      });
    });

    it('should map a duplicate id to 400', async () => {
      const result = await send('POST', '/expenses', { json: { id: 'gen-1', amount: 1 } });
      expect(result).toEqual({
        status: 400,
        body: { error: 'Validation failed', details: ['Expense id already exists: gen-1'] }
      });
    });

    it('should answer a body that is not JSON with 400', async () => {
      const result = await send('POST', '/expenses', { raw: '{"amount": 5,' });
      expect(result).toEqual({
        status: 400,
        body: { error: 'Validation failed', details: ['Request body must be valid JSON'] }
      });
      expect(tracker.listExpenses()).toHaveLength(3);
    });

    it('should keep the status of an oversized body', async () => {
      const result = await send('POST', '/expenses', {
        raw: JSON.stringify({ amount: 1, notes: 'x'.repeat(200_000) })
      });
      expect(result).toEqual({
        status: 413,
        body: { error: 'Validation failed', details: ['request entity too large'] }
      });
    });

    it('should answer a failed save with 500', async () => {
      store.failWrites = true;
      const result = await send('POST', '/expenses', { json: { amount: 1 } });
      expect(result).toEqual({ status: 500, body: { error: 'Failed to create expense' } });
    });
  });

  describe('GET /expenses', () => {
    it('should list everything newest first by default', async () => {
      const result = await send('GET', '/expenses');
      expect(result.status).toBe(200);
      expect(result.body).toEqual({
        data: [
          { id: 'gen-3', amount: 5, category: 'Bills', date: '2024-01-03T08:00:00.000', notes: null },
          { id: 'gen-2', amount: 20, category: 'Food', date: '2024-01-02T00:00:00.000', notes: null },
          { id: 'gen-1', amount: 10, category: 'Food', date: '2024-01-01T00:00:00.000', notes: null }
        ],
        count: 3,
        view: { sort: 'date_desc', period: { kind: 'all' } }
      });
    });

    it('should apply query overrides without changing the view state', async () => {
      const result = await send('GET', '/expenses?period=custom&start=2024-01-01&end=2024-01-02&sort=amount_asc');

      expect(result.body).toMatchObject({
        count: 2,
        view: { sort: 'amount_asc', period: { kind: 'custom', start: '2024-01-01', end: '2024-01-02' } }
      });
      expect(result.body).toMatchObject({ data: [{ id: 'gen-1' }, { id: 'gen-2' }] });

      const view = await send('GET', '/view');
      expect(view).toEqual({ status: 200, body: { sort: 'date_desc', period: { kind: 'all' } } });
    });

    it('should reject an unknown period with 400', async () => {
      const result = await send('GET', '/expenses?period=weekly');
      expect(result).toEqual({
        status: 400,
        body: {
          error: 'Validation failed',
          details: ['Period must be one of: all, today, this_week, this_month, custom']
        }
      });
    });
  });

  describe('GET /expenses/:id', () => {
    it('should return one expense', async () => {
      const result = await send('GET', '/expenses/gen-1');
      expect(result).toEqual({
        status: 200,
        body: { id: 'gen-1', amount: 10, category: 'Food', date: '2024-01-01T00:00:00.000', notes: null }
      });
    });

    it('should return 404 for an unknown id', async () => {
      expect(await send('GET', '/expenses/missing')).toEqual({ status: 404, body: { error: 'Expense not found' } });
    });
  });

  describe('PUT /expenses/:id', () => {
    it('should edit the expense in place', async () => {
      const result = await send('PUT', '/expenses/gen-1', { json: { amount: '11', notes: 'fixed' } });
      expect(result).toEqual({
        status: 200,
        body: { id: 'gen-1', amount: 11, category: 'Food', date: '2024-01-01T00:00:00.000', notes: 'fixed' }
      });
    });

    it('should map an unknown id to 404', async () => {
      expect(await send('PUT', '/expenses/missing', { json: { amount: 1 } })).toEqual({
        status: 404,
        body: { error: 'Expense not found' }
      });
    });

    it('should map a changed id to 400', async () => {
      expect(await send('PUT', '/expenses/gen-1', { json: { id: 'other', amount: 1 } })).toEqual({
        status: 400,
        body: { error: 'Validation failed', details: ['Expense id cannot be changed'] }
      });
    });
  });

  describe('DELETE /expenses/:id', () => {
    it('should delete once and then report 404', async () => {
      expect(await send('DELETE', '/expenses/gen-2')).toEqual({ status: 204, body: null });
      expect(await send('DELETE', '/expenses/gen-2')).toEqual({ status: 404, body: { error: 'Expense not found' } });
      expect(tracker.listExpenses().map(e => e.id)).toEqual(['gen-3', 'gen-1']);
    });
  });

  describe('GET /summary', () => {
    it('should total a custom range', async () => {
      const result = await send('GET', '/summary?period=custom&start=2024-01-01&end=2024-01-02');
      expect(result).toEqual({
        status: 200,
        body: {
          range: { start: '2024-01-01T00:00:00.000', end: '2024-01-02T23:59:59.000' },
          total: 30,
          count: 2,
          average: 15,
          categoryTotals: [
            { category: 'Food', total: 30, share: 1 },
            { category: 'Transport', total: 0, share: 0 },
            { category: 'Shopping', total: 0, share: 0 },
            { category: 'Bills', total: 0, share: 0 },
            { category: 'Other', total: 0, share: 0 }
          ]
        }
      });
    });
  });

  describe('categories', () => {
    it('should list the seeded defaults', async () => {
      expect(await send('GET', '/categories')).toEqual({ status: 200, body: DEFAULTS });
    });

    it('should return 201 for a new name and 200 for a known one', async () => {
      expect(await send('POST', '/categories', { json: { name: ' Travel ' } })).toEqual({
        status: 201,
        body: [...DEFAULTS, 'Travel']
      });
      expect(await send('POST', '/categories', { json: { name: 'Travel' } })).toEqual({
        status: 200,
        body: [...DEFAULTS, 'Travel']
      });
    });

    it('should reject a blank name', async () => {
      expect(await send('POST', '/categories', { json: { name: '  ' } })).toEqual({
        status: 400,
        body: { error: 'Validation failed', details: ['Category name cannot be empty'] }
      });
    });
  });

  describe('PUT /view', () => {
    it('should change the sort and period used by later reads', async () => {
      const result = await send('PUT', '/view', {
        json: { sort: 'amount_desc', period: 'custom', start: '2024-01-02', end: '2024-01-03' }
      });
      expect(result).toEqual({
        status: 200,
        body: { sort: 'amount_desc', period: { kind: 'custom', start: '2024-01-02', end: '2024-01-03' } }
      });

      const list = await send('GET', '/expenses');
      expect(list.body).toMatchObject({ data: [{ id: 'gen-2' }, { id: 'gen-3' }], count: 2 });
    });

    it('should reject an unknown sort key', async () => {
      expect(await send('PUT', '/view', { json: { sort: 'name' } })).toEqual({
        status: 400,
        body: {
          error: 'Validation failed',
          details: ['Sort must be one of: date_desc, date_asc, amount_desc, amount_asc']
        }
      });
    });
  });

  it('should answer the health check', async () => {
    const result = await send('GET', '/health');
    expect(result.status).toBe(200);
    expect(result.body).toMatchObject({ status: 'ok' });
  });

  it('should return 404 for an unknown route', async () => {
    expect(await send('GET', '/nope')).toEqual({ status: 404, body: { error: 'Not found' } });
  });
});
