import 'dotenv/config';
import { createApp } from './app';
import { database } from './database';
import { MemoryRecordStore, RecordStore } from './recordStore';
import { ExpenseRepository } from './repository';
import { ExpenseTracker } from './tracker';

const PORT = Number(process.env.PORT || 3001);
const HOST = process.env.HOST || '127.0.0.1';
const STORE_DRIVER = process.env.STORE_DRIVER || 'mongo';

async function openStore(): Promise<RecordStore> {
  if (STORE_DRIVER === 'memory') {
    console.log('Using in-memory record store; data is lost on exit');
    return new MemoryRecordStore();
  }
  if (STORE_DRIVER !== 'mongo') {
    throw new Error(`Unknown STORE_DRIVER "${STORE_DRIVER}" (expected mongo or memory)`);
  }

  await database.init();
  return database;
}

async function shutdown(): Promise<void> {
  console.log('\nShutting down gracefully...');
  try {
    await database.close();
    process.exit(0);
  } catch (error) {
    console.error('Failed to close the record store:', error);
    process.exit(1);
  }
}

// Graceful shutdown
process.on('SIGINT', () => void shutdown());
process.on('SIGTERM', () => void shutdown());

// Open the store, load the session and start serving
async function start() {
  try {
    const store = await openStore();
    const tracker = new ExpenseTracker(new ExpenseRepository(store));
    await tracker.load();

    const app = createApp(tracker);
    app.listen(PORT, HOST, () => {
      console.log(`Expense Ledger running on http://${HOST}:${PORT}`);
      console.log('Available endpoints:');
      console.log('  GET    /expenses       - List expenses (query: period, start, end, sort)');
      console.log('  POST   /expenses       - Record an expense');
      console.log('  GET    /expenses/:id   - Get one expense');
      console.log('  PUT    /expenses/:id   - Edit an expense');
      console.log('  DELETE /expenses/:id   - Delete an expense');
      console.log('  GET    /summary        - Totals for a period (query: period, start, end)');
      console.log('  GET    /categories     - List categories');
      console.log('  POST   /categories     - Add a category');
      console.log('  GET    /view           - Current sort and period');
      console.log('  PUT    /view           - Change sort and period');
      console.log('  GET    /health         - Health check');
    });
  } catch (error) {
    console.error('Failed to start server:', error);
    await database.close();
    process.exit(1);
  }
}

void start();
