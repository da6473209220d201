import { MongoClient, Collection, Db } from 'mongodb';
import { StorageFormatError } from './errors';
import { RecordStore } from './recordStore';

const MONGODB_URI = process.env.MONGODB_URI || 'mongodb://localhost:27017';
const DB_NAME = process.env.DB_NAME || 'expense_ledger';

// One document per store key
interface StoredRecord {
  key: string;
  value: string | string[];
  updated_at: string;
}

let client: MongoClient | null = null;
let db: Db;
let recordsCollection: Collection<StoredRecord>;
let connecting: Promise<void> | null = null;

async function connect(): Promise<void> {
  if (client) return;

  if (!connecting) {
    connecting = (async () => {
      const nextClient = new MongoClient(MONGODB_URI);
      await nextClient.connect();
      db = nextClient.db(DB_NAME);
      recordsCollection = db.collection<StoredRecord>('records');
      await recordsCollection.createIndex({ key: 1 }, { unique: true });
      client = nextClient;
    })();
  }

  try {
    await connecting;
  } catch (error) {
    connecting = null;
    throw error;
  }
}

async function readValue(key: string): Promise<string | string[] | null> {
  await connect();
  const record = await recordsCollection.findOne({ key });
  return record ? record.value : null;
}

async function writeValue(key: string, value: string | string[]): Promise<void> {
  await connect();
  await recordsCollection.updateOne(
    { key },
    { $set: { value, updated_at: new Date().toISOString() } },
    { upsert: true }
  );
}

export const database = {
  async init(): Promise<void> {
    await connect();
  },

  async getString(key: string): Promise<string | null> {
    const value = await readValue(key);
    if (value === null || typeof value === 'string') return value;
    throw new StorageFormatError(key, 'expected a string, found a list');
  },

  async setString(key: string, value: string): Promise<void> {
    await writeValue(key, value);
  },

  async getStringList(key: string): Promise<string[] | null> {
    const value = await readValue(key);
    if (value === null) return null;
    if (Array.isArray(value) && value.every(v => typeof v === 'string')) return value;
    throw new StorageFormatError(key, 'expected a list of strings');
  },

  async setStringList(key: string, values: readonly string[]): Promise<void> {
    await writeValue(key, [...values]);
  },

  async close(): Promise<void> {
    if (client) await client.close();
    client = null;
    connecting = null;
  }
} satisfies RecordStore & { init(): Promise<void>; close(): Promise<void> };

export default database;
