/**
 * Local key-value persistence used by the repository. Values are either a
 * string blob or a list of strings, mirroring a preferences store.
 */
export interface RecordStore {
  getString(key: string): Promise<string | null>;
  setString(key: string, value: string): Promise<void>;
  getStringList(key: string): Promise<string[] | null>;
  setStringList(key: string, values: readonly string[]): Promise<void>;
}

/** In-process store; nothing survives a restart. */
export class MemoryRecordStore implements RecordStore {
  private readonly strings = new Map<string, string>();
  private readonly lists = new Map<string, string[]>();

  async getString(key: string): Promise<string | null> {
    return this.strings.get(key) ?? null;
  }

  async setString(key: string, value: string): Promise<void> {
    this.strings.set(key, value);
  }

  async getStringList(key: string): Promise<string[] | null> {
    const list = this.lists.get(key);
    return list ? [...list] : null;
  }

  async setStringList(key: string, values: readonly string[]): Promise<void> {
    this.lists.set(key, [...values]);
  }
}
