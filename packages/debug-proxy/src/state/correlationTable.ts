import { normalizeId } from './normalizeId';

export interface RequestRecord {
  id: string;
  method: string;
  subcommand?: string;
  /** `method`, or `method.subcommand` when a subcommand was recorded. */
  key: string;
}

/**
 * Outstanding client requests by normalised id. A response consumes its entry.
 */
export class CorrelationTable {
  private readonly records = new Map<string, RequestRecord>();

  public record(id: unknown, method: string, subcommand?: string): RequestRecord {
    const key = normalizeId(id);
    const record: RequestRecord = {
      id: key,
      method,
      key: subcommand ? `${method}.${subcommand}` : method,
    };
    if (subcommand) {
      record.subcommand = subcommand;
    }
    this.records.set(key, record);
    return record;
  }

  /** Reads and removes the entry for `id`. */
  public take(id: unknown): RequestRecord | undefined {
    const key = normalizeId(id);
    const record = this.records.get(key);
    if (record) {
      this.records.delete(key);
    }
    return record;
  }

  public peek(id: unknown): RequestRecord | undefined {
    return this.records.get(normalizeId(id));
  }

  public get size(): number {
    return this.records.size;
  }

  public clear(): void {
    this.records.clear();
  }
}
