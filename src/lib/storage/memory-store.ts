import type { DigitalParchi, ParchiUpdate } from "../trade/types";
import { applyParchiUpdate, assertListOptions, type ListOptions, type ParchiStore } from "./types";

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Process-local store. Records are deep-copied in and out. */
export class InMemoryParchiStore implements ParchiStore {
  private records = new Map<string, DigitalParchi>();
  private now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async save(parchi: DigitalParchi): Promise<string> {
    this.records.set(parchi.id, structuredClone(parchi));
    return parchi.id;
  }

  async get(id: string): Promise<DigitalParchi | null> {
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  async list(options: ListOptions): Promise<DigitalParchi[]> {
    const { limit, offset } = assertListOptions(options);
    const since = options.since?.getTime();
    return [...this.records.values()]
      .filter((p) => since === undefined || p.createdAt.getTime() >= since)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || compareIds(b.id, a.id))
      .slice(offset, offset + limit)
      .map((p) => structuredClone(p));
  }

  async update(id: string, changes: ParchiUpdate): Promise<boolean> {
    const record = this.records.get(id);
    if (!record) return false;
    this.records.set(id, applyParchiUpdate(record, changes, this.now()));
    return true;
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.records.clear();
  }
}
