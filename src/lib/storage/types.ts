import { ValidationError } from "../errors";
import { transitionParchi } from "../trade/parchi";
import type { DigitalParchi, ParchiUpdate } from "../trade/types";

export interface ListOptions {
  limit: number;
  offset?: number;
  /** Only parchis created at or after this instant. */
  since?: Date;
}

/**
 * Persistence for finalized parchis. Writes are atomic: after save()
 * resolves or rejects, the id is either fully present or absent.
 * Backend failures reject with StorageError.
 */
export interface ParchiStore {
  /** Inserts or replaces the record; resolves with its id. */
  save(parchi: DigitalParchi): Promise<string>;
  get(id: string): Promise<DigitalParchi | null>;
  /** Newest first. */
  list(options: ListOptions): Promise<DigitalParchi[]>;
  /** Resolves false for an unknown id; rejects with InvalidTransitionError on an illegal status change. */
  update(id: string, changes: ParchiUpdate): Promise<boolean>;
  delete(id: string): Promise<boolean>;
  count(): Promise<number>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}

export function assertListOptions(options: ListOptions): { limit: number; offset: number } {
  const offset = options.offset ?? 0;
  if (!Number.isInteger(options.limit) || options.limit <= 0) {
    throw new ValidationError(`limit must be a positive integer, got ${options.limit}`, "limit");
  }
  if (!Number.isInteger(offset) || offset < 0) {
    throw new ValidationError(`offset must be a non-negative integer, got ${offset}`, "offset");
  }
  return { limit: options.limit, offset };
}

/** Applies an update under the lifecycle rules. Same status is not a transition. */
export function applyParchiUpdate(parchi: DigitalParchi, changes: ParchiUpdate, now: Date): DigitalParchi {
  let next = parchi;
  if (changes.status !== undefined && changes.status !== parchi.status) {
    next = transitionParchi(parchi, changes.status, now);
  }
  if (changes.vendorId !== undefined) {
    const updatedAt = now.getTime() < parchi.createdAt.getTime() ? parchi.createdAt : now;
    next = { ...next, vendorId: changes.vendorId, updatedAt };
  }
  return next;
}
