// src/lib/transaction.ts
import mongoose, { ClientSession } from "mongoose";

/** The part of a driver session a transaction needs. */
export interface TransactionSession {
  startTransaction(): void;
  commitTransaction(): Promise<unknown>;
  abortTransaction(): Promise<unknown>;
  inTransaction(): boolean;
  endSession(): Promise<void>;
}

/**
 * Runs `work` inside a transaction on `session`, which is always ended. Commits
 * when it resolves; aborts and rethrows the work's own error when it rejects.
 */
export async function runInTransaction<S extends TransactionSession, T>(
  session: S,
  work: (session: S) => Promise<T>
): Promise<T> {
  try {
    session.startTransaction();
    const result = await work(session);
    await session.commitTransaction();
    return result;
  } catch (err) {
    if (session.inTransaction()) {
      try {
        await session.abortTransaction();
      } catch (abortErr) {
        console.error("[transaction] Abort failed:", abortErr);
      }
    }
    throw err;
  } finally {
    await session.endSession();
  }
}

/** Requires a replica set (or mongos) deployment. */
export async function withTransaction<T>(work: (session: ClientSession) => Promise<T>): Promise<T> {
  return runInTransaction(await mongoose.startSession(), work);
}
