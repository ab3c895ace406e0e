import mongoose from "mongoose";
import { env } from "../config/env.js";
import { ContentionError } from "./errors.js";

const WRITE_CONFLICT = 112;

function isContention(error: unknown): boolean {
  if (error instanceof mongoose.mongo.MongoServerError && error.code === WRITE_CONFLICT) return true;
  return error instanceof mongoose.mongo.MongoError && error.hasErrorLabel("TransientTransactionError");
}

async function attempt<T>(fn: (session: mongoose.ClientSession) => Promise<T>): Promise<T> {
  const session = await mongoose.startSession();
  try {
    session.startTransaction({ maxCommitTimeMS: env.TRANSACTION_TIMEOUT_MS });
    try {
      const result = await fn(session);
      await session.commitTransaction();
      return result;
    } catch (error) {
      if (session.inTransaction()) await session.abortTransaction();
      if (isContention(error)) throw new ContentionError();
      throw error;
    }
  } finally {
    await session.endSession();
  }
}

/**
 * Runs `fn` inside a multi-document transaction (replica set required).
 * A write conflict retries the whole unit once, then surfaces as ContentionError.
 */
export async function runInTransaction<T>(fn: (session: mongoose.ClientSession) => Promise<T>): Promise<T> {
  try {
    return await attempt(fn);
  } catch (error) {
    if (!(error instanceof ContentionError)) throw error;
    return attempt(fn);
  }
}

export function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof mongoose.mongo.MongoServerError && error.code === 11000;
}
