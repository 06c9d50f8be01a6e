/**
 * MongoDB connection (mongoose)
 */

import mongoose from 'mongoose';
import type { Logger } from '../common/logger.js';

export async function connectMongo(url: string, logger: Logger): Promise<void> {
  if (mongoose.connection.readyState === 1) return;
  await mongoose.connect(url, { serverSelectionTimeoutMS: 5_000 });
  logger.info({ db: mongoose.connection.name }, '[DB] Connected to MongoDB');
}

export async function disconnectMongo(): Promise<void> {
  await mongoose.disconnect();
}
