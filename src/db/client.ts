import mongoose from 'mongoose';
import { getLogger } from '../utils/logging.js';

let connecting: Promise<typeof mongoose> | null = null;

export function connectDatabase(url: string): Promise<typeof mongoose> {
  if (!connecting) {
    const logger = getLogger();
    connecting = mongoose
      .connect(url, { serverSelectionTimeoutMS: 5000 })
      .then((m) => {
        logger.debug({ db: m.connection.name }, 'MongoDB connected');
        return m;
      })
      .catch((err: unknown) => {
        connecting = null;
        logger.error({ err }, 'MongoDB connection failed');
        throw err;
      });
  }
  return connecting;
}

export async function closeDatabase(): Promise<void> {
  if (connecting) {
    connecting = null;
    await mongoose.disconnect();
  }
}
