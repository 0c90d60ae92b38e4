import mongoose from 'mongoose';
import env from './env';
import { logger } from '../utils/logger';

/**
 * Connects the event log store. Exits the process when the store is
 * configured but unreachable.
 */
export const connectDB = async () => {
  const mongoURI = env.MONGO_URI;
  if (!mongoURI) {
    throw new Error('MONGO_URI is not defined in environment variables');
  }

  try {
    await mongoose.connect(mongoURI, {
      maxPoolSize: 20,
      minPoolSize: 2,
      maxIdleTimeMS: 30000,
      serverSelectionTimeoutMS: 5000,
      socketTimeoutMS: 45000,
      connectTimeoutMS: 10000,
    });
    logger.success('MongoDB connected for strategy event log');
  } catch (error) {
    logger.error('MongoDB connection error:', error);
    process.exit(1);
  }
};
