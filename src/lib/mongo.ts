/**
 * MongoDB connection
 */

import mongoose from 'mongoose';
import { env } from '../config/env';
import { errorMessage } from './crawling/crawl-errors';

/**
 * Connect to MongoDB. Resolves false instead of throwing so callers can
 * fall back to in-memory storage.
 */
export const connectDB = async (uri: string = env.MONGODB_URI): Promise<boolean> => {
  try {
    await mongoose.connect(uri, { serverSelectionTimeoutMS: 5000 });
    console.log(`MongoDB connected: ${mongoose.connection.host}`);

    mongoose.connection.on('error', (error: Error) => {
      console.error('MongoDB connection error:', error.message);
    });
    mongoose.connection.on('disconnected', () => {
      console.warn('MongoDB disconnected');
    });

    return true;
  } catch (error) {
    console.error('MongoDB connection failed:', errorMessage(error));
    return false;
  }
};

export const disconnectDB = async (): Promise<void> => {
  if (mongoose.connection.readyState !== 0) {
    await mongoose.disconnect();
  }
};
