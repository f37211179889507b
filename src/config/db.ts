import mongoose from 'mongoose';
import { config } from '.';
import logger from '@/utils/pinoLogger';

export const connectDB = async (): Promise<void> => {
    try {
        await mongoose.connect(config.DATABASE_URL);
        logger.info('MongoDB connected');
    } catch (error) {
        logger.error('MongoDB connection failed', { error });
        throw error;
    }
}

export const disconnectDB = async (): Promise<void> => {
    await mongoose.disconnect();
    logger.info('MongoDB disconnected');
}
