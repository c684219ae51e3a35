import 'reflect-metadata';
import { LogLevel, logger } from './utils/logger';

logger.setLevel(LogLevel.NONE);
