import { logger } from '../utils/logger';

// Keep test output clean; assertions never depend on log lines
logger.silent = true;
