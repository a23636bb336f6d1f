import { logger } from '../src/utils/logger.js';

// Keep test output readable
logger.setLogLevel('error');
