import { beforeAll } from 'vitest';
import { logger } from '../utils/logger.js';

beforeAll(() => {
  // Reduce noise during tests
  logger.setLevel('error');
});
