export { createMockLogger, type MockLogger } from './logger-mock';
export { createMockDb, createQueryChain, createFailingQueryChain, type MockDb, type MockQueryChain } from './db-helpers';
