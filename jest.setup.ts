import { configureStateStorage, createMemoryStateStorage } from './src/store/storage';

// Keep Jest output readable.
jest.spyOn(global.console, 'warn').mockImplementation(() => undefined);
jest.spyOn(global.console, 'log').mockImplementation(() => undefined);

// Persisted stores write to a fresh in-memory backend per test.
beforeEach(() => {
  configureStateStorage(createMemoryStateStorage());
});
