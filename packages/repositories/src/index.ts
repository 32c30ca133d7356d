// @asms/repositories
// Store interfaces and in-memory implementations.
//
// Interfaces define WHAT operations are available, not HOW they are
// implemented. Units code against the interfaces; the in-memory stores are
// the reference implementation.

export * from './interfaces/index.js';
export {
  ruleNotFound,
  ruleAlreadyExists,
  alertNotFound,
  serviceNotFound,
  serviceAlreadyExists,
} from './errors.js';
export {
  createInMemoryRepositoryContext,
  createInMemoryAlertRepository,
  createInMemoryServiceRepository,
  paginate,
  type InMemoryDataStore,
  type InMemoryRepositoryContext,
  type InMemoryRepositoryOptions,
} from './in-memory/index.js';
export { ReadWriteLock } from './in-memory/lock.js';
