import type { AlertRepository } from './alert-repository.js';
import type { ServiceRepository } from './service-repository.js';

/**
 * RepositoryContext bundles all repository interfaces together.
 *
 * This is the dependency injection point for the unit runtime: domains take
 * the repository they need from here, and any backing store can be swapped in
 * without changing the units.
 */
export interface RepositoryContext {
  readonly alerts: AlertRepository;
  readonly services: ServiceRepository;
}
