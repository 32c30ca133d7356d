export type {
  AlertRepository,
  CreateRuleInput,
  CreateAlertInput,
  Page,
} from './alert-repository.js';
export type { ServiceRepository } from './service-repository.js';
export type { RepositoryContext } from './repository-context.js';
