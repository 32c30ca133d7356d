import type { Id, ModelService, ServiceFilter } from '@asms/protocol';
import type { Page } from './alert-repository.js';

/**
 * Repository for inference services.
 */
export interface ServiceRepository {
  /**
   * Store a new service. Fails `already_exists` on id collision.
   */
  create(service: ModelService): Promise<ModelService>;

  /**
   * Fails `service_not_found` when absent.
   */
  get(id: Id): Promise<ModelService>;

  /**
   * Look a service up by name. Resolves null when none matches.
   */
  getByName(name: string): Promise<ModelService | null>;

  /**
   * List services in creation order with the pre-pagination match count.
   */
  list(filter?: ServiceFilter): Promise<Page<ModelService>>;

  /**
   * Fails `service_not_found` when absent.
   */
  delete(id: Id): Promise<void>;

  /**
   * Replace a service. Fails `service_not_found` when absent.
   */
  update(service: ModelService): Promise<ModelService>;
}
