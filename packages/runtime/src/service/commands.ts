// Service commands: provisioning and lifecycle

import type { Command, DynamicMap, ModelService } from '@asms/protocol';
import {
  RESOURCE_CLASSES,
  booleanSchema,
  errorMessage,
  numberSchema,
  objectSchema,
  readBoolean,
  readString,
  stringSchema,
  systemClock,
  toInt,
  toNumber,
  wrapError,
  wrapWithCode,
} from '@asms/protocol';
import type { ServiceRepository } from '@asms/repositories';
import { combineSignals } from '../abort.js';
import {
  SERVICE_DOMAIN,
  invalidReplicas,
  missingField,
  providerNotSet,
  serviceAlreadyRunning,
} from '../errors.js';
import { silentLogger } from '../logger.js';
import type { UnitDeps } from '../units/define.js';
import { defineCommand } from '../units/define.js';
import { parseResourceClass } from './projections.js';
import type { ServiceProvider } from './provider.js';

export type ServiceUnitDeps = UnitDeps & {
  services: ServiceRepository;
  /** Absent means provider-backed units fail with provider_not_set */
  provider?: ServiceProvider;
};

export const MAX_REPLICAS = 100;

export function requireServiceProvider(deps: ServiceUnitDeps): ServiceProvider {
  if (!deps.provider) throw providerNotSet(SERVICE_DOMAIN);
  return deps.provider;
}

export function requireServiceId(input: DynamicMap): string {
  const serviceId = readString(input, 'service_id');
  if (!serviceId) throw missingField(SERVICE_DOMAIN, 'service_id');
  return serviceId;
}

export async function loadService(deps: ServiceUnitDeps, serviceId: string): Promise<ModelService> {
  try {
    return await deps.services.get(serviceId);
  } catch (error) {
    throw wrapError(`get service ${serviceId}`, error);
  }
}

async function saveService(deps: ServiceUnitDeps, service: ModelService): Promise<void> {
  try {
    await deps.services.update(service);
  } catch (error) {
    throw wrapError(`update service ${service.id}`, error);
  }
}

export const serviceIdInput = objectSchema(
  { service_id: stringSchema({ description: 'Service ID' }) },
  ['service_id']
);

export const successSchema = objectSchema({ success: booleanSchema() });

export function createCommand(deps: ServiceUnitDeps): Command {
  const clock = deps.clock ?? systemClock;
  return defineCommand(
    {
      name: 'service.create',
      domain: SERVICE_DOMAIN,
      description: 'Create a model service',
      inputSchema: objectSchema(
        {
          model_id: stringSchema({ description: 'Model to deploy' }),
          resource_class: stringSchema({
            description: 'Resource class (default medium)',
            enum: RESOURCE_CLASSES,
          }),
          replicas: numberSchema({ description: 'Number of replicas (default 1)', min: 1, max: MAX_REPLICAS }),
          persistent: booleanSchema({ description: 'Keep the service across restarts' }),
        },
        ['model_id']
      ),
      outputSchema: objectSchema({ service_id: stringSchema() }),
      examples: [
        {
          input: { model_id: 'llama3-70b', resource_class: 'large', replicas: 2 },
          output: { service_id: 'svc-abc123' },
          description: 'Deploy a large model with two replicas',
        },
      ],
      async run(input, ctx) {
        const provider = requireServiceProvider(deps);
        const modelId = readString(input, 'model_id');
        if (!modelId) throw missingField(SERVICE_DOMAIN, 'model_id');
        const resourceClassInput = readString(input, 'resource_class');
        const resourceClass = resourceClassInput ? parseResourceClass(resourceClassInput) : 'medium';
        const requested = toInt(input.replicas);
        const replicas = requested !== undefined && requested > 0 ? requested : 1;
        const persistent = readBoolean(input, 'persistent') ?? false;

        let serviceId: string;
        try {
          const provisioned = await provider.create(modelId, resourceClass, replicas, persistent, ctx.signal);
          serviceId = provisioned.id;
        } catch (error) {
          throw wrapError('create service', error);
        }

        const now = clock.now();
        try {
          await deps.services.create({
            id: serviceId,
            name: `service-${serviceId}`,
            modelId,
            status: 'pending',
            replicas,
            activeReplicas: 0,
            resourceClass,
            endpoints: [],
            config: persistent ? { persistent } : {},
            createdAt: now,
            updatedAt: now,
          });
        } catch (error) {
          throw wrapError('save service', error);
        }
        return { service_id: serviceId };
      },
    },
    deps
  );
}

export function deleteCommand(deps: ServiceUnitDeps): Command {
  return defineCommand(
    {
      name: 'service.delete',
      domain: SERVICE_DOMAIN,
      description: 'Delete a model service',
      inputSchema: serviceIdInput,
      outputSchema: successSchema,
      examples: [
        {
          input: { service_id: 'svc-abc123' },
          output: { success: true },
          description: 'Delete a service',
        },
      ],
      async run(input) {
        const serviceId = requireServiceId(input);
        try {
          await deps.services.delete(serviceId);
        } catch (error) {
          throw wrapError(`delete service ${serviceId}`, error);
        }
        return { success: true };
      },
    },
    deps
  );
}

export function scaleCommand(deps: ServiceUnitDeps): Command {
  const clock = deps.clock ?? systemClock;
  return defineCommand(
    {
      name: 'service.scale',
      domain: SERVICE_DOMAIN,
      description: 'Change the replica count of a service',
      inputSchema: objectSchema(
        {
          service_id: stringSchema({ description: 'Service ID' }),
          replicas: numberSchema({ description: 'Target number of replicas', min: 0, max: MAX_REPLICAS }),
        },
        ['service_id', 'replicas']
      ),
      outputSchema: successSchema,
      examples: [
        {
          input: { service_id: 'svc-abc123', replicas: 4 },
          output: { success: true },
          description: 'Scale to four replicas',
        },
      ],
      async run(input, ctx) {
        const provider = requireServiceProvider(deps);
        const serviceId = requireServiceId(input);
        const replicas = toInt(input.replicas);
        if (replicas === undefined || replicas < 0) throw invalidReplicas();

        const service = await loadService(deps, serviceId);
        try {
          await provider.scale(serviceId, replicas, ctx.signal);
        } catch (error) {
          throw wrapWithCode('service_scale_failed', `scale service ${serviceId}`, error, SERVICE_DOMAIN);
        }

        await saveService(deps, { ...service, replicas, updatedAt: clock.now() });
        return { success: true };
      },
    },
    deps
  );
}

export function startCommand(deps: ServiceUnitDeps): Command {
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger ?? silentLogger;
  return defineCommand(
    {
      name: 'service.start',
      domain: SERVICE_DOMAIN,
      description: 'Start a model service',
      inputSchema: objectSchema(
        {
          service_id: stringSchema({ description: 'Service ID' }),
          timeout: numberSchema({ description: 'Start timeout in seconds', min: 0 }),
        },
        ['service_id']
      ),
      outputSchema: successSchema,
      examples: [
        {
          input: { service_id: 'svc-abc123' },
          output: { success: true },
          description: 'Start a service',
        },
      ],
      async run(input, ctx) {
        const provider = requireServiceProvider(deps);
        const serviceId = requireServiceId(input);
        const timeoutSeconds = toNumber(input.timeout);
        const signal = combineSignals(
          ctx.signal,
          timeoutSeconds !== undefined && timeoutSeconds > 0 ? timeoutSeconds * 1000 : undefined
        );

        let service = await loadService(deps, serviceId);
        if (service.status === 'running') {
          if (await provider.isRunning(serviceId, signal)) {
            throw serviceAlreadyRunning(serviceId);
          }
          logger.warn('Service status out of sync, backend not running', { serviceId });
          service = { ...service, status: 'stopped' };
        }

        try {
          await provider.start(serviceId, signal);
        } catch (error) {
          try {
            await deps.services.update({ ...service, status: 'failed', updatedAt: clock.now() });
          } catch (updateError) {
            logger.warn('Failed to mark service as failed', { serviceId, error: errorMessage(updateError) });
          }
          throw wrapWithCode('service_start_failed', `start service ${serviceId}`, error, SERVICE_DOMAIN);
        }

        await saveService(deps, { ...service, status: 'running', updatedAt: clock.now() });
        return { success: true };
      },
    },
    deps
  );
}

export function stopCommand(deps: ServiceUnitDeps): Command {
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger ?? silentLogger;
  return defineCommand(
    {
      name: 'service.stop',
      domain: SERVICE_DOMAIN,
      description: 'Stop a model service',
      inputSchema: objectSchema(
        {
          service_id: stringSchema({ description: 'Service ID' }),
          force: booleanSchema({ description: 'Stop without draining in-flight requests' }),
        },
        ['service_id']
      ),
      outputSchema: successSchema,
      examples: [
        {
          input: { service_id: 'svc-abc123', force: false },
          output: { success: true },
          description: 'Stop a service gracefully',
        },
      ],
      async run(input, ctx) {
        const provider = requireServiceProvider(deps);
        const serviceId = requireServiceId(input);
        const service = await loadService(deps, serviceId);
        if (service.status === 'stopped') {
          return { success: true };
        }

        // Services that never came up may have nothing to stop
        try {
          await provider.stop(serviceId, readBoolean(input, 'force') ?? false, ctx.signal);
        } catch (error) {
          if (service.status === 'running') {
            throw wrapError(`stop service ${serviceId}`, error);
          }
          logger.warn('Ignoring stop error for non-running service', {
            serviceId,
            status: service.status,
            error: errorMessage(error),
          });
        }

        await saveService(deps, { ...service, status: 'stopped', updatedAt: clock.now() });
        return { success: true };
      },
    },
    deps
  );
}
