// Service queries

import type { Query, ServiceFilter } from '@asms/protocol';
import {
  SERVICE_STATUSES,
  arraySchema,
  errorMessage,
  numberSchema,
  objectSchema,
  readString,
  stringSchema,
  toInt,
  wrapError,
} from '@asms/protocol';
import { SERVICE_DOMAIN, missingField } from '../errors.js';
import { silentLogger } from '../logger.js';
import { defineQuery } from '../units/define.js';
import type { ServiceUnitDeps } from './commands.js';
import { loadService, requireServiceId, requireServiceProvider, serviceIdInput } from './commands.js';
import {
  parseServiceStatus,
  recommendationSchema,
  recommendationToMap,
  serviceMetricsToMap,
  serviceSchema,
  serviceSummarySchema,
  serviceSummaryToMap,
  serviceToMap,
} from './projections.js';

export const DEFAULT_LIST_LIMIT = 100;
export const DEFAULT_LOG_TAIL = 100;

export function getQuery(deps: ServiceUnitDeps): Query {
  const logger = deps.logger ?? silentLogger;
  return defineQuery(
    {
      name: 'service.get',
      domain: SERVICE_DOMAIN,
      description: 'Get service details, with live metrics while it runs',
      inputSchema: serviceIdInput,
      outputSchema: serviceSchema,
      examples: [
        {
          input: { service_id: 'svc-abc123' },
          output: {
            id: 'svc-abc123',
            model_id: 'llama3-70b',
            status: 'running',
            replicas: 2,
            endpoints: ['http://localhost:8080'],
          },
          description: 'Get a running service',
        },
      ],
      async run(input, ctx) {
        const serviceId = requireServiceId(input);
        const service = await loadService(deps, serviceId);
        const result = serviceToMap(service);

        if (deps.provider && service.status === 'running') {
          try {
            result.metrics = serviceMetricsToMap(await deps.provider.getMetrics(serviceId, ctx.signal));
          } catch (error) {
            logger.debug('Service metrics unavailable', { serviceId, error: errorMessage(error) });
          }
        }
        return result;
      },
    },
    deps
  );
}

export function listQuery(deps: ServiceUnitDeps): Query {
  return defineQuery(
    {
      name: 'service.list',
      domain: SERVICE_DOMAIN,
      description: 'List model services',
      inputSchema: objectSchema({
        status: stringSchema({ description: 'Filter by status', enum: SERVICE_STATUSES }),
        model_id: stringSchema({ description: 'Filter by model' }),
        limit: numberSchema({ description: `Maximum results (default ${DEFAULT_LIST_LIMIT})`, min: 1 }),
        offset: numberSchema({ description: 'Results to skip', min: 0 }),
      }),
      outputSchema: objectSchema({
        services: arraySchema(serviceSummarySchema),
        total: numberSchema(),
      }),
      examples: [
        {
          input: { status: 'running' },
          output: {
            services: [{ id: 'svc-abc123', model_id: 'llama3-70b', status: 'running', replicas: 2 }],
            total: 1,
          },
          description: 'List running services',
        },
      ],
      async run(input) {
        const filter: ServiceFilter = {
          limit: DEFAULT_LIST_LIMIT,
          offset: Math.max(toInt(input.offset) ?? 0, 0),
        };
        const limit = toInt(input.limit);
        if (limit !== undefined && limit > 0) filter.limit = limit;
        const status = readString(input, 'status');
        if (status) filter.status = parseServiceStatus(status);
        const modelId = readString(input, 'model_id');
        if (modelId) filter.modelId = modelId;

        try {
          const page = await deps.services.list(filter);
          return { services: page.items.map(serviceSummaryToMap), total: page.total };
        } catch (error) {
          throw wrapError('list services', error);
        }
      },
    },
    deps
  );
}

export function statusQuery(deps: ServiceUnitDeps): Query {
  return defineQuery(
    {
      name: 'service.status',
      domain: SERVICE_DOMAIN,
      description: 'Get the lifecycle status of a service',
      inputSchema: serviceIdInput,
      outputSchema: objectSchema({
        id: stringSchema(),
        name: stringSchema(),
        model_id: stringSchema(),
        status: stringSchema({ enum: SERVICE_STATUSES }),
        endpoints: arraySchema(stringSchema()),
      }),
      examples: [
        {
          input: { service_id: 'svc-abc123' },
          output: { id: 'svc-abc123', status: 'running' },
          description: 'Check whether a service is up',
        },
      ],
      async run(input) {
        const service = await loadService(deps, requireServiceId(input));
        return {
          id: service.id,
          name: service.name,
          model_id: service.modelId,
          status: service.status,
          endpoints: [...service.endpoints],
        };
      },
    },
    deps
  );
}

export function recommendQuery(deps: ServiceUnitDeps): Query {
  return defineQuery(
    {
      name: 'service.recommend',
      domain: SERVICE_DOMAIN,
      description: 'Recommend a deployment configuration for a model',
      inputSchema: objectSchema(
        {
          model_id: stringSchema({ description: 'Model to deploy' }),
          hint: stringSchema({ description: 'Optimization hint, e.g. high-throughput or low-latency' }),
        },
        ['model_id']
      ),
      outputSchema: recommendationSchema,
      examples: [
        {
          input: { model_id: 'llama3-70b' },
          output: {
            resource_class: 'large',
            replicas: 2,
            expected_throughput: 100,
            engine_type: 'vllm',
            device_type: 'gpu',
            reason: 'Large LLM model recommended for GPU acceleration',
          },
          description: 'Recommendation for a large language model',
        },
        {
          input: { model_id: 'sensevoice-small' },
          output: {
            resource_class: 'small',
            replicas: 1,
            expected_throughput: 10,
            engine_type: 'whisper',
            device_type: 'cpu',
            reason: 'ASR model runs efficiently on CPU',
          },
          description: 'Recommendation for a speech model',
        },
      ],
      async run(input, ctx) {
        const provider = requireServiceProvider(deps);
        const modelId = readString(input, 'model_id');
        if (!modelId) throw missingField(SERVICE_DOMAIN, 'model_id');
        try {
          const recommendation = await provider.getRecommendation(modelId, readString(input, 'hint'), ctx.signal);
          return recommendationToMap(recommendation);
        } catch (error) {
          throw wrapError(`recommend for model ${modelId}`, error);
        }
      },
    },
    deps
  );
}

export function logsQuery(deps: ServiceUnitDeps): Query {
  return defineQuery(
    {
      name: 'service.logs',
      domain: SERVICE_DOMAIN,
      description: 'Fetch the most recent log lines of a service',
      inputSchema: objectSchema(
        {
          service_id: stringSchema({ description: 'Service ID' }),
          tail: numberSchema({ description: `Number of lines (default ${DEFAULT_LOG_TAIL})`, min: 1 }),
        },
        ['service_id']
      ),
      outputSchema: objectSchema({ service_id: stringSchema(), logs: stringSchema() }),
      examples: [
        {
          input: { service_id: 'svc-abc123', tail: 50 },
          output: { service_id: 'svc-abc123', logs: '...' },
          description: 'Last 50 log lines',
        },
      ],
      async run(input, ctx) {
        const provider = requireServiceProvider(deps);
        const serviceId = requireServiceId(input);
        const requested = toInt(input.tail);
        const tail = requested !== undefined && requested > 0 ? requested : DEFAULT_LOG_TAIL;
        await loadService(deps, serviceId);
        try {
          return { service_id: serviceId, logs: await provider.getLogs(serviceId, tail, ctx.signal) };
        } catch (error) {
          throw wrapError(`get logs for service ${serviceId}`, error);
        }
      },
    },
    deps
  );
}
