import { z } from 'zod';

import type { MetricTaskService } from '../_shared/metric_engine/engine.ts';
import {
  CircularFormulaError,
  HandlerNotFound,
  InvalidTaskOptions,
  InvalidTimeContext,
  MissingRequiredInputs,
  SchemaError,
  TaskNotFound,
} from '../_shared/metric_engine/errors.ts';
import { StaticMetricIngestor } from '../_shared/metric_engine/static_ingestor.ts';
import { AGGREGATION_LEVELS, CONTENT_ITEM_TYPES } from '../_shared/metric_engine/types.ts';
import { toDay } from '../_shared/metric_engine/window.ts';
import {
  AppError,
  MethodNotAllowedError,
  UnprocessableTaskError,
  ValidationError,
} from '../_shared/utils/errors.ts';
import { logger } from '../_shared/utils/logger.ts';
import { REQUEST_ID_HEADER, getOrGenerateRequestId } from '../_shared/utils/request-id.ts';
import { errorResponse, internalErrorResponse, jsonResponse, noContentResponse } from '../_shared/utils/responses.ts';
import { validateBody } from '../_shared/utils/validate.ts';

const dateString = z
  .string()
  .trim()
  .min(1)
  .refine((value) => !Number.isNaN(Date.parse(value)), 'Must be a valid date');

const scopeId = z.union([z.string().trim().min(1), z.number().int()]).transform(String);

const pointSchema = z.object({
  timestamp: dateString,
  scope_id: scopeId,
  value: z.number().finite(),
  content_item_type: z.enum(CONTENT_ITEM_TYPES).optional(),
});

const facetPointSchema = z.object({
  facet_key: z.string().trim().min(1),
  scope_id: scopeId,
  value: z.number().finite(),
  timestamp: dateString.optional(),
});

const targetSchema = z.discriminatedUnion('scope', [
  z.object({
    scope: z.literal('content'),
    id: scopeId,
    created_at: dateString,
    type: z.enum(CONTENT_ITEM_TYPES),
  }),
  z.object({
    scope: z.literal('org'),
    id: scopeId,
    created_at: dateString,
  }),
]);

export const metricTaskPayloadSchema = z.object({
  task: z.string().trim().min(1),
  target: targetSchema,
  options: z.record(z.unknown()).optional(),
  levels: z.array(z.enum(AGGREGATION_LEVELS)).min(1).optional(),
  prior_window: z
    .object({ start: dateString.transform(toDay), end: dateString.transform(toDay) })
    .optional(),
  data: z
    .object({
      points: z.record(z.array(pointSchema)).default({}),
      facets: z.record(z.array(facetPointSchema)).default({}),
    })
    .default({}),
});

export interface MetricTasksDependencies {
  metricService: MetricTaskService;
  corsHeaders?: Record<string, string>;
}

export async function handleMetricTasksRequest(
  req: Request,
  deps: MetricTasksDependencies
): Promise<Response> {
  const started = Date.now();
  const requestId = getOrGenerateRequestId(req);
  const headers = () => {
    const result = new Headers(deps.corsHeaders ?? {});
    result.set(REQUEST_ID_HEADER, requestId);
    return result;
  };

  let response: Response;

  if (req.method === 'OPTIONS') {
    response = noContentResponse(headers());
  } else {
    try {
      if (req.method !== 'POST') {
        throw new MethodNotAllowedError(req.method, ['POST', 'OPTIONS']);
      }

      const { data, ...request } = await validateBody(metricTaskPayloadSchema, req);
      const result = await deps.metricService.execute(request, new StaticMetricIngestor(data));
      response = jsonResponse({ data: result }, 200, headers());
    } catch (error) {
      const appError = toAppError(error);
      if (appError) {
        response = errorResponse(appError, requestId, headers());
      } else {
        logger.error('Metric task failed', {
          request_id: requestId,
          error: error instanceof Error ? error.message : String(error),
        });
        response = internalErrorResponse(requestId, headers());
      }
    }
  }

  logger.request(req, response, { request_id: requestId, duration_ms: Date.now() - started });
  return response;
}

function toAppError(error: unknown): AppError | null {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof TaskNotFound) {
    return new AppError('NOT_FOUND', error.message, 404);
  }
  if (error instanceof InvalidTaskOptions) {
    return new ValidationError(
      'Invalid task options',
      error.issues.map((issue) => ({ field: `options.${issue.option}`, message: issue.message, code: 'invalid_option' }))
    );
  }
  if (error instanceof InvalidTimeContext) {
    return new ValidationError('Invalid time context', [
      { field: error.field, message: error.message, code: 'invalid_format' },
    ]);
  }
  if (error instanceof MissingRequiredInputs) {
    return new ValidationError(
      error.message,
      error.missing.map((field) => ({ field, message: 'Required', code: 'required' }))
    );
  }
  if (error instanceof SchemaError) {
    return new UnprocessableTaskError(error.message, error.task, error.metric);
  }
  if (error instanceof CircularFormulaError) {
    return new UnprocessableTaskError(error.message, error.task);
  }
  if (error instanceof HandlerNotFound) {
    return new UnprocessableTaskError(error.message);
  }
  return null;
}
