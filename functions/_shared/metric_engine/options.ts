import { z } from 'zod';

import { InvalidTaskOptions } from './errors.ts';
import {
  CONTENT_ITEM_TYPES,
  type ContentItemType,
  type ContentItemTypeSelection,
  type MetricTask,
  type TaskOptions,
} from './types.ts';

const nonNegativeInt = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
  z.number({ invalid_type_error: 'Must be a number' }).int('Must be an integer').min(0, 'Must be non-negative')
);

const typeListSchema = z.union([z.string(), z.array(z.string())]).transform((value) =>
  (Array.isArray(value) ? value : value.split(','))
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0)
);

type OptionIssue = { option: string; message: string };

/**
 * Resolves the options of one task invocation: caller values over the
 * document defaults, validated against the option specs the task declares.
 */
export function resolveTaskOptions(task: MetricTask, provided: Record<string, unknown> = {}): TaskOptions {
  const issues: OptionIssue[] = [];

  for (const name of Object.keys(provided)) {
    if (!Object.prototype.hasOwnProperty.call(task.options, name)) {
      issues.push({ option: name, message: 'Unknown option' });
    }
  }

  const valueOf = (name: string): unknown => {
    const value = provided[name];
    return value !== undefined && value !== null ? value : task.options[name]?.default;
  };

  const maxAge = readNonNegativeInt('max_age', valueOf('max_age'), issues);
  const maxFacets = Object.prototype.hasOwnProperty.call(task.options, 'max_facets')
    ? readNonNegativeInt('max_facets', valueOf('max_facets'), issues)
    : null;
  const contentItemTypes = readContentItemTypes(task, valueOf('content_item_types'), issues);

  if (issues.length > 0 || maxAge === null) {
    throw new InvalidTaskOptions(issues);
  }

  return Object.freeze({
    max_age: maxAge,
    content_item_types: contentItemTypes,
    max_facets: maxFacets,
  });
}

function readNonNegativeInt(option: string, value: unknown, issues: OptionIssue[]): number | null {
  if (value === undefined || value === null) {
    issues.push({ option, message: 'Required' });
    return null;
  }
  const result = nonNegativeInt.safeParse(value);
  if (!result.success) {
    issues.push({ option, message: result.error.errors[0]?.message ?? 'Invalid value' });
    return null;
  }
  return result.data;
}

function readContentItemTypes(task: MetricTask, value: unknown, issues: OptionIssue[]): ContentItemTypeSelection {
  if (value === undefined || value === null) {
    return 'all';
  }

  const result = typeListSchema.safeParse(value);
  if (!result.success) {
    issues.push({ option: 'content_item_types', message: 'Must be a string or a list of strings' });
    return 'all';
  }

  if (result.data.length === 0 || result.data.includes('all')) {
    return 'all';
  }

  const allowed = task.options.content_item_types?.input_options;
  const types: ContentItemType[] = [];
  for (const entry of result.data) {
    const type = CONTENT_ITEM_TYPES.find((candidate) => candidate === entry);
    if (!type || (allowed && !allowed.includes(type))) {
      issues.push({ option: 'content_item_types', message: `Unsupported content item type: ${entry}` });
      continue;
    }
    if (!types.includes(type)) {
      types.push(type);
    }
  }
  return types;
}
