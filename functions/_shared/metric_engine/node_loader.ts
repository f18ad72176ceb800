import { promises as fs } from 'node:fs';
import path from 'node:path';
import { isMap, isScalar, parseDocument } from 'yaml';

import { logger } from '../utils/logger.ts';
import { SchemaError } from './errors.ts';
import { parseTaskDocument } from './schema.ts';
import type { MetricTask, SchemaWarning } from './types.ts';

export interface TaskLoadOptions {
  /** Treat duplicate metric keys as errors instead of warnings. */
  strict?: boolean;
}

function findDuplicateMetricKeys(metricsNode: unknown): string[] {
  if (!isMap(metricsNode)) {
    return [];
  }
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const pair of metricsNode.items) {
    const key = isScalar(pair.key) ? String(pair.key.value) : String(pair.key);
    if (seen.has(key) && !duplicates.includes(key)) {
      duplicates.push(key);
    }
    seen.add(key);
  }
  return duplicates;
}

export function parseTaskYaml(source: string, options: TaskLoadOptions = {}): MetricTask {
  const document = parseDocument(source, { uniqueKeys: false });
  const [syntaxError] = document.errors;
  if (syntaxError) {
    throw new SchemaError(`invalid YAML: ${syntaxError.message}`);
  }

  const parsed: unknown = document.toJS();
  const slugNode = document.get('slug');
  const slug = typeof slugNode === 'string' ? slugNode : null;

  const warnings: SchemaWarning[] = findDuplicateMetricKeys(document.get('metrics', true)).map((metric) => ({
    code: 'duplicate_metric_key',
    metric,
    message: `Metric ${metric} is declared more than once; only the last declaration is kept`,
  }));

  if (options.strict && warnings.length > 0) {
    throw new SchemaError('duplicate metric key', slug, warnings[0]?.metric ?? null);
  }

  for (const warning of warnings) {
    logger.warn(warning.message, { task: slug ?? undefined, metric: warning.metric });
  }

  return parseTaskDocument(parsed, { warnings });
}

export async function loadTaskDefinitionsFromDirectory(
  directoryPath: string,
  options: TaskLoadOptions = {}
): Promise<MetricTask[]> {
  const entries = await fs.readdir(directoryPath, { withFileTypes: true });
  const tasks: MetricTask[] = [];

  const files = entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .filter((name) => name.endsWith('.yaml') || name.endsWith('.yml'))
    .sort();

  for (const name of files) {
    const filePath = path.join(directoryPath, name);
    const raw = await fs.readFile(filePath, 'utf8');
    if (!raw.trim()) {
      continue;
    }
    tasks.push(parseTaskYaml(raw, options));
  }

  return tasks;
}
