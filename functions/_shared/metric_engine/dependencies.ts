import { CircularFormulaError } from './errors.ts';
import type { MetricDefinition } from './types.ts';

type VisitState = 'visiting' | 'done';

/**
 * Orders computed metrics so that every formula is evaluated after the
 * computed metrics it references. Count metrics are leaves and are not listed.
 */
export function resolveEvaluationOrder(metrics: MetricDefinition[], task: string | null = null): string[] {
  const computed = new Map<string, MetricDefinition>();
  for (const metric of metrics) {
    if (metric.type === 'computed') {
      computed.set(metric.name, metric);
    }
  }

  const state = new Map<string, VisitState>();
  const order: string[] = [];

  const visit = (name: string, path: string[]): void => {
    const current = state.get(name);
    if (current === 'done') {
      return;
    }
    if (current === 'visiting') {
      throw new CircularFormulaError([...path.slice(path.indexOf(name)), name], task);
    }

    state.set(name, 'visiting');
    const references = computed.get(name)?.formula?.references ?? [];
    for (const reference of references) {
      if (computed.has(reference)) {
        visit(reference, [...path, name]);
      }
    }
    state.set(name, 'done');
    order.push(name);
  };

  for (const name of computed.keys()) {
    visit(name, []);
  }

  return order;
}
