import type { AsyncFn, Operation, Options } from './interface';
import type { Metric } from './repository';

/**
 * Wrap `call` so each invocation produces one metric, named by `createMetric` and handed to `pushMetric`
 * once the call settles.
 */
export function monitorAsyncFunction<T extends AsyncFn>(
  operation: Operation,
  call: T,
  createMetric: (name: string) => Metric,
  pushMetric: (metric: Metric) => void,
  options: Options<Awaited<ReturnType<T>>> = {},
): (...args: Parameters<T>) => Promise<Awaited<ReturnType<T>>> {
  const { name, tags = {} } = operation;
  const { monitorInvocations = true, acceptedErrors = [], resultFields } = options;

  return async (...args: Parameters<T>): Promise<Awaited<ReturnType<T>>> => {
    const metric = createMetric(name).addTags(tags);
    if (monitorInvocations) {
      metric.intField('invocation', 1);
    }

    try {
      const result: Awaited<ReturnType<T>> = await call(...args);
      if (resultFields) {
        for (const [key, value] of Object.entries(resultFields(result))) {
          metric.intField(key, value);
        }
      }
      return result;
    } catch (e) {
      if (!acceptedErrors.some((acceptedError) => e instanceof acceptedError)) {
        console.error(`${metric.name} failed`, e);
        metric.intField('errors', 1);
      }
      throw e;
    } finally {
      metric.durationField('duration');
      pushMetric(metric);
    }
  };
}
