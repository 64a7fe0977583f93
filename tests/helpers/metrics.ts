import { Counter } from 'prom-client';

/**
 * Current value of one labelled series of a counter (0 if never incremented)
 */
export const counterValue = async <L extends string>(
  counter: Counter<L>,
  labels: Partial<Record<L, string>>
): Promise<number> => {
  const { values } = await counter.get();
  const series = values.find((value) => {
    const actual: Record<string, string | number | undefined> = value.labels;
    return Object.entries(labels).every(([name, expected]) => actual[name] === expected);
  });
  return series?.value ?? 0;
};
