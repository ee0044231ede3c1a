// Arithmetic mean; an empty series averages to 0
export function averageOf(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sum = values.reduce((acc, v) => acc + v, 0);
  return sum / values.length;
}
