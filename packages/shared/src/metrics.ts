export type MetricLabels = Record<string, string | number | boolean>;

type MetricType = "counter" | "gauge";

type MetricEntry = {
  name: string;
  labels: MetricLabels;
  value: number;
  type: MetricType;
};

export type MetricsRegistry = {
  incCounter: (name: string, labels?: MetricLabels, delta?: number) => void;
  setGauge: (name: string, labels: MetricLabels, value: number) => void;
  read: (name: string, labels?: MetricLabels) => number;
  render: () => string;
};

const normalizeLabels = (labels: MetricLabels) =>
  Object.entries(labels)
    .map(([key, value]) => [key, String(value)] as const)
    .sort((a, b) => a[0].localeCompare(b[0]));

const labelsKey = (labels: MetricLabels) => JSON.stringify(normalizeLabels(labels));

const formatLabels = (labels: MetricLabels) => {
  const entries = normalizeLabels(labels);
  if (!entries.length) return "";
  const formatted = entries.map(([key, value]) => `${key}="${value.replace(/"/g, '\\"')}"`);
  return `{${formatted.join(",")}}`;
};

export const createMetricsRegistry = (baseLabels: MetricLabels = {}): MetricsRegistry => {
  const entries = new Map<string, MetricEntry>();
  const keyFor = (name: string, labels: MetricLabels) =>
    `${name}:${labelsKey({ ...baseLabels, ...labels })}`;

  const incCounter = (name: string, labels: MetricLabels = {}, delta = 1) => {
    const key = keyFor(name, labels);
    const existing = entries.get(key);
    if (existing) {
      existing.value += delta;
      return;
    }
    entries.set(key, {
      name,
      labels: { ...baseLabels, ...labels },
      value: delta,
      type: "counter"
    });
  };

  const setGauge = (name: string, labels: MetricLabels, value: number) => {
    const key = keyFor(name, labels);
    const existing = entries.get(key);
    if (existing) {
      existing.value = value;
      return;
    }
    entries.set(key, { name, labels: { ...baseLabels, ...labels }, value, type: "gauge" });
  };

  const read = (name: string, labels: MetricLabels = {}) =>
    entries.get(keyFor(name, labels))?.value ?? 0;

  const render = () => {
    const lines: string[] = [];
    const seenTypes = new Set<string>();
    for (const entry of entries.values()) {
      if (!seenTypes.has(entry.name)) {
        lines.push(`# TYPE ${entry.name} ${entry.type}`);
        seenTypes.add(entry.name);
      }
      lines.push(`${entry.name}${formatLabels(entry.labels)} ${entry.value}`);
    }
    return lines.join("\n") + "\n";
  };

  return { incCounter, setGauge, read, render };
};
