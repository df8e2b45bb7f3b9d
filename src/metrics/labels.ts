export type Labels = Readonly<Record<string, string>>;

export type LabelValues<L extends string> = { readonly [K in L]: string | number };

const METRIC_NAME_RE = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const LABEL_NAME_RE = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export function isValidMetricName(name: string): boolean {
  return METRIC_NAME_RE.test(name);
}

export function isValidLabelName(name: string): boolean {
  return LABEL_NAME_RE.test(name) && !name.startsWith("__");
}

/**
 * Stable key for a label-value tuple, in declaration order.
 * JSON keeps tuples with embedded separators distinct.
 */
export function labelKey(values: readonly string[]): string {
  return JSON.stringify(values);
}

export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

export function escapeHelp(help: string): string {
  return help.replace(/\\/g, "\\\\").replace(/\n/g, "\\n");
}

export function formatLabels(labels: ReadonlyArray<readonly [string, string]>): string {
  if (labels.length === 0) return "";
  return `{${labels.map(([k, v]) => `${k}="${escapeLabelValue(v)}"`).join(",")}}`;
}

/**
 * True when every selector pair appears with the same value in `labels`.
 * Extra labels on the target are ignored; an empty selector matches anything.
 */
export function matchesSelector(selector: Labels, labels: Labels): boolean {
  for (const [key, value] of Object.entries(selector)) {
    if (!Object.prototype.hasOwnProperty.call(labels, key)) return false;
    if (labels[key] !== value) return false;
  }
  return true;
}
