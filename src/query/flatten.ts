/**
 * Flatten state resources into one row per instance
 *
 * A state document describes each resource once, with one entry under
 * `instances` per concrete object (count / for_each). Downstream stages work
 * on one row per instance, so parent fields are copied into every instance
 * and a `resource` address is synthesized for each.
 */

export type JsonRecord = Record<string, unknown>;

export interface FlattenOptions {
  /** Collapse `module.` segments of nested module paths into `+` */
  short?: boolean;
}

const MODULE_SEGMENT = /(^|\.)module\./g;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function text(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

function indexSuffix(indexKey: unknown): string {
  if (indexKey === null || indexKey === undefined) return "";
  if (typeof indexKey === "number") return `[${indexKey}]`;
  return `["${text(indexKey)}"]`;
}

/**
 * Build the address of a flattened instance row, e.g.
 * `module.net.data.aws_vpc.main["blue"]`
 */
export function resourceAddress(row: JsonRecord, options: FlattenOptions = {}): string {
  const module = row.module !== null && row.module !== undefined ? `${text(row.module)}.` : "";
  const mode = typeof row.mode === "string" && row.mode !== "" && row.mode !== "managed" ? `${row.mode}.` : "";
  const address = `${module}${mode}${text(row.type)}.${text(row.name)}${indexSuffix(row.index_key)}`;

  return options.short ? address.replace(MODULE_SEGMENT, "+") : address;
}

/**
 * Fields shared by every instance of a resource
 */
export function commonFields(resource: JsonRecord): JsonRecord {
  const common: JsonRecord = {};
  for (const [key, value] of Object.entries(resource)) {
    if (key !== "instances") {
      common[key] = value;
    }
  }
  return common;
}

/**
 * Flatten a resources array. Resources without instances produce no rows.
 */
export function flattenResources(resources: readonly unknown[], options: FlattenOptions = {}): JsonRecord[] {
  const rows: JsonRecord[] = [];

  for (const resource of resources) {
    if (!isRecord(resource)) continue;

    const common = commonFields(resource);
    const instances = Array.isArray(resource.instances) ? resource.instances : [];

    for (const instance of instances) {
      const row: JsonRecord = { ...common };
      if (isRecord(instance)) {
        Object.assign(row, instance);
      }
      row.resource = resourceAddress(row, options);
      rows.push(row);
    }
  }

  return rows;
}
