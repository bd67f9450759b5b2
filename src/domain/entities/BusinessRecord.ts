/**
 * Business Record & Analysis Report
 * Layer: Domain
 *
 * BusinessRecord is whatever the registry returned under `result`, kept as
 * plain JSON. We do not map it to a typed entity: the only consumer is the
 * report prompt, which embeds it verbatim, and the registry adds fields
 * often enough that a fixed schema would silently drop data.
 *
 * Fields the prompt refers to by name (none are required): name,
 * estiblishTime, legalPersonName, regCapital, regStatus, regLocation,
 * industry, businessScope, tmNum, patentNum, socialStaffNum, actualCapital.
 */
export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type BusinessRecord = { [key: string]: JsonValue };

/** Text produced by the completion provider; passed through untouched. */
export type AnalysisReport = string;

/** A decoded JSON value is a record when it is a plain object (not null, not an array). */
export function isBusinessRecord(value: unknown): value is BusinessRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
