import { parseDateTime, toRfc3339 } from "./dates.js";
import { DateParseError, ValidationError } from "./errors.js";
import { ASC_BY_TIME, ASC_BY_TIME_WITH_TIEBREAKER } from "./query-builder.js";
import type { ExtractionMode, ExtractionPlan, SearchQuery, WhereFilter } from "./types.js";

export const DEFAULT_NUMBER_OF_LINES = 10;
export const MAX_NUMBER_OF_LINES = 5000;

export interface RawCatParameters {
  around?: string;
  from?: string;
  to?: string;
  lines?: number;
  follow?: boolean;
  select?: string;
  where?: string;
}

export function parseSelectClause(select: string): string[] {
  if (select.length === 0) {
    throw new ValidationError("Select clause cannot be empty");
  }

  const fields = select
    .split(",")
    .map((field) => field.trim())
    .filter((field) => field.length > 0);

  if (fields.length === 0) {
    throw new ValidationError("Select clause must contain at least one field");
  }
  return fields;
}

export function parseWhereClause(where: string): WhereFilter[] {
  if (where.length === 0) {
    throw new ValidationError("Where clause cannot be empty");
  }

  return where.split(",").map((pair) => {
    const parts = pair.split(":");
    if (parts.length !== 2 || !parts[0].trim() || !parts[1].trim()) {
      throw new ValidationError(`Invalid where clause format. Expected 'field:value', got '${pair}'`);
    }
    return { field: parts[0].trim(), value: parts[1].trim() };
  });
}

/**
 * ANDs equality filters into one match clause. An empty list is an explicit
 * "select all".
 */
export function buildMatchClause(filters: readonly WhereFilter[]): SearchQuery {
  if (filters.length === 0) {
    return { match_all: {} };
  }
  if (filters.length === 1) {
    return { match: { [filters[0].field]: filters[0].value } };
  }
  return {
    bool: {
      must: filters.map((filter) => ({ match: { [filter.field]: filter.value } })),
    },
  };
}

/** Parses `-n`; rejects anything that is not a non-negative integer. */
export function parseLineCount(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ValidationError(`The -n parameter must be a non-negative integer, got '${value}'`);
  }
  const count = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(count)) {
    throw new ValidationError(`The -n parameter is too large, got '${value}'`);
  }
  return count;
}

function resolveMode(params: RawCatParameters, lines: number): ExtractionMode {
  const { around, from, to } = params;
  const follow = params.follow === true;

  if (around !== undefined) {
    if (from !== undefined || to !== undefined) {
      throw new ValidationError("The parameters --to and --from cannot be used at the same time as --around.");
    }
    if (follow) {
      throw new ValidationError("The parameter --follow cannot be used at the same time as --around.");
    }
    if (lines > MAX_NUMBER_OF_LINES) {
      throw new ValidationError(
        `In combination with --around, the -n parameter has a maximum value of ${MAX_NUMBER_OF_LINES}.`,
      );
    }
    return "around";
  }

  if (to !== undefined) {
    if (follow) {
      throw new ValidationError("The parameter --follow cannot be used at the same time as --to.");
    }
    if (lines > MAX_NUMBER_OF_LINES) {
      throw new ValidationError(
        `In combination with --to, the -n parameter has a maximum value of ${MAX_NUMBER_OF_LINES}.`,
      );
    }
    if (from !== undefined) {
      if (lines !== DEFAULT_NUMBER_OF_LINES) {
        throw new ValidationError("You cannot use -n in combination with a full time range (--from and --to).");
      }
      return "from+to";
    }
    return "to";
  }

  if (from !== undefined) {
    if (follow) {
      throw new ValidationError("The parameter --follow cannot be used at the same time as --from.");
    }
    return "from";
  }

  return follow ? "follow" : "none";
}

/**
 * Turns raw `cat` options into an immutable extraction plan. Performs no I/O;
 * every problem surfaces as a ValidationError before any request is sent.
 */
export function resolveExtractionPlan(params: RawCatParameters): ExtractionPlan {
  const lines = params.lines ?? DEFAULT_NUMBER_OF_LINES;
  if (!Number.isInteger(lines) || lines < 0) {
    throw new ValidationError(`The -n parameter must be a non-negative integer, got '${lines}'`);
  }

  const selectFields = params.select !== undefined ? parseSelectClause(params.select) : undefined;
  const whereFilters = params.where !== undefined ? parseWhereClause(params.where) : undefined;
  const mode = resolveMode(params, lines);

  const needsSnapshot = mode === "around" || mode === "to" || mode === "from+to" || mode === "follow";
  const base = {
    mode,
    needsSnapshot,
    matchClause: whereFilters ? buildMatchClause(whereFilters) : undefined,
    sortOrder: needsSnapshot ? ASC_BY_TIME_WITH_TIEBREAKER : ASC_BY_TIME,
    pollBetweenBatches: mode === "follow",
    selectFields,
    timeWindow: { from: params.from, to: params.to },
  };

  switch (mode) {
    case "around":
      return {
        ...base,
        totalDocumentBudget: lines,
        anchor: { referenceTime: params.around, probeSize: Math.floor(lines / 2) + 1 },
      };
    case "to":
      return { ...base, totalDocumentBudget: lines, anchor: { referenceTime: params.to, probeSize: lines + 1 } };
    case "from+to":
      return { ...base, totalDocumentBudget: "unbounded" };
    case "from":
      return { ...base, totalDocumentBudget: lines };
    case "follow":
      return { ...base, totalDocumentBudget: "unbounded", anchor: { probeSize: lines + 1 } };
    case "none":
      return { ...base, totalDocumentBudget: lines, anchor: { probeSize: lines + 1 } };
  }
}

/**
 * Parses every date of the plan against a single reference instant and
 * returns a plan whose dates are absolute RFC3339 strings. Relative inputs
 * such as "1 hour ago" then mean the same instant for the anchor probe and
 * for every page that follows.
 */
export function pinPlanDates(plan: ExtractionPlan, reference: Date = new Date()): ExtractionPlan {
  const pin = (value: string | undefined, label: string): string | undefined => {
    if (value === undefined) return undefined;
    const parsed = parseDateTime(value, reference);
    if (!parsed) {
      throw new DateParseError(`Invalid ${label} date: ${value}`);
    }
    return toRfc3339(parsed);
  };

  const from = pin(plan.timeWindow.from, "from");
  const to = pin(plan.timeWindow.to, "to");
  const anchor = plan.anchor && { ...plan.anchor, referenceTime: pin(plan.anchor.referenceTime, plan.mode) };
  return { ...plan, timeWindow: { from, to }, anchor };
}
