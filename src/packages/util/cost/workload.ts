/*
The input validation boundary: turn one row of user input (e.g., from an
editable table, so numbers may well be strings) into an immutable
WorkloadDescriptor.

Anything malformed is rejected here with a WorkloadInputError, so the
cost calculator never sees bad input.
*/

import {
  MAX_CLUSTER_COUNT,
  MAX_DAILY_HOURS,
  MAX_MONTHLY_DAYS,
  MAX_MONTHLY_HOURS,
  MAX_NODE_COUNT,
  SAME_AS_PRIMARY,
} from "./consts";
import type {
  ClusterWorkload,
  ServerlessWorkload,
  WorkloadDescriptor,
} from "./types";
import {
  is_integer,
  is_object,
  is_string,
  to_boolean,
  to_number,
} from "@costcalc/util/type-checking";

export class WorkloadInputError extends Error {
  field?: string;
  constructor(mesg: string, { field }: { field?: string } = {}) {
    super(mesg);
    this.name = "WorkloadInputError";
    this.field = field;
  }
}

export interface WorkloadInputDefaults {
  region: string;
  isServerless: (category: string) => boolean;
  // position of the row, used for the default purpose label
  index?: number;
}

type Row = { [key: string]: unknown };

function requiredString(row: Row, field: string): string {
  const value = row[field];
  if (!is_string(value) || value.trim() === "") {
    throw new WorkloadInputError(`${field} must be a nonempty string`, {
      field,
    });
  }
  return value.trim();
}

function optionalString(row: Row, field: string): string | undefined {
  const value = row[field];
  if (value == null || (is_string(value) && value.trim() === "")) {
    return undefined;
  }
  if (!is_string(value)) {
    throw new WorkloadInputError(`${field} must be a string`, { field });
  }
  return value.trim();
}

function numberInRange(
  row: Row,
  field: string,
  { min, max, integer }: { min: number; max: number; integer?: boolean },
): number {
  const x = to_number(row[field]);
  if (x == null) {
    throw new WorkloadInputError(
      `${field} must be a number but is ${JSON.stringify(row[field])}`,
      { field },
    );
  }
  if (integer && !is_integer(x)) {
    throw new WorkloadInputError(`${field} must be an integer`, { field });
  }
  if (x < min || x > max) {
    throw new WorkloadInputError(
      `${field} must be between ${min} and ${max} but is ${x}`,
      { field },
    );
  }
  return x;
}

function monthlyHours(row: Row, dailyHours: number): number {
  if (row.monthlyHours == null && row.monthlyDays != null) {
    const days = numberInRange(row, "monthlyDays", {
      min: 1,
      max: MAX_MONTHLY_DAYS,
      integer: true,
    });
    return dailyHours * days;
  }
  return numberInRange(row, "monthlyHours", { min: 0, max: MAX_MONTHLY_HOURS });
}

export function parseWorkloadInput(
  raw: unknown,
  defaults: WorkloadInputDefaults,
): WorkloadDescriptor {
  if (!is_object(raw)) {
    throw new WorkloadInputError("workload must be an object");
  }
  const category = requiredString(raw, "category");
  const purpose =
    optionalString(raw, "purpose") ?? `Workload ${(defaults.index ?? 0) + 1}`;
  const region = optionalString(raw, "region") ?? defaults.region;
  const dailyHours = numberInRange(raw, "dailyHours", {
    min: 0,
    max: MAX_DAILY_HOURS,
  });
  const base = {
    category,
    purpose,
    region,
    dailyHours,
    monthlyHours: monthlyHours(raw, dailyHours),
  };

  if (defaults.isServerless(category)) {
    const workload: ServerlessWorkload = {
      ...base,
      kind: "serverless",
      size: requiredString(raw, "size"),
      clusterCount:
        raw.clusterCount == null
          ? 1
          : numberInRange(raw, "clusterCount", {
              min: 1,
              max: MAX_CLUSTER_COUNT,
              integer: true,
            }),
    };
    return Object.freeze(workload);
  }

  const primaryMachine = requiredString(raw, "primaryMachine");
  const secondary = optionalString(raw, "secondaryMachine") ?? SAME_AS_PRIMARY;
  const multiplier = to_boolean(raw.multiplier ?? false);
  if (multiplier == null) {
    throw new WorkloadInputError("multiplier must be a boolean", {
      field: "multiplier",
    });
  }
  const workload: ClusterWorkload = {
    ...base,
    kind: "cluster",
    primaryMachine,
    secondaryMachine: secondary == SAME_AS_PRIMARY ? primaryMachine : secondary,
    secondaryNodes: numberInRange(raw, "secondaryNodes", {
      min: 0,
      max: MAX_NODE_COUNT,
      integer: true,
    }),
    multiplier,
  };
  return Object.freeze(workload);
}

// Returns an error message if the input is invalid, and undefined otherwise.
export function validateWorkloadInput(
  raw: unknown,
  defaults: WorkloadInputDefaults,
): string | undefined {
  try {
    parseWorkloadInput(raw, defaults);
  } catch (err) {
    if (err instanceof WorkloadInputError) {
      return err.message;
    }
    throw err;
  }
  return;
}
