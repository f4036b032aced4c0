// Daily cost is always monthly cost divided by this, regardless of the
// calendar or of the daily hours the user entered.
export const DAYS_PER_MONTH = 30;

export const MAX_DAILY_HOURS = 24;

// 31 days * 24 hours
export const MAX_MONTHLY_HOURS = 744;

export const MAX_MONTHLY_DAYS = 31;

export const MAX_NODE_COUNT = 100;

export const MAX_CLUSTER_COUNT = 100;

// Enabling the accelerated processing mode doubles consumption.
export const MULTIPLIER_FACTOR = 2;

// Secondary machine sentinel meaning "use the primary machine type".
export const SAME_AS_PRIMARY = "same-as-primary";

// Consumption rate entry that applies to every category.
export const ANY_CATEGORY = "*";

export const DEFAULT_SERVERLESS_CATEGORIES: readonly string[] = [
  "serverless-warehouse",
];
