/*
Settings of the estimator, from environment variables:

- COSTCALC_REGION -- region used for workloads that do not name one (default "us-east-1")
- COSTCALC_CURRENCY -- "USD" (default) or "JPY", only affects formatting
- COSTCALC_ESTIMATE_INFRA -- set to "no", "false" or "0" to price machines
    missing from infra-rates.json at zero instead of estimating them by size
- COSTCALC_SERVERLESS_CATEGORIES -- comma separated categories that are billed
    by warehouse size and cluster count instead of by machine (default "serverless-warehouse")
*/

import { DEFAULT_SERVERLESS_CATEGORIES } from "@costcalc/util/cost/consts";
import { type Currency, isCurrency } from "@costcalc/util/money";
import getLogger from "./logger";

const logger = getLogger("config");

export const DEFAULT_REGION = "us-east-1";

export interface EstimatorConfig {
  region: string;
  currency: Currency;
  estimateMissingInfraRates: boolean;
  serverlessCategories: string[];
}

type Env = { [key: string]: string | undefined };

function isOff(value: string | undefined): boolean {
  if (value == null) return false;
  return ["no", "false", "0"].includes(value.trim().toLowerCase());
}

export function getConfig(env: Env = process.env): EstimatorConfig {
  const region = env.COSTCALC_REGION?.trim() || DEFAULT_REGION;

  let currency: Currency = "USD";
  const c = env.COSTCALC_CURRENCY?.trim().toUpperCase();
  if (c) {
    if (isCurrency(c)) {
      currency = c;
    } else {
      logger.warn(`unknown currency '${c}', using ${currency}`);
    }
  }

  const serverlessCategories = (env.COSTCALC_SERVERLESS_CATEGORIES ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

  return {
    region,
    currency,
    estimateMissingInfraRates: !isOff(env.COSTCALC_ESTIMATE_INFRA),
    serverlessCategories:
      serverlessCategories.length > 0
        ? serverlessCategories
        : [...DEFAULT_SERVERLESS_CATEGORIES],
  };
}
