/*
Entry point used by whatever presents the workloads to the user.

The rate store is loaded once per process and never changes afterwards,
so concurrent estimates can share it.
*/

import calculate, { type Estimate } from "@costcalc/util/cost/calculate";
import { RateStore } from "@costcalc/util/cost/rate-store";
import {
  addWorkload,
  emptySession,
  type EstimateSession,
} from "@costcalc/util/cost/session";
import {
  parseWorkloadInput,
  WorkloadInputError,
} from "@costcalc/util/cost/workload";
import type { WorkloadDescriptor } from "@costcalc/util/cost/types";
import { moneyToCurrency } from "@costcalc/util/money";
import { type EstimatorConfig, getConfig } from "./config";
import getLogger from "./logger";
import loadRates from "./rate-loader";

const logger = getLogger("estimate");

let rateStore: RateStore | undefined = undefined;

export function createRateStore(
  dir?: string,
  config: EstimatorConfig = getConfig(),
): RateStore {
  // the loader has already logged any problems with the rate files
  const { rates } = loadRates(dir);
  return new RateStore(rates, {
    estimateMissingInfraRates: config.estimateMissingInfraRates,
    serverlessCategories: config.serverlessCategories,
  });
}

export function getRateStore(): RateStore {
  if (rateStore == null) {
    rateStore = createRateStore();
  }
  return rateStore;
}

// only for tests
export function resetRateStore(): void {
  rateStore = undefined;
}

function parseRow(
  row: unknown,
  index: number,
  store: RateStore,
  config: EstimatorConfig,
): WorkloadDescriptor {
  try {
    return parseWorkloadInput(row, {
      region: config.region,
      isServerless: (category) => store.isServerless(category),
      index,
    });
  } catch (err) {
    if (err instanceof WorkloadInputError) {
      throw new WorkloadInputError(`row ${index + 1}: ${err.message}`, {
        field: err.field,
      });
    }
    throw err;
  }
}

// Build a session from rows of user input.  Throws a WorkloadInputError
// naming the offending row if any row is invalid.
export function sessionFromRows(
  rows: readonly unknown[],
  store: RateStore = getRateStore(),
  config: EstimatorConfig = getConfig(),
): EstimateSession {
  let session = emptySession();
  rows.forEach((row, index) => {
    session = addWorkload(session, parseRow(row, index, store, config));
  });
  return session;
}

export default function estimateCosts(
  session: EstimateSession,
  store: RateStore = getRateStore(),
  config: EstimatorConfig = getConfig(),
): Estimate {
  const estimate = calculate(session, store);
  for (const { message, workload } of estimate.warnings) {
    logger.warn(workload ? `${workload}: ${message}` : message);
  }
  const { totals } = estimate;
  logger.info(
    `${totals.workloadCount} workloads:`,
    `${moneyToCurrency(totals.total.monthly, undefined, config.currency)}/month`,
    `(consumption ${moneyToCurrency(totals.primaryCost.monthly, undefined, config.currency)},`,
    `infra ${moneyToCurrency(totals.infraCost.monthly, undefined, config.currency)})`,
  );
  return estimate;
}

export { estimateCosts };
