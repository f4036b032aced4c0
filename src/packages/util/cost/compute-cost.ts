/*
Compute the cost breakdown of one workload.

Cluster workloads are billed twice:

 - consumption: units/hour of each machine (doubled if the multiplier is
   on) * nodes * monthly hours, times the unit price of the category in
   the region.  The primary machine always counts as exactly one node.
 - infra: the raw hourly price of each machine * nodes * monthly hours.

Serverless workloads consume a flat units/hour by size per cluster, and
have no infra cost since no dedicated machine is billed.

Daily cost is monthly cost / 30, always.

Nothing in here throws: a missing rate contributes zero (or an infra
estimate) and adds a warning to the breakdown.
*/

import {
  moneyAdd,
  moneyMultiply,
  type MoneyValue,
  toDecimal,
} from "@costcalc/util/money";
import { DAYS_PER_MONTH, MULTIPLIER_FACTOR } from "./consts";
import type { RateStore } from "./rate-store";
import type {
  ClusterWorkload,
  CostBreakdown,
  CostWarning,
  InfraCost,
  PeriodCost,
  ServerlessWorkload,
  WorkloadDescriptor,
} from "./types";

export function periodCost(monthly: MoneyValue): PeriodCost {
  const m = toDecimal(monthly).toNumber();
  return { monthly: m, daily: m / DAYS_PER_MONTH };
}

const ZERO: PeriodCost = Object.freeze({ monthly: 0, daily: 0 });

export const NO_INFRA_COST: InfraCost = Object.freeze({
  primary: ZERO,
  secondary: ZERO,
  total: ZERO,
});

export default function computeCost(
  workload: WorkloadDescriptor,
  store: RateStore,
): CostBreakdown {
  switch (workload.kind) {
    case "cluster":
      return computeClusterCost(workload, store);
    case "serverless":
      return computeServerlessCost(workload, store);
  }
}

function unitPrice(
  workload: WorkloadDescriptor,
  store: RateStore,
  warnings: CostWarning[],
): number {
  const { value, found } = store.lookupUnitPrice(
    workload.category,
    workload.region,
  );
  if (!found) {
    warnings.push({
      code: "missing-unit-price",
      message: `no unit price for category '${workload.category}' in region '${workload.region}'`,
      workload: workload.purpose,
    });
  }
  return value;
}

function consumptionRate(
  machineType: string,
  workload: ClusterWorkload,
  store: RateStore,
  warnings: CostWarning[],
): number {
  const { value, found } = store.lookupConsumptionRate(
    machineType,
    workload.category,
  );
  if (!found) {
    warnings.push({
      code: "missing-consumption-rate",
      message: `no consumption rate for '${machineType}' under category '${workload.category}'`,
      workload: workload.purpose,
    });
  }
  return value;
}

function infraHourlyRate(
  machineType: string,
  workload: ClusterWorkload,
  store: RateStore,
  warnings: CostWarning[],
): number {
  const { value, found, estimated } = store.lookupInfraRate(
    machineType,
    workload.region,
  );
  if (estimated) {
    warnings.push({
      code: "estimated-infra-rate",
      message: `no infra rate for '${machineType}' in region '${workload.region}', using an estimate of ${value}/hour`,
      workload: workload.purpose,
    });
  } else if (!found) {
    warnings.push({
      code: "missing-infra-rate",
      message: `no infra rate for '${machineType}' in region '${workload.region}'`,
      workload: workload.purpose,
    });
  }
  return value;
}

function computeClusterCost(
  workload: ClusterWorkload,
  store: RateStore,
): CostBreakdown {
  const warnings: CostWarning[] = [];
  const { monthlyHours, secondaryNodes } = workload;
  const price = unitPrice(workload, store, warnings);

  // the multiplier scales the exact product, not the rounded rate
  const factor = workload.multiplier ? MULTIPLIER_FACTOR : 1;
  const primaryRate = consumptionRate(
    workload.primaryMachine,
    workload,
    store,
    warnings,
  );
  const secondaryRate = consumptionRate(
    workload.secondaryMachine,
    workload,
    store,
    warnings,
  );
  const primaryUnits = moneyMultiply(primaryRate, 1, monthlyHours, factor);
  const secondaryUnits = moneyMultiply(
    secondaryRate,
    secondaryNodes,
    monthlyHours,
    factor,
  );
  const totalUnits = primaryUnits.add(secondaryUnits);

  const primaryInfra = moneyMultiply(
    infraHourlyRate(workload.primaryMachine, workload, store, warnings),
    1,
    monthlyHours,
  );
  const secondaryInfra = moneyMultiply(
    infraHourlyRate(workload.secondaryMachine, workload, store, warnings),
    secondaryNodes,
    monthlyHours,
  );
  const infraTotal = primaryInfra.add(secondaryInfra);
  const primaryCost = totalUnits.mul(price);

  return {
    workload: workload.purpose,
    kind: workload.kind,
    category: workload.category,
    region: workload.region,
    monthlyHours,
    unitPrice: price,
    primaryRate: moneyMultiply(primaryRate, factor).toNumber(),
    secondaryRate: moneyMultiply(secondaryRate, factor).toNumber(),
    primaryUnits: primaryUnits.toNumber(),
    secondaryUnits: secondaryUnits.toNumber(),
    totalUnits: totalUnits.toNumber(),
    primaryCost: periodCost(primaryCost),
    infraCost: {
      primary: periodCost(primaryInfra),
      secondary: periodCost(secondaryInfra),
      total: periodCost(infraTotal),
    },
    total: periodCost(moneyAdd(primaryCost, infraTotal)),
    warnings,
  };
}

function computeServerlessCost(
  workload: ServerlessWorkload,
  store: RateStore,
): CostBreakdown {
  const warnings: CostWarning[] = [];
  const { monthlyHours, size, clusterCount } = workload;
  const price = unitPrice(workload, store, warnings);

  const { value: unitsPerHour, found } = store.lookupServerlessSize(size);
  if (!found) {
    warnings.push({
      code: "missing-serverless-size",
      message: `no consumption rate for serverless size '${size}'`,
      workload: workload.purpose,
    });
  }
  // reported as the secondary consumption, there is no primary machine
  const rate = moneyMultiply(unitsPerHour, clusterCount);
  const units = rate.mul(monthlyHours);
  const primaryCost = periodCost(units.mul(price));

  return {
    workload: workload.purpose,
    kind: workload.kind,
    category: workload.category,
    region: workload.region,
    monthlyHours,
    unitPrice: price,
    primaryRate: 0,
    secondaryRate: rate.toNumber(),
    primaryUnits: 0,
    secondaryUnits: units.toNumber(),
    totalUnits: units.toNumber(),
    primaryCost,
    infraCost: NO_INFRA_COST,
    total: primaryCost,
    serverless: { size, unitsPerHour, clusterCount },
    warnings,
  };
}
