/*
Sum a list of cost breakdowns into grand totals.

Pure decimal summation, so the result does not depend on the order of
the breakdowns.  Nothing is deduplicated.  Daily totals are derived from
the monthly totals, like every other daily cost.
*/

import { moneyDivide, moneySum } from "@costcalc/util/money";
import { periodCost } from "./compute-cost";
import type { CostBreakdown, PeriodCost, Totals } from "./types";

function sumPeriods(periods: PeriodCost[]): PeriodCost {
  return periodCost(moneySum(periods.map(({ monthly }) => monthly)));
}

export default function aggregate(breakdowns: readonly CostBreakdown[]): Totals {
  const totalUnits = moneySum(breakdowns.map((b) => b.totalUnits));
  const primaryCost = sumPeriods(breakdowns.map((b) => b.primaryCost));
  return {
    workloadCount: breakdowns.length,
    totalUnits: totalUnits.toNumber(),
    effectiveUnitPrice: totalUnits.isZero()
      ? 0
      : moneyDivide(primaryCost.monthly, totalUnits).toNumber(),
    primaryCost,
    infraCost: sumPeriods(breakdowns.map((b) => b.infraCost.total)),
    total: sumPeriods(breakdowns.map((b) => b.total)),
  };
}
