/*
One calculation pass: compute every declared workload in order, then sum.
*/

import aggregate from "./aggregate";
import computeCost from "./compute-cost";
import type { RateStore } from "./rate-store";
import type { EstimateSession } from "./session";
import type { CostBreakdown, CostWarning, Totals } from "./types";

export interface Estimate {
  breakdowns: CostBreakdown[];
  totals: Totals;
  warnings: CostWarning[];
}

export default function calculate(
  session: EstimateSession,
  store: RateStore,
): Estimate {
  const breakdowns = session.workloads.map((workload) =>
    computeCost(workload, store),
  );
  return {
    breakdowns,
    totals: aggregate(breakdowns),
    warnings: breakdowns.flatMap((b) => b.warnings),
  };
}
