// Small rate table shared by the cost engine tests.

import type { ClusterWorkload, RateTable, ServerlessWorkload } from "./types";

export function testRates(): RateTable {
  return {
    unitPrices: {
      standard: { R1: { pricePerUnit: 0.65 } },
      "serverless-warehouse": { R1: { pricePerUnit: 1.0 } },
    },
    consumptionRates: {
      "m5.large": { "*": { unitsPerHour: 0.34, nominalHourlyPrice: 0.096 } },
      "m5.xlarge": {
        "*": { unitsPerHour: 0.69 },
        jobs: { unitsPerHour: 0.5 },
      },
    },
    infraRates: {
      "m5.large": { R1: { pricePerHour: 0.1 } },
      "m5.xlarge": { R1: { pricePerHour: 0.2 } },
    },
    machineSpecs: {
      "m5.large": { vcpu: 2, memoryGib: 8 },
    },
    serverlessSizes: {
      Medium: { unitsPerHour: 8 },
    },
  };
}

export function clusterWorkload(
  overrides: Partial<ClusterWorkload> = {},
): ClusterWorkload {
  return {
    kind: "cluster",
    category: "standard",
    purpose: "etl",
    region: "R1",
    dailyHours: 8,
    monthlyHours: 160,
    primaryMachine: "m5.large",
    secondaryMachine: "m5.xlarge",
    secondaryNodes: 2,
    multiplier: false,
    ...overrides,
  };
}

export function serverlessWorkload(
  overrides: Partial<ServerlessWorkload> = {},
): ServerlessWorkload {
  return {
    kind: "serverless",
    category: "serverless-warehouse",
    purpose: "dashboards",
    region: "R1",
    dailyHours: 8,
    monthlyHours: 160,
    size: "Medium",
    clusterCount: 2,
    ...overrides,
  };
}
