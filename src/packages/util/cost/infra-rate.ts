/*
Rough hourly price of a machine type that is not in the infra rate table.

This is a best effort guess from the name alone, e.g., "r6i.2xlarge" is
a memory optimized 2xlarge, so 0.60 * 1.2 = 0.72/hour.  It is NOT a
billing source of truth; callers flag every estimate with a warning.
*/

import { moneyMultiply } from "@costcalc/util/money";

// base price per hour by size token
export const SIZE_RATES: { [size: string]: number } = {
  medium: 0.08,
  large: 0.15,
  xlarge: 0.3,
  "2xlarge": 0.6,
  "3xlarge": 0.9,
  "4xlarge": 1.2,
  "6xlarge": 1.8,
  "8xlarge": 2.4,
  "9xlarge": 2.7,
  "12xlarge": 3.6,
  "16xlarge": 4.8,
  "18xlarge": 5.4,
  "24xlarge": 7.2,
  "32xlarge": 9.6,
  "48xlarge": 14.4,
  metal: 10.0,
};

export const DEFAULT_INFRA_RATE = 0.2;

export type MachineFamily =
  | "compute"
  | "memory"
  | "general"
  | "storage"
  | "accelerator"
  | "other";

const FAMILY_PREFIXES: { family: MachineFamily; prefixes: string[] }[] = [
  { family: "compute", prefixes: ["c5", "c6", "c7"] },
  { family: "memory", prefixes: ["r5", "r6", "r7", "r8"] },
  { family: "general", prefixes: ["m5", "m6", "m7", "m8"] },
  { family: "storage", prefixes: ["i3", "i4"] },
  {
    family: "accelerator",
    prefixes: ["p2", "p3", "p4", "p5", "g4", "g5"],
  },
];

export const FAMILY_MULTIPLIERS: { [family in MachineFamily]: number } = {
  compute: 0.9,
  memory: 1.2,
  general: 1.0,
  storage: 1.1,
  accelerator: 3.0,
  other: 1.0,
};

// Longest first, so "12xlarge" is never mistaken for "2xlarge" or "large".
const SIZE_TOKENS = Object.keys(SIZE_RATES).sort((a, b) => b.length - a.length);

export function machineFamily(machineType: string): MachineFamily {
  for (const { family, prefixes } of FAMILY_PREFIXES) {
    if (prefixes.some((prefix) => machineType.startsWith(prefix))) {
      return family;
    }
  }
  return "other";
}

export function sizeToken(machineType: string): string | undefined {
  const i = machineType.lastIndexOf(".");
  const suffix = i == -1 ? machineType : machineType.slice(i + 1);
  if (Object.prototype.hasOwnProperty.call(SIZE_RATES, suffix)) {
    return suffix;
  }
  return SIZE_TOKENS.find((token) => machineType.includes(token));
}

export function estimateInfraRate(machineType: string): number {
  const size = sizeToken(machineType);
  if (size == null) {
    return DEFAULT_INFRA_RATE;
  }
  return moneyMultiply(
    SIZE_RATES[size],
    FAMILY_MULTIPLIERS[machineFamily(machineType)],
  ).toNumber();
}
