/*
Types shared by the rate store, the cost calculator and the aggregator.

Everything in here is plain data: a RateTable is loaded once and never
mutated during a calculation, WorkloadDescriptors are created from user
input, and CostBreakdowns are recomputed on every calculation run.
*/

export interface UnitPriceEntry {
  pricePerUnit: number;
}

export interface ConsumptionRateEntry {
  unitsPerHour: number;
  // list price of the machine under this category, if the rate file has it
  nominalHourlyPrice?: number;
}

export interface InfraRateEntry {
  pricePerHour: number;
}

export interface MachineSpec {
  vcpu: number;
  memoryGib: number;
}

export interface ServerlessSizeEntry {
  unitsPerHour: number;
}

export interface LastUpdate {
  unitPrices?: string;
  infraRates?: string;
}

export interface RateTable {
  // category -> region -> price per unit
  unitPrices: { [category: string]: { [region: string]: UnitPriceEntry } };
  // machine type -> category (or "*") -> units consumed per hour
  consumptionRates: {
    [machineType: string]: { [category: string]: ConsumptionRateEntry };
  };
  // machine type -> region -> raw machine price per hour
  infraRates: { [machineType: string]: { [region: string]: InfraRateEntry } };
  machineSpecs: { [machineType: string]: MachineSpec };
  // size label -> units consumed per hour by one cluster
  serverlessSizes: { [size: string]: ServerlessSizeEntry };
  lastUpdate?: LastUpdate;
}

export interface Lookup {
  value: number;
  found: boolean;
}

export interface InfraLookup extends Lookup {
  // true if value came from the size heuristic instead of the rate table
  estimated: boolean;
}

interface WorkloadBase {
  category: string;
  // free text label the user gave this workload
  purpose: string;
  region: string;
  dailyHours: number;
  monthlyHours: number;
}

export interface ClusterWorkload extends WorkloadBase {
  kind: "cluster";
  primaryMachine: string;
  secondaryMachine: string;
  secondaryNodes: number;
  multiplier: boolean;
}

export interface ServerlessWorkload extends WorkloadBase {
  kind: "serverless";
  size: string;
  clusterCount: number;
}

export type WorkloadDescriptor = ClusterWorkload | ServerlessWorkload;

export type WorkloadKind = WorkloadDescriptor["kind"];

export type CostWarningCode =
  | "missing-unit-price"
  | "missing-consumption-rate"
  | "missing-serverless-size"
  | "estimated-infra-rate"
  | "missing-infra-rate"
  | "missing-config"
  | "invalid-config";

export interface CostWarning {
  code: CostWarningCode;
  message: string;
  // purpose label of the workload the warning is about
  workload?: string;
}

export interface PeriodCost {
  monthly: number;
  daily: number;
}

export interface InfraCost {
  primary: PeriodCost;
  secondary: PeriodCost;
  total: PeriodCost;
}

export interface ServerlessDetail {
  size: string;
  unitsPerHour: number;
  clusterCount: number;
}

export interface CostBreakdown {
  workload: string;
  kind: WorkloadKind;
  category: string;
  region: string;
  monthlyHours: number;
  unitPrice: number;
  // units per hour, after the multiplier
  primaryRate: number;
  secondaryRate: number;
  // units per month
  primaryUnits: number;
  secondaryUnits: number;
  totalUnits: number;
  primaryCost: PeriodCost;
  infraCost: InfraCost;
  total: PeriodCost;
  serverless?: ServerlessDetail;
  warnings: CostWarning[];
}

export interface Totals {
  workloadCount: number;
  totalUnits: number;
  // primary monthly cost / total units, or 0 if nothing was consumed
  effectiveUnitPrice: number;
  primaryCost: PeriodCost;
  infraCost: PeriodCost;
  total: PeriodCost;
}
