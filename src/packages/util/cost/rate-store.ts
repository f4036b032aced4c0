/*
Read-only access to a RateTable.

Every lookup returns {value, found}.  A missing key is a perfectly valid
state: the value is then 0 (or, for infra rates, the size heuristic from
./infra-rate) and found is false, so the caller can attach a warning.

A RateStore is never mutated after construction, so one instance can be
shared by any number of calculations.
*/

import { ANY_CATEGORY, DEFAULT_SERVERLESS_CATEGORIES } from "./consts";
import { estimateInfraRate } from "./infra-rate";
import { describeMachine, sortMachineTypes } from "./machines";
import type {
  ConsumptionRateEntry,
  InfraLookup,
  Lookup,
  MachineSpec,
  RateTable,
} from "./types";

export interface RateStoreOptions {
  // if false, a missing infra rate is 0 instead of an estimate
  estimateMissingInfraRates?: boolean;
  serverlessCategories?: readonly string[];
}

const NOT_FOUND: Lookup = Object.freeze({ value: 0, found: false });

function get<T>(obj: { [key: string]: T } | undefined, key: string): T | undefined {
  if (obj == null || !Object.prototype.hasOwnProperty.call(obj, key)) {
    return undefined;
  }
  return obj[key];
}

export function emptyRateTable(): RateTable {
  return {
    unitPrices: {},
    consumptionRates: {},
    infraRates: {},
    machineSpecs: {},
    serverlessSizes: {},
  };
}

export class RateStore {
  private readonly rates: RateTable;
  private readonly estimateMissingInfraRates: boolean;
  private readonly serverlessCategories: ReadonlySet<string>;

  constructor(rates: RateTable = emptyRateTable(), opts: RateStoreOptions = {}) {
    this.rates = rates;
    this.estimateMissingInfraRates = opts.estimateMissingInfraRates ?? true;
    this.serverlessCategories = new Set(
      opts.serverlessCategories ?? DEFAULT_SERVERLESS_CATEGORIES,
    );
  }

  isServerless(category: string): boolean {
    return this.serverlessCategories.has(category);
  }

  lookupUnitPrice(category: string, region: string): Lookup {
    const entry = get(get(this.rates.unitPrices, category), region);
    if (entry == null) {
      return NOT_FOUND;
    }
    return { value: entry.pricePerUnit, found: true };
  }

  private consumptionEntry(
    machineType: string,
    category: string,
  ): ConsumptionRateEntry | undefined {
    const byCategory = get(this.rates.consumptionRates, machineType);
    return get(byCategory, category) ?? get(byCategory, ANY_CATEGORY);
  }

  lookupConsumptionRate(machineType: string, category: string): Lookup {
    const entry = this.consumptionEntry(machineType, category);
    if (entry == null) {
      return NOT_FOUND;
    }
    return { value: entry.unitsPerHour, found: true };
  }

  lookupNominalHourlyPrice(machineType: string, category: string): Lookup {
    const price = this.consumptionEntry(machineType, category)?.nominalHourlyPrice;
    if (price == null) {
      return NOT_FOUND;
    }
    return { value: price, found: true };
  }

  lookupInfraRate(machineType: string, region: string): InfraLookup {
    const entry = get(get(this.rates.infraRates, machineType), region);
    if (entry != null) {
      return { value: entry.pricePerHour, found: true, estimated: false };
    }
    if (!this.estimateMissingInfraRates) {
      return { value: 0, found: false, estimated: false };
    }
    return {
      value: estimateInfraRate(machineType),
      found: false,
      estimated: true,
    };
  }

  lookupServerlessSize(size: string): Lookup {
    const entry = get(this.rates.serverlessSizes, size);
    if (entry == null) {
      return NOT_FOUND;
    }
    return { value: entry.unitsPerHour, found: true };
  }

  getMachineSpec(machineType: string): MachineSpec | undefined {
    return get(this.rates.machineSpecs, machineType);
  }

  describeMachine(machineType: string): string {
    return describeMachine(machineType, this.getMachineSpec(machineType));
  }

  machineTypes(): string[] {
    return sortMachineTypes([
      ...Object.keys(this.rates.consumptionRates),
      ...Object.keys(this.rates.infraRates),
      ...Object.keys(this.rates.machineSpecs),
    ]);
  }

  categories(): string[] {
    return Object.keys(this.rates.unitPrices).sort();
  }

  regions(category?: string): string[] {
    const categories =
      category == null ? Object.keys(this.rates.unitPrices) : [category];
    const regions = new Set<string>();
    for (const c of categories) {
      for (const region of Object.keys(get(this.rates.unitPrices, c) ?? {})) {
        regions.add(region);
      }
    }
    return Array.from(regions).sort();
  }

  serverlessSizes(): string[] {
    return Object.keys(this.rates.serverlessSizes);
  }

  lastUpdate() {
    return this.rates.lastUpdate;
  }
}
