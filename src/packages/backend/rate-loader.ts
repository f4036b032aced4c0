/*
Load the rate files from the data directory into a RateTable.

Nothing here is fatal.  A missing file leaves its part of the table empty
and produces a "missing-config" warning; a file that isn't valid JSON, or
an entry with the wrong shape (e.g., a negative price), is dropped with an
"invalid-config" warning.  Lookups against the empty parts then simply
miss, and the calculator reports that per workload.
*/

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { isEmpty } from "lodash";
import { emptyRateTable } from "@costcalc/util/cost/rate-store";
import type {
  ConsumptionRateEntry,
  CostWarning,
  InfraRateEntry,
  LastUpdate,
  MachineSpec,
  RateTable,
  ServerlessSizeEntry,
  UnitPriceEntry,
} from "@costcalc/util/cost/types";
import {
  is_nonnegative_number,
  is_object,
  is_string,
} from "@costcalc/util/type-checking";
import { data } from "./data";
import getLogger from "./logger";

const logger = getLogger("rate-loader");

export const RATE_FILES = {
  unitPrices: "unit-prices.json",
  consumptionRates: "consumption-rates.json",
  infraRates: "infra-rates.json",
  machineSpecs: "machine-specs.json",
  serverlessSizes: "serverless-sizes.json",
  lastUpdate: "last-update.json",
} as const;

export interface LoadedRates {
  rates: RateTable;
  warnings: CostWarning[];
}

type Parser<T> = (value: unknown) => T | undefined;

function numberField(obj: { [key: string]: unknown }, field: string) {
  const x = obj[field];
  return is_nonnegative_number(x) ? x : undefined;
}

const parseUnitPrice: Parser<UnitPriceEntry> = (value) => {
  if (!is_object(value)) return;
  const pricePerUnit = numberField(value, "pricePerUnit");
  return pricePerUnit == null ? undefined : { pricePerUnit };
};

const parseConsumptionRate: Parser<ConsumptionRateEntry> = (value) => {
  if (!is_object(value)) return;
  const unitsPerHour = numberField(value, "unitsPerHour");
  if (unitsPerHour == null) return;
  if (value.nominalHourlyPrice == null) {
    return { unitsPerHour };
  }
  const nominalHourlyPrice = numberField(value, "nominalHourlyPrice");
  return nominalHourlyPrice == null
    ? undefined
    : { unitsPerHour, nominalHourlyPrice };
};

const parseInfraRate: Parser<InfraRateEntry> = (value) => {
  if (!is_object(value)) return;
  const pricePerHour = numberField(value, "pricePerHour");
  return pricePerHour == null ? undefined : { pricePerHour };
};

const parseMachineSpec: Parser<MachineSpec> = (value) => {
  if (!is_object(value)) return;
  const vcpu = numberField(value, "vcpu");
  const memoryGib = numberField(value, "memoryGib");
  return vcpu == null || memoryGib == null ? undefined : { vcpu, memoryGib };
};

const parseServerlessSize: Parser<ServerlessSizeEntry> = (value) => {
  if (!is_object(value)) return;
  const unitsPerHour = numberField(value, "unitsPerHour");
  return unitsPerHour == null ? undefined : { unitsPerHour };
};

class Loader {
  readonly warnings: CostWarning[] = [];

  constructor(private readonly dir: string) {}

  private invalid(message: string) {
    logger.error(message);
    this.warnings.push({ code: "invalid-config", message });
  }

  // Returns the parsed JSON of the file, or undefined if it is missing or broken.
  read(file: string, { optional }: { optional?: boolean } = {}): unknown {
    const path = join(this.dir, file);
    if (!existsSync(path)) {
      if (!optional) {
        const message = `rate file '${path}' not found`;
        logger.warn(message);
        this.warnings.push({ code: "missing-config", message });
      }
      return;
    }
    try {
      return JSON.parse(readFileSync(path, "utf8"));
    } catch (err) {
      this.invalid(`unable to read rate file '${path}' -- ${err}`);
      return;
    }
  }

  entries<T>(
    obj: unknown,
    where: string,
    parse: Parser<T>,
  ): { [key: string]: T } {
    const result: { [key: string]: T } = {};
    if (obj === undefined) {
      return result;
    }
    if (!is_object(obj)) {
      this.invalid(`${where} must be a JSON object`);
      return result;
    }
    for (const key in obj) {
      const entry = parse(obj[key]);
      if (entry === undefined) {
        this.invalid(`ignoring invalid entry ${where}:${key}`);
      } else {
        result[key] = entry;
      }
    }
    return result;
  }

  // two levels deep, e.g., category -> region -> entry
  nested<T>(
    file: string,
    parse: Parser<T>,
  ): { [key: string]: { [key: string]: T } } {
    const result: { [key: string]: { [key: string]: T } } = {};
    const obj = this.read(file);
    if (obj === undefined) {
      return result;
    }
    if (!is_object(obj)) {
      this.invalid(`${file} must be a JSON object`);
      return result;
    }
    for (const key in obj) {
      result[key] = this.entries(obj[key], `${file}:${key}`, parse);
    }
    return result;
  }

  lastUpdate(): LastUpdate | undefined {
    const obj = this.read(RATE_FILES.lastUpdate, { optional: true });
    if (obj === undefined) {
      return;
    }
    if (!is_object(obj)) {
      this.invalid(`${RATE_FILES.lastUpdate} must be a JSON object`);
      return;
    }
    const lastUpdate: LastUpdate = {};
    if (is_string(obj.unitPrices)) {
      lastUpdate.unitPrices = obj.unitPrices;
    }
    if (is_string(obj.infraRates)) {
      lastUpdate.infraRates = obj.infraRates;
    }
    return lastUpdate;
  }
}

export default function loadRates(dir: string = data): LoadedRates {
  const loader = new Loader(dir);
  const rates: RateTable = {
    ...emptyRateTable(),
    unitPrices: loader.nested(RATE_FILES.unitPrices, parseUnitPrice),
    consumptionRates: loader.nested(
      RATE_FILES.consumptionRates,
      parseConsumptionRate,
    ),
    infraRates: loader.nested(RATE_FILES.infraRates, parseInfraRate),
    machineSpecs: loader.entries(
      loader.read(RATE_FILES.machineSpecs),
      RATE_FILES.machineSpecs,
      parseMachineSpec,
    ),
    serverlessSizes: loader.entries(
      loader.read(RATE_FILES.serverlessSizes),
      RATE_FILES.serverlessSizes,
      parseServerlessSize,
    ),
  };
  const lastUpdate = loader.lastUpdate();
  if (lastUpdate != null) {
    rates.lastUpdate = lastUpdate;
  }
  if (isEmpty(rates.unitPrices)) {
    logger.warn(`no unit prices loaded from '${dir}', all consumption costs will be 0`);
  }
  logger.debug("loaded rates", {
    dir,
    categories: Object.keys(rates.unitPrices).length,
    machines: Object.keys(rates.consumptionRates).length,
    warnings: loader.warnings.length,
  });
  return { rates, warnings: loader.warnings };
}

export { loadRates };
