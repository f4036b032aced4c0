import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { getConfig } from "./config";
import estimateCosts, {
  createRateStore,
  getRateStore,
  resetRateStore,
  sessionFromRows,
} from "./estimate";
import getLogger from "./logger";

const REPO_DATA = join(__dirname, "..", "..", "..", "data");
const config = getConfig({});
const store = createRateStore(REPO_DATA, config);

const clusterRow = {
  category: "all-purpose",
  purpose: "etl",
  primaryMachine: "r5.large",
  secondaryMachine: "r5.xlarge",
  secondaryNodes: 2,
  dailyHours: 8,
  monthlyHours: 160,
};

const serverlessRow = {
  category: "serverless-warehouse",
  size: "Small",
  clusterCount: "2",
  dailyHours: "8",
  monthlyDays: 20,
};

describe("estimating rows of input", () => {
  const session = sessionFromRows([clusterRow, serverlessRow], store, config);

  it("parses the rows", () => {
    expect(session.workloads.map(({ kind, purpose, region }) => [kind, purpose, region])).toEqual([
      ["cluster", "etl", "us-east-1"],
      ["serverless", "Workload 2", "us-east-1"],
    ]);
  });

  it("costs a cluster workload", () => {
    const [etl] = estimateCosts(session, store, config).breakdowns;
    expect(etl.totalUnits).toBe(275.2);
    expect(etl.primaryCost.monthly).toBe(151.36);
    expect(etl.infraCost.primary.monthly).toBe(20.16);
    expect(etl.infraCost.secondary.monthly).toBe(80.64);
    expect(etl.infraCost.total.monthly).toBe(100.8);
    expect(etl.total.monthly).toBe(252.16);
    expect(etl.warnings).toEqual([]);
  });

  it("costs a serverless workload", () => {
    const [, warehouse] = estimateCosts(session, store, config).breakdowns;
    expect(warehouse.monthlyHours).toBe(160);
    expect(warehouse.totalUnits).toBe(3840);
    expect(warehouse.total.monthly).toBe(2688);
    expect(warehouse.infraCost.total.monthly).toBe(0);
  });

  it("adds up the totals", () => {
    const { totals, warnings } = estimateCosts(session, store, config);
    expect(totals.workloadCount).toBe(2);
    expect(totals.totalUnits).toBe(4115.2);
    expect(totals.primaryCost.monthly).toBe(2839.36);
    expect(totals.infraCost.monthly).toBe(100.8);
    expect(totals.total.monthly).toBe(2940.16);
    expect(warnings).toEqual([]);
  });
});

describe("bad input", () => {
  it("names the row that is invalid", () => {
    expect(() =>
      sessionFromRows(
        [clusterRow, { category: "jobs", dailyHours: "x" }],
        store,
        config,
      ),
    ).toThrow('row 2: dailyHours must be a number but is "x"');
  });

  it("estimates the infra rate of an unknown machine", () => {
    const session = sessionFromRows(
      [{ ...clusterRow, secondaryMachine: "m7.xlarge" }],
      store,
      config,
    );
    const { warnings } = estimateCosts(session, store, config);
    expect(warnings.map(({ code }) => code)).toEqual([
      "missing-consumption-rate",
      "estimated-infra-rate",
    ]);
  });
});

describe("the shared rate store", () => {
  afterEach(resetRateStore);

  it("is loaded once", () => {
    const s = getRateStore();
    expect(getRateStore()).toBe(s);
    expect(s.lookupUnitPrice("jobs", "us-east-1")).toEqual({
      value: 0.15,
      found: true,
    });
  });

  it("is loaded again after a reset", () => {
    const s = getRateStore();
    resetRateStore();
    expect(getRateStore()).not.toBe(s);
  });
});

describe("loading the rate store", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "estimate-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  it("reports each missing rate file once", () => {
    const loaderWarn = jest.spyOn(getLogger("rate-loader"), "warn");
    const estimateWarn = jest.spyOn(getLogger("estimate"), "warn");
    const empty = createRateStore(dir, config);
    expect(empty.categories()).toEqual([]);
    const missing = `rate file '${join(dir, "unit-prices.json")}' not found`;
    expect(
      loaderWarn.mock.calls.filter(([message]) => message == missing).length,
    ).toBe(1);
    expect(estimateWarn).not.toHaveBeenCalled();
  });
});
