import {
  parseWorkloadInput,
  validateWorkloadInput,
  WorkloadInputError,
} from "./workload";

const defaults = {
  region: "R1",
  isServerless: (category: string) => category == "serverless-warehouse",
};

const row = {
  category: "standard",
  purpose: "ETL",
  primaryMachine: "m5.large",
  secondaryMachine: "m5.xlarge",
  secondaryNodes: "2",
  dailyHours: "8",
  monthlyHours: "160",
  multiplier: "true",
};

function fieldOf(f: () => unknown): string | undefined {
  try {
    f();
  } catch (err) {
    if (err instanceof WorkloadInputError) {
      return err.field;
    }
    throw err;
  }
  throw Error("did not throw");
}

describe("cluster rows", () => {
  it("parses numbers and booleans given as strings", () => {
    expect(parseWorkloadInput(row, defaults)).toEqual({
      kind: "cluster",
      category: "standard",
      purpose: "ETL",
      region: "R1",
      dailyHours: 8,
      monthlyHours: 160,
      primaryMachine: "m5.large",
      secondaryMachine: "m5.xlarge",
      secondaryNodes: 2,
      multiplier: true,
    });
  });

  it("returns a frozen descriptor", () => {
    expect(Object.isFrozen(parseWorkloadInput(row, defaults))).toBe(true);
  });

  it("uses the primary machine when no secondary machine is given", () => {
    const { secondaryMachine: _, ...rest } = row;
    const w = parseWorkloadInput(rest, defaults);
    expect(w.kind == "cluster" && w.secondaryMachine).toBe("m5.large");
    const same = parseWorkloadInput(
      { ...row, secondaryMachine: "same-as-primary" },
      defaults,
    );
    expect(same.kind == "cluster" && same.secondaryMachine).toBe("m5.large");
  });

  it("computes monthly hours from daily hours and days", () => {
    const { monthlyHours: _, ...rest } = row;
    const w = parseWorkloadInput({ ...rest, monthlyDays: 20 }, defaults);
    expect(w.monthlyHours).toBe(160);
  });

  it("fills in region, purpose and multiplier", () => {
    const { purpose: _, multiplier: __, ...rest } = row;
    const w = parseWorkloadInput(rest, { ...defaults, index: 2 });
    expect(w.purpose).toBe("Workload 3");
    expect(w.region).toBe("R1");
    expect(w.kind == "cluster" && w.multiplier).toBe(false);
    expect(parseWorkloadInput({ ...row, region: "R2" }, defaults).region).toBe(
      "R2",
    );
  });
});

describe("serverless rows", () => {
  const serverless = {
    category: "serverless-warehouse",
    purpose: "BI",
    size: "Medium",
    clusterCount: 2,
    dailyHours: 8,
    monthlyHours: 160,
  };

  it("parses size and cluster count", () => {
    expect(parseWorkloadInput(serverless, defaults)).toEqual({
      kind: "serverless",
      category: "serverless-warehouse",
      purpose: "BI",
      region: "R1",
      dailyHours: 8,
      monthlyHours: 160,
      size: "Medium",
      clusterCount: 2,
    });
  });

  it("defaults to one cluster", () => {
    const { clusterCount: _, ...rest } = serverless;
    const w = parseWorkloadInput(rest, defaults);
    expect(w.kind == "serverless" && w.clusterCount).toBe(1);
  });

  it("requires a size and a positive cluster count", () => {
    const { size: _, ...rest } = serverless;
    expect(fieldOf(() => parseWorkloadInput(rest, defaults))).toBe("size");
    expect(
      fieldOf(() =>
        parseWorkloadInput({ ...serverless, clusterCount: 0 }, defaults),
      ),
    ).toBe("clusterCount");
  });
});

describe("malformed input is rejected", () => {
  it("rejects non-numeric hours", () => {
    expect(() =>
      parseWorkloadInput({ ...row, dailyHours: "abc" }, defaults),
    ).toThrow('dailyHours must be a number but is "abc"');
  });

  it("rejects out of range hours", () => {
    expect(() =>
      parseWorkloadInput({ ...row, dailyHours: 25 }, defaults),
    ).toThrow("dailyHours must be between 0 and 24 but is 25");
    expect(
      fieldOf(() => parseWorkloadInput({ ...row, monthlyHours: 745 }, defaults)),
    ).toBe("monthlyHours");
  });

  it("rejects fractional or negative node counts", () => {
    expect(() =>
      parseWorkloadInput({ ...row, secondaryNodes: 1.5 }, defaults),
    ).toThrow("secondaryNodes must be an integer");
    expect(
      fieldOf(() => parseWorkloadInput({ ...row, secondaryNodes: -1 }, defaults)),
    ).toBe("secondaryNodes");
  });

  it("rejects a multiplier that is not a boolean", () => {
    expect(
      fieldOf(() => parseWorkloadInput({ ...row, multiplier: "maybe" }, defaults)),
    ).toBe("multiplier");
  });

  it("rejects a missing category or machine", () => {
    expect(
      fieldOf(() => parseWorkloadInput({ ...row, category: " " }, defaults)),
    ).toBe("category");
    expect(
      fieldOf(() => parseWorkloadInput({ ...row, primaryMachine: 5 }, defaults)),
    ).toBe("primaryMachine");
  });

  it("rejects things that are not rows", () => {
    expect(() => parseWorkloadInput(null, defaults)).toThrow(
      "workload must be an object",
    );
    expect(() => parseWorkloadInput([row], defaults)).toThrow(
      WorkloadInputError,
    );
  });
});

test("validateWorkloadInput returns the error message", () => {
  expect(validateWorkloadInput(row, defaults)).toBe(undefined);
  expect(validateWorkloadInput({ ...row, dailyHours: 30 }, defaults)).toBe(
    "dailyHours must be between 0 and 24 but is 30",
  );
});
