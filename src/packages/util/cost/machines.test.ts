import { cmpMachineTypes, describeMachine, sortMachineTypes } from "./machines";

describe("sortMachineTypes", () => {
  it("orders by family, then by size", () => {
    expect(
      sortMachineTypes([
        "r5.2xlarge",
        "m5.large",
        "r5.large",
        "r5.12xlarge",
        "r5.xlarge",
        "r5.metal",
        "r5.medium",
      ]),
    ).toEqual([
      "m5.large",
      "r5.medium",
      "r5.large",
      "r5.xlarge",
      "r5.2xlarge",
      "r5.12xlarge",
      "r5.metal",
    ]);
  });

  it("drops duplicates", () => {
    expect(sortMachineTypes(["m5.large", "m5.large"])).toEqual(["m5.large"]);
  });
});

test("cmpMachineTypes", () => {
  expect(cmpMachineTypes("r5.xlarge", "r5.xlarge")).toBe(0);
  expect(cmpMachineTypes("r5.nano", "r5.micro")).toBeLessThan(0);
  expect(cmpMachineTypes("r5.4xlarge", "r5.2xlarge")).toBeGreaterThan(0);
});

test("describeMachine", () => {
  expect(describeMachine("r5.large", { vcpu: 2, memoryGib: 16 })).toBe(
    "r5.large (2 vCPU, 16 GiB)",
  );
  expect(describeMachine("r5.large", undefined)).toBe("r5.large");
});
