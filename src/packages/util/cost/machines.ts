import type { MachineSpec } from "./types";

const NAMED_SIZES: { [size: string]: number } = {
  nano: 0.1,
  micro: 0.2,
  small: 0.3,
  medium: 0.4,
  large: 1,
  xlarge: 2,
  metal: 1000,
};

function sizeOrder(size: string): number {
  if (Object.prototype.hasOwnProperty.call(NAMED_SIZES, size)) {
    return NAMED_SIZES[size];
  }
  const m = size.match(/^(\d+)xlarge$/);
  if (m != null) {
    // 2xlarge comes right after xlarge, and so on
    return parseInt(m[1]) + 1;
  }
  return 1;
}

function splitMachineType(machineType: string): [string, string] {
  const i = machineType.indexOf(".");
  if (i == -1) {
    return [machineType, ""];
  }
  return [machineType.slice(0, i), machineType.slice(i + 1)];
}

// Sort "r5.large, r5.xlarge, r5.2xlarge, r5.12xlarge" in that order
// rather than lexicographically.
export function cmpMachineTypes(a: string, b: string): number {
  const [familyA, sizeA] = splitMachineType(a);
  const [familyB, sizeB] = splitMachineType(b);
  if (familyA != familyB) {
    return familyA < familyB ? -1 : 1;
  }
  const c = sizeOrder(sizeA) - sizeOrder(sizeB);
  if (c != 0) {
    return c;
  }
  return sizeA < sizeB ? -1 : sizeA > sizeB ? 1 : 0;
}

export function sortMachineTypes(machineTypes: Iterable<string>): string[] {
  return Array.from(new Set(machineTypes)).sort(cmpMachineTypes);
}

export function describeMachine(
  machineType: string,
  spec: MachineSpec | undefined,
): string {
  if (spec == null) {
    return machineType;
  }
  return `${machineType} (${spec.vcpu} vCPU, ${spec.memoryGib} GiB)`;
}
