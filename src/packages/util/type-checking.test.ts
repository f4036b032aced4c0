import {
  is_nonnegative_number,
  is_object,
  to_boolean,
  to_number,
} from "./type-checking";

describe("to_number", () => {
  it("accepts numbers and numeric strings", () => {
    expect(to_number(8)).toBe(8);
    expect(to_number(" 0.5 ")).toBe(0.5);
    expect(to_number("160")).toBe(160);
  });

  it("rejects everything else", () => {
    expect(to_number("abc")).toBe(undefined);
    expect(to_number("")).toBe(undefined);
    expect(to_number(NaN)).toBe(undefined);
    expect(to_number(Infinity)).toBe(undefined);
    expect(to_number(null)).toBe(undefined);
    expect(to_number([1])).toBe(undefined);
  });
});

test("to_boolean", () => {
  expect(to_boolean(true)).toBe(true);
  expect(to_boolean("TRUE")).toBe(true);
  expect(to_boolean("no")).toBe(false);
  expect(to_boolean("")).toBe(false);
  expect(to_boolean("maybe")).toBe(undefined);
  expect(to_boolean(1)).toBe(undefined);
});

test("is_nonnegative_number", () => {
  expect(is_nonnegative_number(0)).toBe(true);
  expect(is_nonnegative_number(0.65)).toBe(true);
  expect(is_nonnegative_number(-1)).toBe(false);
  expect(is_nonnegative_number("1")).toBe(false);
  expect(is_nonnegative_number(NaN)).toBe(false);
});

test("is_object", () => {
  expect(is_object({})).toBe(true);
  expect(is_object([])).toBe(false);
  expect(is_object(null)).toBe(false);
  expect(is_object(new Date())).toBe(false);
});
