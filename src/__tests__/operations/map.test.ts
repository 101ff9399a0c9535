import { describe, it, expect } from "vitest";
import { success, failure, failures } from "../../core/result.js";
import { mapResult, flatMapResult } from "../../operations/map.js";
import { getErrors, getValue, isFailed } from "../../operations/query.js";
import type { Result } from "../../types/common.js";
import { Conflict, NotFound, ResourceErrors } from "../fixtures.js";

type Lookup<T> = Result<T, NotFound | Conflict>;

describe("mapResult()", () => {
  it("transforms the data on success", () => {
    const result = mapResult(success(ResourceErrors, 2), (n) => n * 10);
    expect(getValue(result)).toBe(20);
  });

  it("keeps the error set on success", () => {
    const result = mapResult(success(ResourceErrors, 2), String);
    expect(result.errorSet).toBe(ResourceErrors);
  });

  it("passes through errors unchanged", () => {
    const errors = [new NotFound("invoice"), new Conflict("invoice")];
    const original: Lookup<number> = failures(ResourceErrors, errors);
    const result = mapResult(original, (n) => `value: ${n}`);
    expect(isFailed(result)).toBe(true);
    expect(getErrors(result)).toEqual(errors);
    expect(result.errorSet).toBe(ResourceErrors);
  });

  it("does not call fn on failure", () => {
    let called = false;
    const original: Lookup<number> = failure(ResourceErrors, new NotFound("invoice"));
    mapResult(original, (n) => {
      called = true;
      return n;
    });
    expect(called).toBe(false);
  });

  it("produces a frozen object", () => {
    expect(Object.isFrozen(mapResult(success(ResourceErrors, 1), (n) => n + 1))).toBe(true);
  });
});

describe("flatMapResult()", () => {
  const lookup = (id: string): Lookup<string> =>
    id === "missing"
      ? failure(ResourceErrors, new NotFound(id))
      : success(ResourceErrors, `invoice:${id}`);

  it("chains a second Result-returning function on success", () => {
    const result = flatMapResult(success(ResourceErrors, "42"), lookup);
    expect(getValue(result)).toBe("invoice:42");
  });

  it("short-circuits on the first failure", () => {
    const conflict = new Conflict("invoice");
    const initial: Lookup<string> = failure(ResourceErrors, conflict);
    let called = false;
    const result = flatMapResult(initial, (id) => {
      called = true;
      return lookup(id);
    });
    expect(called).toBe(false);
    expect(getErrors(result)).toEqual([conflict]);
  });

  it("propagates errors from the chained function", () => {
    const result = flatMapResult(success(ResourceErrors, "missing"), lookup);
    expect(getErrors(result)).toEqual([new NotFound("missing")]);
  });
});
