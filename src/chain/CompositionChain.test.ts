import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "../errors/InvalidArgumentError.js";
import { Chain, chainFrom } from "./CompositionChain.js";
import { applySteps, type Step } from "./composeSteps.js";

const thrownBy = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
};

const deductions: Step<number>[] = [
  (n) => n - 2400,
  (n) => n - 15000,
  (n) => n - 3000,
  (n) => n - 45000,
  (n) => n - 2000,
];

describe("chainFrom", () => {
  it("calculates the starting value when no steps are added", () => {
    expect(chainFrom(100000).calculate()).toBe(100000);
  });

  it("is also reachable as Chain.from", () => {
    expect(Chain.from("x").calculate()).toBe("x");
  });

  it("rejects null", () => {
    expect(() => chainFrom(null)).toThrow(InvalidArgumentError);
    expect(() => chainFrom(null)).toThrow("value must not be null");
  });

  it("rejects undefined", () => {
    expect(() => chainFrom(undefined)).toThrow(InvalidArgumentError);
  });

  it("accepts falsy but present values", () => {
    expect(chainFrom(0).calculate()).toBe(0);
    expect(chainFrom("").calculate()).toBe("");
  });
});

describe("with", () => {
  it("applies steps left to right", () => {
    const result = chainFrom(2)
      .with((n) => n + 3)
      .with((n) => n * 10)
      .calculate();

    expect(result).toBe(50);
  });

  it("computes the salary deduction example", () => {
    const result = chainFrom(100000)
      .with((n) => n - 2400)
      .with((n) => n - 15000)
      .with((n) => n - 3000)
      .with((n) => n - 45000)
      .with((n) => n - 2000)
      .calculate();

    expect(result).toBe(32600);
  });

  it("drops exactly the omitted step", () => {
    const result = chainFrom(100000)
      .with((n) => n - 2400)
      .with((n) => n - 15000)
      .with((n) => n - 3000)
      .with((n) => n - 45000)
      .calculate();

    expect(result).toBe(34600);
  });

  it("defers evaluation until calculate", () => {
    let calls = 0;
    const chain = chainFrom(1).with((n) => {
      calls++;
      return n + 1;
    });

    expect(calls).toBe(0);
    expect(chain.calculate()).toBe(2);
    expect(calls).toBe(1);
  });

  it("returns a new chain and leaves the previous one intact", () => {
    const base = chainFrom(10).with((n) => n + 1);
    const extended = base.with((n) => n * 3);

    expect(extended).not.toBe(base);
    expect(base.calculate()).toBe(11);
    expect(extended.calculate()).toBe(33);
  });

  it("lets two chains branch from the same base", () => {
    const base = chainFrom(10);
    const left = base.with((n) => n - 1);
    const right = base.with((n) => n + 1);

    expect(left.calculate()).toBe(9);
    expect(right.calculate()).toBe(11);
  });
});

describe("calculate", () => {
  it("returns the same value on every call", () => {
    const chain = chainFrom(7).with((n) => n * 6);

    expect(chain.calculate()).toBe(42);
    expect(chain.calculate()).toBe(42);
  });

  it("propagates a failing step unchanged", () => {
    const failure = new Error("step failed");
    const chain = chainFrom(1).with(() => {
      throw failure;
    });

    expect(thrownBy(() => chain.calculate())).toBe(failure);
  });

  it("handles a chain of 20,000 steps", () => {
    let chain = chainFrom(0);
    for (let i = 0; i < 20_000; i++) {
      chain = chain.with((n) => n + 1);
    }

    expect(chain.calculate()).toBe(20_000);
  });

  it("keeps branches independent when they share earlier steps", () => {
    const base = chainFrom("a").with((s) => `${s}b`);
    const left = base.with((s) => `${s}L`);
    const right = base.with((s) => `${s}R`).with((s) => `${s}!`);

    expect(left.calculate()).toBe("abL");
    expect(right.calculate()).toBe("abR!");
    expect(base.calculate()).toBe("ab");
  });

  it("matches applySteps for the same steps", () => {
    const chained = deductions.reduce(
      (chain, step) => chain.with(step),
      chainFrom(100000),
    );

    expect(chained.calculate()).toBe(applySteps(100000, deductions));
  });

  it("omitting any single step matches the fold without it", () => {
    deductions.forEach((_, skipped) => {
      const remaining = deductions.filter((__, index) => index !== skipped);
      const chained = remaining.reduce(
        (chain, step) => chain.with(step),
        chainFrom(100000),
      );

      expect(chained.calculate()).toBe(applySteps(100000, remaining));
    });
  });
});
