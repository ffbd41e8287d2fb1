import type { CriterionDef, CriterionKind, ZeroMetricPolicy } from "../pipeline/types.js";
import { ComputationError } from "./errors.js";
import { compensatedSum, toMinorUnits } from "../table/helpers.js";

/**
 * An allocation rule: turns the weights of a group's members into shares
 * that sum to 1. Implementations hold no state between groups.
 */
export interface Criterion {
  readonly kind: CriterionKind;
  shares(weights: readonly number[], context: string): number[];
}

/** `metric_i / Σ metric`, with an explicit policy for all-zero groups. */
export class ProportionalByMetric implements Criterion {
  readonly kind = "proportional";

  constructor(
    private readonly zeroMetric: ZeroMetricPolicy = "equal_split",
    private readonly allowNegative = false
  ) {}

  shares(weights: readonly number[], context: string): number[] {
    let total = 0;
    for (const weight of weights) {
      if (!Number.isFinite(weight)) {
        throw new ComputationError(`${context}: non-finite metric ${weight}`);
      }
      if (weight < 0 && !this.allowNegative) {
        throw new ComputationError(
          `${context}: negative metric ${weight} in a proportional split (set allow_negative to permit it)`
        );
      }
      total += weight;
    }
    if (!Number.isFinite(total)) {
      throw new ComputationError(`${context}: metric sum overflowed`);
    }

    if (total === 0) {
      if (this.zeroMetric === "fail") {
        throw new ComputationError(`${context}: metrics sum to zero and zero_metric is "fail"`);
      }
      return equalShares(weights.length);
    }

    const shares = weights.map((weight) => weight / total);
    for (const share of shares) {
      if (!Number.isFinite(share)) {
        throw new ComputationError(`${context}: non-finite share ${share}`);
      }
    }
    return shares;
  }
}

/** Every member receives the same share whatever its metric. */
export class EqualSplit implements Criterion {
  readonly kind = "equal";

  shares(weights: readonly number[]): number[] {
    return equalShares(weights.length);
  }
}

function equalShares(count: number): number[] {
  return Array.from({ length: count }, () => 1 / count);
}

export function criterionFor(def: CriterionDef): Criterion {
  switch (def.kind) {
    case "proportional":
      return new ProportionalByMetric(def.zero_metric, def.allow_negative);
    case "equal":
      return new EqualSplit();
  }
}

export interface Split {
  amounts: number[];
  /** What rounding left over; already added to `amounts[designated]`. */
  residual: number;
  designated: number;
  /**
   * Part of `total` below one minor unit, left unallocated. Zero whenever
   * `total` is a whole number of minor units, or when `decimals` is null.
   */
  remainder: number;
}

/**
 * Member that absorbs the rounding residual: the largest share, ties going
 * to the earliest member.
 */
export function designatedMember(shares: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < shares.length; i++) {
    if (shares[i] > shares[best]) best = i;
  }
  return best;
}

/**
 * Split `total` by `shares`. With `decimals` set, the total is taken as a
 * whole number of minor units (10^-decimals), each provisional amount is
 * rounded to whole units and the difference goes to the designated member,
 * so the amounts add back up to the total in exact integer arithmetic.
 */
export function splitAmount(
  total: number,
  shares: readonly number[],
  decimals: number | null,
  context: string
): Split {
  if (shares.length === 0) {
    throw new ComputationError(`${context}: cannot split ${total} across zero members`);
  }
  if (!Number.isFinite(total)) {
    throw new ComputationError(`${context}: non-finite amount ${total}`);
  }

  const designated = designatedMember(shares);
  if (decimals === null) return splitUnrounded(total, shares, designated, context);

  const scale = 10 ** decimals;
  const totalUnits = toMinorUnits(total, decimals);
  if (!Number.isSafeInteger(totalUnits)) {
    throw new ComputationError(`${context}: amount ${total} overflows at ${decimals} decimals`);
  }

  const units = shares.map((share) => Math.round(totalUnits * share));
  let allocated = 0;
  for (const unit of units) allocated += unit;
  const residualUnits = totalUnits - allocated;
  units[designated] += residualUnits;

  for (const unit of units) {
    if (!Number.isSafeInteger(unit)) {
      throw new ComputationError(`${context}: non-finite allocation while splitting ${total}`);
    }
  }

  return {
    amounts: units.map((unit) => positiveZero(unit / scale)),
    residual: positiveZero(residualUnits / scale),
    designated,
    remainder: positiveZero(total - totalUnits / scale),
  };
}

function splitUnrounded(
  total: number,
  shares: readonly number[],
  designated: number,
  context: string
): Split {
  const amounts = shares.map((share) => total * share);
  const residual = total - compensatedSum(amounts);
  amounts[designated] += residual;

  for (const amount of amounts) {
    if (!Number.isFinite(amount)) {
      throw new ComputationError(`${context}: non-finite allocation while splitting ${total}`);
    }
  }

  return {
    amounts: amounts.map(positiveZero),
    residual: positiveZero(residual),
    designated,
    remainder: 0,
  };
}

function positiveZero(value: number): number {
  return Object.is(value, -0) ? 0 : value;
}
