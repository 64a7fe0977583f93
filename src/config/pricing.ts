/**
 * Pricing
 *
 * The single source of truth for how money maps to credits and what a
 * generation costs. Nothing else in the code base derives these numbers.
 */

const parsePositiveInt = (raw: string | undefined, fallback: number): number => {
  const parsed = raw ? parseInt(raw, 10) : NaN;
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

/** 1 RUB buys 1 credit. */
export const CREDITS_PER_RUB = 1;

/** Credits reserved (and on success committed) per generation job. */
export const GENERATION_COST = parsePositiveInt(process.env.GENERATION_COST, 10);

export interface TopupPackage {
  rubAmount: number;
  credits: number;
  label: string;
}

export const creditsForRub = (rubAmount: number): number => rubAmount * CREDITS_PER_RUB;

const topupPackage = (rubAmount: number): TopupPackage => {
  const credits = creditsForRub(rubAmount);
  return { rubAmount, credits, label: `${rubAmount} RUB → ${credits} credits` };
};

export const TOPUP_PACKAGES: readonly TopupPackage[] = [100, 200, 300].map(topupPackage);

export const findTopupPackage = (rubAmount: number): TopupPackage | undefined =>
  TOPUP_PACKAGES.find((pkg) => pkg.rubAmount === rubAmount);
