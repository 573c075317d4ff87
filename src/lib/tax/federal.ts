// /src/lib/tax/federal.ts
// 2025 federal bracket helpers for estimating a filer's federal rate (deterministic; no external deps)

/**
 * Sources for 2025 inflation-adjusted parameters:
 * - Ordinary income tax brackets and standard deduction: IRS Rev. Proc. 2024-40
 *
 * Notes:
 * - Offer comparison applies a single flat federal rate to taxable wages. These
 *   helpers only suggest that rate from an annual income figure.
 * - Standard deduction only. No AMT, credits, payroll taxes or preferential rates.
 */

export const FILING_STATUSES_2025 = ["single", "mfj", "mfs", "hoh", "qw"] as const;
export type FilingStatus2025 = (typeof FILING_STATUSES_2025)[number];

function roundToCents(x: number): number {
  return Math.round((x + Number.EPSILON) * 100) / 100;
}
function clampMin0(x: number): number {
  return x < 0 ? 0 : x;
}

type Bracket = { upTo: number; rate: number }; // upTo is inclusive upper bound for the bracket
type BracketsByStatus = Record<FilingStatus2025, Bracket[]>;

const MFJ_BRACKETS_2025: Bracket[] = [
  { upTo: 23_850, rate: 0.10 },
  { upTo: 96_950, rate: 0.12 },
  { upTo: 206_700, rate: 0.22 },
  { upTo: 394_600, rate: 0.24 },
  { upTo: 501_050, rate: 0.32 },
  { upTo: 751_600, rate: 0.35 },
  { upTo: Number.POSITIVE_INFINITY, rate: 0.37 },
];

/**
 * 2025 ordinary income brackets (taxable income after deductions).
 * Rates: 10%, 12%, 22%, 24%, 32%, 35%, 37%.
 */
const ORDINARY_BRACKETS_2025: BracketsByStatus = {
  single: [
    { upTo: 11_925, rate: 0.10 },
    { upTo: 48_475, rate: 0.12 },
    { upTo: 103_350, rate: 0.22 },
    { upTo: 197_300, rate: 0.24 },
    { upTo: 250_525, rate: 0.32 },
    { upTo: 626_350, rate: 0.35 },
    { upTo: Number.POSITIVE_INFINITY, rate: 0.37 },
  ],
  mfj: MFJ_BRACKETS_2025,
  mfs: [
    { upTo: 11_925, rate: 0.10 },
    { upTo: 48_475, rate: 0.12 },
    { upTo: 103_350, rate: 0.22 },
    { upTo: 197_300, rate: 0.24 },
    { upTo: 250_525, rate: 0.32 },
    { upTo: 375_800, rate: 0.35 },
    { upTo: Number.POSITIVE_INFINITY, rate: 0.37 },
  ],
  hoh: [
    { upTo: 17_000, rate: 0.10 },
    { upTo: 64_850, rate: 0.12 },
    { upTo: 103_350, rate: 0.22 },
    { upTo: 197_300, rate: 0.24 },
    { upTo: 250_500, rate: 0.32 },
    { upTo: 626_350, rate: 0.35 },
    { upTo: Number.POSITIVE_INFINITY, rate: 0.37 },
  ],
  // Qualifying widow(er) uses MFJ brackets
  qw: MFJ_BRACKETS_2025,
};

const STANDARD_DEDUCTION_2025: Record<FilingStatus2025, number> = {
  single: 15_000,
  mfj: 30_000,
  mfs: 15_000,
  hoh: 22_500,
  qw: 30_000,
};

/**
 * Compute tax on a taxable amount using a bracket table.
 * @param taxable Taxable income for the bracket schedule (>= 0).
 */
export function computeBracketTax(taxable: number, brackets: readonly Bracket[]): number {
  const x = clampMin0(taxable);

  let tax = 0;
  let prevUpper = 0;

  for (const b of brackets) {
    const upper = b.upTo;
    if (x <= prevUpper) break;

    const amtInBracket = Math.min(x, upper) - prevUpper;
    tax += amtInBracket * b.rate;
    prevUpper = upper;
  }

  return roundToCents(tax);
}

export function getStandardDeduction2025(status: FilingStatus2025): number {
  return STANDARD_DEDUCTION_2025[status];
}

export function computeTaxableIncome2025(params: {
  filingStatus: FilingStatus2025;
  grossTaxableWages: number;
}): { standardDeduction: number; taxableIncome: number } {
  const sd = getStandardDeduction2025(params.filingStatus);
  const taxableIncome = clampMin0(params.grossTaxableWages - sd);
  return { standardDeduction: sd, taxableIncome: roundToCents(taxableIncome) };
}

/**
 * Marginal bracket rate for an annual taxable income (after deductions).
 * Income at or below zero sits in the lowest bracket.
 */
export function estimateFederalMarginalRate2025(
  taxableIncome: number,
  filingStatus: FilingStatus2025 = "single",
): number {
  const brackets = ORDINARY_BRACKETS_2025[filingStatus];
  const x = clampMin0(taxableIncome);

  for (const b of brackets) {
    if (x <= b.upTo) return b.rate;
  }
  return 0.37;
}

/**
 * Average federal rate on gross taxable wages (tax after the standard deduction
 * divided by wages). Rounded to 4 places; 0 when wages are 0.
 */
export function estimateFederalEffectiveRate2025(
  grossTaxableWages: number,
  filingStatus: FilingStatus2025 = "single",
): number {
  const wages = clampMin0(grossTaxableWages);
  if (wages === 0) return 0;

  const { taxableIncome } = computeTaxableIncome2025({ filingStatus, grossTaxableWages: wages });
  const tax = computeBracketTax(taxableIncome, ORDINARY_BRACKETS_2025[filingStatus]);

  return Math.round((tax / wages) * 10_000) / 10_000;
}
