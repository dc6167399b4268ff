const NUMBER_PATTERN = /-?\d+\.?\d*/g;

export type ElasticityLabel = 'Elastic' | 'Inelastic' | 'Unit Elastic';

export interface ElasticityReading {
  initialQuantity: number;
  newQuantity: number;
  initialPrice: number;
  newPrice: number;
  pctChangeQuantity: number;
  pctChangePrice: number;
  elasticity: number;
  label: ElasticityLabel;
}

/**
 * Numbers in order of appearance: optional minus, digits, optional fraction.
 */
export function extractNumbers(text: string): number[] {
  return Array.from(text.matchAll(NUMBER_PATTERN), (m) => Number.parseFloat(m[0])).filter(
    (n) => !Number.isNaN(n),
  );
}

const percentChange = (from: number, to: number): number | null => {
  if (from === 0) return null;
  const pct = ((to - from) / from) * 100;
  return Number.isFinite(pct) ? pct : null;
};

export const labelElasticity = (elasticity: number): ElasticityLabel => {
  if (elasticity > 1) return 'Elastic';
  if (elasticity < 1) return 'Inelastic';
  return 'Unit Elastic';
};

/**
 * Read the first four numbers as (q1, q2, p1, p2).
 * Returns null whenever the reading is undefined: fewer than four numbers,
 * a zero base quantity or price, or no price change.
 */
export function interpretElasticity(numbers: readonly number[]): ElasticityReading | null {
  if (numbers.length < 4) return null;
  const [initialQuantity, newQuantity, initialPrice, newPrice] = numbers;

  const pctChangeQuantity = percentChange(initialQuantity, newQuantity);
  const pctChangePrice = percentChange(initialPrice, newPrice);
  if (pctChangeQuantity === null || pctChangePrice === null || pctChangePrice === 0) {
    return null;
  }

  const elasticity = Math.abs(pctChangeQuantity / pctChangePrice);
  if (!Number.isFinite(elasticity)) return null;

  return {
    initialQuantity,
    newQuantity,
    initialPrice,
    newPrice,
    pctChangeQuantity,
    pctChangePrice,
    elasticity,
    label: labelElasticity(elasticity),
  };
}

export function formatElasticitySection(reading: ElasticityReading): string {
  const q = reading.pctChangeQuantity.toFixed(2);
  const p = reading.pctChangePrice.toFixed(2);
  return [
    '**Numerical Calculation:**',
    `- Initial Quantity: ${reading.initialQuantity}, New Quantity: ${reading.newQuantity}`,
    `- Initial Price: ${reading.initialPrice}, New Price: ${reading.newPrice}`,
    `- % Change in Quantity: ${q}%`,
    `- % Change in Price: ${p}%`,
    `- Price Elasticity: |${q}/${p}| = ${reading.elasticity.toFixed(2)}`,
    `- Interpretation: ${reading.label}`,
  ].join('\n');
}
