/**
 * One-line formulas quoted by the templates through {{formula:<name>}}.
 */
export const ECONOMIC_FORMULAS = {
  elasticity_demand:
    'Price Elasticity of Demand = (% Change in Quantity Demanded) / (% Change in Price)',
  elasticity_supply:
    'Price Elasticity of Supply = (% Change in Quantity Supplied) / (% Change in Price)',
  consumer_surplus: 'Consumer Surplus = 0.5 × Base × Height',
  producer_surplus: 'Producer Surplus = 0.5 × Base × Height',
  gdp_nominal: 'Nominal GDP = Price × Quantity for all goods and services',
  gdp_real: 'Real GDP = Nominal GDP / GDP Deflator × 100',
  inflation_rate: 'Inflation Rate = ((CPI_new - CPI_old) / CPI_old) × 100',
  unemployment_rate: 'Unemployment Rate = (Unemployed / Labor Force) × 100',
} as const;

export type FormulaName = keyof typeof ECONOMIC_FORMULAS;

export const isFormulaName = (name: string): name is FormulaName =>
  Object.prototype.hasOwnProperty.call(ECONOMIC_FORMULAS, name);
