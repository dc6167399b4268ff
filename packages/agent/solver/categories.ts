/**
 * Problem categories as data (ordered catalog).
 * Row order is match priority: the first row with a keyword hit wins.
 * 'general' has no row; it is what classification falls back to.
 */
export const CATEGORIES = [
  'supply_demand',
  'elasticity',
  'market_equilibrium',
  'consumer_producer_surplus',
  'gdp_analysis',
  'inflation_unemployment',
  'market_structures',
  'general',
] as const;

export type Category = (typeof CATEGORIES)[number];

export type KeywordRow = {
  category: Exclude<Category, 'general'>;
  keywords: readonly string[];
};

export const CATEGORY_KEYWORDS: readonly KeywordRow[] = [
  { category: 'supply_demand', keywords: ['supply', 'demand', 'curve', 'shift'] },
  { category: 'elasticity', keywords: ['elasticity', 'elastic', 'inelastic', 'responsive'] },
  {
    category: 'market_equilibrium',
    keywords: ['equilibrium', 'market clearing', 'intersection'],
  },
  {
    category: 'consumer_producer_surplus',
    keywords: ['consumer surplus', 'producer surplus', 'deadweight loss'],
  },
  { category: 'gdp_analysis', keywords: ['gdp', 'gross domestic product', 'economic growth'] },
  {
    category: 'inflation_unemployment',
    keywords: ['inflation', 'unemployment', 'cpi', 'price level'],
  },
  {
    category: 'market_structures',
    keywords: ['monopoly', 'competition', 'oligopoly', 'market structure'],
  },
];

const CATEGORY_SET = new Set<string>(CATEGORIES);

export const isCategory = (value: string): value is Category => CATEGORY_SET.has(value);
