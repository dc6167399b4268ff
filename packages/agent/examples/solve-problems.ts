/**
 * Example: answering sample questions with the solver, no model involved
 *
 * Run: npx tsx packages/agent/examples/solve-problems.ts [question...]
 */

import { EconomicsSolver } from '../solver/index.js';

const examples = [
  'Calculate the price elasticity of demand when price increases from $10 to $12 and quantity demanded decreases from 100 to 80 units.',
  'If the demand curve is Qd = 100 - 2P and the supply curve is Qs = 20 + 3P, find the market equilibrium.',
  'Explain the concept of consumer surplus and how it\'s calculated.',
  'What is GDP and how is it different from GNP?',
  'Analyze the characteristics of a monopolistic competition market structure.',
  'Calculate the inflation rate if CPI increased from 200 to 210.',
  'How elastic is the quantity bought if it goes from 100 to 80 when the price moves from 10 to 12?',
];

const solver = new EconomicsSolver();
const questions = process.argv.slice(2).length > 0 ? process.argv.slice(2) : examples;

questions.forEach((question, i) => {
  const { category, text } = solver.analyze(question);
  console.log(`\nTEST ${i + 1} [${category}]: ${question}`);
  console.log('-'.repeat(80));
  console.log(text);
  console.log('='.repeat(80));
});
