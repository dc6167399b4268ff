import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { CATEGORIES, type Category } from './categories.js';
import { ECONOMIC_FORMULAS, isFormulaName } from './formulas.js';

const PLACEHOLDER = /\{\{\s*formula:([a-z_]+)\s*\}\}/g;

export const DEFAULT_TEMPLATE_DIR = fileURLToPath(new URL('../templates/', import.meta.url));

/** Substitute {{formula:<name>}} placeholders; unknown names are an error. */
export function renderFormulas(body: string, source = 'template'): string {
  return body.replace(PLACEHOLDER, (_match, name: string) => {
    if (!isFormulaName(name)) {
      throw new Error(`Unknown formula placeholder "${name}" in ${source}`);
    }
    return ECONOMIC_FORMULAS[name];
  });
}

/**
 * Static explanation bodies, one Markdown file per category.
 * Files are read once, on first use, and kept for the life of the library.
 */
export class TemplateLibrary {
  private bodies: Map<Category, string> | null = null;

  constructor(private readonly dir: string = DEFAULT_TEMPLATE_DIR) {}

  load(): this {
    if (this.bodies) return this;
    const bodies = new Map<Category, string>();
    for (const category of CATEGORIES) {
      const file = join(this.dir, `${category}.md`);
      let raw: string;
      try {
        raw = readFileSync(file, 'utf8');
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new Error(`Template for category "${category}" could not be read: ${reason}`);
      }
      bodies.set(category, renderFormulas(raw, `${category}.md`).trim());
    }
    this.bodies = bodies;
    return this;
  }

  body(category: Category): string {
    const body = this.load().bodies?.get(category);
    if (body === undefined) throw new Error(`No template loaded for category "${category}"`);
    return body;
  }

  /**
   * Base text for a category. A numeric section is appended for 'elasticity'
   * only; other categories ignore it.
   */
  respond(category: Category, numericSection?: string): string {
    const base = this.body(category);
    if (category !== 'elasticity' || !numericSection) return base;
    return `${base}\n\n${numericSection}`;
  }
}

export const templateLibrary = new TemplateLibrary();

export const respond = (category: Category, numericSection?: string): string =>
  templateLibrary.respond(category, numericSection);
