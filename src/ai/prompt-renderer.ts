import { existsSync } from 'fs';
import { join, resolve } from 'path';
import nunjucks from 'nunjucks';
import type { Environment } from 'nunjucks';

export class TemplateNotFoundError extends Error {
  readonly template: string;

  constructor(template: string, dir: string) {
    super(`Template not found: ${template} (in ${dir})`);
    this.name = 'TemplateNotFoundError';
    this.template = template;
  }
}

/** `academic_summary.md.njk` -> `academic_summary_phase1.md.njk` */
export function phaseTemplate(template: string, phase: 1 | 2): string {
  const slash = template.lastIndexOf('/');
  const dot = template.indexOf('.', slash + 1);
  if (dot === -1) return `${template}_phase${phase}`;
  return `${template.slice(0, dot)}_phase${phase}${template.slice(dot)}`;
}

export type PromptVariables = Record<string, string>;

/** Prompt templates (nunjucks) loaded from a directory. */
export class PromptRenderer {
  private dir: string;
  private env: Environment;

  constructor(templatesDir: string) {
    this.dir = resolve(templatesDir);
    this.env = new nunjucks.Environment(new nunjucks.FileSystemLoader(this.dir), {
      autoescape: false,
    });
  }

  has(template: string): boolean {
    return existsSync(join(this.dir, template));
  }

  render(template: string, variables: PromptVariables): string {
    if (!this.has(template)) {
      throw new TemplateNotFoundError(template, this.dir);
    }
    return this.env.render(template, variables);
  }
}
