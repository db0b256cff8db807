import { ConfigError } from './errors.js';

export type TemplateVars = Readonly<Record<string, string>>;

/** Replaces `${name}` references; an unknown name is a catalog error. */
export function renderTemplate(template: string, vars: TemplateVars): string {
  return template.replace(/\$\{(\w+)\}/g, (_match, name: string) => {
    const value = vars[name];
    if (value === undefined) {
      throw new ConfigError(`Unknown variable \${${name}} in "${template}"`);
    }
    return value;
  });
}

export function usesVariable(template: string, name: string): boolean {
  return template.includes(`\${${name}}`);
}
