import fs from 'fs';
import path from 'path';
import { fullName } from './registry.js';
import { STAGE_LABELS } from './stages.js';
import type { Rider } from './types.js';

export function listTemplates(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs.readdirSync(dir).filter((f) => f.endsWith('.md')).map((f) => f.replace(/\.md$/, '')).sort();
}

export function readTemplate(dir: string, name: string): string | null {
  const file = path.join(dir, `${name}.md`);
  return fs.existsSync(file) ? fs.readFileSync(file, 'utf-8') : null;
}

/** Values a template can reference as {{name}}. */
export function templateValues(rider: Rider, extra: Record<string, string> = {}): Record<string, string> {
  return {
    key: rider.key,
    name: fullName(rider),
    firstName: rider.firstName,
    lastName: rider.lastName,
    championship: rider.championship ?? '',
    stage: STAGE_LABELS[rider.stage],
    phone: rider.phone ?? '',
    flowProfileResult: rider.flowProfileResult ?? '',
    mindsetResult: rider.mindsetResult ?? '',
    biggestMistake: rider.biggestMistake ?? '',
    ...extra,
  };
}

/** Substitute {{placeholders}}. Unknown or empty ones are left in place. */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => values[key] || match);
}
