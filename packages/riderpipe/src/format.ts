import chalk from 'chalk';
import { isPlaceholderKey } from './identity.js';
import { fullName } from './registry.js';
import { STAGE_LABELS, type Stage } from './stages.js';
import type { Milestone, Rider } from './types.js';

const stageColors: Partial<Record<Stage, (s: string) => string>> = {
  contact: chalk.blue,
  messaged: chalk.cyan,
  replied: chalk.cyan,
  link_sent: chalk.yellow,
  registered: chalk.yellow,
  day1_complete: chalk.magenta,
  day2_complete: chalk.magenta,
  strategy_call_booked: chalk.red,
  client: chalk.green,
  not_a_fit: chalk.gray,
};

export function colorStage(stage: Stage): string {
  const fn = stageColors[stage] ?? chalk.white;
  return fn(STAGE_LABELS[stage]);
}

export function displayKey(key: string): string {
  return isPlaceholderKey(key) ? chalk.dim(`~${key}`) : key;
}

export function formatRiderRow(r: Rider): string {
  const stage = colorStage(r.stage).padEnd(40);
  const name = chalk.bold(fullName(r) || '(no name)');
  const value = r.saleValue ? chalk.green(` £${r.saleValue}`) : '';
  const champ = r.championship ? chalk.dim(` [${r.championship}]`) : '';
  return `${stage}  ${name}  ${displayKey(r.key)}${value}${champ}`;
}

const MILESTONE_LABELS: ReadonlyArray<[Milestone, string]> = [
  ['outreach', 'Outreach'],
  ['registered', 'Registered'],
  ['day1Complete', 'Day 1'],
  ['day2Complete', 'Day 2'],
  ['callBooked', 'Call booked'],
  ['saleClosed', 'Sale closed'],
  ['flowProfile', 'Flow profile'],
  ['sleepTest', 'Sleep test'],
  ['mindsetQuiz', 'Mindset quiz'],
  ['raceReview', 'Race review'],
  ['seasonReview', 'Season review'],
];

const dash = (): string => chalk.dim('—');

export function formatRiderDetail(r: Rider): string {
  const lines: string[] = [
    `${chalk.bold(fullName(r) || '(no name)')} ${chalk.dim(`(${r.key})`)}`,
    '',
    `  Stage:        ${colorStage(r.stage)}${r.isDisqualified ? chalk.red(' (disqualified)') : ''}`,
    `  Phone:        ${r.phone || dash()}`,
    `  Facebook:     ${r.facebookUrl || dash()}`,
    `  Instagram:    ${r.instagramUrl || dash()}`,
    `  LinkedIn:     ${r.linkedinUrl || dash()}`,
    `  Championship: ${r.championship || dash()}`,
    `  Country:      ${r.country || dash()}`,
    `  Sale value:   ${r.saleValue !== null ? chalk.green(`£${r.saleValue}`) : dash()}`,
    `  Follow-up:    ${r.followUpDate ? r.followUpDate.slice(0, 10) : chalk.dim('none')}`,
    `  Tags:         ${r.tags || chalk.dim('none')}`,
  ];
  if (r.disqualificationReason) lines.push(`  DQ reason:    ${r.disqualificationReason}`);

  const milestones = MILESTONE_LABELS.flatMap(([key, label]) => {
    const at = r.milestones[key];
    return at ? [`    ${chalk.dim(at.slice(0, 10))}  ${label}`] : [];
  });
  if (milestones.length) lines.push('', chalk.bold('  Milestones:'), ...milestones);

  const results = [
    r.scores.day1 !== null ? `Day 1 score ${r.scores.day1}` : '',
    r.biggestMistake ? `Biggest mistake: ${r.biggestMistake}` : '',
    r.flowProfileResult ? `Flow profile: ${r.flowProfileResult}` : '',
    r.mindsetResult ? `Mindset: ${r.mindsetResult}` : '',
    ...Object.entries(r.scores.day2).map(([pillar, score]) => `${pillar} ${score}`),
  ].filter(Boolean);
  if (results.length) lines.push('', chalk.bold('  Results:'), ...results.map((line) => `    ${line}`));

  if (r.notes) {
    lines.push('', chalk.bold('  Notes:'), ...r.notes.split('\n').map((line) => `    ${line}`));
  }
  return lines.join('\n');
}
