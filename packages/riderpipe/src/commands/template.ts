import { Command } from 'commander';
import chalk from 'chalk';
import { listTemplates, readTemplate, renderTemplate, templateValues } from '../templates.js';
import { storePaths } from '../store.js';
import { fail, isJson, openSession, printJson } from './shared.js';

function templateOrExit(dir: string, name: string): string {
  const template = readTemplate(dir, name);
  if (template === null) {
    console.error(chalk.red(`Template not found: ${name}`));
    process.exit(1);
  }
  return template;
}

export function templateCmd(program: Command): void {
  const cmd = program.command('template').description('Message templates');

  cmd.command('list').description('List templates').action(() => {
    const names = listTemplates(storePaths().templates);
    if (isJson(program)) { printJson(names); return; }
    for (const name of names) console.log(`  ${name}`);
  });

  cmd.command('show <name>').description('Preview a template').action((name: string) => {
    console.log(templateOrExit(storePaths().templates, name));
  });

  cmd.command('use <name> <rider>').description('Render a template for a rider').action(async (name: string, query: string) => {
    try {
      const template = templateOrExit(storePaths().templates, name);
      const session = await openSession(program);
      const rider = session.desk.get(query);
      console.log(renderTemplate(template, templateValues(rider, { coach: session.config.coach.name })));
    } catch (e) {
      fail(e);
    }
  });
}
