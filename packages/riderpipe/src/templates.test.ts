import fs from 'fs';
import os from 'os';
import path from 'path';
import { createRider } from './registry';
import { listTemplates, readTemplate, renderTemplate, templateValues } from './templates';

describe('renderTemplate', () => {
  it('fills known values and leaves the rest in place', () => {
    const rider = createRider('jane@example.com', 'Jane', 'Doe');
    const text = renderTemplate('Hey {{firstName}}, see you at {{championship}}. {{coach}} {{unknown}}', templateValues(rider, { coach: 'Sam' }));
    expect(text).toBe('Hey Jane, see you at {{championship}}. Sam {{unknown}}');
  });

  it('exposes the stage label', () => {
    const rider = createRider('jane@example.com', 'Jane', 'Doe');
    rider.stage = 'day1_complete';
    expect(templateValues(rider).stage).toBe('Day 1 Completed');
  });
});

describe('template files', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'riderpipe-templates-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('lists markdown templates by name', () => {
    fs.writeFileSync(path.join(dir, 'race-weekend.md'), 'x');
    fs.writeFileSync(path.join(dir, 'day1-nudge.md'), 'y');
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'z');
    expect(listTemplates(dir)).toEqual(['day1-nudge', 'race-weekend']);
    expect(readTemplate(dir, 'day1-nudge')).toBe('y');
    expect(readTemplate(dir, 'missing')).toBeNull();
  });

  it('lists nothing for a missing directory', () => {
    expect(listTemplates(path.join(dir, 'nope'))).toEqual([]);
  });
});
