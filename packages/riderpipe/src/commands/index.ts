import { Command } from 'commander';
import { addCmd } from './add.js';
import { disqualifyCmd } from './disqualify.js';
import { dueCmd } from './due.js';
import { editCmd } from './edit.js';
import { exportCmd } from './export.js';
import { followUpCmd } from './followup.js';
import { funnelCmd } from './funnel.js';
import { initCmd } from './init.js';
import { listCmd } from './list.js';
import { loadCmd } from './load.js';
import { moveCmd } from './move.js';
import { noteCmd } from './note.js';
import { pushCmd } from './push.js';
import { raceResultsCmd } from './race-results.js';
import { revenueCmd } from './revenue.js';
import { searchCmd } from './search.js';
import { showCmd } from './show.js';
import { staleCmd } from './stale.js';
import { targetsCmd } from './targets.js';
import { templateCmd } from './template.js';
import { todayCmd } from './today.js';

export function registerCommands(program: Command): void {
  initCmd(program);
  loadCmd(program);
  listCmd(program);
  showCmd(program);
  searchCmd(program);
  addCmd(program);
  moveCmd(program);
  noteCmd(program);
  editCmd(program);
  followUpCmd(program);
  disqualifyCmd(program);
  funnelCmd(program);
  revenueCmd(program);
  targetsCmd(program);
  todayCmd(program);
  staleCmd(program);
  dueCmd(program);
  templateCmd(program);
  raceResultsCmd(program);
  exportCmd(program);
  pushCmd(program);
}
