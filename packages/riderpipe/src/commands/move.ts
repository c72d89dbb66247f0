import { Command } from 'commander';
import { EditRejectedError } from '../errors.js';
import { colorStage } from '../format.js';
import { fullName } from '../registry.js';
import { describeSync, fail, isJson, openSession, printJson } from './shared.js';

interface MoveOptions {
  stage: string;
  value?: string;
}

export function moveCmd(program: Command): void {
  program
    .command('move <rider>')
    .description('Move a rider to a different stage')
    .requiredOption('--stage <stage>', 'stage key or label')
    .option('--value <amount>', 'sale value, when closing a client')
    .action(async (query: string, opts: MoveOptions) => {
      try {
        const session = await openSession(program);
        const old = session.desk.get(query).stage;
        let saleValue: number | undefined;
        if (opts.value !== undefined) {
          saleValue = Number(opts.value);
          if (!Number.isFinite(saleValue)) throw new EditRejectedError(`invalid amount "${opts.value}"`);
        }
        const { rider, sync } = await session.desk.move(query, opts.stage, { saleValue });
        if (isJson(program)) { printJson({ rider, sync }); return; }
        console.log(`${fullName(rider) || rider.key}: ${colorStage(old)} → ${colorStage(rider.stage)}${describeSync(sync)}`);
      } catch (e) {
        fail(e);
      }
    });
}
