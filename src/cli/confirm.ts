import 'dotenv/config';
import { Command } from 'commander';
import { buildContext } from '../core/context';
import { parseInstant } from '../core/time';

const program = new Command();

program
  .description('Confirm pending orders whose trade-date NAV is published')
  .option('--at <timestamp>', 'evaluate as of this instant (defaults to now)');

const run = async () => {
  const opts = program.parse(process.argv).opts<{ at?: string }>();
  const ctx = buildContext();
  const summary = await ctx.poller.poll(parseInstant(opts.at));
  console.log(JSON.stringify(summary, null, 2));
  if (summary.conflicts.length) process.exitCode = 2;
};

run().catch((err) => {
  console.error('Confirmation poll failed', err);
  process.exitCode = 1;
});
