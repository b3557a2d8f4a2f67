import 'dotenv/config';
import { Command } from 'commander';
import { buildContext } from '../core/context';
import { isISODate, localDateInZone } from '../core/time';

const program = new Command();

program.description('Print positions with net and estimated valuations').option('--asof <date>', 'valuation date (YYYY-MM-DD)');

const run = async () => {
  const opts = program.parse(process.argv).opts<{ asof?: string }>();
  if (opts.asof && !isISODate(opts.asof)) throw new Error(`--asof must be YYYY-MM-DD, got ${opts.asof}`);
  const ctx = buildContext();
  const asOf = opts.asof ?? localDateInZone(new Date(), ctx.config.timezone);
  const snapshot = await ctx.aggregator.getPositions(asOf);
  console.log(JSON.stringify(snapshot, null, 2));
};

run().catch((err) => {
  console.error('Positions failed', err);
  process.exitCode = 1;
});
