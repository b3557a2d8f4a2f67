import 'dotenv/config';
import { Command } from 'commander';
import { buildContext } from '../core/context';
import { parseInstant } from '../core/time';
import { formatPct } from '../core/utils';

const program = new Command();

program
  .description('Evaluate rebalance and tactical signals and record their cooldowns')
  .option('--at <timestamp>', 'evaluate as of this instant (defaults to now)')
  .option('--json', 'print the full evaluation as JSON');

const run = async () => {
  const opts = program.parse(process.argv).opts<{ at?: string; json?: boolean }>();
  const ctx = buildContext();
  const evaluation = await ctx.signals.evaluate(parseInstant(opts.at));
  if (opts.json) {
    console.log(JSON.stringify(evaluation, null, 2));
    return;
  }
  for (const d of evaluation.deviations) {
    console.log(
      `${d.assetClass.padEnd(14)} target ${formatPct(d.targetWeight)} net ${formatPct(d.actualWeightNet)} ` +
        `est ${formatPct(d.actualWeightEstimated)} dev ${formatPct(d.absoluteDeviationNet)}`
    );
  }
  if (!evaluation.signals.length) console.log('No signals.');
  for (const s of evaluation.signals) {
    console.log(`[${s.urgency}] ${s.signalType} ${s.action} ${s.assetClass} ~${s.amountHint}: ${s.reason}`);
    if (s.riskNote) console.log(`    ${s.riskNote}`);
  }
  for (const w of evaluation.warnings) console.warn(`${w.code}: ${w.message}`);
};

run().catch((err) => {
  console.error('Signal evaluation failed', err);
  process.exitCode = 1;
});
