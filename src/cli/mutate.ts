import 'dotenv/config';
import { Command } from 'commander';
import { buildContext } from '../core/context';
import { readJSONFile } from '../core/utils';

const program = new Command();

program
  .description('Apply a structured ledger command, e.g. {"name":"delete_transaction","args":{"transactionId":"tx-1"}}')
  .option('--command <json>', 'command descriptor as JSON')
  .option('--file <path>', 'read the command descriptor from a JSON file');

const run = async () => {
  const opts = program.parse(process.argv).opts<{ command?: string; file?: string }>();
  let descriptor: unknown;
  if (opts.file) descriptor = readJSONFile(opts.file);
  else if (opts.command) descriptor = JSON.parse(opts.command);
  else throw new Error('Pass --command <json> or --file <path>');

  const ctx = buildContext();
  const reply = await ctx.commands.dispatch(descriptor);
  console.log(reply.message);
  if (!reply.ok) process.exitCode = 1;
};

run().catch((err) => {
  console.error('Command failed', err);
  process.exitCode = 1;
});
