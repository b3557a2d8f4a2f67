import { z } from 'zod';
import { InstrumentConfig, PortfolioSnapshot, Transaction } from '../core/types';
import { isoDateSchema } from '../core/schema';
import { localDateInZone } from '../core/time';
import { formatPct, hashString } from '../core/utils';
import { TradingCalendar } from '../calendar/tradingCalendar';
import { MutationGateway, MutationResult, MutationStatus } from '../ledger/gateway';
import { readTransactions } from '../ledger/ledger';
import { LedgerOperation } from '../ledger/operations';
import { VersionedStore } from '../ledger/storage';
import { kindForAmount } from '../ledger/transactions';
import { PositionAggregator } from '../portfolio/aggregator';

const fundCode = z.string().regex(/^\d{6}$/, 'fund code must be 6 digits');
const txId = z.string().trim().min(1).max(120);

export const commandSchema = z.discriminatedUnion('name', [
  z.object({
    name: z.literal('add_transaction'),
    args: z
      .object({
        fundCode,
        amount: z.number().finite().refine((n) => n !== 0, 'amount must be non-zero; use skip_investment instead'),
        tradeTime: z.string().datetime({ offset: true }).optional(),
        id: txId.optional(),
        note: z.string().max(200).optional()
      })
      .strict()
  }),
  z.object({
    name: z.literal('skip_investment'),
    args: z.object({ fundCode, date: isoDateSchema.optional() }).strict()
  }),
  z.object({
    name: z.literal('confirm_shares'),
    args: z
      .object({
        transactionId: txId,
        shares: z.number().finite().refine((n) => n !== 0, 'shares must be non-zero'),
        nav: z.number().positive().optional()
      })
      .strict()
  }),
  z.object({
    name: z.literal('delete_transaction'),
    args: z.object({ transactionId: txId }).strict()
  }),
  z.object({
    name: z.literal('query_status'),
    args: z.object({ asOf: isoDateSchema.optional() }).strict().default({})
  })
]);

export type Command = z.infer<typeof commandSchema>;
export type CommandName = Command['name'];

export type CommandReply =
  | { ok: false; command: string; status: 'invalid'; message: string; errors: string[] }
  | { ok: boolean; command: CommandName; status: MutationStatus; message: string; transaction?: Transaction }
  | { ok: true; command: 'query_status'; status: 'ok'; message: string; snapshot: PortfolioSnapshot };

export interface CommandDeps {
  gateway: MutationGateway;
  calendar: TradingCalendar;
  aggregator: PositionAggregator;
  store: VersionedStore;
  instruments: Record<string, InstrumentConfig>;
  timezone: string;
  now?: () => Date;
}

const describeMutation = (result: MutationResult, done: (tx: Transaction) => string): string => {
  switch (result.status) {
    case 'applied':
      return done(result.transaction);
    case 'no_op':
      return `Already recorded: ${result.transaction.id} is ${result.transaction.status}.`;
    case 'rejected':
      return `Not applied: ${result.reason}.`;
    case 'conflict_exhausted':
      return `Not applied: the ledger kept changing underneath (${result.reason}). Try again.`;
  }
};

const fromMutation = (
  command: CommandName,
  result: MutationResult,
  done: (tx: Transaction) => string
): CommandReply => ({
  ok: result.status === 'applied' || result.status === 'no_op',
  command,
  status: result.status,
  message: describeMutation(result, done),
  ...(result.status === 'applied' || result.status === 'no_op' ? { transaction: result.transaction } : {})
});

/**
 * Runs structured commands against the ledger. Input arrives already parsed
 * from chat; anything that fails validation is answered, never thrown.
 */
export class CommandDispatcher {
  private readonly deps: CommandDeps;

  constructor(deps: CommandDeps) {
    this.deps = deps;
  }

  private now(): Date {
    return (this.deps.now ?? (() => new Date()))();
  }

  async dispatch(raw: unknown): Promise<CommandReply> {
    const parsed = commandSchema.safeParse(raw);
    if (!parsed.success) {
      const errors = parsed.error.issues.map((i) => `${i.path.join('.') || '(command)'}: ${i.message}`);
      return { ok: false, command: commandName(raw), status: 'invalid', message: `Invalid command: ${errors.join('; ')}`, errors };
    }
    const command = parsed.data;
    switch (command.name) {
      case 'add_transaction':
        return this.addTransaction(command.args);
      case 'skip_investment':
        return this.skipInvestment(command.args);
      case 'confirm_shares':
        return this.confirmShares(command.args);
      case 'delete_transaction':
        return this.deleteTransaction(command.args);
      case 'query_status':
        return this.queryStatus(command.args);
    }
  }

  private async addTransaction(args: Extract<Command, { name: 'add_transaction' }>['args']): Promise<CommandReply> {
    const instrument = this.deps.instruments[args.fundCode];
    if (!instrument) {
      return {
        ok: false,
        command: 'add_transaction',
        status: 'rejected',
        message: `Not applied: fund ${args.fundCode} is not in the configured instrument list.`
      };
    }
    const submitted = args.tradeTime ? new Date(args.tradeTime) : this.now();
    const { calendar } = this.deps;
    const date = calendar.effectiveTradeDate(submitted, 'domestic');
    const confirmDate = calendar.confirmDate(date, instrument.instrumentClass);
    // Without an explicit id the key is built from what a retried message repeats, never the clock.
    // Two identical orders for one fund on one trade date need distinct ids from the caller.
    const id = args.id ?? `${args.fundCode}-${date}-${hashString(`${args.fundCode}|${args.amount}|${date}`).toString(16)}`;

    const result = await this.deps.gateway.applyMutation(id, {
      type: 'append',
      transaction: {
        date,
        instrumentCode: args.fundCode,
        amount: args.amount,
        kind: kindForAmount(args.amount),
        confirmDate,
        submittedAt: submitted.toISOString(),
        note: args.note
      }
    });
    return fromMutation(
      'add_transaction',
      result,
      (tx) => `Recorded ${tx.kind} ${tx.instrumentCode} ${Math.abs(tx.amount)} as ${tx.id}, trade date ${tx.date}, confirms ${tx.confirmDate}.`
    );
  }

  private async skipInvestment(args: Extract<Command, { name: 'skip_investment' }>['args']): Promise<CommandReply> {
    const date = args.date ?? localDateInZone(this.now(), this.deps.timezone);
    const rows = await readTransactions(this.deps.store);
    const planned = rows.find(
      (tx) => tx.instrumentCode === args.fundCode && tx.date === date && tx.kind === 'buy' && tx.status === 'pending'
    );

    let key: string;
    let operation: LedgerOperation;
    if (planned) {
      key = `${planned.id}:skip`;
      operation = { type: 'skip', transactionId: planned.id };
    } else {
      key = `skip-${args.fundCode}-${date}`;
      operation = {
        type: 'append',
        transaction: {
          date,
          instrumentCode: args.fundCode,
          amount: 0,
          kind: 'skip',
          status: 'skipped',
          confirmDate: null,
          note: 'skip'
        }
      };
    }
    const result = await this.deps.gateway.applyMutation(key, operation);
    return fromMutation('skip_investment', result, (tx) => `Skipped ${tx.instrumentCode} on ${tx.date} (${tx.id}).`);
  }

  private async confirmShares(args: Extract<Command, { name: 'confirm_shares' }>['args']): Promise<CommandReply> {
    const today = localDateInZone(this.now(), this.deps.timezone);
    const result = await this.deps.gateway.applyMutation(`${args.transactionId}:confirm`, {
      type: 'confirm',
      transactionId: args.transactionId,
      shares: args.shares,
      nav: args.nav ?? null,
      confirmDate: today
    });
    return fromMutation('confirm_shares', result, (tx) => `Confirmed ${tx.id}: ${tx.shares} shares on ${tx.confirmDate}.`);
  }

  private async deleteTransaction(args: Extract<Command, { name: 'delete_transaction' }>['args']): Promise<CommandReply> {
    const result = await this.deps.gateway.applyMutation(`${args.transactionId}:void`, {
      type: 'void',
      transactionId: args.transactionId
    });
    return fromMutation('delete_transaction', result, (tx) => `Deleted ${tx.id}; it stays in the ledger as void.`);
  }

  private async queryStatus(args: Extract<Command, { name: 'query_status' }>['args']): Promise<CommandReply> {
    const asOf = args.asOf ?? localDateInZone(this.now(), this.deps.timezone);
    const snapshot = await this.deps.aggregator.getPositions(asOf);
    const weights = Object.entries(snapshot.weightsNet)
      .sort(([a], [b]) => (a < b ? -1 : 1))
      .map(([assetClass, w]) => `${assetClass} ${formatPct(w)}`);
    const pending = snapshot.positions.reduce((acc, p) => acc + p.pendingCount, 0);
    const message =
      `Portfolio ${snapshot.totalValueNet.toFixed(2)} as of ${asOf}` +
      (weights.length ? `: ${weights.join(', ')}` : '') +
      (pending ? `; ${pending} pending` : '');
    return { ok: true, command: 'query_status', status: 'ok', message, snapshot };
  }
}

const commandName = (raw: unknown): string => {
  if (typeof raw === 'object' && raw !== null && 'name' in raw && typeof raw.name === 'string') return raw.name;
  return 'unknown';
};
