import { NavPoint, Transaction } from '../core/types';
import { PriceUnavailableError } from '../core/errors';
import { localDateInZone } from '../core/time';
import { MarketDataProvider } from '../data/marketData.types';
import { pendingDueForConfirmation, readTransactions } from '../ledger/ledger';
import { MutationGateway } from '../ledger/gateway';
import { VersionedStore } from '../ledger/storage';

export interface PollSummary {
  today: string;
  confirmed: string[];
  waiting: string[];
  conflicts: string[];
  rejected: string[];
}

export interface PollerDeps {
  store: VersionedStore;
  gateway: MutationGateway;
  // must be the uncached provider; a stale cached NAV would confirm at the wrong price
  marketData: MarketDataProvider;
  timezone: string;
}

export const confirmKey = (transactionId: string) => `${transactionId}:confirm`;

/**
 * Confirms pending orders whose confirmation date has arrived, once the NAV
 * dated on their trade date is published. Safe to run repeatedly: every
 * confirm goes through the gateway under a per-row idempotency key.
 */
export class ConfirmationPoller {
  private readonly deps: PollerDeps;

  constructor(deps: PollerDeps) {
    this.deps = deps;
  }

  async poll(now: Date): Promise<PollSummary> {
    const today = localDateInZone(now, this.deps.timezone);
    const rows = await readTransactions(this.deps.store);
    const due = pendingDueForConfirmation(rows, today);
    const summary: PollSummary = { today, confirmed: [], waiting: [], conflicts: [], rejected: [] };
    const navs = new Map<string, Promise<NavPoint | null>>();

    for (const tx of due) {
      const nav = await this.navForTradeDate(tx, navs);
      if (!nav) {
        summary.waiting.push(tx.id);
        continue;
      }
      const result = await this.deps.gateway.applyMutation(confirmKey(tx.id), {
        type: 'confirm',
        transactionId: tx.id,
        shares: tx.amount / nav.value,
        nav: nav.value,
        // settlement date from the calendar at entry, not the day this poll ran
        confirmDate: tx.confirmDate ?? today
      });
      switch (result.status) {
        case 'applied':
        case 'no_op':
          summary.confirmed.push(tx.id);
          break;
        case 'conflict_exhausted':
          summary.conflicts.push(tx.id);
          break;
        case 'rejected':
          summary.rejected.push(tx.id);
          break;
      }
    }

    console.log(
      `Confirmation poll ${today}: ${summary.confirmed.length} confirmed, ${summary.waiting.length} waiting, ` +
        `${summary.conflicts.length} conflicts, ${summary.rejected.length} rejected`
    );
    return summary;
  }

  /** The NAV dated exactly on the trade date, or null while it is unpublished. */
  private async navForTradeDate(tx: Transaction, navs: Map<string, Promise<NavPoint | null>>): Promise<NavPoint | null> {
    const key = `${tx.instrumentCode}@${tx.date}`;
    let pending = navs.get(key);
    if (!pending) {
      pending = this.deps.marketData.getLatestNav(tx.instrumentCode, tx.date);
      navs.set(key, pending);
    }
    try {
      const nav = await pending;
      return nav && nav.date === tx.date ? nav : null;
    } catch (err) {
      if (!(err instanceof PriceUnavailableError)) throw err;
      console.warn(`NAV lookup for ${tx.id} failed, leaving it pending: ${err.message}`);
      return null;
    }
  }
}
