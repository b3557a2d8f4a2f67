import path from 'path';
import { AppConfig } from './types';
import { defaultConfigPath, loadConfig } from './utils';
import { loadHolidayTable } from '../calendar/holidays';
import { TradingCalendar } from '../calendar/tradingCalendar';
import { getMarketDataProviders, MarketDataProviders } from '../data/marketData';
import { FileVersionedStore, VersionedStore } from '../ledger/storage';
import { InMemoryVersionedStore } from '../ledger/storage.stub';
import { GitHubVersionedStore } from '../ledger/githubStore';
import { MutationGateway } from '../ledger/gateway';
import { PositionAggregator } from '../portfolio/aggregator';
import { CooldownRegistry } from '../signals/cooldownState';
import { SignalEngine } from '../signals/signalEngine';
import { ConfirmationPoller } from '../confirmation/poller';
import { CommandDispatcher } from '../commands/commands';

export interface Stores {
  ledger: VersionedStore;
  cooldowns: VersionedStore;
}

export interface AppContext {
  config: AppConfig;
  calendar: TradingCalendar;
  stores: Stores;
  marketData: MarketDataProviders;
  gateway: MutationGateway;
  aggregator: PositionAggregator;
  signals: SignalEngine;
  poller: ConfirmationPoller;
  commands: CommandDispatcher;
}

export const createStores = (config: AppConfig, env: NodeJS.ProcessEnv = process.env): Stores => {
  const kind = (env.LEDGER_STORE || 'file').toLowerCase();
  if (kind === 'memory') {
    return { ledger: new InMemoryVersionedStore(), cooldowns: new InMemoryVersionedStore() };
  }
  if (kind === 'github') {
    const token = env.GITHUB_TOKEN;
    const repo = env.GITHUB_REPO;
    if (!token || !repo) {
      throw new Error('LEDGER_STORE=github needs GITHUB_TOKEN and GITHUB_REPO');
    }
    const common = { token, repo, branch: env.GITHUB_BRANCH || 'main', timeoutMs: config.httpTimeoutMs };
    return {
      ledger: new GitHubVersionedStore({ ...common, path: env.GITHUB_LEDGER_PATH || 'data/transactions.jsonl' }),
      cooldowns: new GitHubVersionedStore({ ...common, path: env.GITHUB_COOLDOWN_PATH || 'data/cooldowns.json' })
    };
  }
  if (kind !== 'file') {
    console.warn(`Unknown LEDGER_STORE=${kind}; using local files.`);
  }
  return {
    ledger: new FileVersionedStore(env.LEDGER_FILE || 'data/transactions.jsonl'),
    cooldowns: new FileVersionedStore(env.COOLDOWN_FILE || 'data/cooldowns.json')
  };
};

export interface ContextOptions {
  config?: AppConfig;
  stores?: Stores;
  marketData?: MarketDataProviders;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export const buildContext = (options: ContextOptions = {}): AppContext => {
  const config = options.config ?? loadConfig(defaultConfigPath());
  const calendar = new TradingCalendar(loadHolidayTable(path.resolve(process.cwd(), config.holidayFile)), {
    timezone: config.timezone,
    cutoff: config.cutoff
  });
  const stores = options.stores ?? createStores(config);
  const marketData = options.marketData ?? getMarketDataProviders(config);
  const gateway = new MutationGateway(stores.ledger, { retry: config.retry, now: options.now, sleep: options.sleep });
  const aggregator = new PositionAggregator({
    store: stores.ledger,
    marketData: marketData.cached,
    instruments: config.instruments,
    timezone: config.timezone
  });
  const signals = new SignalEngine({
    aggregator,
    marketData: marketData.cached,
    cooldowns: new CooldownRegistry(stores.cooldowns, { retry: config.retry, sleep: options.sleep }),
    policy: config.policy,
    instruments: config.instruments,
    timezone: config.timezone
  });
  const poller = new ConfirmationPoller({
    store: stores.ledger,
    gateway,
    marketData: marketData.live,
    timezone: config.timezone
  });
  const commands = new CommandDispatcher({
    gateway,
    calendar,
    aggregator,
    store: stores.ledger,
    instruments: config.instruments,
    timezone: config.timezone,
    now: options.now
  });
  console.log(`Context ready: ledger ${stores.ledger.label}, cooldowns ${stores.cooldowns.label}`);
  return { config, calendar, stores, marketData, gateway, aggregator, signals, poller, commands };
};
