export * from './core/types';
export * from './core/errors';
export { buildContext, createStores } from './core/context';
export type { AppContext, Stores } from './core/context';
export { TradingCalendar } from './calendar/tradingCalendar';
export { loadHolidayTable, parseHolidayTable, offshoreHolidays } from './calendar/holidays';
export { FileVersionedStore, contentVersion } from './ledger/storage';
export type { FileStoreOptions } from './ledger/storage';
export type { VersionedStore, VersionedContent, ConditionalWriteResult } from './ledger/storage';
export { InMemoryVersionedStore } from './ledger/storage.stub';
export { GitHubVersionedStore } from './ledger/githubStore';
export { MutationGateway } from './ledger/gateway';
export type { MutationResult, MutationStatus } from './ledger/gateway';
export type { LedgerOperation } from './ledger/operations';
export { PositionAggregator } from './portfolio/aggregator';
export { analyzeDeviation } from './portfolio/deviation';
export { SignalEngine } from './signals/signalEngine';
export type { SignalEvaluation, SuppressedSignal } from './signals/signalEngine';
export { CooldownRegistry } from './signals/cooldownState';
export { ConfirmationPoller } from './confirmation/poller';
export type { PollSummary } from './confirmation/poller';
export { CommandDispatcher, commandSchema } from './commands/commands';
export type { Command, CommandReply } from './commands/commands';
export { getMarketDataProviders, StubMarketDataProvider, EastMoneyMarketDataProvider, CachedMarketDataProvider } from './data/marketData';
export type { MarketDataProvider } from './data/marketData.types';
