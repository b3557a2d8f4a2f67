import { z } from 'zod';
import { MarketDataProvider, PriceBar } from './marketData.types';
import { EstimatePoint, NavPoint } from '../core/types';
import { PriceUnavailableError } from '../core/errors';
import { isISODate, zonedToInstant } from '../core/time';

const NAV_API = 'https://api.fund.eastmoney.com/f10/lsjz';
const ESTIMATE_API = 'https://fundgz.1234567.com.cn/js';
const PAGE_SIZE = 20;
const MAX_PAGES = 40;

const navRowSchema = z.object({
  FSRQ: z.string(),
  DWJZ: z.string()
});

const navResponseSchema = z.object({
  ErrCode: z.number(),
  ErrMsg: z.string().nullable().optional(),
  TotalCount: z.number().optional(),
  Data: z
    .object({
      LSJZList: z.array(navRowSchema).nullable()
    })
    .nullable()
});

const estimateSchema = z.object({
  fundcode: z.string(),
  gsz: z.string(),
  gztime: z.string()
});

const toBar = (row: z.infer<typeof navRowSchema>): PriceBar | undefined => {
  const close = Number(row.DWJZ);
  if (!row.DWJZ || Number.isNaN(close) || close <= 0 || !isISODate(row.FSRQ)) return undefined;
  return { date: row.FSRQ, close };
};

export interface EastMoneyOptions {
  timeoutMs?: number;
  timezone?: string;
}

/** Published NAVs and intraday estimates from the public EastMoney fund endpoints. */
export class EastMoneyMarketDataProvider implements MarketDataProvider {
  private readonly timeoutMs: number;
  private readonly timezone: string;

  constructor(options: EastMoneyOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.timezone = options.timezone ?? 'Asia/Shanghai';
  }

  private async fetchText(code: string, url: URL): Promise<string | null> {
    let resp: Response;
    try {
      resp = await fetch(url.toString(), {
        headers: { Referer: 'https://fundf10.eastmoney.com/' },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (err) {
      throw new PriceUnavailableError(code, err instanceof Error ? err.message : String(err));
    }
    if (resp.status === 404) return null;
    if (!resp.ok) {
      const text = await resp.text();
      throw new PriceUnavailableError(code, `HTTP ${resp.status}: ${text.slice(0, 200)}`);
    }
    return resp.text();
  }

  private async fetchNavPage(code: string, page: number, pageSize: number, from: string, to: string) {
    const url = new URL(NAV_API);
    url.searchParams.set('fundCode', code);
    url.searchParams.set('pageIndex', String(page));
    url.searchParams.set('pageSize', String(pageSize));
    url.searchParams.set('startDate', from);
    url.searchParams.set('endDate', to);
    const text = await this.fetchText(code, url);
    if (text === null) return { bars: [], total: 0 };
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new PriceUnavailableError(code, 'NAV response is not JSON');
    }
    const parsed = navResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new PriceUnavailableError(code, 'unexpected NAV response shape');
    }
    if (parsed.data.ErrCode !== 0) {
      throw new PriceUnavailableError(code, parsed.data.ErrMsg || `ErrCode ${parsed.data.ErrCode}`);
    }
    const rows = parsed.data.Data?.LSJZList ?? [];
    const bars = rows.map(toBar).filter((b): b is PriceBar => Boolean(b));
    return { bars, total: parsed.data.TotalCount ?? rows.length };
  }

  async getLatestNav(instrumentCode: string, asOf: string): Promise<NavPoint | null> {
    const { bars } = await this.fetchNavPage(instrumentCode, 1, 1, '', asOf);
    const latest = bars[0];
    if (!latest || latest.date > asOf) return null;
    return { value: latest.close, date: latest.date };
  }

  async getIntradayEstimate(instrumentCode: string): Promise<EstimatePoint | null> {
    const text = await this.fetchText(instrumentCode, new URL(`${ESTIMATE_API}/${instrumentCode}.js`));
    if (text === null) return null;
    const match = /^jsonpgz\((.*)\);?\s*$/s.exec(text.trim());
    if (!match || !match[1].trim()) return null;
    let json: unknown;
    try {
      json = JSON.parse(match[1]);
    } catch {
      throw new PriceUnavailableError(instrumentCode, 'estimate payload is not JSON');
    }
    const parsed = estimateSchema.safeParse(json);
    if (!parsed.success) return null;
    const value = Number(parsed.data.gsz);
    if (Number.isNaN(value) || value <= 0) return null;
    let asOf: Date;
    try {
      asOf = zonedToInstant(parsed.data.gztime, this.timezone);
    } catch {
      throw new PriceUnavailableError(instrumentCode, `bad estimate time ${parsed.data.gztime}`);
    }
    return { value, asOf: asOf.toISOString() };
  }

  async getHistoricalSeries(instrumentCode: string, from: string, to: string): Promise<PriceBar[]> {
    const byDate = new Map<string, number>();
    for (let page = 1; page <= MAX_PAGES; page++) {
      const { bars, total } = await this.fetchNavPage(instrumentCode, page, PAGE_SIZE, from, to);
      for (const bar of bars) byDate.set(bar.date, bar.close);
      if (!bars.length || page * PAGE_SIZE >= total) break;
    }
    return Array.from(byDate.entries())
      .map(([date, close]) => ({ date, close }))
      .sort((a, b) => (a.date < b.date ? -1 : 1));
  }
}
