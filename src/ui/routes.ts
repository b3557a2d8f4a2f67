import express from 'express';
import { isISODate, localDateInZone, parseInstant } from '../core/time';
import { AppContext } from '../core/context';

export interface JsonReply {
  status: number;
  body: unknown;
}

type RouteContext = Pick<AppContext, 'config' | 'aggregator' | 'signals' | 'commands'>;

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

const queryString = (value: unknown): string | undefined => (typeof value === 'string' && value ? value : undefined);

export const positionsReply = async (ctx: RouteContext, asOf?: string): Promise<JsonReply> => {
  if (asOf && !isISODate(asOf)) return { status: 400, body: { error: `asOf must be YYYY-MM-DD, got ${asOf}` } };
  const date = asOf ?? localDateInZone(new Date(), ctx.config.timezone);
  return { status: 200, body: await ctx.aggregator.getPositions(date) };
};

export const signalsReply = async (ctx: RouteContext, at?: string): Promise<JsonReply> => {
  let now: Date;
  try {
    now = parseInstant(at);
  } catch (err) {
    return { status: 400, body: { error: errorMessage(err) } };
  }
  const evaluation = await ctx.signals.evaluate(now);
  return {
    status: 200,
    body: {
      today: evaluation.today,
      signals: evaluation.signals,
      suppressed: evaluation.suppressed,
      deviations: evaluation.deviations,
      warnings: evaluation.warnings
    }
  };
};

export const commandReply = async (
  ctx: RouteContext,
  token: string | undefined,
  csrfToken: string,
  body: unknown
): Promise<JsonReply> => {
  if (token !== csrfToken) return { status: 403, body: { error: 'Invalid CSRF token' } };
  const reply = await ctx.commands.dispatch(body);
  if (reply.status === 'invalid') return { status: 400, body: reply };
  if (reply.status === 'conflict_exhausted') return { status: 409, body: reply };
  return { status: 200, body: reply };
};

const send = (res: express.Response, reply: JsonReply) => res.status(reply.status).json(reply.body);

export const registerRoutes = (app: express.Application, ctx: RouteContext, csrfToken: string) => {
  app.get('/positions', async (req, res) => {
    try {
      send(res, await positionsReply(ctx, queryString(req.query.asOf)));
    } catch (err) {
      console.error('GET /positions failed', err);
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  app.get('/signals', async (req, res) => {
    try {
      send(res, await signalsReply(ctx, queryString(req.query.at)));
    } catch (err) {
      console.error('GET /signals failed', err);
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  app.post('/commands', express.json(), async (req, res) => {
    try {
      send(res, await commandReply(ctx, req.get('x-csrf-token'), csrfToken, req.body));
    } catch (err) {
      console.error('POST /commands failed', err);
      res.status(500).json({ error: errorMessage(err) });
    }
  });
};
