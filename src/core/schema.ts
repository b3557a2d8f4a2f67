import { z } from 'zod';
import { AppConfig, Transaction } from './types';
import { isISODate } from './time';

export const isoDateSchema = z.string().refine((val) => isISODate(val), {
  message: 'must be an ISO date (YYYY-MM-DD)'
});

const instantSchema = z.string().datetime({ offset: true });

export const transactionSchema = z
  .object({
    id: z.string().min(1),
    date: isoDateSchema,
    instrumentCode: z.string().min(1),
    amount: z.number().finite(),
    shares: z.number().finite().nullable(),
    kind: z.enum(['buy', 'sell', 'skip']),
    status: z.enum(['pending', 'confirmed', 'skipped', 'void']),
    confirmDate: isoDateSchema.nullable(),
    nav: z.number().positive().nullable(),
    submittedAt: instantSchema.nullable(),
    note: z.string().max(200).optional(),
    createdAt: instantSchema,
    updatedAt: instantSchema
  })
  .strict()
  .superRefine((tx, ctx) => {
    if (tx.kind === 'buy' && !(tx.amount > 0)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['amount'], message: 'buy amount must be positive' });
    }
    if (tx.kind === 'sell' && !(tx.amount < 0)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['amount'], message: 'sell amount must be negative' });
    }
    if (tx.kind === 'skip' && tx.amount !== 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['amount'], message: 'skip amount must be zero' });
    }
    if (tx.status === 'confirmed' && tx.shares === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['shares'], message: 'confirmed rows need shares' });
    }
  });

export const validateTransaction = (
  raw: unknown
): { success: true; value: Transaction } | { success: false; errors: string[] } => {
  const result = transactionSchema.safeParse(raw);
  if (result.success) {
    return { success: true, value: result.data };
  }
  const errors = result.error.issues.map((i) => `${i.path.join('.') || '(row)'}: ${i.message}`);
  return { success: false, errors };
};

const instrumentSchema = z.object({
  name: z.string().optional(),
  assetClass: z.string().min(1),
  instrumentClass: z.enum(['domestic', 'qdii'])
});

const cooldownSchema = z.object({
  rebalance_forced: z.number().int().min(0).default(90),
  rebalance_light: z.number().int().min(0).default(60),
  tactical_buy: z.number().int().min(0).default(30),
  tactical_sell: z.number().int().min(0).default(30)
});

const policySchema = z
  .object({
    targets: z.record(z.number().min(0).max(1)),
    weightTolerance: z.number().positive().max(0.05).default(0.001),
    thresholds: z
      .object({
        forcedRelative: z.number().positive().default(0.2),
        lightAbsolute: z.number().positive().max(1).default(0.05)
      })
      .default({}),
    cooldownDays: cooldownSchema.default({}),
    tactical: z
      .object({
        lookbackDays: z.number().int().min(2).max(3650).default(90),
        buyDrawdown: z.number().gt(0).lt(1).default(0.1),
        sellReturn: z.number().gt(0).default(0.15),
        amountHint: z.number().min(0).default(200),
        benchmarks: z.record(z.string()).optional()
      })
      .default({})
  })
  .superRefine((policy, ctx) => {
    const classes = Object.keys(policy.targets);
    if (!classes.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['targets'], message: 'at least one target weight required' });
      return;
    }
    const total = classes.reduce((acc, k) => acc + policy.targets[k], 0);
    if (Math.abs(total - 1) > policy.weightTolerance) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['targets'],
        message: `target weights sum to ${total.toFixed(6)}, outside 1 ± ${policy.weightTolerance}`
      });
    }
  });

const retrySchema = z.object({
  maxAttempts: z.number().int().min(1).max(20).default(5),
  baseDelayMs: z.number().int().min(0).default(200),
  maxDelayMs: z.number().int().min(0).default(5000)
});

export const appConfigSchema = z.object({
  timezone: z.string().default('Asia/Shanghai'),
  cutoff: z.string().regex(/^\d{1,2}:\d{2}$/).default('15:00'),
  holidayFile: z.string().default('data/holidays.json'),
  instruments: z.record(instrumentSchema),
  policy: policySchema,
  retry: retrySchema.default({}),
  priceCacheTtlMs: z.number().int().min(0).default(300000),
  httpTimeoutMs: z.number().int().positive().default(10000),
  uiPort: z.number().int().positive().optional(),
  uiBind: z.string().optional()
});

export const parseAppConfig = (raw: unknown): AppConfig => {
  const result = appConfigSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid configuration:\n${errors.join('\n')}`);
  }
  return result.data;
};
