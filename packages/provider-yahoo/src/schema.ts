/**
 * @fileoverview Shape of the Yahoo Finance chart API payload.
 *
 * Only the fields yieldwatch reads are declared; everything else passes
 * through untouched.
 *
 * @module @yieldwatch/provider-yahoo/schema
 */

import { z } from 'zod';

const nullableNumbers = z.array(z.number().nullable());

const quoteSchema = z.object({
  open: nullableNumbers.optional(),
  high: nullableNumbers.optional(),
  low: nullableNumbers.optional(),
  close: nullableNumbers.optional(),
  volume: nullableNumbers.optional(),
});

const dividendSchema = z.object({
  amount: z.number(),
  /** Ex-dividend date, epoch seconds */
  date: z.number(),
});

export const chartResultSchema = z.object({
  meta: z
    .object({
      symbol: z.string().optional(),
      regularMarketPrice: z.number().nullable().optional(),
      /** IANA timezone of the listing exchange */
      exchangeTimezoneName: z.string().optional(),
    })
    .passthrough()
    .optional(),
  /** Bar open times, epoch seconds; absent when the range holds no trades */
  timestamp: z.array(z.number()).optional(),
  indicators: z
    .object({
      quote: z.array(quoteSchema).optional(),
    })
    .optional(),
  events: z
    .object({
      dividends: z.record(dividendSchema).optional(),
    })
    .passthrough()
    .optional(),
});

export const chartErrorSchema = z.object({
  code: z.string().optional(),
  description: z.string().optional(),
});

export const chartResponseSchema = z.object({
  chart: z.object({
    result: z.array(chartResultSchema).nullable().optional(),
    error: chartErrorSchema.nullable().optional(),
  }),
});

export type ChartResult = z.infer<typeof chartResultSchema>;
export type ChartError = z.infer<typeof chartErrorSchema>;
export type ChartResponse = z.infer<typeof chartResponseSchema>;
