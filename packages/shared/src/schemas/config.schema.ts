import { z } from 'zod';

const pathSchema = z.string().regex(/^[A-Za-z0-9_-]+(\/[A-Za-z0-9_-]+)*$/, 'must be a path of [A-Za-z0-9_-] segments');

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const flagStoreConfigSchema = z.object({
  name: z.string().min(1),
  flags: z.array(pathSchema).min(1),
  values: z.array(z.number().finite()).min(1).optional(),
  prefix: pathSchema.optional(),
});

export const slotStoreConfigSchema = z.object({
  name: z.string().min(1),
  slots: z.number().int().positive(),
  prefix: pathSchema.optional(),
});

export const registersConfigSchema = z.object({
  flags: z.array(flagStoreConfigSchema).default([]),
  slots: z.array(slotStoreConfigSchema).default([]),
});

export const loggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  trace: z.boolean().default(false),
});

export const wmregConfigSchema = z.object({
  registers: registersConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});
