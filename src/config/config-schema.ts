// src/config/config-schema.ts
import { z } from 'zod';

export const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

const loggingProfileSchema = z.object({
  appendTimestamp: z.boolean(),
  timestampFormat: z.string(),
  logLevel: logLevelSchema,
  enableWarningLog: z.boolean(),
  logDirectory: z.string().min(1)
});

export const loggingConfigSchema = z.object({
  profile: z.string().optional(),
  profiles: z.record(loggingProfileSchema).optional(),
  appendTimestamp: z.boolean().optional(),
  timestampFormat: z.string().optional(),
  logLevel: logLevelSchema.optional(),
  enableWarningLog: z.boolean().optional(),
  logDirectory: z.string().optional()
});

const offsetRangeSchema = z.object({
  start: z.number().int().nonnegative(),
  end: z.number().int().positive().optional()
});

/**
 * Shape of a JSON configuration file. Every key is optional and overrides the
 * compiled-in default of the same name.
 */
export const consolidatorConfigFileSchema = z.object({
  reportsDir: z.string().min(1).optional(),
  outputFile: z.string().min(1).optional(),
  encoding: z.enum(['latin1', 'utf-8', 'ascii']).optional(),
  anchorPhrases: z.array(z.string().min(1)).min(1).optional(),
  columnHeadings: z.array(z.string()).optional(),
  cycleHeading: z.string().optional(),
  cyclesPerBillingMonth: z.number().int().positive().optional(),
  monthAbbreviations: z.array(z.string().min(1)).length(12).optional(),
  markers: z.object({
    readCycle: z.string().min(1).optional(),
    scheduleDates: z.string().min(1).optional()
  }).strict().optional(),
  offsets: z.object({
    readCycle: offsetRangeSchema.optional(),
    scheduleDay: offsetRangeSchema.optional(),
    scheduleMonth: offsetRangeSchema.optional(),
    scheduleYear: offsetRangeSchema.optional(),
    fieldValue: offsetRangeSchema.optional()
  }).strict().optional()
}).strict();

export type ConsolidatorConfigFile = z.infer<typeof consolidatorConfigFileSchema>;
