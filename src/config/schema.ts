import { z } from "zod";
import { DEFAULT_LIMITS } from "../operations/validation.ts";

export const logLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export type LogLevel = z.infer<typeof logLevelSchema>;

const logSchema = z.object({
  level: logLevelSchema.default("warn"),
});

const cliSchema = z.object({
  color: z.boolean().default(true),
});

const limitsSchema = z.object({
  titleMaxLength: z.number().int().positive().default(DEFAULT_LIMITS.titleMaxLength),
  descriptionMaxLength: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_LIMITS.descriptionMaxLength),
});

export const configSchema = z.object({
  log: logSchema,
  cli: cliSchema,
  limits: limitsSchema,
});

export type AppConfig = z.infer<typeof configSchema>;
