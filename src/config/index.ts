import { configSchema } from "./schema.ts";
import type { AppConfig } from "./schema.ts";

export type { AppConfig };

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw = {
    log: {
      level: env["LOG_LEVEL"] || undefined,
    },
    cli: {
      color: env["NO_COLOR"] ? false : env["TODO_COLOR"] !== "false",
    },
    limits: {
      titleMaxLength: parseIntOrUndefined(env["TODO_TITLE_MAX_LENGTH"]),
      descriptionMaxLength: parseIntOrUndefined(
        env["TODO_DESCRIPTION_MAX_LENGTH"],
      ),
    },
  };

  return configSchema.parse(raw);
}

function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}
