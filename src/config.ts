import { z } from "zod";
import { ConfigError } from "./errors.js";

const envSchema = z.object({
  GITHUB_TOKEN: z
    .string({ error: "GITHUB_TOKEN is required" })
    .min(1, "GITHUB_TOKEN is required"),
  GITHUB_API_URL: z.url().default("https://api.github.com"),
  TELEGRAM_BOT_TOKEN: z.string().min(1).optional(),
  TELEGRAM_CHAT_ID: z.string().min(1).optional(),
  REPO_HERALD_CONFIG: z.string().default("./repo-herald.yaml"),
  STATE_FILE_PATH: z.string().min(1).optional(),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info"),
  FETCH_CONCURRENCY: z
    .string()
    .optional()
    .transform((s) => (s === undefined ? undefined : parseInt(s, 10)))
    .pipe(z.number().int().min(1).max(32).optional()),
});

export type Config = z.infer<typeof envSchema>;

export function formatIssues(
  issues: readonly { path: readonly PropertyKey[]; message: string }[],
): string {
  return issues
    .map((issue) => `  - ${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`)
    .join("\n");
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`);
  }

  return result.data;
}

export interface TelegramTarget {
  botToken: string;
  chatId: string;
}

/** The recipient is only needed when a report is actually sent. */
export function requireTelegramTarget(config: Config): TelegramTarget {
  if (config.TELEGRAM_BOT_TOKEN === undefined || config.TELEGRAM_CHAT_ID === undefined) {
    throw new ConfigError(
      "TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID must be set to deliver reports (or use --print)",
    );
  }
  return { botToken: config.TELEGRAM_BOT_TOKEN, chatId: config.TELEGRAM_CHAT_ID };
}
