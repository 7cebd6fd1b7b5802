#!/usr/bin/env node
import { Command, Option } from "commander";
import dotenv from "dotenv";
import { loadConfig, requireTelegramTarget } from "./config.js";
import { ConfigError } from "./errors.js";
import { GitHubActivitySource } from "./github/activity.js";
import { createGitHubClient } from "./github/client.js";
import { retryingSource } from "./github/retry.js";
import { createLogger, setLogLevel, type LogLevel } from "./logger.js";
import { runNewsCycle, type CycleMode } from "./monitor/cycle.js";
import { loadSettings } from "./settings/load.js";
import { StateStore } from "./state/store.js";
import { createTelegramNotifier, createTelegramSender } from "./telegram/sender.js";
import { VERSION } from "./version.js";

const log = createLogger("main");

const LOG_LEVELS: LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

interface CliOptions {
  config?: string;
  env?: string;
  logLevel?: LogLevel;
  print?: boolean;
  dumpRepos?: boolean;
  save: boolean;
}

async function main(options: CliOptions): Promise<void> {
  dotenv.config(options.env === undefined ? {} : { path: options.env });

  const config = loadConfig();
  setLogLevel(options.logLevel ?? config.LOG_LEVEL);

  const mode: CycleMode = options.dumpRepos ? "dumpRepos" : options.print ? "print" : "deliver";
  const settings = await loadSettings(options.config ?? config.REPO_HERALD_CONFIG);
  const stateFile = config.STATE_FILE_PATH ?? settings.stateFile;

  // Fail on a missing recipient before touching the network
  const target = mode === "deliver" ? requireTelegramTarget(config) : null;
  const sender = target ? createTelegramSender(target.botToken, target.chatId) : null;

  const github = createGitHubClient({ token: config.GITHUB_TOKEN, baseUrl: config.GITHUB_API_URL });

  log.info({ mode, stateFile, save: options.save }, "repo-herald starting");

  await runNewsCycle(
    {
      settings,
      source: retryingSource(new GitHubActivitySource(github)),
      store: new StateStore(stateFile, createLogger("state")),
      notifier: createTelegramNotifier(settings.title, sender),
      write: (text) => process.stdout.write(`${text}\n`),
    },
    {
      mode,
      save: options.save && mode !== "dumpRepos",
      concurrency: config.FETCH_CONCURRENCY,
    },
  );
}

const program = new Command()
  .name("repo-herald")
  .description("Report new activity on your GitHub repositories")
  .version(VERSION, "-V, --version")
  .option(
    "-c, --config <path>",
    "Path to settings file (default: $REPO_HERALD_CONFIG or ./repo-herald.yaml)",
  )
  .option("-E, --env <path>", "Load environment variables from given .env file")
  .addOption(new Option("-l, --log-level <level>", "Set logging level").choices(LOG_LEVELS))
  .addOption(new Option("--print", "Print the report instead of sending it").conflicts("dumpRepos"))
  .option("--dump-repos", "List tracked repos and their activity preferences")
  .option("--no-save", "Do not update the state file")
  .action(async (options: CliOptions) => {
    try {
      await main(options);
    } catch (err) {
      if (err instanceof ConfigError) {
        log.error(err.message);
        process.exitCode = 2;
        return;
      }
      log.fatal({ err }, "Run failed, state file left untouched");
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error("Fatal startup error:", err);
  process.exit(1);
});
