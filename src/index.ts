/**
 * Guildwarden — src/index.ts
 * WHAT: Process entrypoint. Loads config, opens the database, builds services, connects to Discord.
 * WHY: Startup and shutdown order in one place; every acquired resource is released on every exit path.
 * FLOWS:
 *  - main(): config (fatal → exit 1) → logger + Sentry → startBot()
 *  - startBot(): SQLite → client → services (stores create their tables) → dispatcher → login;
 *    any failure past the database open → shutdown(1)
 *  - ready: scheduler.start() (fatal → shutdown) → slash command sync
 *  - SIGINT/SIGTERM/startup failure: scheduler.shutdown → client.destroy → db.close → flushSentry
 * DOCS:
 *  - discord.js v14 Client: https://discord.js.org/#/docs/discord.js/main/class/Client
 *  - Process events: https://nodejs.org/api/process.html#event-uncaughtexception
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { Client, Events, GatewayIntentBits } from "discord.js";
import { loadAppConfig, type AppConfig } from "./config/appConfig.js";
import { buildCommands, ALL_COMMANDS } from "./commands/buildCommands.js";
import { syncCommands } from "./commands/sync.js";
import { closeDatabase, openDatabase, type Db } from "./db/db.js";
import { createCommandDispatcher, type CommandServices } from "./lib/cmdWrap.js";
import { ConfigError } from "./lib/errors.js";
import { createLogger, type Logger } from "./lib/logger.js";
import { captureException, flushSentry, initializeSentry, setTag } from "./lib/sentry.js";
import { createServices } from "./services.js";

export interface MainOptions {
  configPath?: string;
  envPath?: string;
}

export interface StartOptions {
  /** Called once shutdown has released everything */
  exit?: (code: number) => void;
}

// Time for logs and Sentry to flush after an uncaught exception
const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

function installProcessHandlers(logger: Logger): void {
  process.on("unhandledRejection", (reason) => {
    const error = reason instanceof Error ? reason : new Error(String(reason));
    logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
    captureException(error, { context: "unhandledRejection" });
  });

  process.on("uncaughtException", (error, origin) => {
    logger.error(
      { evt: "uncaught_exception", err: error, origin },
      "[process] Uncaught exception - bot may be in unstable state"
    );
    captureException(error, { context: "uncaughtException", origin });
    setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS).unref();
  });
}

export async function main(options: MainOptions = {}): Promise<void> {
  let config: AppConfig;
  try {
    config = loadAppConfig(options);
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`[config] ${err.message}\n`);
      process.exit(1);
    }
    throw err;
  }

  const logger = createLogger({
    level: config.logging.level,
    file: config.logging.file,
    maxBytes: config.logging.maxBytes,
    backupCount: config.logging.backupCount,
  });
  for (const warning of config.warnings) {
    logger.warn({ evt: "config_warning" }, `[config] ${warning}`);
  }
  installProcessHandlers(logger);

  const sentryOn = initializeSentry({
    dsn: config.env.SENTRY_DSN,
    environment: config.env.SENTRY_ENVIRONMENT ?? config.env.NODE_ENV,
    release: process.env.npm_package_version ?? "dev",
    tracesSampleRate: config.env.SENTRY_TRACES_SAMPLE_RATE,
  });
  logger.info({ evt: "sentry_init", enabled: sentryOn }, "[startup] error tracking configured");

  await startBot(config, logger);
}

/**
 * Everything that holds a resource. Every acquired resource is released on
 * every exit path, including a throw while wiring services.
 */
export async function startBot(config: AppConfig, logger: Logger, options: StartOptions = {}): Promise<void> {
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let db: Db | null = null;
  let client: Client | null = null;
  let services: CommandServices | null = null;
  let shuttingDown = false;

  const onSigint = () => void shutdown("SIGINT", 0);
  const onSigterm = () => void shutdown("SIGTERM", 0);

  // ORDER: scheduler → client → database → Sentry
  async function shutdown(reason: string, exitCode: number): Promise<void> {
    if (shuttingDown) {
      logger.warn({ reason }, "[shutdown] Already shutting down, ignoring");
      return;
    }
    shuttingDown = true;
    process.off("SIGINT", onSigint);
    process.off("SIGTERM", onSigterm);
    logger.info({ evt: "shutdown", reason }, "[shutdown] Graceful shutdown initiated");

    try {
      await services?.scheduler.shutdown({ waitForRunning: false });
    } catch (err) {
      logger.warn({ err }, "[shutdown] Scheduler stop failed (non-fatal)");
    }
    if (client) {
      client.removeAllListeners();
      try {
        await client.destroy();
        logger.debug("[shutdown] Discord client destroyed");
      } catch (err) {
        logger.warn({ err }, "[shutdown] Client destroy failed (non-fatal)");
      }
    }
    if (db) closeDatabase(db, logger);
    await flushSentry();

    logger.info({ exitCode }, "[shutdown] Graceful shutdown complete");
    exit(exitCode);
  }

  process.once("SIGINT", onSigint);
  process.once("SIGTERM", onSigterm);

  try {
    db = openDatabase({ dsn: config.database.dsn, logger });
  } catch (err) {
    logger.fatal({ evt: "startup_failed", err, dsn: config.database.dsn }, "[startup] database unavailable");
    await shutdown("db_open_failed", 1);
    return;
  }

  try {
    const activeClient = new Client({ intents: [GatewayIntentBits.Guilds] });
    client = activeClient;
    const activeServices = createServices({ config, logger, db, client: activeClient });
    services = activeServices;
    const dispatch = createCommandDispatcher(activeServices, ALL_COMMANDS);

    activeClient.on(Events.InteractionCreate, (interaction) => {
      dispatch(interaction).catch((err: unknown) => {
        logger.error({ evt: "dispatch_error", err }, "[interaction] dispatcher failed");
      });
    });

    activeClient.on(Events.GuildCreate, (guild) => {
      logger.info(
        { evt: "guild_join", guildId: guild.id, guildName: guild.name, members: guild.memberCount },
        "[guild] joined guild"
      );
    });

    activeClient.once(Events.ClientReady, async (ready) => {
      logger.info({ evt: "ready", tag: ready.user.tag, id: ready.user.id }, "Bot ready");
      setTag("bot_id", ready.user.id);

      try {
        await activeServices.scheduler.start();
      } catch (err) {
        logger.fatal({ err }, "[startup] scheduler failed to start");
        await shutdown("scheduler_start_failed", 1);
        return;
      }

      await syncCommands(
        {
          token: config.env.DISCORD_TOKEN,
          applicationId: config.env.CLIENT_ID ?? ready.application.id,
          guildId: config.env.GUILD_ID,
        },
        buildCommands(),
        logger
      );
    });

    await activeClient.login(config.env.DISCORD_TOKEN);
  } catch (err) {
    logger.fatal({ evt: "startup_failed", err }, "[startup] startup failed");
    await shutdown("startup_failed", 1);
  }
}

// Tests import pieces of the app; only a real process boots it
if (!process.env.VITEST_WORKER_ID) {
  main().catch((err: unknown) => {
    process.stderr.write(`[startup] fatal: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
    process.exit(1);
  });
}
