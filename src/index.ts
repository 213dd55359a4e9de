import { mkdirSync } from "node:fs";
import { dirname, relative, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import Database from "better-sqlite3";
import { Client, Events, GatewayIntentBits } from "discord.js";
import dotenv from "dotenv";

import {
  POLL_INTERVAL_DEFAULT_MS,
  createPollAdapterFactory,
} from "@/adapters/pollAdapter";
import {
  PUSH_FEED_DEFAULT_URL,
  createPushAdapterFactory,
} from "@/adapters/pushAdapter";
import type { AdapterFactory, TransportKind } from "@/adapters/types";
import { createMigrationRunner } from "@/database/migrations";
import {
  buildCommandDefinitions,
  createCommandHandler,
  type CommandHandler,
  type CommandHandlerDeps,
} from "@/handlers/commands";
import {
  createPipelineCoordinator,
  type PipelineCoordinator,
  type PipelineCoordinatorDeps,
} from "@/pipeline/coordinator";
import {
  createTenantConfigRepository,
  type TenantConfigRepository,
} from "@/repositories/tenantConfigRepository";
import {
  createConfigService,
  type ConfigService,
  type ConfigServiceDeps,
} from "@/services/configService";
import {
  createDiscordDestinationClient,
  type DestinationClient,
} from "@/services/destinationClient";
import {
  createNotifyService,
  type NotifyService,
  type NotifyServiceDeps,
} from "@/services/notifyService";
import { errorToMessage } from "@/utils/errors";
import { createLogger, isLogLevel, type LogLevel, type Logger } from "@/utils/logger";

export interface AppConfig {
  discordToken: string;
  dbPath: string;
  logLevel: LogLevel;
  nodeEnv: string;
  dataDir: string;
  transports: TransportKind[];
  pushFeedUrl: string;
  mainFeedUrl: string;
  eventFeedUrl: string;
  pollIntervalMs: number;
}

export type MinimalClient = Pick<
  Client,
  "once" | "login" | "on" | "destroy" | "channels" | "user"
>;

export interface ApplicationServices {
  configService: ConfigService;
  notifyService: NotifyService;
}

export interface BootstrapResult {
  client: MinimalClient;
  config: AppConfig;
  services: ApplicationServices;
  tenantConfigRepository: TenantConfigRepository;
  coordinator: PipelineCoordinator;
  cleanup: () => Promise<void>;
}

const DEFAULT_DB_PATH = "./data/bot.db";
const DATA_ROOT = resolve(process.cwd(), "data");
const DEFAULT_MAIN_FEED_URL = "https://24data.ptfs.app/acft-data";
const DEFAULT_EVENT_FEED_URL = "https://24data.ptfs.app/acft-data/event";
const TRANSPORT_KINDS: readonly TransportKind[] = ["push", "poll"];

export interface BootstrapDependencies {
  clientFactory?: (
    config: AppConfig,
    services: ApplicationServices
  ) => MinimalClient;
  ensureDataDir?: (path: string) => void | Promise<void>;
  logger?: Logger;
  tenantConfigRepositoryFactory?: (config: AppConfig) => TenantConfigRepository;
  configServiceFactory?: (deps: ConfigServiceDeps) => ConfigService;
  notifyServiceFactory?: (deps: NotifyServiceDeps) => NotifyService;
  destinationClientFactory?: (
    getClient: () => MinimalClient
  ) => DestinationClient;
  adapterFactoriesFactory?: (config: AppConfig, logger: Logger) => AdapterFactory[];
  coordinatorFactory?: (deps: PipelineCoordinatorDeps) => PipelineCoordinator;
  commandHandlerFactory?: (deps: CommandHandlerDeps) => CommandHandler;
}

function readEnv(key: string): string | undefined {
  const value = process.env[key];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadConfig(): AppConfig {
  const discordToken = readEnv("DISCORD_TOKEN");
  if (!discordToken) {
    throw new Error("環境変数 DISCORD_TOKEN が設定されていません。");
  }

  const dbPath = resolveDbPath(readEnv("DB_PATH"));
  const logLevel = readEnv("LOG_LEVEL") ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL が不正です: ${logLevel}`);
  }
  const nodeEnv = readEnv("NODE_ENV") ?? "production";
  const dataDir = dirname(dbPath);

  return {
    discordToken,
    dbPath,
    logLevel,
    nodeEnv,
    dataDir,
    transports: parseTransports(readEnv("FEED_TRANSPORTS")),
    pushFeedUrl: readEnv("PUSH_FEED_URL") ?? PUSH_FEED_DEFAULT_URL,
    mainFeedUrl: readEnv("MAIN_FEED_URL") ?? DEFAULT_MAIN_FEED_URL,
    eventFeedUrl: readEnv("EVENT_FEED_URL") ?? DEFAULT_EVENT_FEED_URL,
    pollIntervalMs: parsePositiveInteger(
      "POLL_INTERVAL_MS",
      readEnv("POLL_INTERVAL_MS"),
      POLL_INTERVAL_DEFAULT_MS
    ),
  };
}

export function ensureDataDir(path: string): void {
  if (!path) {
    return;
  }

  try {
    mkdirSync(path, { recursive: true });
  } catch (error) {
    throw new Error(
      `データディレクトリの作成に失敗しました: ${errorToMessage(error)}`,
      { cause: error }
    );
  }
}

function defaultClientFactory(
  _config: AppConfig,
  _services: ApplicationServices
): Client {
  return new Client({
    intents: [GatewayIntentBits.Guilds],
  });
}

export function createAdapterFactories(
  config: AppConfig,
  logger: Logger
): AdapterFactory[] {
  return config.transports.map((transport) =>
    transport === "push"
      ? createPushAdapterFactory({ url: config.pushFeedUrl, logger })
      : createPollAdapterFactory({
          feeds: [
            { identity: "main", url: config.mainFeedUrl },
            { identity: "event", url: config.eventFeedUrl },
          ],
          intervalMs: config.pollIntervalMs,
          logger,
        })
  );
}

export async function bootstrap(
  deps: BootstrapDependencies = {}
): Promise<BootstrapResult> {
  const config = loadConfig();
  const ensureDir = deps.ensureDataDir ?? ensureDataDir;
  await Promise.resolve(ensureDir(config.dataDir));

  const logger = deps.logger ?? createLogger(config.logLevel);
  const migrationRunner = createMigrationRunner({
    dbPath: config.dbPath,
    logger,
  });
  await migrationRunner.runMigrations();

  let db: Database.Database | undefined;
  const tenantConfigRepository =
    deps.tenantConfigRepositoryFactory?.(config) ??
    createTenantConfigRepository({
      db: (db = new Database(config.dbPath)),
      logger,
    });

  const configService = (deps.configServiceFactory ?? createConfigService)({
    tenantConfigRepository,
    logger,
  });

  let discordClientRef: MinimalClient | undefined;
  const getClient = () => {
    if (!discordClientRef) {
      throw new Error("Discord client is not initialized");
    }
    return discordClientRef;
  };

  const destinationClient = deps.destinationClientFactory
    ? deps.destinationClientFactory(getClient)
    : createDiscordDestinationClient({ getClient, logger });

  const notifyService = (deps.notifyServiceFactory ?? createNotifyService)({
    destinationClient,
    logger,
  });

  const services: ApplicationServices = {
    configService,
    notifyService,
  };

  const client = (deps.clientFactory ?? defaultClientFactory)(config, services);
  discordClientRef = client;

  const coordinator = (deps.coordinatorFactory ?? createPipelineCoordinator)({
    adapterFactories: (deps.adapterFactoriesFactory ?? createAdapterFactories)(
      config,
      logger
    ),
    configSource: tenantConfigRepository,
    notifyService,
    logger,
  });

  const commandHandler = (deps.commandHandlerFactory ?? createCommandHandler)({
    configService,
    logger,
  });

  client.on(Events.InteractionCreate, (interaction) => {
    if (!interaction.isChatInputCommand()) {
      return;
    }
    commandHandler.handle(interaction).catch((error: unknown) => {
      logger.error(
        `InteractionCreate: コマンド処理中に未処理の例外が発生しました: ${errorToMessage(error)}`
      );
    });
  });

  client.once(Events.ClientReady, (readyClient) => {
    logger.info(`Discord client 初期化完了 (user=${readyClient.user.tag})`);
    coordinator.start();
    readyClient.application.commands
      .set(buildCommandDefinitions())
      .then((commands) => {
        logger.info(`スラッシュコマンドを登録しました (count=${commands.size})`);
      })
      .catch((error: unknown) => {
        logger.error(
          `スラッシュコマンドの登録に失敗しました: ${errorToMessage(error)}`
        );
      });
  });

  let cleanedUp = false;
  const cleanup = async () => {
    if (cleanedUp) {
      return;
    }
    cleanedUp = true;
    try {
      await coordinator.stop();
    } catch (rawError) {
      logger.error(`PipelineCoordinator stop failed: ${errorToMessage(rawError)}`);
    }
    try {
      await client.destroy();
    } catch (rawError) {
      logger.error(`Discord client destroy failed: ${errorToMessage(rawError)}`);
    }
    if (!db) {
      return;
    }
    try {
      db.close();
    } catch (rawError) {
      logger.error(`Database close failed: ${errorToMessage(rawError)}`);
    }
  };

  try {
    await client.login(config.discordToken);
  } catch (error) {
    const message =
      error instanceof Error ? error.message : "不明なエラーが発生しました";
    logger.error(`Discord クライアントのログインに失敗しました: ${message}`);
    await cleanup();
    throw error;
  }

  return {
    client,
    config,
    services,
    tenantConfigRepository,
    coordinator,
    cleanup,
  };
}

function resolveDbPath(rawPath: string | undefined): string {
  const candidate = rawPath ?? DEFAULT_DB_PATH;
  const resolved = resolve(process.cwd(), candidate);
  const relativeToRoot = relative(DATA_ROOT, resolved);

  if (relativeToRoot.startsWith("..")) {
    throw new Error(
      `DB_PATH は ${DATA_ROOT} 配下のパスのみ指定できます: ${candidate}`
    );
  }

  return resolved;
}

function parseTransports(raw: string | undefined): TransportKind[] {
  if (raw === undefined) {
    return ["push"];
  }

  const transports: TransportKind[] = [];
  for (const token of raw.split(",")) {
    const name = token.trim().toLowerCase();
    if (!name) {
      continue;
    }
    const transport = TRANSPORT_KINDS.find((kind) => kind === name);
    if (!transport) {
      throw new Error(`FEED_TRANSPORTS に未知のトランスポートが含まれています: ${name}`);
    }
    if (!transports.includes(transport)) {
      transports.push(transport);
    }
  }

  if (transports.length === 0) {
    throw new Error("FEED_TRANSPORTS に有効なトランスポートがありません。");
  }
  return transports;
}

function parsePositiveInteger(
  key: string,
  raw: string | undefined,
  fallback: number
): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${key} は正の整数で指定してください: ${raw}`);
  }
  return value;
}

async function main(): Promise<void> {
  dotenv.config();
  const { cleanup } = await bootstrap();

  const shutdown = (signal: NodeJS.Signals) => {
    console.info(`${signal} を受信しました。シャットダウンします`);
    cleanup()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error(`シャットダウンに失敗しました: ${errorToMessage(error)}`);
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

const isEntryPoint =
  process.argv[1] !== undefined &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isEntryPoint) {
  await main();
}
