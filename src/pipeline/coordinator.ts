import type { AdapterFactory, IngestionAdapter } from "@/adapters/types";
import {
  createDedupCache,
  createDedupKey,
  type DedupCache,
} from "@/pipeline/dedupCache";
import { matchTenants } from "@/pipeline/prefixMatcher";
import { sleep as defaultSleep, type SleepFn } from "@/pipeline/retry";
import {
  createSnapshotDiffer,
  type SnapshotDiffer,
} from "@/pipeline/snapshotDiffer";
import type { NotifyService } from "@/services/notifyService";
import type { FlightEvent, TenantConfigSnapshot } from "@/types";
import { errorToMessage } from "@/utils/errors";

export interface TenantConfigSource {
  getAll: () => Promise<TenantConfigSnapshot>;
}

export interface PipelineCoordinatorDeps {
  adapterFactories: AdapterFactory[];
  configSource: TenantConfigSource;
  notifyService: Pick<NotifyService, "dispatch">;
  dedupCache?: DedupCache;
  snapshotDiffer?: SnapshotDiffer;
  restartDelayMs?: number;
  sleep?: SleepFn;
  logger?: Pick<typeof console, "info" | "warn" | "error">;
}

export interface PipelineCoordinator {
  start: () => void;
  stop: () => Promise<void>;
  /** 取り込んだイベント 1 件を dedup → match → dispatch に流します */
  processEvent: (
    event: FlightEvent,
    adapter: Pick<IngestionAdapter, "name" | "requiresDeduplication">
  ) => Promise<void>;
  readonly running: boolean;
}

const RESTART_DELAY_DEFAULT_MS = 5_000;

export function createPipelineCoordinator(
  deps: PipelineCoordinatorDeps
): PipelineCoordinator {
  const logger = deps.logger ?? console;
  const dedupCache = deps.dedupCache ?? createDedupCache();
  const snapshotDiffer = deps.snapshotDiffer ?? createSnapshotDiffer();
  const restartDelayMs = deps.restartDelayMs ?? RESTART_DELAY_DEFAULT_MS;
  const sleep = deps.sleep ?? defaultSleep;

  let controller: AbortController | undefined;
  let supervisors: Promise<void>[] = [];
  const inFlightDispatches = new Set<Promise<void>>();
  let lastKnownConfigs: TenantConfigSnapshot | undefined;

  async function loadConfigs(): Promise<TenantConfigSnapshot | undefined> {
    try {
      lastKnownConfigs = await deps.configSource.getAll();
    } catch (error) {
      logger.error(
        `PipelineCoordinator: テナント設定の取得に失敗しました。${
          lastKnownConfigs ? "直前のスナップショットを使用します" : "照合をスキップします"
        }: ${errorToMessage(error)}`
      );
    }
    return lastKnownConfigs;
  }

  async function processEvent(
    event: FlightEvent,
    adapter: Pick<IngestionAdapter, "name" | "requiresDeduplication">
  ): Promise<void> {
    if (adapter.requiresDeduplication) {
      const key = createDedupKey(event);
      if (dedupCache.seen(key)) {
        return;
      }
      dedupCache.record(key);
    }

    const configs = await loadConfigs();
    if (!configs) {
      return;
    }

    const matches = matchTenants(event, configs);
    if (matches.length === 0) {
      return;
    }

    logger.info(
      `PipelineCoordinator: 通知対象のイベントを検出しました (callsign=${event.callsign}, pilot=${event.pilotName ?? "Unknown"}, tenants=${matches.length}, source=${adapter.name})`
    );

    // 配信の完了は待たずに次のイベントの取り込みへ戻る
    const task = deps.notifyService
      .dispatch(event, matches)
      .then(() => undefined)
      .catch((error: unknown) => {
        logger.error(
          `PipelineCoordinator: 通知配信中に未処理の例外が発生しました (callsign=${event.callsign}): ${errorToMessage(error)}`
        );
      })
      .finally(() => {
        inFlightDispatches.delete(task);
      });
    inFlightDispatches.add(task);
  }

  async function supervise(
    factory: AdapterFactory,
    signal: AbortSignal
  ): Promise<void> {
    while (!signal.aborted) {
      let adapter: IngestionAdapter;
      try {
        adapter = factory({ snapshotDiffer });
      } catch (error) {
        logger.error(
          `PipelineCoordinator: アダプターの生成に失敗しました: ${errorToMessage(error)}`
        );
        await sleep(restartDelayMs, signal);
        continue;
      }

      logger.info(`PipelineCoordinator: アダプターを起動します (adapter=${adapter.name})`);
      try {
        for await (const event of adapter.stream(signal)) {
          try {
            await processEvent(event, adapter);
          } catch (error) {
            logger.error(
              `PipelineCoordinator: イベント処理に失敗しました (adapter=${adapter.name}, callsign=${event.callsign}): ${errorToMessage(error)}`
            );
          }
        }
      } catch (error) {
        logger.error(
          `PipelineCoordinator: アダプターが異常終了しました (adapter=${adapter.name}): ${errorToMessage(error)}`
        );
      }

      if (signal.aborted) {
        break;
      }
      logger.warn(
        `PipelineCoordinator: ${restartDelayMs}ms 後にアダプターを再起動します (adapter=${adapter.name})`
      );
      await sleep(restartDelayMs, signal);
    }
  }

  return {
    start() {
      if (controller) {
        return;
      }
      controller = new AbortController();
      const signal = controller.signal;
      supervisors = deps.adapterFactories.map((factory) =>
        supervise(factory, signal)
      );
      logger.info(
        `PipelineCoordinator: パイプラインを開始しました (adapters=${deps.adapterFactories.length})`
      );
    },
    async stop() {
      if (!controller) {
        return;
      }
      controller.abort();
      controller = undefined;
      await Promise.allSettled(supervisors);
      supervisors = [];
      await Promise.allSettled([...inFlightDispatches]);
      logger.info("PipelineCoordinator: パイプラインを停止しました");
    },
    processEvent,
    get running() {
      return controller !== undefined;
    },
  };
}
