import { EmbedBuilder } from "discord.js";

import type { DestinationClient, DeliveryResult } from "@/services/destinationClient";
import type { FlightEvent, TenantConfig, TenantMatch } from "@/types";
import { errorToMessage } from "@/utils/errors";

export interface DispatchReport {
  delivered: number;
  skipped: number;
  failed: number;
}

export interface NotifyService {
  dispatch: (event: FlightEvent, matches: TenantMatch[]) => Promise<DispatchReport>;
}

export interface NotifyServiceDeps {
  destinationClient: DestinationClient;
  logger?: Pick<typeof console, "info" | "warn" | "error">;
  deliveryTimeoutMs?: number;
  getNow?: () => Date;
}

const DELIVERY_TIMEOUT_DEFAULT_MS = 10_000;
const FOOTER_TEXT = "Flight Plan Monitor";
const FIELD_VALUE_MAX_LENGTH = 1024;
const DESCRIPTION_MAX_LENGTH = 4096;

type TenantOutcome = "delivered" | "skipped" | "failed";

export function createNotifyService(deps: NotifyServiceDeps): NotifyService {
  const logger = deps.logger ?? console;
  const deliveryTimeoutMs = Math.max(
    1,
    deps.deliveryTimeoutMs ?? DELIVERY_TIMEOUT_DEFAULT_MS
  );
  const getNow = deps.getNow ?? (() => new Date());

  async function deliver(
    event: FlightEvent,
    match: TenantMatch,
    now: Date
  ): Promise<TenantOutcome> {
    const { guildId, config, matchedPrefix } = match;
    const embed = renderNotification(event, config, now, (message) =>
      logger.warn(`NotifyService: ${message} (guildId=${guildId})`)
    );

    let result: DeliveryResult;
    try {
      result = await withTimeout(
        deps.destinationClient.send(config.destinationId, embed),
        deliveryTimeoutMs
      );
    } catch (error) {
      result = { kind: "error", error };
    }

    switch (result.kind) {
      case "success":
        logger.info(
          `NotifyService: 通知を送信しました (callsign=${event.callsign}, prefix=${matchedPrefix}, guildId=${guildId}, channelId=${config.destinationId})`
        );
        return "delivered";
      case "notFound":
        logger.warn(
          `NotifyService: 通知チャンネルが見つからないためスキップします (guildId=${guildId}, channelId=${config.destinationId})`
        );
        return "skipped";
      case "permissionDenied":
        logger.warn(
          `NotifyService: 送信権限がないためスキップします (guildId=${guildId}, channelId=${config.destinationId})`
        );
        return "skipped";
      case "error":
        logger.error(
          `NotifyService: 通知送信に失敗しました (guildId=${guildId}, channelId=${config.destinationId}): ${errorToMessage(result.error)}`
        );
        return "failed";
    }
  }

  return {
    async dispatch(event, matches) {
      const report: DispatchReport = { delivered: 0, skipped: 0, failed: 0 };
      if (matches.length === 0) {
        return report;
      }

      const now = getNow();
      const results = await Promise.allSettled(
        matches.map((match) => deliver(event, match, now))
      );

      for (const result of results) {
        if (result.status === "fulfilled") {
          report[result.value] += 1;
        } else {
          report.failed += 1;
          logger.error(
            `NotifyService: 通知処理中に未処理の例外が発生しました (callsign=${event.callsign}): ${errorToMessage(result.reason)}`
          );
        }
      }

      return report;
    },
  };
}

/**
 * テナントの表示設定に従って通知 Embed を生成します。
 *
 * 表示フラグが有効でも、イベント側の値が空のフィールドは出力しません。
 */
export function renderNotification(
  event: FlightEvent,
  config: Pick<TenantConfig, "appearance">,
  now: Date,
  onInvalidAsset?: (message: string) => void
): EmbedBuilder {
  const { appearance } = config;
  const description =
    event.kind === "flightPlan"
      ? `Flight **${event.callsign}** has filed a flight plan`
      : `Aircraft **${event.callsign}** has spawned`;

  const builder = new EmbedBuilder()
    .setTitle(appearance.title)
    .setColor(appearance.color)
    .setDescription(truncate(description, DESCRIPTION_MAX_LENGTH))
    .setTimestamp(now)
    .setFooter({ text: FOOTER_TEXT });

  if (appearance.thumbnailUrl) {
    try {
      builder.setThumbnail(appearance.thumbnailUrl);
    } catch (error) {
      onInvalidAsset?.(`サムネイル URL を設定できませんでした: ${errorToMessage(error)}`);
    }
  }

  if (appearance.imageUrl) {
    try {
      builder.setImage(appearance.imageUrl);
    } catch (error) {
      onInvalidAsset?.(`画像 URL を設定できませんでした: ${errorToMessage(error)}`);
    }
  }

  const fields: Array<{ name: string; value: string; inline: boolean }> = [];
  const addField = (
    visible: boolean,
    name: string,
    value: string | undefined,
    inline = true
  ) => {
    if (visible && value) {
      fields.push({ name, value: truncate(value, FIELD_VALUE_MAX_LENGTH), inline });
    }
  };

  addField(appearance.showCallsign, "Callsign", `**${event.callsign}**`);
  addField(appearance.showPilot, "Pilot", event.pilotName);
  addField(appearance.showAircraft, "Aircraft", event.aircraftType);
  addField(appearance.showDeparture, "Departure", event.departureAirport);
  addField(appearance.showArrival, "Arrival", event.arrivalAirport);
  addField(
    appearance.showFlightLevel,
    "Flight Level",
    event.flightLevel && formatFlightLevel(event.flightLevel)
  );
  addField(appearance.showFlightRules, "Flight Rules", event.flightRules);
  addField(appearance.showRoute, "Route", event.route, false);

  if (fields.length > 0) {
    builder.addFields(fields);
  }

  return builder;
}

function truncate(value: string, maxLength: number): string {
  return value.length > maxLength ? `${value.slice(0, maxLength - 1)}…` : value;
}

function formatFlightLevel(value: string): string {
  return /^FL/i.test(value) ? value.toUpperCase() : `FL${value}`;
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let handle: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    handle = setTimeout(() => {
      reject(new Error(`delivery timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(handle);
  }
}
