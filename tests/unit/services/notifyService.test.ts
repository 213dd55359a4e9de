import type { EmbedBuilder } from "discord.js";
import { describe, expect, it, vi } from "vitest";

import type { DeliveryResult } from "@/services/destinationClient";
import { createNotifyService, renderNotification } from "@/services/notifyService";
import {
  DEFAULT_APPEARANCE,
  type AppearanceOptions,
  type FlightEvent,
  type TenantConfig,
  type TenantMatch,
} from "@/types";

function createMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

function createConfig(
  guildId: string,
  destinationId: string,
  appearance: Partial<AppearanceOptions> = {}
): TenantConfig {
  return {
    guildId,
    destinationId,
    prefixes: ["SWA"],
    appearance: { ...DEFAULT_APPEARANCE, ...appearance },
    createdAt: new Date("2025-01-01T00:00:00.000Z"),
    updatedAt: new Date("2025-01-01T00:00:00.000Z"),
  };
}

function createMatch(
  guildId: string,
  destinationId: string,
  appearance: Partial<AppearanceOptions> = {}
): TenantMatch {
  return {
    guildId,
    config: createConfig(guildId, destinationId, appearance),
    matchedPrefix: "SWA",
  };
}

const fullEvent: FlightEvent = {
  kind: "flightPlan",
  callsign: "SWA10",
  pilotName: "pilot_one",
  aircraftType: "Boeing 737",
  departureAirport: "IRFD",
  arrivalAirport: "ILAR",
  flightLevel: "350",
  flightRules: "IFR",
  route: "DCT GRASS DCT",
  extras: {},
};

describe("renderNotification", () => {
  const now = new Date("2025-10-25T08:00:00.000Z");

  it("テナントの外観設定とイベントの全項目から Embed を生成する", () => {
    const embed = renderNotification(
      fullEvent,
      createConfig("100000000000000001", "200000000000000002", {
        color: 0x123456,
        title: "New plan",
        thumbnailUrl: "https://cdn.test/thumb.png",
      }),
      now
    );

    expect(embed.data.title).toBe("New plan");
    expect(embed.data.color).toBe(0x123456);
    expect(embed.data.description).toBe("Flight **SWA10** has filed a flight plan");
    expect(embed.data.timestamp).toBe("2025-10-25T08:00:00.000Z");
    expect(embed.data.footer?.text).toBe("Flight Plan Monitor");
    expect(embed.data.thumbnail?.url).toBe("https://cdn.test/thumb.png");
    expect(embed.data.image).toBeUndefined();
    expect(embed.data.fields).toEqual([
      { name: "Callsign", value: "**SWA10**", inline: true },
      { name: "Pilot", value: "pilot_one", inline: true },
      { name: "Aircraft", value: "Boeing 737", inline: true },
      { name: "Departure", value: "IRFD", inline: true },
      { name: "Arrival", value: "ILAR", inline: true },
      { name: "Flight Level", value: "FL350", inline: true },
      { name: "Flight Rules", value: "IFR", inline: true },
      { name: "Route", value: "DCT GRASS DCT", inline: false },
    ]);
  });

  it("非表示の項目と値のない項目は出力しない", () => {
    const embed = renderNotification(
      {
        kind: "aircraftSpawn",
        callsign: "UAL456",
        pilotName: "pilot_two",
        flightLevel: "fl120",
        extras: {},
      },
      createConfig("100000000000000001", "200000000000000002", {
        showPilot: false,
        showRoute: true,
      }),
      now
    );

    expect(embed.data.description).toBe("Aircraft **UAL456** has spawned");
    expect(embed.data.fields).toEqual([
      { name: "Callsign", value: "**UAL456**", inline: true },
      { name: "Flight Level", value: "FL120", inline: true },
    ]);
  });

  it("Embed の上限を超える callsign を切り詰めて出力する", () => {
    const callsign = `SWA${"1".repeat(1100)}`;

    const embed = renderNotification(
      { kind: "flightPlan", callsign, extras: {} },
      createConfig("100000000000000001", "200000000000000002"),
      now
    );

    const value = embed.data.fields?.[0]?.value ?? "";
    expect(value).toHaveLength(1024);
    expect(value.startsWith("**SWA111")).toBe(true);
    expect(value.endsWith("…")).toBe(true);
    expect(embed.data.description).toBe(`Flight **${callsign}** has filed a flight plan`);
  });

  it("表示する項目がなければフィールドを追加しない", () => {
    const embed = renderNotification(
      { kind: "flightPlan", callsign: "SWA10", extras: {} },
      createConfig("100000000000000001", "200000000000000002", {
        showCallsign: false,
      }),
      now
    );

    expect(embed.data.fields).toBeUndefined();
  });
});

describe("createNotifyService", () => {
  const now = new Date("2025-10-25T08:00:00.000Z");

  it("各テナントへ独立して配信し結果を集計する", async () => {
    const results: Record<string, DeliveryResult> = {
      "200000000000000001": { kind: "success" },
      "200000000000000002": { kind: "notFound", message: "Unknown Channel" },
      "200000000000000003": { kind: "permissionDenied", message: "Missing Access" },
      "200000000000000004": { kind: "error", error: new Error("boom") },
    };
    const send = vi.fn(
      async (destinationId: string, _embed: EmbedBuilder): Promise<DeliveryResult> =>
        results[destinationId] ?? { kind: "success" }
    );
    const logger = createMockLogger();
    const service = createNotifyService({
      destinationClient: { send },
      logger,
      getNow: () => now,
    });

    const report = await service.dispatch(fullEvent, [
      createMatch("100000000000000001", "200000000000000001"),
      createMatch("100000000000000002", "200000000000000002"),
      createMatch("100000000000000003", "200000000000000003"),
      createMatch("100000000000000004", "200000000000000004"),
    ]);

    expect(report).toEqual({ delivered: 1, skipped: 2, failed: 1 });
    expect(send).toHaveBeenCalledTimes(4);
    expect(logger.info).toHaveBeenCalledWith(
      "NotifyService: 通知を送信しました (callsign=SWA10, prefix=SWA, guildId=100000000000000001, channelId=200000000000000001)"
    );
    expect(logger.warn).toHaveBeenCalledWith(
      "NotifyService: 通知チャンネルが見つからないためスキップします (guildId=100000000000000002, channelId=200000000000000002)"
    );
    expect(logger.error).toHaveBeenCalledWith(
      "NotifyService: 通知送信に失敗しました (guildId=100000000000000004, channelId=200000000000000004): boom"
    );
  });

  it("テナントごとの外観で Embed を生成する", async () => {
    const send = vi.fn(
      async (_destinationId: string, _embed: EmbedBuilder): Promise<DeliveryResult> => ({
        kind: "success",
      })
    );
    const service = createNotifyService({
      destinationClient: { send },
      logger: createMockLogger(),
      getNow: () => now,
    });

    await service.dispatch(fullEvent, [
      createMatch("100000000000000001", "200000000000000001", { title: "Alpha" }),
      createMatch("100000000000000002", "200000000000000002", { title: "Bravo" }),
    ]);

    const titles = send.mock.calls.map(([, embed]) => embed.data.title);
    expect(titles).toEqual(["Alpha", "Bravo"]);
  });

  it("応答しない配信先はタイムアウトで失敗扱いにして他の配信を妨げない", async () => {
    const send = vi.fn(
      (destinationId: string, _embed: EmbedBuilder): Promise<DeliveryResult> =>
        destinationId === "200000000000000001"
          ? new Promise<DeliveryResult>(() => undefined)
          : Promise.resolve({ kind: "success" })
    );
    const logger = createMockLogger();
    const service = createNotifyService({
      destinationClient: { send },
      logger,
      deliveryTimeoutMs: 20,
      getNow: () => now,
    });

    const report = await service.dispatch(fullEvent, [
      createMatch("100000000000000001", "200000000000000001"),
      createMatch("100000000000000002", "200000000000000002"),
    ]);

    expect(report).toEqual({ delivered: 1, skipped: 0, failed: 1 });
    expect(logger.error).toHaveBeenCalledWith(
      "NotifyService: 通知送信に失敗しました (guildId=100000000000000001, channelId=200000000000000001): delivery timed out after 20ms"
    );
  });

  it("長すぎる callsign のイベントも配信する", async () => {
    const send = vi.fn(
      async (_destinationId: string, _embed: EmbedBuilder): Promise<DeliveryResult> => ({
        kind: "success",
      })
    );
    const service = createNotifyService({
      destinationClient: { send },
      logger: createMockLogger(),
      getNow: () => now,
    });

    const report = await service.dispatch(
      { kind: "flightPlan", callsign: `SWA${"1".repeat(1100)}`, extras: {} },
      [createMatch("100000000000000001", "200000000000000001")]
    );

    expect(report).toEqual({ delivered: 1, skipped: 0, failed: 0 });
    expect(send).toHaveBeenCalledTimes(1);
  });

  it("一致がなければ何も送信しない", async () => {
    const send = vi.fn(
      async (_destinationId: string, _embed: EmbedBuilder): Promise<DeliveryResult> => ({
        kind: "success",
      })
    );
    const service = createNotifyService({
      destinationClient: { send },
      logger: createMockLogger(),
    });

    await expect(service.dispatch(fullEvent, [])).resolves.toEqual({
      delivered: 0,
      skipped: 0,
      failed: 0,
    });
    expect(send).not.toHaveBeenCalled();
  });
});
