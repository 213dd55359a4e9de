import {
  PermissionFlagsBits,
  type Client,
  type EmbedBuilder,
  type Message,
  type MessageCreateOptions,
  type MessagePayload,
  type PermissionsBitField,
  type TextBasedChannel,
  type User,
} from "discord.js";

import { errorToMessage } from "@/utils/errors";

export type DeliveryResult =
  | { kind: "success" }
  | { kind: "permissionDenied"; message: string }
  | { kind: "notFound"; message: string }
  | { kind: "error"; error: unknown };

export interface DestinationClient {
  send: (destinationId: string, embed: EmbedBuilder) => Promise<DeliveryResult>;
}

export interface DiscordDestinationClientDeps {
  getClient: () => Pick<Client, "channels" | "user">;
  logger?: Pick<typeof console, "warn">;
}

type SendableTextChannel = Extract<
  TextBasedChannel,
  {
    send: (
      options: string | MessagePayload | MessageCreateOptions
    ) => Promise<Message>;
  }
>;

interface PermissionScopedChannel {
  permissionsFor: (user: User) => Readonly<PermissionsBitField> | null;
}

const REQUIRED_PERMISSIONS = [
  PermissionFlagsBits.SendMessages,
  PermissionFlagsBits.EmbedLinks,
];

export function createDiscordDestinationClient(
  deps: DiscordDestinationClientDeps
): DestinationClient {
  const logger = deps.logger ?? console;

  return {
    async send(destinationId, embed) {
      const client = deps.getClient();

      let channel: unknown;
      try {
        channel = await client.channels.fetch(destinationId);
      } catch (error) {
        return classifyDiscordError(error);
      }

      if (!isTextChannel(channel)) {
        return {
          kind: "notFound",
          message: "destination is not a text based channel",
        };
      }

      if (client.user && hasPermissionScope(channel)) {
        const permissions = channel.permissionsFor(client.user);
        if (!permissions || !permissions.has(REQUIRED_PERMISSIONS)) {
          return {
            kind: "permissionDenied",
            message: "missing SendMessages or EmbedLinks",
          };
        }
      }

      try {
        await channel.send({ embeds: [embed] });
        return { kind: "success" };
      } catch (error) {
        const result = classifyDiscordError(error);
        if (result.kind === "error") {
          logger.warn(
            `DestinationClient: 送信時に想定外のエラーが発生しました (channelId=${destinationId}): ${errorToMessage(error)}`
          );
        }
        return result;
      }
    },
  };
}

export function classifyDiscordError(error: unknown): DeliveryResult {
  if (!error || typeof error !== "object") {
    return { kind: "error", error };
  }

  const candidate = error as { status?: number; code?: number | string };
  const message = errorToMessage(error);

  // Discord API 特有のエラーコード
  if (
    candidate.status === 404 ||
    candidate.code === 10003 || // Unknown Channel
    candidate.code === 10004 // Unknown Guild
  ) {
    return { kind: "notFound", message };
  }

  if (
    candidate.status === 403 ||
    candidate.code === 50001 || // Missing Access
    candidate.code === 50013 // Missing Permissions
  ) {
    return { kind: "permissionDenied", message };
  }

  return { kind: "error", error };
}

function isTextChannel(channel: unknown): channel is SendableTextChannel {
  if (!channel || typeof channel !== "object") {
    return false;
  }

  const candidate = channel as TextBasedChannel;

  if (typeof candidate.isTextBased === "function") {
    if (!candidate.isTextBased()) {
      return false;
    }
  }

  return (
    // Fallback for partial mocks
    typeof (candidate as { send?: unknown }).send === "function"
  );
}

function hasPermissionScope(channel: object): channel is PermissionScopedChannel {
  return (
    typeof (channel as { permissionsFor?: unknown }).permissionsFor === "function"
  );
}
