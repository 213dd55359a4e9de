import {
  ChannelType,
  EmbedBuilder,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from "discord.js";

import {
  ConfigServiceError,
  ConfigValidationError,
  PrefixLimitExceededError,
  PrefixNotMonitoredError,
  TenantNotFoundError,
  normalizePrefix,
  type ConfigService,
  type UpdateAppearanceInput,
} from "@/services/configService";
import type { AppearanceOptions, FieldVisibility, TenantConfig } from "@/types";
import { errorToMessage } from "@/utils/errors";

export type CommandInteraction = Pick<
  ChatInputCommandInteraction,
  "commandName" | "guildId" | "memberPermissions" | "options" | "reply"
>;

export interface CommandHandlerDeps {
  configService: ConfigService;
  logger?: Pick<typeof console, "info" | "warn" | "error">;
}

export interface CommandHandler {
  handle: (interaction: CommandInteraction) => Promise<void>;
}

const VISIBILITY_OPTIONS: ReadonlyArray<{
  option: string;
  key: keyof FieldVisibility;
  label: string;
}> = [
  { option: "show_callsign", key: "showCallsign", label: "callsign" },
  { option: "show_pilot", key: "showPilot", label: "pilot" },
  { option: "show_aircraft", key: "showAircraft", label: "aircraft" },
  { option: "show_departure", key: "showDeparture", label: "departure" },
  { option: "show_arrival", key: "showArrival", label: "arrival" },
  { option: "show_flightlevel", key: "showFlightLevel", label: "flight level" },
  { option: "show_flightrules", key: "showFlightRules", label: "flight rules" },
  { option: "show_route", key: "showRoute", label: "route" },
];

export function buildCommandDefinitions(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  const setup = new SlashCommandBuilder()
    .setName("setup")
    .setDescription("Configure flight plan monitoring for this server")
    .setDefaultMemberPermissions(PermissionFlagsBits.Administrator)
    .addStringOption((option) =>
      option
        .setName("callsign_prefix")
        .setDescription("The airline callsign prefix to monitor (e.g. SWA, UAL, DAL)")
        .setRequired(true)
    )
    .addChannelOption((option) =>
      option
        .setName("channel")
        .setDescription("The channel to send notifications to")
        .addChannelTypes(ChannelType.GuildText, ChannelType.GuildAnnouncement)
        .setRequired(true)
    );

  const remove = new SlashCommandBuilder()
    .setName("remove")
    .setDescription("Remove a callsign prefix from monitoring")
    .setDefaultMemberPermissions(PermissionFlagsBits.Administrator)
    .addStringOption((option) =>
      option
        .setName("callsign_prefix")
        .setDescription("The callsign prefix to stop monitoring")
        .setRequired(true)
    );

  const config = new SlashCommandBuilder()
    .setName("config")
    .setDescription("Configure embed appearance and field visibility")
    .setDefaultMemberPermissions(PermissionFlagsBits.Administrator)
    .addStringOption((option) =>
      option.setName("embed_color").setDescription("Hex color code (e.g. #00FF00)")
    )
    .addStringOption((option) =>
      option.setName("embed_title").setDescription("Custom title for notifications")
    )
    .addStringOption((option) =>
      option
        .setName("embed_thumbnail")
        .setDescription("Thumbnail image URL (empty to remove)")
    )
    .addStringOption((option) =>
      option.setName("embed_image").setDescription("Main image URL (empty to remove)")
    );
  for (const { option, label } of VISIBILITY_OPTIONS) {
    config.addBooleanOption((builder) =>
      builder.setName(option).setDescription(`Show/hide the ${label} field`)
    );
  }

  const status = new SlashCommandBuilder()
    .setName("status")
    .setDescription("Show the flight plan monitoring configuration")
    .setDefaultMemberPermissions(PermissionFlagsBits.Administrator);

  return [setup, remove, config, status].map((builder) => builder.toJSON());
}

export function createCommandHandler(deps: CommandHandlerDeps): CommandHandler {
  const logger = deps.logger ?? console;
  const { configService } = deps;

  async function replyError(
    interaction: CommandInteraction,
    content: string
  ): Promise<void> {
    await interaction.reply({ content: `❌ ${content}`, ephemeral: true });
  }

  async function handleSetup(
    interaction: CommandInteraction,
    guildId: string
  ): Promise<void> {
    const prefix = interaction.options.getString("callsign_prefix", true);
    const channel = interaction.options.getChannel("channel", true);

    const config = await configService.addPrefix({
      guildId,
      destinationId: channel.id,
      prefix,
    });

    const embed = new EmbedBuilder()
      .setTitle("✅ Flight Plan Monitoring Configured")
      .setColor(0x00ff00)
      .setDescription(`Now monitoring callsign prefix: **${normalizePrefix(prefix)}**`)
      .addFields(
        { name: "Channel", value: `<#${config.destinationId}>`, inline: true },
        {
          name: "All Monitored Prefixes",
          value: config.prefixes.join(", "),
          inline: true,
        }
      )
      .setFooter({
        text: "Flight plan notifications will be posted when aircraft with matching callsigns file flight plans.",
      });

    await interaction.reply({ embeds: [embed] });
  }

  async function handleRemove(
    interaction: CommandInteraction,
    guildId: string
  ): Promise<void> {
    const prefix = interaction.options.getString("callsign_prefix", true);
    const config = await configService.removePrefix(guildId, prefix);

    const embed = new EmbedBuilder()
      .setTitle("✅ Callsign Prefix Removed")
      .setColor(0xff9900)
      .setDescription(`Removed **${normalizePrefix(prefix)}** from monitoring`)
      .addFields(
        config.prefixes.length > 0
          ? {
              name: "Remaining Monitored Prefixes",
              value: config.prefixes.join(", "),
              inline: true,
            }
          : {
              name: "Status",
              value: "No prefixes are currently being monitored",
              inline: true,
            }
      );

    await interaction.reply({ embeds: [embed] });
  }

  async function handleConfig(
    interaction: CommandInteraction,
    guildId: string
  ): Promise<void> {
    const input: UpdateAppearanceInput = {};
    const color = interaction.options.getString("embed_color");
    const title = interaction.options.getString("embed_title");
    const thumbnail = interaction.options.getString("embed_thumbnail");
    const image = interaction.options.getString("embed_image");
    if (color !== null) {
      input.color = color;
    }
    if (title !== null) {
      input.title = title;
    }
    if (thumbnail !== null) {
      input.thumbnailUrl = thumbnail;
    }
    if (image !== null) {
      input.imageUrl = image;
    }
    for (const { option, key } of VISIBILITY_OPTIONS) {
      const value = interaction.options.getBoolean(option);
      if (value !== null) {
        input[key] = value;
      }
    }

    const { config, updatedKeys } = await configService.updateAppearance(
      guildId,
      input
    );

    const embed = new EmbedBuilder()
      .setTitle("✅ Embed Configuration Updated")
      .setColor(config.appearance.color)
      .setDescription("Flight plan embed appearance has been configured")
      .addFields(describeAppearanceChanges(config.appearance, updatedKeys))
      .addFields({
        name: "Visible Fields",
        value: describeVisibleFields(config.appearance),
        inline: false,
      });

    await interaction.reply({ embeds: [embed] });
  }

  async function handleStatus(
    interaction: CommandInteraction,
    guildId: string
  ): Promise<void> {
    const config = await configService.getConfig(guildId);
    if (!config) {
      await replyError(
        interaction,
        "No monitoring configuration found for this server. Please use `/setup` first."
      );
      return;
    }

    await interaction.reply({ embeds: [createStatusEmbed(config)], ephemeral: true });
  }

  return {
    async handle(interaction) {
      const guildId = interaction.guildId;
      if (
        !guildId ||
        !interaction.memberPermissions?.has(PermissionFlagsBits.Administrator)
      ) {
        await replyError(
          interaction,
          "You need 'Administrator' permissions to use this command."
        );
        return;
      }

      try {
        switch (interaction.commandName) {
          case "setup":
            await handleSetup(interaction, guildId);
            return;
          case "remove":
            await handleRemove(interaction, guildId);
            return;
          case "config":
            await handleConfig(interaction, guildId);
            return;
          case "status":
            await handleStatus(interaction, guildId);
            return;
          default:
            logger.warn(
              `CommandHandler: 未知のコマンドを受信しました (command=${interaction.commandName}, guildId=${guildId})`
            );
        }
      } catch (error) {
        if (error instanceof ConfigServiceError) {
          await replyError(interaction, describeServiceError(error));
          return;
        }
        logger.error(
          `CommandHandler: コマンド処理中に例外が発生しました (command=${interaction.commandName}, guildId=${guildId}): ${errorToMessage(error)}`
        );
        throw error;
      }
    },
  };
}

export function describeServiceError(error: ConfigServiceError): string {
  if (error instanceof ConfigValidationError) {
    return error.violations.join(" ");
  }
  if (error instanceof TenantNotFoundError) {
    return "No monitoring configuration found for this server. Please use `/setup` first.";
  }
  if (error instanceof PrefixNotMonitoredError) {
    return `Callsign prefix **${error.prefix}** is not being monitored.`;
  }
  if (error instanceof PrefixLimitExceededError) {
    return `A server can monitor at most ${error.limit} callsign prefixes.`;
  }
  return error.message;
}

function describeAppearanceChanges(
  appearance: AppearanceOptions,
  updatedKeys: ReadonlyArray<keyof AppearanceOptions>
): Array<{ name: string; value: string; inline: boolean }> {
  const fields: Array<{ name: string; value: string; inline: boolean }> = [];
  if (updatedKeys.includes("color")) {
    fields.push({ name: "Color", value: formatColor(appearance.color), inline: true });
  }
  if (updatedKeys.includes("title")) {
    fields.push({ name: "Title", value: appearance.title, inline: true });
  }
  if (updatedKeys.includes("thumbnailUrl")) {
    fields.push({
      name: "Thumbnail",
      value: appearance.thumbnailUrl ? "Set" : "Removed",
      inline: true,
    });
  }
  if (updatedKeys.includes("imageUrl")) {
    fields.push({
      name: "Image",
      value: appearance.imageUrl ? "Set" : "Removed",
      inline: true,
    });
  }
  return fields;
}

export function describeVisibleFields(visibility: FieldVisibility): string {
  const visible = VISIBILITY_OPTIONS.filter(({ key }) => visibility[key]).map(
    ({ label }) => label
  );
  return visible.length > 0 ? visible.join(", ") : "None";
}

function createStatusEmbed(config: TenantConfig): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle("🛫 Flight Plan Monitoring Status")
    .setColor(config.appearance.color)
    .addFields(
      { name: "Channel", value: `<#${config.destinationId}>`, inline: true },
      {
        name: "Monitored Prefixes",
        value: config.prefixes.length > 0 ? config.prefixes.join(", ") : "None",
        inline: true,
      },
      { name: "Title", value: config.appearance.title, inline: false },
      { name: "Color", value: formatColor(config.appearance.color), inline: true },
      {
        name: "Visible Fields",
        value: describeVisibleFields(config.appearance),
        inline: false,
      }
    );
}

function formatColor(color: number): string {
  return `#${color.toString(16).padStart(6, "0")}`;
}
