import type Database from "better-sqlite3";

import {
  DEFAULT_APPEARANCE,
  type AppearanceOptions,
  type Snowflake,
  type TenantConfig,
} from "@/types";

export interface TenantConfigFields extends Partial<AppearanceOptions> {
  destinationId?: Snowflake;
  prefixes?: string[];
}

export interface TenantConfigRepository {
  getAll: () => Promise<Map<Snowflake, TenantConfig>>;
  findByGuild: (guildId: Snowflake) => Promise<TenantConfig | null>;
  upsert: (guildId: Snowflake, fields: TenantConfigFields) => Promise<TenantConfig>;
  delete: (guildId: Snowflake) => Promise<boolean>;
}

export interface TenantConfigRepositoryDeps {
  db: Database.Database;
  getCurrentTime?: () => Date;
  logger?: Pick<typeof console, "warn">;
}

interface TenantConfigRow {
  guild_id: string;
  destination_id: string;
  callsign_prefixes: string;
  embed_color: number;
  embed_title: string;
  embed_thumbnail: string | null;
  embed_image: string | null;
  show_callsign: number;
  show_pilot: number;
  show_aircraft: number;
  show_departure: number;
  show_arrival: number;
  show_flight_level: number;
  show_flight_rules: number;
  show_route: number;
  created_at: string;
  updated_at: string;
}

interface UpsertParams {
  guildId: string;
  destinationId: string;
  prefixes: string;
  color: number;
  title: string;
  thumbnail: string | null;
  image: string | null;
  showCallsign: number;
  showPilot: number;
  showAircraft: number;
  showDeparture: number;
  showArrival: number;
  showFlightLevel: number;
  showFlightRules: number;
  showRoute: number;
  now: string;
}

export function createTenantConfigRepository(
  deps: TenantConfigRepositoryDeps
): TenantConfigRepository {
  const getCurrentTime = deps.getCurrentTime ?? (() => new Date());
  const logger = deps.logger ?? console;
  const db = deps.db;

  const selectAllStmt = db.prepare<[], TenantConfigRow>(`
    SELECT *
    FROM tenant_configs
    ORDER BY created_at ASC, guild_id ASC
  `);

  const selectByGuildStmt = db.prepare<{ guildId: string }, TenantConfigRow>(`
    SELECT *
    FROM tenant_configs
    WHERE guild_id = @guildId
  `);

  const upsertStmt = db.prepare<UpsertParams>(`
    INSERT INTO tenant_configs (
      guild_id,
      destination_id,
      callsign_prefixes,
      embed_color,
      embed_title,
      embed_thumbnail,
      embed_image,
      show_callsign,
      show_pilot,
      show_aircraft,
      show_departure,
      show_arrival,
      show_flight_level,
      show_flight_rules,
      show_route,
      created_at,
      updated_at
    ) VALUES (
      @guildId,
      @destinationId,
      @prefixes,
      @color,
      @title,
      @thumbnail,
      @image,
      @showCallsign,
      @showPilot,
      @showAircraft,
      @showDeparture,
      @showArrival,
      @showFlightLevel,
      @showFlightRules,
      @showRoute,
      @now,
      @now
    )
    ON CONFLICT(guild_id) DO UPDATE SET
      destination_id = excluded.destination_id,
      callsign_prefixes = excluded.callsign_prefixes,
      embed_color = excluded.embed_color,
      embed_title = excluded.embed_title,
      embed_thumbnail = excluded.embed_thumbnail,
      embed_image = excluded.embed_image,
      show_callsign = excluded.show_callsign,
      show_pilot = excluded.show_pilot,
      show_aircraft = excluded.show_aircraft,
      show_departure = excluded.show_departure,
      show_arrival = excluded.show_arrival,
      show_flight_level = excluded.show_flight_level,
      show_flight_rules = excluded.show_flight_rules,
      show_route = excluded.show_route,
      updated_at = excluded.updated_at
  `);

  const deleteStmt = db.prepare<{ guildId: string }>(`
    DELETE FROM tenant_configs
    WHERE guild_id = @guildId
  `);

  const mapRow = (row: TenantConfigRow) => mapRowToDomain(row, logger);

  return {
    async getAll() {
      const rows = selectAllStmt.all();
      return new Map(rows.map((row) => [row.guild_id, mapRow(row)]));
    },

    async findByGuild(guildId) {
      const row = selectByGuildStmt.get({ guildId });
      return row ? mapRow(row) : null;
    },

    async upsert(guildId, fields) {
      const existingRow = selectByGuildStmt.get({ guildId });
      const existing = existingRow ? mapRow(existingRow) : null;

      const destinationId = fields.destinationId ?? existing?.destinationId;
      if (!destinationId) {
        throw new Error(
          `destinationId is required for a new tenant config: ${guildId}`
        );
      }

      const appearance: AppearanceOptions = {
        ...DEFAULT_APPEARANCE,
        ...existing?.appearance,
        ...pickDefined(fields),
      };
      const prefixes = fields.prefixes ?? existing?.prefixes ?? [];

      upsertStmt.run({
        guildId,
        destinationId,
        prefixes: JSON.stringify(prefixes),
        color: appearance.color,
        title: appearance.title,
        thumbnail: appearance.thumbnailUrl,
        image: appearance.imageUrl,
        showCallsign: toFlag(appearance.showCallsign),
        showPilot: toFlag(appearance.showPilot),
        showAircraft: toFlag(appearance.showAircraft),
        showDeparture: toFlag(appearance.showDeparture),
        showArrival: toFlag(appearance.showArrival),
        showFlightLevel: toFlag(appearance.showFlightLevel),
        showFlightRules: toFlag(appearance.showFlightRules),
        showRoute: toFlag(appearance.showRoute),
        now: getCurrentTime().toISOString(),
      });

      const record = selectByGuildStmt.get({ guildId });
      if (!record) {
        throw new Error("Failed to retrieve upserted tenant config");
      }
      return mapRow(record);
    },

    async delete(guildId) {
      const result = deleteStmt.run({ guildId });
      return result.changes > 0;
    },
  };
}

const APPEARANCE_KEYS: ReadonlyArray<keyof AppearanceOptions> = [
  "color",
  "title",
  "thumbnailUrl",
  "imageUrl",
  "showCallsign",
  "showPilot",
  "showAircraft",
  "showDeparture",
  "showArrival",
  "showFlightLevel",
  "showFlightRules",
  "showRoute",
];

function pickDefined(fields: TenantConfigFields): Partial<AppearanceOptions> {
  const appearance: Partial<AppearanceOptions> = {};
  for (const key of APPEARANCE_KEYS) {
    const value = fields[key];
    if (value !== undefined) {
      assignAppearance(appearance, key, value);
    }
  }
  return appearance;
}

function assignAppearance<K extends keyof AppearanceOptions>(
  target: Partial<AppearanceOptions>,
  key: K,
  value: AppearanceOptions[K]
): void {
  target[key] = value;
}

function toFlag(value: boolean): number {
  return value ? 1 : 0;
}

function mapRowToDomain(
  row: TenantConfigRow,
  logger: Pick<typeof console, "warn">
): TenantConfig {
  return {
    guildId: row.guild_id,
    destinationId: row.destination_id,
    prefixes: parsePrefixes(row.callsign_prefixes, row.guild_id, logger),
    appearance: {
      color: row.embed_color,
      title: row.embed_title,
      thumbnailUrl: row.embed_thumbnail,
      imageUrl: row.embed_image,
      showCallsign: Boolean(row.show_callsign),
      showPilot: Boolean(row.show_pilot),
      showAircraft: Boolean(row.show_aircraft),
      showDeparture: Boolean(row.show_departure),
      showArrival: Boolean(row.show_arrival),
      showFlightLevel: Boolean(row.show_flight_level),
      showFlightRules: Boolean(row.show_flight_rules),
      showRoute: Boolean(row.show_route),
    },
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function parsePrefixes(
  raw: string,
  guildId: string,
  logger: Pick<typeof console, "warn">
): string[] {
  try {
    const value: unknown = JSON.parse(raw);
    if (Array.isArray(value)) {
      return value.map((item) => String(item));
    }
  } catch {
    // fall through
  }
  logger.warn(
    `TenantConfigRepository: プレフィックスの形式が不正なため空として扱います (guildId=${guildId})`
  );
  return [];
}
