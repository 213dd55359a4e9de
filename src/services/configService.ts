import type { TenantConfigRepository } from "@/repositories/tenantConfigRepository";
import type { AppearanceOptions, FieldVisibility, TenantConfig } from "@/types";

export interface AddPrefixInput {
  guildId: string;
  destinationId: string;
  prefix: string;
}

export interface UpdateAppearanceInput extends Partial<FieldVisibility> {
  color?: string;
  title?: string;
  thumbnailUrl?: string;
  imageUrl?: string;
}

export abstract class ConfigServiceError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = "ConfigServiceError";
  }
}

export class ConfigValidationError extends ConfigServiceError {
  constructor(public readonly violations: string[]) {
    super("Config validation failed", "CONFIG_VALIDATION_ERROR");
    this.name = "ConfigValidationError";
  }
}

export class TenantNotFoundError extends ConfigServiceError {
  constructor(public readonly guildId: string) {
    super("Tenant config not found", "TENANT_NOT_FOUND");
    this.name = "TenantNotFoundError";
  }
}

export class PrefixNotMonitoredError extends ConfigServiceError {
  constructor(public readonly guildId: string, public readonly prefix: string) {
    super("Prefix is not monitored", "PREFIX_NOT_MONITORED");
    this.name = "PrefixNotMonitoredError";
  }
}

export class PrefixLimitExceededError extends ConfigServiceError {
  constructor(public readonly guildId: string, public readonly limit: number) {
    super("Prefix limit exceeded", "PREFIX_LIMIT_EXCEEDED");
    this.name = "PrefixLimitExceededError";
  }
}

export interface AppearanceUpdateResult {
  config: TenantConfig;
  updatedKeys: Array<keyof AppearanceOptions>;
}

export interface ConfigService {
  getConfig: (guildId: string) => Promise<TenantConfig | null>;
  addPrefix: (input: AddPrefixInput) => Promise<TenantConfig>;
  removePrefix: (guildId: string, prefix: string) => Promise<TenantConfig>;
  updateAppearance: (
    guildId: string,
    input: UpdateAppearanceInput
  ) => Promise<AppearanceUpdateResult>;
}

export interface ConfigServiceDeps {
  tenantConfigRepository: TenantConfigRepository;
  logger?: Pick<typeof console, "info" | "warn" | "error">;
}

export function createConfigService(deps: ConfigServiceDeps): ConfigService {
  const repository = deps.tenantConfigRepository;
  const logger = deps.logger ?? console;

  return {
    async getConfig(guildId) {
      return repository.findByGuild(guildId);
    },

    async addPrefix(input) {
      const { violations, normalized } = validateAddPrefixInput(input);
      if (violations.length > 0 || !normalized) {
        log(logger, "warn", "ConfigService.addPrefix: validation failed", {
          guildId: input.guildId,
          violations,
        });
        throw new ConfigValidationError(violations);
      }

      const existing = await repository.findByGuild(normalized.guildId);
      const prefixes = [...(existing?.prefixes ?? [])];
      if (!prefixes.includes(normalized.prefix)) {
        if (prefixes.length >= PREFIXES_PER_TENANT_LIMIT) {
          log(logger, "warn", "ConfigService.addPrefix: limit exceeded", {
            guildId: normalized.guildId,
            limit: PREFIXES_PER_TENANT_LIMIT,
          });
          throw new PrefixLimitExceededError(
            normalized.guildId,
            PREFIXES_PER_TENANT_LIMIT
          );
        }
        prefixes.push(normalized.prefix);
      }

      const updated = await repository.upsert(normalized.guildId, {
        destinationId: normalized.destinationId,
        prefixes,
      });

      log(logger, "info", "ConfigService.addPrefix: prefix added", {
        guildId: updated.guildId,
        prefix: normalized.prefix,
      });

      return updated;
    },

    async removePrefix(guildId, rawPrefix) {
      const existing = await repository.findByGuild(guildId);
      if (!existing) {
        log(logger, "warn", "ConfigService.removePrefix: tenant not found", {
          guildId,
        });
        throw new TenantNotFoundError(guildId);
      }

      const prefix = normalizePrefix(rawPrefix);
      if (!existing.prefixes.includes(prefix)) {
        throw new PrefixNotMonitoredError(guildId, prefix);
      }

      const updated = await repository.upsert(guildId, {
        prefixes: existing.prefixes.filter((candidate) => candidate !== prefix),
      });

      log(logger, "info", "ConfigService.removePrefix: prefix removed", {
        guildId,
        prefix,
      });

      return updated;
    },

    async updateAppearance(guildId, input) {
      const existing = await repository.findByGuild(guildId);
      if (!existing) {
        log(logger, "warn", "ConfigService.updateAppearance: tenant not found", {
          guildId,
        });
        throw new TenantNotFoundError(guildId);
      }

      const { violations, normalized } = validateAppearanceInput(input);
      if (violations.length > 0 || !normalized) {
        log(logger, "warn", "ConfigService.updateAppearance: validation failed", {
          guildId,
          violations,
        });
        throw new ConfigValidationError(violations);
      }

      const config = await repository.upsert(guildId, normalized);
      const updatedKeys = APPEARANCE_INPUT_ORDER.filter(
        (key) => normalized[key] !== undefined
      );

      log(logger, "info", "ConfigService.updateAppearance: appearance updated", {
        guildId,
        updatedKeys,
      });

      return { config, updatedKeys };
    },
  };
}

const PREFIXES_PER_TENANT_LIMIT = 25;
const PREFIX_MIN_LENGTH = 2;
const PREFIX_MAX_LENGTH = 10;
const PREFIX_REGEX = /^[A-Z0-9]+$/;
const TITLE_MAX_LENGTH = 256;
const SNOWFLAKE_REGEX = /^\d{17,19}$/;
const COLOR_REGEX = /^(?:#|0x)?([0-9a-f]{6})$/i;
const URL_REGEX = /^https?:\/\/\S+$/;

const VISIBILITY_KEYS: ReadonlyArray<keyof FieldVisibility> = [
  "showCallsign",
  "showPilot",
  "showAircraft",
  "showDeparture",
  "showArrival",
  "showFlightLevel",
  "showFlightRules",
  "showRoute",
];

const APPEARANCE_INPUT_ORDER: ReadonlyArray<keyof AppearanceOptions> = [
  "color",
  "title",
  "thumbnailUrl",
  "imageUrl",
  ...VISIBILITY_KEYS,
];

interface NormalizedAddPrefixInput {
  guildId: string;
  destinationId: string;
  prefix: string;
}

interface ValidationOutcome<T> {
  violations: string[];
  normalized?: T;
}

export function normalizePrefix(prefix: string): string {
  return typeof prefix === "string" ? prefix.trim().toUpperCase() : "";
}

export function parseColor(raw: string): number | null {
  const match = COLOR_REGEX.exec(raw.trim());
  if (!match?.[1]) {
    return null;
  }
  return Number.parseInt(match[1], 16);
}

function validateAddPrefixInput(
  input: AddPrefixInput
): ValidationOutcome<NormalizedAddPrefixInput> {
  const violations: string[] = [];

  const guildId = typeof input.guildId === "string" ? input.guildId.trim() : "";
  if (!SNOWFLAKE_REGEX.test(guildId)) {
    violations.push("guildId must be a valid snowflake ID.");
  }

  const destinationId =
    typeof input.destinationId === "string" ? input.destinationId.trim() : "";
  if (!SNOWFLAKE_REGEX.test(destinationId)) {
    violations.push("destinationId must be a valid snowflake ID.");
  }

  const prefix = normalizePrefix(input.prefix);
  if (prefix.length < PREFIX_MIN_LENGTH || prefix.length > PREFIX_MAX_LENGTH) {
    violations.push("callsign prefix must be between 2 and 10 characters.");
  } else if (!PREFIX_REGEX.test(prefix)) {
    violations.push("callsign prefix must contain only letters and digits.");
  }

  if (violations.length > 0) {
    return { violations };
  }

  return { violations, normalized: { guildId, destinationId, prefix } };
}

function validateAppearanceInput(
  input: UpdateAppearanceInput
): ValidationOutcome<Partial<AppearanceOptions>> {
  const violations: string[] = [];
  const normalized: Partial<AppearanceOptions> = {};

  if (input.color !== undefined) {
    const color = parseColor(input.color);
    if (color === null) {
      violations.push("color must be a hex value like #00FF00 or 0x00FF00.");
    } else {
      normalized.color = color;
    }
  }

  if (input.title !== undefined) {
    const title = input.title.trim();
    if (title.length === 0 || title.length > TITLE_MAX_LENGTH) {
      violations.push("title must be between 1 and 256 characters.");
    } else {
      normalized.title = title;
    }
  }

  if (input.thumbnailUrl !== undefined) {
    const url = normalizeOptionalUrl(input.thumbnailUrl);
    if (url === undefined) {
      violations.push("thumbnail URL must start with http:// or https://.");
    } else {
      normalized.thumbnailUrl = url;
    }
  }

  if (input.imageUrl !== undefined) {
    const url = normalizeOptionalUrl(input.imageUrl);
    if (url === undefined) {
      violations.push("image URL must start with http:// or https://.");
    } else {
      normalized.imageUrl = url;
    }
  }

  for (const key of VISIBILITY_KEYS) {
    const value = input[key];
    if (typeof value === "boolean") {
      normalized[key] = value;
    }
  }

  if (violations.length === 0 && Object.keys(normalized).length === 0) {
    violations.push("at least one configuration parameter must be provided.");
  }

  if (violations.length > 0) {
    return { violations };
  }

  return { violations, normalized };
}

/**
 * 空文字は設定の解除 (null)、不正な URL は undefined を返します。
 */
function normalizeOptionalUrl(raw: string): string | null | undefined {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return null;
  }
  return URL_REGEX.test(trimmed) ? trimmed : undefined;
}

function log(
  logger: Pick<typeof console, "info" | "warn" | "error">,
  level: "info" | "warn" | "error",
  message: string,
  context?: Record<string, unknown>
): void {
  if (context) {
    logger[level](message, context);
  } else {
    logger[level](message);
  }
}
