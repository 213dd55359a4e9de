export type Snowflake = string;

export type FlightEventKind = "flightPlan" | "aircraftSpawn";

/**
 * 上流フィードから取り込んだフライトイベントの正規化表現。
 * callsign 以外はすべて任意で、空値は undefined として保持する。
 */
export interface FlightEvent {
  readonly kind: FlightEventKind;
  readonly callsign: string;
  readonly pilotName?: string;
  readonly aircraftType?: string;
  readonly departureAirport?: string;
  readonly arrivalAirport?: string;
  readonly flightLevel?: string;
  readonly flightRules?: string;
  readonly route?: string;
  readonly realCallsign?: string;
  readonly extras: Readonly<Record<string, unknown>>;
}

export interface FieldVisibility {
  showCallsign: boolean;
  showPilot: boolean;
  showAircraft: boolean;
  showDeparture: boolean;
  showArrival: boolean;
  showFlightLevel: boolean;
  showFlightRules: boolean;
  showRoute: boolean;
}

export interface AppearanceOptions extends FieldVisibility {
  color: number;
  title: string;
  thumbnailUrl: string | null;
  imageUrl: string | null;
}

export interface TenantConfig {
  guildId: Snowflake;
  destinationId: Snowflake;
  prefixes: string[];
  appearance: AppearanceOptions;
  createdAt: Date;
  updatedAt: Date;
}

export type TenantConfigSnapshot = ReadonlyMap<Snowflake, TenantConfig>;

export interface TenantMatch {
  guildId: Snowflake;
  config: TenantConfig;
  matchedPrefix: string;
}

export const DEFAULT_APPEARANCE: Readonly<AppearanceOptions> = {
  color: 0x00ff00,
  title: "✈️ New Flight Plan Filed",
  thumbnailUrl: null,
  imageUrl: null,
  showCallsign: true,
  showPilot: true,
  showAircraft: true,
  showDeparture: true,
  showArrival: true,
  showFlightLevel: true,
  showFlightRules: true,
  showRoute: true,
};
