import { z } from "zod";

import { ENTITY_ID_FIELDS, extractEntityId } from "@/pipeline/snapshotDiffer";
import type { FlightEvent, FlightEventKind } from "@/types";

export type RawRecord = Record<string, unknown>;

export const FLIGHT_PLAN_EVENT_TYPES: readonly string[] = [
  "FLIGHT_PLAN",
  "EVENT_FLIGHT_PLAN",
];

const PAYLOAD_WRAPPER_KEYS = ["flightPlan", "data", "flight_plan"] as const;

const MAX_FIELD_LENGTH = 1024;

const recordSchema = z.record(z.string(), z.unknown());
const recordArraySchema = z.array(z.unknown());

// 24data は {t, d} 形式、汎用フィードは {type, data} 形式
const envelopeSchema = z.union([
  z
    .object({ t: z.string(), d: z.unknown() })
    .transform(({ t, d }) => ({ type: t, data: d })),
  z.object({ type: z.string(), data: z.unknown() }),
]);

export type Envelope = z.infer<typeof envelopeSchema>;

export type DecodeResult<T> =
  | { kind: "ok"; value: T }
  | { kind: "malformed"; reason: string };

export function parseEnvelope(raw: string): DecodeResult<Envelope> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { kind: "malformed", reason: "invalid JSON" };
  }

  const parsed = envelopeSchema.safeParse(json);
  if (!parsed.success) {
    return { kind: "malformed", reason: "unexpected envelope shape" };
  }
  return { kind: "ok", value: parsed.data };
}

export function isFlightPlanEventType(type: string): boolean {
  return FLIGHT_PLAN_EVENT_TYPES.includes(type);
}

/**
 * push ペイロードから生レコードを取り出します。
 * 配列 → callsign を持つ単一オブジェクト → 既知のラッパーキーの順で判定し、
 * いずれにも当てはまらない場合は空配列を返します。
 */
export function unwrapPushPayload(payload: unknown): RawRecord[] {
  const asArray = recordArraySchema.safeParse(payload);
  if (asArray.success) {
    return onlyRecords(asArray.data);
  }

  const asRecord = recordSchema.safeParse(payload);
  if (!asRecord.success) {
    return [];
  }

  const record = asRecord.data;
  if ("callsign" in record) {
    return [record];
  }

  for (const key of PAYLOAD_WRAPPER_KEYS) {
    if (!(key in record)) {
      continue;
    }
    const inner = record[key];
    const innerArray = recordArraySchema.safeParse(inner);
    if (innerArray.success) {
      return onlyRecords(innerArray.data);
    }
    const innerRecord = recordSchema.safeParse(inner);
    if (innerRecord.success && "callsign" in innerRecord.data) {
      return [innerRecord.data];
    }
    return [];
  }

  return [];
}

/**
 * poll スナップショットを生レコード配列へ変換します。
 * callsign をキーとするオブジェクトは各値にキーを callsign として注入します。
 * 配列でもオブジェクトでもなければ null を返します。
 */
export function decodePollSnapshot(payload: unknown): RawRecord[] | null {
  const asArray = recordArraySchema.safeParse(payload);
  if (asArray.success) {
    return onlyRecords(asArray.data);
  }

  const asRecord = recordSchema.safeParse(payload);
  if (!asRecord.success) {
    return null;
  }

  const entities: RawRecord[] = [];
  for (const [key, value] of Object.entries(asRecord.data)) {
    const entity = recordSchema.safeParse(value);
    if (!entity.success) {
      continue;
    }
    entities.push({ ...entity.data, callsign: key });
  }
  return entities;
}

function onlyRecords(values: unknown[]): RawRecord[] {
  const records: RawRecord[] = [];
  for (const value of values) {
    const parsed = recordSchema.safeParse(value);
    if (parsed.success) {
      records.push(parsed.data);
    }
  }
  return records;
}

const FIELD_ALIASES = {
  pilotName: ["robloxName", "playerName", "pilotName"],
  aircraftType: ["aircraft", "aircraftType"],
  departureAirport: ["departing", "departureAirport"],
  arrivalAirport: ["arriving", "arrivalAirport"],
  flightLevel: ["flightlevel", "flightLevel"],
  flightRules: ["flightrules", "flightRules"],
  route: ["route"],
  realCallsign: ["realcallsign", "realCallsign"],
} as const satisfies Record<string, readonly string[]>;

const CONSUMED_FIELDS: ReadonlySet<string> = new Set<string>([
  ...ENTITY_ID_FIELDS,
  ...Object.values(FIELD_ALIASES).flat(),
]);

/**
 * 生レコードを FlightEvent に正規化します。callsign が取れない場合は null。
 */
export function toFlightEvent(
  record: RawRecord,
  kind: FlightEventKind
): FlightEvent | null {
  const callsign = extractEntityId(record);
  if (!callsign) {
    return null;
  }

  // 名前付きプロパティに取り込まなかった項目はすべて extras に残す
  const extras: Record<string, unknown> = {};
  for (const [field, value] of Object.entries(record)) {
    if (CONSUMED_FIELDS.has(field) || value === undefined || value === null) {
      continue;
    }
    extras[field] = value;
  }

  const route = readText(record, FIELD_ALIASES.route);

  return {
    kind,
    callsign,
    pilotName: readText(record, FIELD_ALIASES.pilotName),
    aircraftType: readText(record, FIELD_ALIASES.aircraftType),
    departureAirport: readText(record, FIELD_ALIASES.departureAirport),
    arrivalAirport: readText(record, FIELD_ALIASES.arrivalAirport),
    flightLevel: readText(record, FIELD_ALIASES.flightLevel),
    flightRules: readText(record, FIELD_ALIASES.flightRules),
    route: route === "N/A" ? undefined : route,
    realCallsign: readText(record, FIELD_ALIASES.realCallsign),
    extras,
  };
}

function readText(
  record: RawRecord,
  keys: readonly string[]
): string | undefined {
  for (const key of keys) {
    const value = record[key];
    let text: string | undefined;
    if (typeof value === "string") {
      text = value.trim();
    } else if (typeof value === "number" && Number.isFinite(value)) {
      text = String(value);
    }
    if (text) {
      return text.length > MAX_FIELD_LENGTH
        ? `${text.slice(0, MAX_FIELD_LENGTH - 1)}…`
        : text;
    }
  }
  return undefined;
}
