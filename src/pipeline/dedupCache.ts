import type { FlightEvent } from "@/types";

export interface DedupCache {
  seen: (key: string) => boolean;
  record: (key: string) => void;
  readonly size: number;
}

export const DEDUP_CAPACITY_DEFAULT = 500;

/**
 * 直近 capacity 件のキーのみを保持する重複フィルタ。
 * 満杯時は最も古いキーから追い出すため、窓の外の重複は検出しない。
 */
export function createDedupCache(
  capacity: number = DEDUP_CAPACITY_DEFAULT
): DedupCache {
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new Error(`Dedup cache capacity must be a positive integer: ${capacity}`);
  }

  // Set は挿入順を保持するので、先頭が最古のキーになる
  const keys = new Set<string>();

  return {
    seen(key) {
      return keys.has(key);
    },
    record(key) {
      if (keys.has(key)) {
        return;
      }
      if (keys.size >= capacity) {
        const oldest = keys.values().next();
        if (!oldest.done) {
          keys.delete(oldest.value);
        }
      }
      keys.add(key);
    },
    get size() {
      return keys.size;
    },
  };
}

export function createDedupKey(event: FlightEvent): string {
  return [
    event.callsign,
    event.pilotName ?? "",
    event.departureAirport ?? "",
    event.arrivalAirport ?? "",
  ].join("_");
}
