export const ENTITY_ID_FIELDS = ["callsign", "call_sign", "flight_id"] as const;

export interface SnapshotDiffer {
  /**
   * feed ごとの前回スナップショットとの差分（新規 ID）を返し、current を次回の基準として保存します。
   * 初回観測時は空集合を返します。
   */
  diff: (feed: string, current: ReadonlySet<string>) => Set<string>;
}

export function createSnapshotDiffer(): SnapshotDiffer {
  const previousByFeed = new Map<string, ReadonlySet<string>>();

  return {
    diff(feed, current) {
      const previous = previousByFeed.get(feed);
      previousByFeed.set(feed, new Set(current));

      if (!previous) {
        return new Set();
      }

      const added = new Set<string>();
      for (const id of current) {
        if (!previous.has(id)) {
          added.add(id);
        }
      }
      return added;
    },
  };
}

export function extractEntityId(
  entity: Readonly<Record<string, unknown>>
): string | undefined {
  for (const field of ENTITY_ID_FIELDS) {
    const value = entity[field];
    if (typeof value === "string" && value.trim().length > 0) {
      return value.trim();
    }
    if (typeof value === "number" && Number.isFinite(value)) {
      return String(value);
    }
  }
  return undefined;
}
