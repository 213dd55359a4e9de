import type { FlightEvent, TenantConfigSnapshot, TenantMatch } from "@/types";

/**
 * callsign が前方一致するテナントを列挙します。
 *
 * テナントごとに設定順でプレフィックスを評価し、最初に一致したもののみを採用します。
 * 戻り値はスナップショットの走査順に並びます。
 */
export function matchTenants(
  event: Pick<FlightEvent, "callsign">,
  tenants: TenantConfigSnapshot
): TenantMatch[] {
  const callsign = event.callsign.toUpperCase();
  const matches: TenantMatch[] = [];

  for (const [guildId, config] of tenants) {
    const matchedPrefix = config.prefixes.find(
      (prefix) => prefix.length > 0 && callsign.startsWith(prefix.toUpperCase())
    );
    if (matchedPrefix === undefined) {
      continue;
    }
    matches.push({ guildId, config, matchedPrefix });
  }

  return matches;
}
