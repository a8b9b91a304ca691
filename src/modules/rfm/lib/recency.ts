import { DAY_IN_MS } from "../config";
import { CustomerOrderProfile, RecencyResult } from "./types";

export function resolveAnchorDate(
  profiles: readonly CustomerOrderProfile[]
): Date | null {
  let latestMs: number | null = null;
  for (const profile of profiles) {
    const ms = profile.lastPurchaseDate?.getTime();
    if (ms === undefined || Number.isNaN(ms)) {
      continue;
    }
    latestMs = latestMs === null ? ms : Math.max(latestMs, ms);
  }
  return latestMs === null ? null : new Date(latestMs + DAY_IN_MS);
}

/**
 * Whole days between the anchor (latest purchase + 1 day) and each
 * customer's last purchase. Customers without a usable date get 0.
 */
export function computeRecency(
  profiles: readonly CustomerOrderProfile[]
): RecencyResult {
  const anchorDate = resolveAnchorDate(profiles);
  const anchorMs = anchorDate?.getTime() ?? null;

  const records = profiles.map((profile) => {
    const lastMs = profile.lastPurchaseDate?.getTime();
    const recencyDays =
      anchorMs === null || lastMs === undefined || Number.isNaN(lastMs)
        ? 0
        : Math.floor((anchorMs - lastMs) / DAY_IN_MS);

    return {
      customerId: profile.customerId,
      recencyDays,
      frequency: profile.orderCount,
      monetary: profile.totalMonetary
    };
  });

  return { anchorDate, records };
}
