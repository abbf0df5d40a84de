/** Tighter per-route limit for mutations, on top of the global ThrottlerModule limit. */
export const WRITE_THROTTLE = { default: { limit: 30, ttl: 60_000 } };
