export type RateLimitConfig = {
  /** Requests per window when the credential carries no limit of its own */
  defaultLimit: number;
  windowSeconds: number;
  sweepIntervalMs: number;
  /** Buckets idle for longer than this are dropped by the sweep */
  retentionMs: number;
};
