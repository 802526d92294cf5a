export type AuthConfig = {
  // Absent secret disables JWT verification (503 for JWT callers)
  jwtSecret?: string;
  jwtIssuer?: string;
  jwtAudience?: string;
  jwtAllowedAlgorithms: string[];
  apiTokenHashRounds: number;
  // 0 disables the verification cache
  verificationCacheTtlSeconds: number;
};
