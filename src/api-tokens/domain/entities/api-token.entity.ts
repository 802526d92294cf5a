export type ApiTokenUserType = 'agent' | 'customer';

export class ApiToken {
  id: number;
  userId: number;
  userType: ApiTokenUserType;
  name: string;
  /** First eight hex characters of the random part, stored in clear */
  prefix: string;
  tokenHash: string;
  /** Empty means the token inherits every permission of its user */
  scopes: string[];
  expiresAt: Date | null;
  lastUsedAt: Date | null;
  lastUsedIp: string | null;
  rateLimit: number;
  createdAt: Date;
  createdBy: number | null;
  revokedAt: Date | null;
  revokedBy: number | null;

  constructor(data: {
    id: number;
    userId: number;
    userType: ApiTokenUserType;
    name: string;
    prefix: string;
    tokenHash: string;
    scopes: string[];
    expiresAt: Date | null;
    lastUsedAt: Date | null;
    lastUsedIp: string | null;
    rateLimit: number;
    createdAt: Date;
    createdBy: number | null;
    revokedAt: Date | null;
    revokedBy: number | null;
  }) {
    this.id = data.id;
    this.userId = data.userId;
    this.userType = data.userType;
    this.name = data.name;
    this.prefix = data.prefix;
    this.tokenHash = data.tokenHash;
    this.scopes = data.scopes;
    this.expiresAt = data.expiresAt;
    this.lastUsedAt = data.lastUsedAt;
    this.lastUsedIp = data.lastUsedIp;
    this.rateLimit = data.rateLimit;
    this.createdAt = data.createdAt;
    this.createdBy = data.createdBy;
    this.revokedAt = data.revokedAt;
    this.revokedBy = data.revokedBy;
  }

  isRevoked(): boolean {
    return this.revokedAt !== null;
  }

  isExpired(now: Date = new Date()): boolean {
    return this.expiresAt !== null && now.getTime() > this.expiresAt.getTime();
  }

  isActive(now: Date = new Date()): boolean {
    return !this.isRevoked() && !this.isExpired(now);
  }
}

export type NewApiToken = Pick<
  ApiToken,
  | 'userId'
  | 'userType'
  | 'name'
  | 'prefix'
  | 'tokenHash'
  | 'scopes'
  | 'expiresAt'
  | 'rateLimit'
  | 'createdBy'
>;
