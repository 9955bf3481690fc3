import jwt from "jsonwebtoken";

type ServiceTokenOptions = {
  secret: string | undefined;
  audience: string | undefined;
  clientId: string;
  username: string;
  subscribeTopic: string;
  expiresInSeconds: number;
  nowMs?: number;
};

/**
 * Signs the broker credential for this service, or returns null when no
 * JWT secret is configured.
 */
export function buildServiceJwtToken(options: ServiceTokenOptions): string | null {
  if (!options.secret) {
    return null;
  }

  const now = Math.floor((options.nowMs ?? Date.now()) / 1000);
  const expirationOffset = Number.isFinite(options.expiresInSeconds)
    ? Math.max(60, options.expiresInSeconds)
    : 86400;

  const payload = {
    sub: options.clientId,
    username: options.username,
    clientid: options.clientId,
    role: "mqtt_service",
    iat: now,
    exp: now + expirationOffset,
    acl: {
      pub: [],
      sub: [options.subscribeTopic],
    },
  };

  const signOptions = options.audience ? { audience: options.audience } : undefined;
  return jwt.sign(payload, options.secret, signOptions);
}
