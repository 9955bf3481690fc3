import type { Fix, RawFixPayload } from "../types";
import { toDegrees } from "./geo";
import { isFiniteNumber, toFiniteNumber } from "./numbers";
import { InvalidFixError } from "./rejects";

function wrapDegrees(value: number): number {
  const wrapped = ((value % 360) + 360) % 360;
  return wrapped >= 360 ? 0 : wrapped;
}

export function parseFixPayload(payloadBuffer: Buffer): RawFixPayload {
  const payloadText = payloadBuffer.toString("utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(payloadText);
  } catch {
    throw new InvalidFixError("Payload is not valid JSON");
  }

  if (!isRecord(parsed)) {
    throw new InvalidFixError("Payload must be a JSON object");
  }
  return toRawFix(parsed);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toRawFix(record: Record<string, unknown>): RawFixPayload {
  return {
    lon: record.lon,
    lat: record.lat,
    yaw: record.yaw,
    yaw_rad: record.yaw_rad,
    timestamp: record.timestamp,
  };
}

export function validateFix(fix: Fix): void {
  if (!isFiniteNumber(fix.lon) || fix.lon < -180 || fix.lon > 180) {
    throw new InvalidFixError("Invalid longitude");
  }

  if (!isFiniteNumber(fix.lat) || fix.lat < -90 || fix.lat > 90) {
    throw new InvalidFixError("Invalid latitude");
  }

  if (!isFiniteNumber(fix.yaw) || fix.yaw < 0 || fix.yaw >= 360) {
    throw new InvalidFixError("Invalid yaw");
  }

  if (!isFiniteNumber(fix.timestamp) || fix.timestamp <= 0) {
    throw new InvalidFixError("Invalid timestamp");
  }
}

/**
 * Builds a frozen Fix from a feed payload. `yaw` is degrees; `yaw_rad`
 * (the bridge's native unit) is converted and wrapped into [0, 360).
 */
export function normalizeFix(raw: RawFixPayload, receivedAt = Date.now()): Fix {
  let yaw = 0;
  if (raw.yaw !== undefined && raw.yaw !== null) {
    yaw = toFiniteNumber(raw.yaw) ?? Number.NaN;
  } else if (raw.yaw_rad !== undefined && raw.yaw_rad !== null) {
    const radians = toFiniteNumber(raw.yaw_rad);
    yaw = radians === null ? Number.NaN : wrapDegrees(toDegrees(radians));
  }

  const timestamp =
    raw.timestamp === undefined || raw.timestamp === null
      ? receivedAt
      : (toFiniteNumber(raw.timestamp) ?? Number.NaN);

  const fix: Fix = {
    lon: toFiniteNumber(raw.lon) ?? Number.NaN,
    lat: toFiniteNumber(raw.lat) ?? Number.NaN,
    yaw,
    timestamp,
  };

  validateFix(fix);
  return Object.freeze(fix);
}
