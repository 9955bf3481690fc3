import type { GnssTopic } from "../types";

type ParseOptions = {
  prefix?: string;
};

export function parseGnssTopic(
  topic: string,
  options: ParseOptions = {},
): GnssTopic | null {
  if (topic.includes("#") || topic.includes("+")) return null;

  const parts = topic.split("/");
  if (parts.length !== 2) return null;

  const [prefix, deviceId] = parts;
  const expectedPrefix = options.prefix ?? "gnss";
  if (prefix !== expectedPrefix) return null;
  if (!deviceId) return null;

  return { deviceId };
}
