import type { RerouteRules } from "../services/reroutePolicy";

type Env = Record<string, string | undefined>;

type MqttQos = 0 | 1 | 2;

export type AppConfig = {
  http: {
    host: string;
    port: number;
    apiPrefix: string;
    corsOrigins: string[];
    logFormat: string;
  };
  osrm: {
    baseUrl: string;
    profile: string;
    timeoutMs: number;
  };
  reroute: RerouteRules;
  tracking: {
    backwardToleranceSegments: number;
    historySize: number;
    historyWindowMs: number;
  };
  mqtt: {
    brokerUrl: string;
    clientId: string;
    username: string;
    password: string | undefined;
    jwtSecret: string | undefined;
    jwtAudience: string | undefined;
    jwtExpiresInSeconds: number;
    subscribeTopic: string;
    subscribeQos: MqttQos;
    topicPrefix: string;
    keepalive: number;
    reconnectPeriodMs: number;
  };
  keydb: {
    url: string | undefined;
    clientName: string;
    channelPrefix: string;
  };
};

function intOr(raw: string | undefined, fallback: number, min = 0): number {
  const value = Number.parseInt(raw ?? "", 10);
  return Number.isFinite(value) && value >= min ? value : fallback;
}

function floatOr(raw: string | undefined, fallback: number, min = 0): number {
  const value = Number.parseFloat(raw ?? "");
  return Number.isFinite(value) && value >= min ? value : fallback;
}

function boolOr(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === "") return fallback;
  return raw.toLowerCase() !== "false" && raw !== "0";
}

function listOf(raw: string | undefined): string[] {
  return (raw ?? "")
    .split(",")
    .map((value) => value.trim())
    .filter(Boolean);
}

export function loadConfig(env: Env = process.env): AppConfig {
  const mqttHost = env.MQTT_HOST ?? "127.0.0.1";
  const mqttPort = intOr(env.MQTT_PORT, 1883, 1);
  const mqttClientId = env.MQTT_CLIENT_ID ?? "live_nav_ingestion";
  const qosRaw = Number.parseInt(env.MQTT_SUBSCRIBE_QOS ?? "0", 10);
  const subscribeQos: MqttQos = qosRaw === 1 || qosRaw === 2 ? qosRaw : 0;
  const topicPrefix = env.MQTT_TOPIC_PREFIX ?? "gnss";

  return {
    http: {
      host: env.HTTP_HOST ?? "0.0.0.0",
      port: intOr(env.HTTP_PORT, 5000, 1),
      apiPrefix: (env.API_PREFIX ?? "").replace(/\/+$/, ""),
      corsOrigins: listOf(env.CORS_ORIGINS),
      logFormat: env.LOG_FORMAT || "dev",
    },
    osrm: {
      baseUrl: env.OSRM_BASE_URL || "http://router.project-osrm.org",
      profile: env.OSRM_PROFILE || "driving",
      timeoutMs: intOr(env.ROUTING_TIMEOUT_MS, 5000, 1),
    },
    reroute: {
      enabled: boolOr(env.REROUTE_ENABLED, true),
      driftThresholdMeters: floatOr(env.DRIFT_THRESHOLD_METERS, 20),
      debounceMs: intOr(env.DRIFT_DEBOUNCE_MS, 3000),
      cooldownMs: intOr(env.REROUTE_COOLDOWN_MS, 10000),
      retryCooldownMs: intOr(env.REROUTE_RETRY_COOLDOWN_MS, 2000),
      maxRetries: intOr(env.REROUTE_MAX_RETRIES, 3, 1),
      timeoutMs: intOr(env.ROUTING_TIMEOUT_MS, 5000, 1),
      waypointPassedBufferMeters: floatOr(
        env.WAYPOINT_PASSED_BUFFER_METERS,
        5,
      ),
    },
    tracking: {
      backwardToleranceSegments: intOr(env.BACKWARD_TOLERANCE_SEGMENTS, 2),
      historySize: intOr(env.FIX_HISTORY_SIZE, 100, 1),
      historyWindowMs: intOr(env.FIX_HISTORY_WINDOW_MS, 5000),
    },
    mqtt: {
      brokerUrl: env.MQTT_BROKER_URL ?? `mqtt://${mqttHost}:${mqttPort}`,
      clientId: mqttClientId,
      username: env.MQTT_USERNAME || mqttClientId,
      password: env.MQTT_PASSWORD || undefined,
      jwtSecret: env.MQTT_JWT_SECRET || undefined,
      jwtAudience: env.MQTT_JWT_AUDIENCE || undefined,
      jwtExpiresInSeconds: intOr(env.MQTT_JWT_EXP_SECONDS, 86400, 60),
      subscribeTopic: env.MQTT_SUBSCRIBE_TOPIC ?? `${topicPrefix}/+`,
      subscribeQos,
      topicPrefix,
      keepalive: intOr(env.MQTT_KEEPALIVE, 60),
      reconnectPeriodMs: intOr(env.MQTT_RECONNECT_PERIOD_MS, 1000),
    },
    keydb: {
      url: env.KEYDB_URL || undefined,
      clientName: env.KEYDB_CLIENT_NAME ?? "live_nav",
      channelPrefix: env.EVENT_CHANNEL_PREFIX || "nav",
    },
  };
}
