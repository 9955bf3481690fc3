import http from "http";
import dotenv from "dotenv";
import Redis from "ioredis";
import mqtt from "mqtt";
import { loadConfig } from "./config";
import { createServer } from "./server";
import { createEventPublisher } from "./services/eventPublisher";
import { createNavigationService } from "./services/navigationService";
import { createOsrmClient } from "./services/osrmClient";
import { createPositionFeed } from "./services/positionFeed";
import { createProgressTracker } from "./services/progressTracker";
import { createRouteStore } from "./services/routeStore";
import type { MessageMeta } from "./types";
import { createGnssHandler } from "./utils/gnssHandler";
import { buildServiceJwtToken } from "./utils/mqttAuth";
import {
  classifyRejectReason,
  errorMessage,
  logRejectedMessage,
} from "./utils/rejects";
import { parseGnssTopic } from "./utils/topic";

dotenv.config();

const config = loadConfig();

const navigation = createNavigationService({
  feed: createPositionFeed({
    historySize: config.tracking.historySize,
    historyWindowMs: config.tracking.historyWindowMs,
  }),
  routeStore: createRouteStore(),
  tracker: createProgressTracker({
    backwardToleranceSegments: config.tracking.backwardToleranceSegments,
  }),
  routingEngine: createOsrmClient(config.osrm),
  rerouteRules: config.reroute,
});

const keydb = config.keydb.url
  ? new Redis(config.keydb.url, {
      maxRetriesPerRequest: null,
      enableReadyCheck: true,
      connectionName: config.keydb.clientName,
    })
  : null;
keydb?.on("error", (error) => {
  console.error("[keydb] error", error);
});

const events = createEventPublisher({
  keydb,
  channelPrefix: config.keydb.channelPrefix,
});

navigation.on("route:created", (route) => {
  void events.publishRouteCreated(route).catch((error) => {
    console.warn("[events] route_created publish failed", {
      routeId: route.id,
      error: errorMessage(error),
    });
  });
});
navigation.on("route:cleared", (routeId) => {
  void events.publishRouteCleared(routeId).catch((error) => {
    console.warn("[events] route_cleared publish failed", {
      routeId,
      error: errorMessage(error),
    });
  });
});
navigation.on("rerouted", (notice, route) => {
  void events.publishRerouted(notice, route).catch((error) => {
    console.warn("[events] rerouted publish failed", {
      routeId: route.id,
      error: errorMessage(error),
    });
  });
});

let mqttConnected = false;
let mqttSubscriptionActive = false;
let lastMqttConnectedAt: number | null = null;

// rejects are logged by the feed; only counted here
const ingestStats: {
  accepted: number;
  rejected: number;
  lastDeviceId: string | null;
} = { accepted: 0, rejected: 0, lastDeviceId: null };

const handleGnssMessage = createGnssHandler({
  ingestFix: navigation.ingestFix,
  onOutcome: (outcome, topic) => {
    if (!outcome.accepted) {
      ingestStats.rejected += 1;
      return;
    }
    ingestStats.accepted += 1;
    ingestStats.lastDeviceId = topic.deviceId;
  },
});

const mqttPassword =
  config.mqtt.password ||
  buildServiceJwtToken({
    secret: config.mqtt.jwtSecret,
    audience: config.mqtt.jwtAudience,
    clientId: config.mqtt.clientId,
    username: config.mqtt.username,
    subscribeTopic: config.mqtt.subscribeTopic,
    expiresInSeconds: config.mqtt.jwtExpiresInSeconds,
  }) ||
  undefined;

const mqttClient = mqtt.connect(config.mqtt.brokerUrl, {
  clientId: config.mqtt.clientId,
  username: config.mqtt.username,
  password: mqttPassword,
  keepalive: config.mqtt.keepalive,
  reconnectPeriod: config.mqtt.reconnectPeriodMs,
});

mqttClient.on("connect", () => {
  mqttConnected = true;
  lastMqttConnectedAt = Date.now();
  console.log("[mqtt] connected", {
    broker: config.mqtt.brokerUrl,
    hasPassword: Boolean(mqttPassword),
    authMode: config.mqtt.password
      ? "static_password"
      : config.mqtt.jwtSecret
        ? "jwt"
        : "none",
  });
  mqttClient.subscribe(
    config.mqtt.subscribeTopic,
    { qos: config.mqtt.subscribeQos },
    (error) => {
      if (error) {
        mqttSubscriptionActive = false;
        console.warn("[mqtt] subscribe failed", error);
        return;
      }
      mqttSubscriptionActive = true;
      console.log("[mqtt] subscribed", {
        topic: config.mqtt.subscribeTopic,
        qos: config.mqtt.subscribeQos,
      });
    },
  );
});

mqttClient.on("message", (topic, payload, packet) => {
  const parsedTopic = parseGnssTopic(topic, {
    prefix: config.mqtt.topicPrefix,
  });
  if (!parsedTopic) {
    logRejectedMessage("invalid_topic", {
      topic,
      message: `Topic must match ${config.mqtt.topicPrefix}/{deviceId}`,
    });
    return;
  }

  const meta: MessageMeta = {
    qos: packet.qos,
    retain: packet.retain,
    dup: packet.dup,
  };

  try {
    handleGnssMessage(parsedTopic, topic, payload, meta);
  } catch (error) {
    logRejectedMessage(classifyRejectReason(error), {
      deviceId: parsedTopic.deviceId,
      topic,
      message: errorMessage(error),
    });
  }
});

mqttClient.on("reconnect", () => {
  mqttSubscriptionActive = false;
  console.log("[mqtt] reconnecting");
});

mqttClient.on("close", () => {
  mqttConnected = false;
  mqttSubscriptionActive = false;
  console.log("[mqtt] connection closed");
});

mqttClient.on("error", (error) => {
  console.warn("[mqtt] error", error);
});

mqttClient.on("offline", () => {
  mqttConnected = false;
  mqttSubscriptionActive = false;
  console.warn("[mqtt] offline");
});

const app = createServer({
  navigation,
  http: config.http,
  healthDetails: () => ({
    mqtt: {
      connected: mqttConnected,
      subscribed: mqttSubscriptionActive,
      topic: config.mqtt.subscribeTopic,
      lastConnectedAt: lastMqttConnectedAt,
      fixesAccepted: ingestStats.accepted,
      fixesRejected: ingestStats.rejected,
      lastDeviceId: ingestStats.lastDeviceId,
    },
    keydb: { configured: keydb !== null, status: keydb?.status ?? null },
  }),
});

const server = http.createServer(app);

let isShuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;
  console.log(`[nav] shutting down (${signal})`);

  await new Promise<void>((resolve) => {
    mqttClient.end(true, {}, () => resolve());
  });
  await new Promise<void>((resolve) => {
    server.close(() => resolve());
  });
  await navigation.settled();

  if (keydb) {
    try {
      await keydb.quit();
    } catch (error) {
      console.warn("[keydb] quit failed, disconnecting", error);
      keydb.disconnect();
    }
  }

  process.exit(0);
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

server.listen(config.http.port, config.http.host, () => {
  console.log(
    `[http] server listening on ${config.http.host}:${config.http.port}`,
  );
});
