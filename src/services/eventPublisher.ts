import type { RerouteNotice, Route } from "../types";

export type ChannelPublisher = {
  publish: (channel: string, message: string) => Promise<number>;
};

type EventPublisherOptions = {
  keydb: ChannelPublisher | null;
  channelPrefix: string;
};

export type EventPublisher = {
  publishRouteCreated: (route: Route) => Promise<void>;
  publishRouteCleared: (routeId: string) => Promise<void>;
  publishRerouted: (notice: RerouteNotice, route: Route) => Promise<void>;
};

function routeSummary(route: Route) {
  return {
    route_id: route.id,
    distance_m: route.distanceMeters,
    duration_s: route.durationSeconds,
    geometry: route.geometry,
    maneuvers: route.maneuvers.map((maneuver) => ({
      turn_type: maneuver.turnType,
      instruction: maneuver.instructionText,
      name: maneuver.roadName,
      location: maneuver.position,
      distance_along_m: maneuver.distanceFromStartMeters,
    })),
  };
}

/**
 * Fans navigation events out over KeyDB pub/sub. Without a connection the
 * events are only logged.
 */
export function createEventPublisher(
  options: EventPublisherOptions,
): EventPublisher {
  const routeChannel = `${options.channelPrefix}:route`;
  const reroutedChannel = `${options.channelPrefix}:rerouted`;

  async function send(channel: string, payload: Record<string, unknown>) {
    if (!options.keydb) {
      console.log("[events] no keydb connection, skipped publish", {
        channel,
        event: payload.event,
      });
      return;
    }
    await options.keydb.publish(channel, JSON.stringify(payload));
  }

  async function publishRouteCreated(route: Route): Promise<void> {
    await send(routeChannel, {
      event: "route_created",
      ...routeSummary(route),
      timestamp: route.createdAt,
    });
  }

  async function publishRouteCleared(routeId: string): Promise<void> {
    await send(routeChannel, {
      event: "route_cleared",
      route_id: routeId,
      timestamp: Date.now(),
    });
  }

  async function publishRerouted(
    notice: RerouteNotice,
    route: Route,
  ): Promise<void> {
    await send(reroutedChannel, {
      event: "rerouted",
      ...notice,
      ...routeSummary(route),
    });
  }

  return { publishRouteCreated, publishRouteCleared, publishRerouted };
}
