import dotenv from "dotenv";
import { createNavigationService } from "../services/navigationService";
import { createPositionFeed } from "../services/positionFeed";
import { createProgressTracker } from "../services/progressTracker";
import { createRouteStore } from "../services/routeStore";
import type { Fix, LonLat, Route, RoutingEngine } from "../types";
import { offsetMeters } from "../utils/geo";
import { buildRoute } from "../utils/routes";

dotenv.config();

const driftThresholdMeters = Number.parseFloat(
  process.env.REPLAY_DRIFT_THRESHOLD_METERS ?? "20",
);
const debounceMs = Number.parseInt(process.env.REPLAY_DEBOUNCE_MS ?? "3000", 10);
const engineLatencyMs = Number.parseInt(
  process.env.REPLAY_ENGINE_LATENCY_MS ?? "50",
  10,
);

const routeStart: LonLat = [-79.5199, 8.9824];

function assertOrThrow(condition: boolean, message: string): void {
  if (!condition) {
    throw new Error(message);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Straight-line engine: one segment per waypoint pair, no network. */
function createReplayEngine(): RoutingEngine & { calls: () => number } {
  let calls = 0;
  return {
    calls: () => calls,
    async requestRoute(request) {
      calls += 1;
      await sleep(engineLatencyMs);
      if (request.signal?.aborted) {
        throw new Error("request aborted");
      }
      const geometry = request.waypoints.map(
        (waypoint): LonLat => [waypoint.lon, waypoint.lat],
      );
      const last = geometry[geometry.length - 1];
      return buildRoute({
        id: `replay-${calls}`,
        geometry,
        maneuvers: [
          { position: geometry[0], turnType: "depart", roadName: "Replay Avenue" },
          { position: last, turnType: "arrive" },
        ],
        waypoints: request.waypoints,
      });
    },
  };
}

async function main(): Promise<void> {
  let clock = 1_000;
  const engine = createReplayEngine();
  const navigation = createNavigationService({
    feed: createPositionFeed({ historySize: 100, historyWindowMs: 5000 }),
    routeStore: createRouteStore(),
    tracker: createProgressTracker({ backwardToleranceSegments: 2 }),
    routingEngine: engine,
    rerouteRules: {
      enabled: true,
      driftThresholdMeters,
      debounceMs,
      cooldownMs: 10_000,
      retryCooldownMs: 2_000,
      maxRetries: 3,
      timeoutMs: 5_000,
      waypointPassedBufferMeters: 5,
    },
    now: () => clock,
  });

  const destination = offsetMeters(routeStart, 0, 600);
  const original: Route = await navigation.createRoute([
    { lon: routeStart[0], lat: routeStart[1], label: "start" },
    { lon: destination[0], lat: destination[1], label: "destination" },
  ]);
  console.log("[replay:drift] route created", { routeId: original.id });

  function feed(label: string, eastMeters: number, northMeters: number) {
    const [lon, lat] = offsetMeters(routeStart, eastMeters, northMeters);
    const fix: Fix = { lon, lat, yaw: 0, timestamp: clock };
    const outcome = navigation.pushFix(fix, "replay");
    const status = navigation.getStatus();
    console.log(`[replay:drift] ${label}`, {
      at: clock,
      navState: navigation.rerouteSnapshot().state,
      status: status.status,
      destinationM: status.destination_m,
    });
    return outcome;
  }

  feed("on_route", 0, 100);
  clock += 1_000;
  feed("on_route", 2, 150);
  assertOrThrow(
    navigation.rerouteSnapshot().state === "ON_ROUTE",
    "small drift should stay ON_ROUTE",
  );

  clock += 1_000;
  feed("drift_start", driftThresholdMeters + 15, 200);
  assertOrThrow(
    navigation.rerouteSnapshot().driftSince === clock,
    "drift should start the debounce window",
  );

  clock += Math.max(1, debounceMs - 1);
  feed("drift_debouncing", driftThresholdMeters + 20, 210);
  assertOrThrow(engine.calls() === 1, "no reroute before the debounce elapses");

  clock += 1;
  feed("drift_sustained", driftThresholdMeters + 25, 220);
  assertOrThrow(
    navigation.rerouteSnapshot().state === "REROUTING",
    "sustained drift should start a reroute",
  );

  clock += 500;
  feed("drift_in_flight", driftThresholdMeters + 30, 230);
  assertOrThrow(engine.calls() === 2, "exactly one reroute call per episode");

  await navigation.settled();
  const active = navigation.activeRoute();
  assertOrThrow(
    active !== null && active.id !== original.id,
    "reroute should replace the active route",
  );
  const notices = navigation.drainRerouteNotices();
  assertOrThrow(
    notices.length === 1 && notices[0].previous_route_id === original.id,
    "reroute should queue one notice naming the previous route",
  );

  clock += 1_000;
  feed("after_reroute", driftThresholdMeters + 30, 230);
  assertOrThrow(
    navigation.getStatus().status === "success",
    "status should be success on the new route",
  );

  navigation.clearRoute();
  assertOrThrow(
    navigation.getStatus().status === "no_route",
    "cleared route should report no_route",
  );

  console.log("[replay:drift] PASS: drift debounce + reroute behavior validated");
}

main().catch((error) => {
  console.error("[replay:drift] FAIL:", error);
  process.exitCode = 1;
});
