import { createNavigationService } from "../services/navigationService";
import { createPositionFeed } from "../services/positionFeed";
import { createProgressTracker } from "../services/progressTracker";
import type { RerouteRules } from "../services/reroutePolicy";
import { createRouteStore } from "../services/routeStore";
import type { Route } from "../types";
import { RouteSupersededError } from "../utils/rejects";
import {
  createClock,
  createFakeEngine,
  detourRoute,
  east,
  fixAt,
  quietConsole,
  straightRoute,
  threeTurnRoute,
  waypointAt,
} from "./fixtures";

const rules: RerouteRules = {
  enabled: true,
  driftThresholdMeters: 50,
  debounceMs: 1000,
  cooldownMs: 10000,
  retryCooldownMs: 2000,
  maxRetries: 3,
  timeoutMs: 20,
  waypointPassedBufferMeters: 5,
};

const destinations = [
  waypointAt(east(0), "start"),
  waypointAt(east(300), "destination"),
];

function mainRoute(): Route {
  return straightRoute({
    id: "route-a",
    vertices: [0, 100, 300],
    maneuvers: [
      [0, "depart", "Main Street"],
      [100, "right", "Second Street"],
      [300, "arrive", ""],
    ],
  });
}

function setup() {
  const clock = createClock(1000);
  const routeStore = createRouteStore();
  const { engine, calls } = createFakeEngine();
  const navigation = createNavigationService({
    feed: createPositionFeed({ historySize: 50, historyWindowMs: 5000 }),
    routeStore,
    tracker: createProgressTracker({ backwardToleranceSegments: 2 }),
    routingEngine: engine,
    rerouteRules: rules,
    now: clock.now,
  });

  async function createRoute(route: Route) {
    const pending = navigation.createRoute(destinations);
    calls[calls.length - 1].resolve(route);
    return pending;
  }

  /** Drift 60 m north long enough to start a reroute. */
  function driftUntilReroute(startAt: number) {
    clock.set(startAt);
    navigation.pushFix(fixAt(50, 60, startAt));
    clock.set(startAt + rules.debounceMs);
    navigation.pushFix(fixAt(60, 60, startAt + rules.debounceMs));
  }

  return { clock, routeStore, calls, navigation, createRoute, driftUntilReroute };
}

beforeEach(() => {
  quietConsole();
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe("navigation service", () => {
  test("reports no_route before any route exists", () => {
    const { navigation } = setup();
    navigation.pushFix(fixAt(10, 0, 1));

    expect(navigation.getStatus()).toMatchObject({
      status: "no_route",
      message: "Route not created yet",
      route_id: null,
    });
  });

  test("waits for a fix after a route is created", async () => {
    const { navigation, createRoute } = setup();
    await createRoute(mainRoute());

    expect(navigation.getStatus()).toMatchObject({
      status: "error",
      message: "Waiting for GNSS fix",
      route_id: "route-a",
    });
  });

  test("a new route is matched against the latest fix", async () => {
    const { navigation, createRoute } = setup();
    navigation.pushFix(fixAt(80, 0, 1));
    await createRoute(mainRoute());

    expect(navigation.getStatus()).toEqual({
      status: "success",
      turn_type: "right",
      turn_m: 20,
      destination_m: 220,
      message: "Turn right onto Second Street",
      route_id: "route-a",
      nav_state: "ON_ROUTE",
    });
  });

  test("status queries are idempotent", async () => {
    const { navigation, createRoute } = setup();
    await createRoute(mainRoute());
    navigation.pushFix(fixAt(140, 4, 1));

    expect(navigation.getStatus()).toEqual(navigation.getStatus());
  });

  test("late fixes are stored but do not move progress", async () => {
    const { navigation, createRoute } = setup();
    await createRoute(mainRoute());
    navigation.pushFix(fixAt(150, 0, 2000));
    const late = navigation.pushFix(fixAt(20, 0, 1000));

    expect(late).toMatchObject({ accepted: true, isLatest: false });
    expect(navigation.getStatus().destination_m).toBe(150);
    expect(navigation.history()).toHaveLength(2);
  });

  test("invalid fixes are rejected", () => {
    const { navigation } = setup();
    expect(
      navigation.ingestFix({ lon: 12, lat: 91, timestamp: 5 }),
    ).toEqual({ accepted: false, error: "Invalid latitude" });
    expect(navigation.latestFix()).toBeNull();
  });

  test("createRoute needs two waypoints", async () => {
    const { navigation, calls } = setup();
    await expect(
      navigation.createRoute([waypointAt(east(0), "start")]),
    ).rejects.toThrow("At least 2 waypoints required");
    expect(calls).toHaveLength(0);
  });

  test("a failed createRoute keeps the previous route", async () => {
    const { navigation, calls, createRoute } = setup();
    await createRoute(mainRoute());

    const pending = navigation.createRoute(destinations);
    calls[1].reject(new Error("engine down"));
    await expect(pending).rejects.toThrow("engine down");

    expect(navigation.activeRoute()?.id).toBe("route-a");
  });

  test("sustained drift reroutes once and resets the maneuver index", async () => {
    const { navigation, calls, createRoute, driftUntilReroute, clock } =
      setup();
    const created = jest.fn();
    const rerouted = jest.fn();
    navigation.on("route:created", created);
    navigation.on("rerouted", rerouted);
    await createRoute(mainRoute());

    driftUntilReroute(2000);
    expect(navigation.rerouteSnapshot().state).toBe("REROUTING");
    clock.set(3500);
    navigation.pushFix(fixAt(70, 60, 3500));
    expect(calls).toHaveLength(2);

    calls[1].resolve(detourRoute("route-b", east(70, 60)));
    await navigation.settled();

    expect(navigation.activeRoute()?.id).toBe("route-b");
    const progress = navigation.getProgress();
    expect(progress.kind === "progress" && progress.nextManeuverIndex).toBe(0);
    expect(navigation.getStatus()).toMatchObject({
      status: "success",
      turn_type: "depart",
      route_id: "route-b",
      nav_state: "ON_ROUTE",
    });
    expect(created).toHaveBeenCalledTimes(1);
    expect(rerouted).toHaveBeenCalledTimes(1);
    const commitLogs = jest
      .mocked(console.log)
      .mock.calls.filter(([message]) => message === "[reroute] committed new route");
    expect(commitLogs).toHaveLength(1);

    expect(navigation.drainRerouteNotices()).toEqual([
      {
        rerouted: true,
        route_id: "route-b",
        previous_route_id: "route-a",
        reason: "drift",
        timestamp: 3500,
      },
    ]);
    expect(navigation.drainRerouteNotices()).toEqual([]);
  });

  test("a timed-out reroute reports an error and keeps the old route until a later success", async () => {
    const { navigation, calls, createRoute, driftUntilReroute, clock } =
      setup();
    await createRoute(mainRoute());

    driftUntilReroute(2000);
    await navigation.settled();

    expect(navigation.activeRoute()?.id).toBe("route-a");
    expect(navigation.getStatus()).toMatchObject({
      status: "error",
      message: "Reroute failed: Routing engine timed out after 20 ms",
      route_id: "route-a",
    });

    // retry opens after retryCooldownMs
    clock.set(5000);
    navigation.pushFix(fixAt(70, 60, 5000));
    expect(calls).toHaveLength(3);
    calls[2].resolve(detourRoute("route-b", east(70, 60)));
    await navigation.settled();

    expect(navigation.activeRoute()?.id).toBe("route-b");
    expect(navigation.getStatus()).toMatchObject({
      status: "success",
      turn_type: "depart",
      route_id: "route-b",
    });
    const progress = navigation.getProgress();
    expect(progress.kind === "progress" && progress.nextManeuverIndex).toBe(0);
  });

  test("clearing during a reroute discards the late response", async () => {
    const { navigation, calls, createRoute, driftUntilReroute } = setup();
    const rerouted = jest.fn();
    navigation.on("rerouted", rerouted);
    await createRoute(mainRoute());

    driftUntilReroute(2000);
    expect(navigation.clearRoute()).toEqual({
      cleared: true,
      clearedRouteId: "route-a",
    });

    calls[1].resolve(detourRoute("route-b", east(60, 60)));
    await navigation.settled();

    expect(navigation.activeRoute()).toBeNull();
    expect(navigation.getStatus().status).toBe("no_route");
    expect(navigation.drainRerouteNotices()).toEqual([]);
    expect(rerouted).not.toHaveBeenCalled();
  });

  test("a status read during a reroute sees one whole route", async () => {
    const { navigation, calls, createRoute, driftUntilReroute } = setup();
    const original = await createRoute(mainRoute());

    driftUntilReroute(2000);
    const during = navigation.activeRoute();
    expect(during).toBe(original);
    expect(during?.maneuvers[1].roadName).toBe("Second Street");
    expect(navigation.getStatus().route_id).toBe("route-a");

    const detour = detourRoute("route-b", east(60, 60));
    calls[1].resolve(detour);
    await navigation.settled();

    const after = navigation.activeRoute();
    expect(after).toBe(detour);
    expect(after?.geometry).toEqual(detour.geometry);
    expect(after?.maneuvers.map((maneuver) => maneuver.roadName)).toEqual([
      "Detour Road",
      "",
    ]);
    expect(Object.isFrozen(after)).toBe(true);
  });

  test("a user route replaces a pending reroute", async () => {
    const { navigation, calls, createRoute, driftUntilReroute } = setup();
    await createRoute(mainRoute());

    driftUntilReroute(2000);
    await createRoute(threeTurnRoute("route-user"));
    calls[1].resolve(detourRoute("route-b", east(60, 60)));
    await navigation.settled();

    expect(navigation.activeRoute()?.id).toBe("route-user");
  });

  test("clearing during a create discards the computed route", async () => {
    const { navigation, calls, createRoute } = setup();
    await createRoute(mainRoute());

    const pending = navigation.createRoute(destinations);
    navigation.clearRoute();
    calls[1].resolve(threeTurnRoute("after-clear"));

    await expect(pending).rejects.toThrow(RouteSupersededError);
    expect(navigation.activeRoute()).toBeNull();
    expect(navigation.getStatus().status).toBe("no_route");
  });

  test("clearing during the first create keeps the service without a route", async () => {
    const { navigation, calls } = setup();

    const pending = navigation.createRoute(destinations);
    expect(navigation.clearRoute()).toEqual({
      cleared: false,
      clearedRouteId: null,
    });
    calls[0].resolve(threeTurnRoute("after-clear"));

    await expect(pending).rejects.toThrow(RouteSupersededError);
    expect(navigation.activeRoute()).toBeNull();
  });

  test("overlapping creates commit only the newest request", async () => {
    const { navigation, calls } = setup();
    const created = jest.fn();
    navigation.on("route:created", created);

    const older = navigation.createRoute(destinations);
    const newer = navigation.createRoute(destinations);
    calls[1].resolve(threeTurnRoute("newer"));
    await expect(newer).resolves.toMatchObject({ id: "newer" });
    calls[0].resolve(threeTurnRoute("older"));
    await expect(older).rejects.toThrow(RouteSupersededError);

    expect(navigation.activeRoute()?.id).toBe("newer");
    expect(created).toHaveBeenCalledTimes(1);
  });

  test("clearRoute only clears the named route", async () => {
    const { navigation, createRoute } = setup();
    const cleared = jest.fn();
    navigation.on("route:cleared", cleared);
    await createRoute(mainRoute());

    expect(navigation.clearRoute("other")).toEqual({
      cleared: false,
      clearedRouteId: null,
    });
    expect(navigation.clearRoute("route-a")).toEqual({
      cleared: true,
      clearedRouteId: "route-a",
    });
    expect(navigation.clearRoute()).toEqual({
      cleared: false,
      clearedRouteId: null,
    });
    expect(cleared).toHaveBeenCalledWith("route-a");
  });

  test("unsubscribing stops event delivery", async () => {
    const { navigation, createRoute } = setup();
    const created = jest.fn();
    const off = navigation.on("route:created", created);
    off();
    await createRoute(mainRoute());

    expect(created).not.toHaveBeenCalled();
  });
});
