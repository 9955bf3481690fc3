import type {
  Fix,
  LonLat,
  ProgressState,
  Route,
  RouteRequest,
  RoutingEngine,
  TurnType,
  Waypoint,
} from "../types";
import { offsetMeters } from "../utils/geo";
import { buildRoute } from "../utils/routes";

export const ORIGIN: LonLat = [0, 0];

/** Point `eastMeters` along the equator from ORIGIN, shifted north. */
export function east(eastMeters: number, northMeters = 0): LonLat {
  return offsetMeters(ORIGIN, eastMeters, northMeters);
}

export function waypointAt(point: LonLat, label: string): Waypoint {
  return { lon: point[0], lat: point[1], label };
}

export function fixAt(
  eastMeters: number,
  northMeters: number,
  timestamp: number,
): Fix {
  const [lon, lat] = east(eastMeters, northMeters);
  return { lon, lat, yaw: 90, timestamp };
}

type StraightRouteOptions = {
  id: string;
  /** Vertex positions in metres east of ORIGIN. */
  vertices: number[];
  maneuvers: Array<[number, TurnType, string]>;
  waypoints?: Waypoint[];
};

/** Route running due east along the equator. */
export function straightRoute(options: StraightRouteOptions): Route {
  const geometry = options.vertices.map((meters) => east(meters));
  const last = options.vertices[options.vertices.length - 1];
  return buildRoute({
    id: options.id,
    geometry,
    maneuvers: options.maneuvers.map(([meters, turnType, roadName]) => ({
      position: east(meters),
      turnType,
      roadName,
      distanceFromStartMeters: meters,
    })),
    waypoints: options.waypoints ?? [
      waypointAt(geometry[0], "start"),
      waypointAt(east(last), "destination"),
    ],
    createdAt: 1000,
  });
}

/** Maneuvers at 0, 100 and 250 m: left, right, arrive. */
export function threeTurnRoute(id = "route-a"): Route {
  return straightRoute({
    id,
    vertices: [0, 100, 250],
    maneuvers: [
      [0, "left", "First Street"],
      [100, "right", "Second Street"],
      [250, "arrive", ""],
    ],
  });
}

/** Route starting at `start` and heading to a point 300 m east of ORIGIN. */
export function detourRoute(id: string, start: LonLat): Route {
  return buildRoute({
    id,
    geometry: [start, east(300)],
    maneuvers: [
      { position: start, turnType: "depart", roadName: "Detour Road" },
      { position: east(300), turnType: "arrive" },
    ],
    waypoints: [waypointAt(start, "current position"), waypointAt(east(300), "destination")],
    createdAt: 2000,
  });
}

export function progressOn(
  route: Route,
  driftMeters: number,
  alongMeters = 50,
): ProgressState {
  return {
    kind: "progress",
    activeRouteId: route.id,
    nearestSegmentIndex: 0,
    alongRouteDistanceMeters: alongMeters,
    perpendicularDriftMeters: driftMeters,
    projectedPoint: east(alongMeters),
    nextManeuverIndex: 0,
    distanceToNextManeuverMeters: 0,
    distanceToDestinationMeters: route.totalLengthMeters - alongMeters,
    arrived: false,
    fixTimestamp: 1,
  };
}

type PendingCall = {
  request: RouteRequest;
  resolve: (route: Route) => void;
  reject: (error: unknown) => void;
};

/**
 * In-process routing engine. Without `respond` every call stays pending
 * until the test settles it through `calls`.
 */
export function createFakeEngine(
  respond?: (request: RouteRequest) => Promise<Route>,
) {
  const calls: PendingCall[] = [];

  const engine: RoutingEngine = {
    requestRoute: (request) => {
      if (respond) {
        calls.push({ request, resolve: () => undefined, reject: () => undefined });
        return respond(request);
      }
      return new Promise<Route>((resolve, reject) => {
        calls.push({ request, resolve, reject });
      });
    },
  };

  return { engine, calls };
}

export function createClock(start = 0) {
  let current = start;
  return {
    now: () => current,
    set: (value: number) => {
      current = value;
    },
  };
}

export function quietConsole(): void {
  jest.spyOn(console, "log").mockImplementation(() => undefined);
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
  jest.spyOn(console, "error").mockImplementation(() => undefined);
}
