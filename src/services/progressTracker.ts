import type { Fix, ProgressResult, ProgressState, Route } from "../types";
import { projectOntoPolyline } from "../utils/geo";

type ProgressTrackerOptions = {
  /** How many segments behind the last match a fix may still snap to. */
  backwardToleranceSegments: number;
};

export type ProgressTracker = {
  update: (fix: Fix, route: Route | null) => ProgressResult;
  peek: () => ProgressResult;
  reset: () => void;
};

type Anchor = {
  routeId: string;
  segmentIndex: number;
  maneuverIndex: number;
};

const NO_ROUTE: ProgressResult = Object.freeze({ kind: "no_route" });

function findNextManeuver(
  route: Route,
  alongMeters: number,
  fromIndex: number,
): number {
  const { maneuvers } = route;
  if (maneuvers.length === 0) return -1;

  for (let i = Math.max(0, fromIndex); i < maneuvers.length; i += 1) {
    if (maneuvers[i].distanceFromStartMeters >= alongMeters) {
      return i;
    }
  }
  return maneuvers.length - 1;
}

export function createProgressTracker(
  options: ProgressTrackerOptions,
): ProgressTracker {
  const backwardTolerance = Math.max(
    0,
    Math.floor(options.backwardToleranceSegments),
  );
  let anchor: Anchor | null = null;
  let last: ProgressResult = NO_ROUTE;

  function update(fix: Fix, route: Route | null): ProgressResult {
    if (!route) {
      anchor = null;
      last = NO_ROUTE;
      return last;
    }

    if (!anchor || anchor.routeId !== route.id) {
      anchor = { routeId: route.id, segmentIndex: 0, maneuverIndex: 0 };
    }

    const projection = projectOntoPolyline(
      [fix.lon, fix.lat],
      route.geometry,
      route.cumulativeMeters,
      anchor.segmentIndex - backwardTolerance,
    );
    if (!projection) {
      console.warn("[progress] route has no geometry", { routeId: route.id });
      last = NO_ROUTE;
      return last;
    }

    const lastSegment = Math.max(0, route.geometry.length - 2);
    const arrived =
      route.geometry.length < 2 ||
      (projection.segmentIndex === lastSegment && projection.rawT >= 1);
    const alongRouteDistanceMeters = arrived
      ? route.totalLengthMeters
      : projection.alongMeters;

    const nextManeuverIndex = arrived
      ? route.maneuvers.length - 1
      : findNextManeuver(route, alongRouteDistanceMeters, anchor.maneuverIndex);

    const nextManeuver =
      nextManeuverIndex >= 0 ? route.maneuvers[nextManeuverIndex] : null;
    const distanceToDestinationMeters = Math.max(
      0,
      route.totalLengthMeters - alongRouteDistanceMeters,
    );
    const distanceToNextManeuverMeters = nextManeuver
      ? Math.max(
          0,
          nextManeuver.distanceFromStartMeters - alongRouteDistanceMeters,
        )
      : distanceToDestinationMeters;

    anchor = {
      routeId: route.id,
      segmentIndex: projection.segmentIndex,
      maneuverIndex: Math.max(anchor.maneuverIndex, nextManeuverIndex),
    };

    const state: ProgressState = {
      kind: "progress",
      activeRouteId: route.id,
      nearestSegmentIndex: projection.segmentIndex,
      alongRouteDistanceMeters,
      perpendicularDriftMeters: projection.distanceMeters,
      projectedPoint: projection.projectedPoint,
      nextManeuverIndex,
      distanceToNextManeuverMeters,
      distanceToDestinationMeters,
      arrived,
      fixTimestamp: fix.timestamp,
    };
    last = state;
    return state;
  }

  function peek(): ProgressResult {
    return last;
  }

  function reset(): void {
    anchor = null;
    last = NO_ROUTE;
  }

  return { update, peek, reset };
}
