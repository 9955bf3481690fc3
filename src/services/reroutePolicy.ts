import type {
  Fix,
  ProgressResult,
  ProgressState,
  RerouteState,
  Route,
  RoutingEngine,
  Waypoint,
} from "../types";
import { projectOntoPolyline } from "../utils/geo";
import { RoutingEngineUnavailableError, errorMessage } from "../utils/rejects";
import type { RouteStore } from "./routeStore";

export type RerouteRules = {
  enabled: boolean;
  driftThresholdMeters: number;
  debounceMs: number;
  cooldownMs: number;
  retryCooldownMs: number;
  maxRetries: number;
  timeoutMs: number;
  waypointPassedBufferMeters: number;
};

type ReroutePolicyOptions = {
  routeStore: RouteStore;
  routingEngine: RoutingEngine;
  rules: RerouteRules;
  now?: () => number;
  onRerouted?: (route: Route, previous: Route) => void;
};

export type RerouteSnapshot = {
  state: RerouteState;
  driftSince: number | null;
  consecutiveFailures: number;
  lastError: string | null;
  nextAttemptAt: number;
  inFlight: number;
};

export type ReroutePolicy = {
  observe: (fix: Fix, progress: ProgressResult) => RerouteState;
  state: () => RerouteState;
  lastError: () => string | null;
  snapshot: () => RerouteSnapshot;
  settled: () => Promise<void>;
  reset: () => void;
};

export const REROUTE_ORIGIN_LABEL = "current position";

/**
 * Destinations still ahead of the vehicle. The route's first waypoint is
 * its origin and is never carried over.
 */
export function remainingWaypoints(
  route: Route,
  progress: ProgressState,
  passedBufferMeters: number,
): Waypoint[] {
  const destinations = route.waypoints.slice(1);
  const ahead = destinations.filter((waypoint) => {
    const projection = projectOntoPolyline(
      [waypoint.lon, waypoint.lat],
      route.geometry,
      route.cumulativeMeters,
      progress.nearestSegmentIndex,
    );
    return (
      projection !== null &&
      projection.alongMeters >
        progress.alongRouteDistanceMeters + passedBufferMeters
    );
  });

  if (ahead.length > 0) return ahead;
  const finalWaypoint = route.waypoints[route.waypoints.length - 1];
  return finalWaypoint ? [finalWaypoint] : [];
}

export function createReroutePolicy(
  options: ReroutePolicyOptions,
): ReroutePolicy {
  const { rules, routeStore, routingEngine } = options;
  const now = options.now ?? (() => Date.now());

  let currentState: RerouteState = "ON_ROUTE";
  let driftSince: number | null = null;
  let consecutiveFailures = 0;
  let lastErrorMessage: string | null = null;
  let nextAttemptAt = 0;
  let generation = 0;
  const inFlight = new Set<Promise<void>>();

  async function requestWithTimeout(waypoints: Waypoint[]): Promise<Route> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let timedOut = false;

    const pending = routingEngine.requestRoute({
      waypoints,
      signal: controller.signal,
    });
    pending.catch((error) => {
      if (timedOut) {
        console.warn("[reroute] abandoned request settled with error", {
          error: errorMessage(error),
        });
      }
    });

    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
        reject(
          new RoutingEngineUnavailableError(
            `Routing engine timed out after ${rules.timeoutMs} ms`,
          ),
        );
      }, rules.timeoutMs);
    });

    try {
      return await Promise.race([pending, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  async function runReroute(
    previous: Route,
    expectedRevision: number,
    waypoints: Waypoint[],
    runGeneration: number,
  ): Promise<void> {
    let committed: Route | null = null;

    try {
      const next = await requestWithTimeout(waypoints);
      if (runGeneration !== generation) {
        console.log("[reroute] response arrived after reset, discarded", {
          routeId: next.id,
        });
        return;
      }

      if (!routeStore.replaceIfRevision(expectedRevision, next)) {
        console.log("[reroute] active route changed in flight, discarded", {
          routeId: next.id,
          previousRouteId: previous.id,
        });
        currentState = "ON_ROUTE";
        driftSince = null;
        return;
      }

      committed = routeStore.get();
      consecutiveFailures = 0;
      lastErrorMessage = null;
      driftSince = null;
      nextAttemptAt = now() + rules.cooldownMs;
      currentState = "ON_ROUTE";
      console.log("[reroute] committed new route", {
        routeId: next.id,
        previousRouteId: previous.id,
        waypoints: waypoints.length,
      });
    } catch (error) {
      if (
        runGeneration !== generation ||
        routeStore.revision() !== expectedRevision
      ) {
        console.log("[reroute] failed after route changed, ignored", {
          previousRouteId: previous.id,
          error: errorMessage(error),
        });
        // after a reset the state belongs to the newer generation
        if (runGeneration === generation) {
          currentState = "ON_ROUTE";
          driftSince = null;
        }
        return;
      }

      consecutiveFailures += 1;
      lastErrorMessage = errorMessage(error);
      const backoff =
        rules.retryCooldownMs * 2 ** Math.max(0, consecutiveFailures - 1);
      nextAttemptAt = now() + Math.min(rules.cooldownMs, backoff);
      currentState = "ON_ROUTE";
      console.warn("[reroute] routing engine call failed", {
        routeId: previous.id,
        consecutiveFailures,
        maxRetries: rules.maxRetries,
        error: lastErrorMessage,
      });
    }

    if (committed && options.onRerouted) {
      try {
        options.onRerouted(committed, previous);
      } catch (error) {
        console.error("[reroute] rerouted listener failed", {
          routeId: committed.id,
          error: errorMessage(error),
        });
      }
    }
  }

  function startReroute(fix: Fix, progress: ProgressState): void {
    const route = routeStore.get();
    if (!route || route.id !== progress.activeRouteId) return;

    const destinations = remainingWaypoints(
      route,
      progress,
      rules.waypointPassedBufferMeters,
    );
    if (destinations.length === 0) return;

    const waypoints: Waypoint[] = [
      { lon: fix.lon, lat: fix.lat, label: REROUTE_ORIGIN_LABEL },
      ...destinations,
    ];

    currentState = "REROUTING";
    console.log("[reroute] requesting new route", {
      routeId: route.id,
      driftMeters: progress.perpendicularDriftMeters,
      destinations: destinations.length,
    });

    const run = runReroute(
      route,
      routeStore.revision(),
      waypoints,
      generation,
    ).finally(() => {
      inFlight.delete(run);
    });
    inFlight.add(run);
  }

  function observe(fix: Fix, progress: ProgressResult): RerouteState {
    if (currentState === "REROUTING") return currentState;

    if (progress.kind === "no_route" || !rules.enabled) {
      driftSince = null;
      currentState = "ON_ROUTE";
      return currentState;
    }

    const at = now();
    if (progress.perpendicularDriftMeters <= rules.driftThresholdMeters) {
      driftSince = null;
      consecutiveFailures = 0;
      lastErrorMessage = null;
      currentState = "ON_ROUTE";
      return currentState;
    }

    if (driftSince === null) driftSince = at;
    if (at - driftSince < rules.debounceMs) return currentState;

    currentState = "DRIFTING";
    if (consecutiveFailures >= rules.maxRetries) return currentState;
    if (at < nextAttemptAt) return currentState;

    startReroute(fix, progress);
    return currentState;
  }

  function snapshot(): RerouteSnapshot {
    return {
      state: currentState,
      driftSince,
      consecutiveFailures,
      lastError: lastErrorMessage,
      nextAttemptAt,
      inFlight: inFlight.size,
    };
  }

  async function settled(): Promise<void> {
    while (inFlight.size > 0) {
      await Promise.all(Array.from(inFlight));
    }
  }

  function reset(): void {
    generation += 1;
    currentState = "ON_ROUTE";
    driftSince = null;
    consecutiveFailures = 0;
    lastErrorMessage = null;
    nextAttemptAt = 0;
  }

  return {
    observe,
    state: () => currentState,
    lastError: () => lastErrorMessage,
    snapshot,
    settled,
    reset,
  };
}
