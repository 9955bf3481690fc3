import { EventEmitter } from "events";
import type {
  Fix,
  NavStatus,
  ProgressResult,
  RawFixPayload,
  RerouteNotice,
  Route,
  RoutingEngine,
  Waypoint,
} from "../types";
import { RouteSupersededError, RoutingEngineError } from "../utils/rejects";
import type { PositionFeed, PushResult } from "./positionFeed";
import type { ProgressTracker } from "./progressTracker";
import {
  type RerouteRules,
  type RerouteSnapshot,
  createReroutePolicy,
} from "./reroutePolicy";
import type { RouteStore } from "./routeStore";
import { buildNavStatus } from "./statusPublisher";

export type NavigationEventMap = {
  "route:created": [Route];
  "route:cleared": [string];
  rerouted: [RerouteNotice, Route];
};

export type FixOutcome =
  | { accepted: false; error: string }
  | { accepted: true; isLatest: boolean; fix: Fix; progress: ProgressResult };

export type ClearOutcome = {
  cleared: boolean;
  clearedRouteId: string | null;
};

type NavigationServiceOptions = {
  feed: PositionFeed;
  routeStore: RouteStore;
  tracker: ProgressTracker;
  routingEngine: RoutingEngine;
  rerouteRules: RerouteRules;
  now?: () => number;
  noticeQueueLimit?: number;
};

export type NavigationService = {
  pushFix: (fix: Fix, source?: string) => FixOutcome;
  ingestFix: (raw: RawFixPayload, source?: string) => FixOutcome;
  createRoute: (waypoints: Waypoint[]) => Promise<Route>;
  clearRoute: (routeId?: string) => ClearOutcome;
  getStatus: () => NavStatus;
  getProgress: () => ProgressResult;
  activeRoute: () => Route | null;
  latestFix: () => Fix | null;
  history: (windowMs?: number) => Fix[];
  drainRerouteNotices: () => RerouteNotice[];
  rerouteSnapshot: () => RerouteSnapshot;
  settled: () => Promise<void>;
  on: <K extends keyof NavigationEventMap>(
    event: K,
    listener: (...args: NavigationEventMap[K]) => void,
  ) => () => void;
};

export function createNavigationService(
  options: NavigationServiceOptions,
): NavigationService {
  const { feed, routeStore, tracker, routingEngine } = options;
  const now = options.now ?? (() => Date.now());
  const noticeQueueLimit = options.noticeQueueLimit ?? 50;
  const events = new EventEmitter();
  let pendingNotices: RerouteNotice[] = [];
  // bumped by every create and every clear; only the newest create commits
  let commandGeneration = 0;

  function emit<K extends keyof NavigationEventMap>(
    event: K,
    ...args: NavigationEventMap[K]
  ): void {
    events.emit(event, ...args);
  }

  function recompute(): ProgressResult {
    const fix = feed.latest();
    if (!fix) {
      tracker.reset();
      return tracker.peek();
    }
    return tracker.update(fix, routeStore.get());
  }

  function handleRerouted(route: Route, previous: Route): void {
    recompute();

    const notice: RerouteNotice = {
      rerouted: true,
      route_id: route.id,
      previous_route_id: previous.id,
      reason: "drift",
      timestamp: now(),
    };
    pendingNotices = [...pendingNotices, notice].slice(-noticeQueueLimit);
    emit("rerouted", notice, route);
  }

  const policy = createReroutePolicy({
    routeStore,
    routingEngine,
    rules: options.rerouteRules,
    now,
    onRerouted: handleRerouted,
  });

  function applyPush(result: PushResult): FixOutcome {
    if (!result.accepted) {
      return result;
    }
    if (!result.isLatest) {
      return { ...result, progress: tracker.peek() };
    }

    const progress = tracker.update(result.fix, routeStore.get());
    policy.observe(result.fix, progress);
    return { ...result, progress };
  }

  function pushFix(fix: Fix, source?: string): FixOutcome {
    return applyPush(feed.push(fix, source));
  }

  function ingestFix(raw: RawFixPayload, source?: string): FixOutcome {
    return applyPush(feed.ingest(raw, source));
  }

  async function createRoute(waypoints: Waypoint[]): Promise<Route> {
    if (waypoints.length < 2) {
      throw new RoutingEngineError("At least 2 waypoints required");
    }

    commandGeneration += 1;
    const requestGeneration = commandGeneration;
    const route = await routingEngine.requestRoute({ waypoints });
    if (requestGeneration !== commandGeneration) {
      console.log("[route] superseded while computing, discarded", {
        routeId: route.id,
      });
      throw new RouteSupersededError();
    }

    policy.reset();
    const committed = routeStore.set(route);
    recompute();

    console.log("[route] created", {
      routeId: committed.id,
      distanceMeters: committed.distanceMeters,
      maneuvers: committed.maneuvers.length,
    });
    emit("route:created", committed);
    return committed;
  }

  function clearRoute(routeId?: string): ClearOutcome {
    const active = routeStore.get();
    if (!routeId || routeId === active?.id) {
      commandGeneration += 1;
    }
    if (!active) {
      return { cleared: false, clearedRouteId: null };
    }
    if (routeId && routeId !== active.id) {
      return { cleared: false, clearedRouteId: null };
    }

    routeStore.clear();
    policy.reset();
    tracker.reset();
    console.log("[route] cleared", { routeId: active.id });
    emit("route:cleared", active.id);
    return { cleared: true, clearedRouteId: active.id };
  }

  function getStatus(): NavStatus {
    return buildNavStatus({
      route: routeStore.get(),
      progress: tracker.peek(),
      rerouteError: policy.lastError(),
      navState: policy.state(),
    });
  }

  function drainRerouteNotices(): RerouteNotice[] {
    const drained = pendingNotices;
    pendingNotices = [];
    return drained;
  }

  function on<K extends keyof NavigationEventMap>(
    event: K,
    listener: (...args: NavigationEventMap[K]) => void,
  ): () => void {
    events.on(event, listener);
    return () => {
      events.off(event, listener);
    };
  }

  return {
    pushFix,
    ingestFix,
    createRoute,
    clearRoute,
    getStatus,
    getProgress: () => tracker.peek(),
    activeRoute: () => routeStore.get(),
    latestFix: () => feed.latest(),
    history: (windowMs?: number) => feed.history(windowMs),
    drainRerouteNotices,
    rerouteSnapshot: () => policy.snapshot(),
    settled: () => policy.settled(),
    on,
  };
}
