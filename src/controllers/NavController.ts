import { type Request, type Response, Router } from "express";
import { body } from "express-validator";
import type { NavigationService } from "../services/navigationService";
import type { Route, Waypoint } from "../types";
import {
  BAD_GATEWAY,
  BAD_REQUEST,
  CONFLICT,
  INVALID_FIX,
  NOT_FOUND,
  OK,
  ROUTE_SUPERSEDED,
  ROUTING_ENGINE_FAILED,
  ROUTING_ENGINE_UNAVAILABLE,
  SERVICE_UNAVAILABLE,
  UNKNOWN_ROUTE,
} from "../utils/common/responseCodes";
import { isRecord, toRawFix } from "../utils/fix";
import {
  checkReqBodyInput,
  checkReqDataError,
} from "../utils/helpers/errorHandling";
import { isFiniteNumber, roundTo } from "../utils/numbers";
import {
  RouteSupersededError,
  RoutingEngineError,
  RoutingEngineUnavailableError,
  errorMessage,
} from "../utils/rejects";

function toWaypoint(entry: unknown, index: number): Waypoint | null {
  if (Array.isArray(entry)) {
    const lon = Number(entry[0]);
    const lat = Number(entry[1]);
    if (entry.length < 2 || !isFiniteNumber(lon) || !isFiniteNumber(lat)) {
      return null;
    }
    return { lon, lat, label: `waypoint ${index + 1}` };
  }

  if (isRecord(entry)) {
    const lon = Number(entry.lon);
    const lat = Number(entry.lat);
    if (!isFiniteNumber(lon) || !isFiniteNumber(lat)) return null;
    const label =
      typeof entry.label === "string" && entry.label.trim()
        ? entry.label.trim()
        : `waypoint ${index + 1}`;
    return { lon, lat, label };
  }

  return null;
}

function inRange(waypoint: Waypoint): boolean {
  return (
    waypoint.lon >= -180 &&
    waypoint.lon <= 180 &&
    waypoint.lat >= -90 &&
    waypoint.lat <= 90
  );
}

/** `{waypoints: [...]}` or the shorthand `{origin, destination}`. */
export function readWaypoints(input: unknown): Waypoint[] | null {
  if (!isRecord(input)) return null;

  const entries: unknown[] | null = Array.isArray(input.waypoints)
    ? input.waypoints
    : input.origin !== undefined && input.destination !== undefined
      ? [input.origin, input.destination]
      : null;
  if (!entries || entries.length < 2) return null;

  const waypoints: Waypoint[] = [];
  for (const [index, entry] of entries.entries()) {
    const waypoint = toWaypoint(entry, index);
    if (!waypoint || !inRange(waypoint)) return null;
    waypoints.push(waypoint);
  }
  return waypoints;
}

function validateWaypoints(_value: unknown, meta: { req: { body?: unknown } }) {
  if (!readWaypoints(meta.req.body)) {
    throw new Error(
      "waypoints must hold at least 2 [lon, lat] pairs or {lon, lat} objects within range",
    );
  }
  return true;
}

function routeResponse(route: Route) {
  return {
    route_id: route.id,
    distance_m: route.distanceMeters,
    duration_s: route.durationSeconds,
    maneuvers: route.maneuvers.map((maneuver) => ({
      instruction: maneuver.instructionText,
      name: maneuver.roadName,
      type: maneuver.turnType,
      location: maneuver.position,
      distance_along_m: roundTo(maneuver.distanceFromStartMeters, 1),
    })),
    geometry: route.geometry,
    waypoints: route.waypoints,
  };
}

type HealthDetails = () => Record<string, unknown>;

class NavController {
  rt = Router();

  constructor(
    private readonly navigation: NavigationService,
    private readonly healthDetails: HealthDetails = () => ({}),
  ) {}

  routes() {
    this.rt.route("/route").post(this.createRoute);
    this.rt.route("/clear_route").post(this.clearRoute);
    this.rt.route("/nav_cmd").get(this.navCmd);
    this.rt.route("/update_gnss").post(this.updateGnss);
    this.rt.route("/position").post(this.position);
    this.rt.route("/latest_position").get(this.latestPosition);
    this.rt.route("/reroute_events").get(this.rerouteEvents);
    this.rt.route("/health").get(this.health);
    return this.rt;
  }

  createRoute = [
    checkReqBodyInput,
    body("waypoints").custom(validateWaypoints),
    checkReqDataError,
    async (req: Request, res: Response) => {
      const waypoints = readWaypoints(req.body) ?? [];
      try {
        const route = await this.navigation.createRoute(waypoints);
        return res.status(OK).json(routeResponse(route));
      } catch (error) {
        console.warn("[http] route creation failed", {
          error: errorMessage(error),
        });
        if (error instanceof RouteSupersededError) {
          return res
            .status(CONFLICT)
            .json({ ...ROUTE_SUPERSEDED, error: error.message });
        }
        if (error instanceof RoutingEngineUnavailableError) {
          return res.status(SERVICE_UNAVAILABLE).json({
            ...ROUTING_ENGINE_UNAVAILABLE,
            error: error.message,
          });
        }
        if (error instanceof RoutingEngineError) {
          return res
            .status(BAD_GATEWAY)
            .json({ ...ROUTING_ENGINE_FAILED, error: error.message });
        }
        return res.status(BAD_REQUEST).json({ error: errorMessage(error) });
      }
    },
  ];

  clearRoute = [
    body("route_id").optional().isString(),
    checkReqDataError,
    (req: Request, res: Response) => {
      const requested: unknown = isRecord(req.body)
        ? req.body.route_id
        : undefined;
      const routeId = typeof requested === "string" ? requested : undefined;
      const outcome = this.navigation.clearRoute(routeId);
      return res.status(OK).json({
        status: "ok",
        cleared: outcome.cleared,
        cleared_route_id: outcome.clearedRouteId,
      });
    },
  ];

  navCmd = (_req: Request, res: Response) => {
    return res.status(OK).json(this.navigation.getStatus());
  };

  updateGnss = [
    checkReqBodyInput,
    (req: Request, res: Response) => {
      if (!isRecord(req.body)) {
        return res
          .status(BAD_REQUEST)
          .json({ ...INVALID_FIX, error: "Body must be a JSON object" });
      }
      const outcome = this.navigation.ingestFix(toRawFix(req.body), "http");
      if (!outcome.accepted) {
        return res
          .status(BAD_REQUEST)
          .json({ ...INVALID_FIX, error: outcome.error });
      }
      return res.status(OK).json({ status: "ok", latest: outcome.isLatest });
    },
  ];

  position = [
    checkReqBodyInput,
    (req: Request, res: Response) => {
      const payload: unknown = req.body;
      if (!isRecord(payload)) {
        return res
          .status(BAD_REQUEST)
          .json({ ...INVALID_FIX, error: "Body must be a JSON object" });
      }

      const active = this.navigation.activeRoute();
      if (
        typeof payload.route_id === "string" &&
        payload.route_id !== active?.id
      ) {
        return res.status(NOT_FOUND).json({ ...UNKNOWN_ROUTE });
      }

      const raw = toRawFix(payload);
      if (Array.isArray(payload.position)) {
        raw.lon = payload.position[0];
        raw.lat = payload.position[1];
      }

      const outcome = this.navigation.ingestFix(raw, "http");
      if (!outcome.accepted) {
        return res
          .status(BAD_REQUEST)
          .json({ ...INVALID_FIX, error: outcome.error });
      }

      const route = this.navigation.activeRoute();
      const progress = this.navigation.getProgress();
      const navState = this.navigation.rerouteSnapshot().state;
      if (!route || progress.kind === "no_route") {
        return res.status(OK).json({
          route_id: null,
          projected_point: null,
          distance_to_next_m: null,
          next_maneuver: null,
          remaining_distance_m: null,
          drift_m: null,
          nav_state: navState,
        });
      }

      const next =
        progress.nextManeuverIndex >= 0
          ? route.maneuvers[progress.nextManeuverIndex]
          : undefined;
      return res.status(OK).json({
        route_id: route.id,
        projected_point: progress.projectedPoint,
        distance_to_next_m: roundTo(progress.distanceToNextManeuverMeters, 1),
        next_maneuver: next
          ? {
              instruction: next.instructionText,
              name: next.roadName,
              type: next.turnType,
              location: next.position,
              distance_to_maneuver_m: roundTo(
                progress.distanceToNextManeuverMeters,
                1,
              ),
            }
          : null,
        remaining_distance_m: roundTo(progress.distanceToDestinationMeters, 1),
        drift_m: roundTo(progress.perpendicularDriftMeters, 1),
        arrived: progress.arrived,
        nav_state: navState,
      });
    },
  ];

  latestPosition = (_req: Request, res: Response) => {
    const fix = this.navigation.latestFix();
    if (!fix) {
      return res.status(NOT_FOUND).json({ error: "No GNSS data yet" });
    }
    return res.status(OK).json({
      ...fix,
      history_size: this.navigation.history().length,
    });
  };

  rerouteEvents = (_req: Request, res: Response) => {
    return res
      .status(OK)
      .json({ events: this.navigation.drainRerouteNotices() });
  };

  health = (_req: Request, res: Response) => {
    const route = this.navigation.activeRoute();
    return res.status(OK).json({
      status: "ok",
      service: "live_nav",
      active_route_id: route?.id ?? null,
      nav_state: this.navigation.rerouteSnapshot().state,
      ...this.healthDetails(),
      timestamp: Date.now(),
    });
  };
}

export default NavController;
