import axios from "axios";
import type { LonLat, Route, RouteRequest, RoutingEngine } from "../types";
import { decodePolyline } from "../utils/geo";
import { isRecord } from "../utils/fix";
import { turnTypeFromOsrm } from "../utils/maneuvers";
import { isFiniteNumber } from "../utils/numbers";
import {
  RoutingEngineError,
  RoutingEngineUnavailableError,
  errorMessage,
} from "../utils/rejects";
import { type ManeuverInput, buildRoute } from "../utils/routes";

export type OsrmHttpGet = (
  url: string,
  config: {
    params: Record<string, string>;
    timeout: number;
    signal?: AbortSignal;
  },
) => Promise<{ data: unknown }>;

type OsrmClientOptions = {
  baseUrl: string;
  profile: string;
  timeoutMs: number;
  httpGet?: OsrmHttpGet;
};

const defaultHttpGet: OsrmHttpGet = (url, config) =>
  axios.get<unknown>(url, config);

function toLonLat(value: unknown): LonLat | null {
  if (!Array.isArray(value) || value.length < 2) return null;
  const lon = Number(value[0]);
  const lat = Number(value[1]);
  return isFiniteNumber(lon) && isFiniteNumber(lat) ? [lon, lat] : null;
}

function readString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function parseGeometry(geometry: unknown): LonLat[] {
  if (typeof geometry === "string") {
    try {
      return decodePolyline(geometry);
    } catch (error) {
      throw new RoutingEngineError(`Invalid polyline: ${errorMessage(error)}`);
    }
  }

  if (isRecord(geometry) && Array.isArray(geometry.coordinates)) {
    return geometry.coordinates
      .map(toLonLat)
      .filter((entry): entry is LonLat => entry !== null);
  }

  throw new RoutingEngineError("Unsupported geometry format from OSRM");
}

function parseManeuvers(legs: unknown): ManeuverInput[] {
  if (!Array.isArray(legs)) return [];

  const maneuvers: ManeuverInput[] = [];
  legs.forEach((leg: unknown, legIndex) => {
    if (!isRecord(leg) || !Array.isArray(leg.steps)) return;
    const isFirstLeg = legIndex === 0;
    const isLastLeg = legIndex === legs.length - 1;

    const steps: unknown[] = leg.steps;
    for (const step of steps) {
      if (!isRecord(step) || !isRecord(step.maneuver)) continue;
      const position = toLonLat(step.maneuver.location);
      if (!position) continue;

      const type = readString(step.maneuver.type);
      // via points end one leg and start the next
      if (type === "depart" && !isFirstLeg) continue;
      if (type === "arrive" && !isLastLeg) continue;

      maneuvers.push({
        position,
        turnType: turnTypeFromOsrm(type, readString(step.maneuver.modifier)),
        roadName: readString(step.name) || readString(step.ref),
      });
    }
  });
  return maneuvers;
}

export function parseOsrmRoute(
  data: unknown,
  request: RouteRequest,
): Route {
  if (!isRecord(data)) {
    throw new RoutingEngineError("Empty response from OSRM");
  }
  if (data.code !== undefined && data.code !== "Ok") {
    throw new RoutingEngineError(
      `OSRM returned ${readString(data.code)}: ${readString(data.message)}`,
    );
  }
  const first: unknown = Array.isArray(data.routes) ? data.routes[0] : null;
  if (!isRecord(first)) {
    throw new RoutingEngineError("No routes returned by OSRM");
  }

  const geometry = parseGeometry(first.geometry);
  if (geometry.length < 2) {
    throw new RoutingEngineError("OSRM route geometry is too short");
  }

  return buildRoute({
    geometry,
    maneuvers: parseManeuvers(first.legs),
    waypoints: request.waypoints,
    distanceMeters: isFiniteNumber(first.distance) ? first.distance : undefined,
    durationSeconds: isFiniteNumber(first.duration) ? first.duration : 0,
  });
}

export function createOsrmClient(options: OsrmClientOptions): RoutingEngine {
  const httpGet = options.httpGet ?? defaultHttpGet;
  const baseUrl = options.baseUrl.replace(/\/+$/, "");

  async function requestRoute(request: RouteRequest): Promise<Route> {
    if (request.waypoints.length < 2) {
      throw new RoutingEngineError("At least 2 waypoints required");
    }

    const coords = request.waypoints
      .map((waypoint) => `${waypoint.lon},${waypoint.lat}`)
      .join(";");
    const url = `${baseUrl}/route/v1/${options.profile}/${coords}`;

    let data: unknown;
    try {
      const response = await httpGet(url, {
        params: { overview: "full", geometries: "geojson", steps: "true" },
        timeout: options.timeoutMs,
        signal: request.signal,
      });
      data = response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        const body = error.response.data;
        const detail = isRecord(body) ? readString(body.message) : "";
        throw new RoutingEngineError(
          `OSRM responded ${error.response.status}${detail ? `: ${detail}` : ""}`,
        );
      }
      throw new RoutingEngineUnavailableError(
        `OSRM request failed: ${errorMessage(error)}`,
      );
    }

    return parseOsrmRoute(data, request);
  }

  return { requestRoute };
}
