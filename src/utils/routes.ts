import { randomUUID } from "crypto";
import type { LonLat, Maneuver, Route, TurnType, Waypoint } from "../types";
import { buildCumulativeMeters, projectOntoPolyline } from "./geo";
import { describeManeuver } from "./maneuvers";
import { RouteProjectionError } from "./rejects";

export type ManeuverInput = {
  position: LonLat;
  turnType: TurnType;
  roadName?: string;
  instructionText?: string;
  distanceFromStartMeters?: number;
};

export type RouteInput = {
  id?: string;
  geometry: LonLat[];
  maneuvers: ManeuverInput[];
  waypoints: Waypoint[];
  distanceMeters?: number;
  durationSeconds?: number;
  createdAt?: number;
};

/**
 * Builds an immutable-ready Route: cumulative length table, maneuvers
 * anchored by projecting their position onto the geometry when no distance
 * is given, sorted by distance from the start.
 */
export function buildRoute(input: RouteInput): Route {
  const geometry = input.geometry.map(
    (vertex): LonLat => [vertex[0], vertex[1]],
  );
  if (geometry.length < 2) {
    throw new RouteProjectionError("Route geometry needs at least 2 points");
  }

  const cumulativeMeters = buildCumulativeMeters(geometry);
  const totalLengthMeters = cumulativeMeters[cumulativeMeters.length - 1];

  const maneuvers: Maneuver[] = input.maneuvers
    .map((entry) => {
      const roadName = entry.roadName ?? "";
      let distance = entry.distanceFromStartMeters;
      if (distance === undefined) {
        const projection = projectOntoPolyline(
          entry.position,
          geometry,
          cumulativeMeters,
        );
        distance = projection ? projection.alongMeters : 0;
      }
      if (entry.turnType === "arrive") {
        distance = Math.max(distance, totalLengthMeters);
      }

      const position: LonLat = [entry.position[0], entry.position[1]];
      return {
        position,
        turnType: entry.turnType,
        roadName,
        instructionText:
          entry.instructionText ?? describeManeuver(entry.turnType, roadName),
        distanceFromStartMeters: distance,
      };
    })
    .sort((a, b) => a.distanceFromStartMeters - b.distanceFromStartMeters);

  return {
    id: input.id ?? randomUUID(),
    geometry,
    cumulativeMeters,
    totalLengthMeters,
    maneuvers,
    waypoints: input.waypoints.map((waypoint) => ({ ...waypoint })),
    distanceMeters: input.distanceMeters ?? totalLengthMeters,
    durationSeconds: input.durationSeconds ?? 0,
    createdAt: input.createdAt ?? Date.now(),
  };
}
